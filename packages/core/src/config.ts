import fs from "fs";
import path from "path";
import { ConfigError } from "./errors.js";
import type { AuditSettings, Config, ConfigLayer, OutputFormat } from "./types.js";
import { DEFAULT_SETTINGS } from "./types.js";
import { v, validate } from "./validation.js";

/** File name of the per-project settings file. */
export const PROJECT_CONFIG_FILE = "pomsync.json";

function isRecord(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep-get a nested value from an object using dot-notation keys.
 */
function deepGet(obj: Record<string, unknown>, key: string): unknown {
	let current: unknown = obj;
	for (const part of key.split(".")) {
		if (!isRecord(current)) return undefined;
		current = current[part];
	}
	return current;
}

/**
 * Deep-merge source into target (mutates target). Arrays are replaced, not
 * concatenated. `undefined` values in source never overwrite.
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): void {
	for (const key of Object.keys(source)) {
		const sv = source[key];
		const tv = target[key];
		if (sv === undefined) continue;
		if (isRecord(sv)) {
			const into: Record<string, unknown> = isRecord(tv) ? tv : {};
			deepMerge(into, sv);
			target[key] = into;
		} else {
			target[key] = sv;
		}
	}
}

/**
 * Create a config layer backed by an in-memory object with dot-notation key support.
 *
 * @example
 * ```ts
 * const cfg = createConfig("project", { paths: { pom: "parent/pom.xml" } });
 * cfg.get("paths.pom"); // "parent/pom.xml"
 * cfg.get("group", "maven-plugins"); // "maven-plugins"
 * ```
 */
export function createConfig(layer: ConfigLayer, initial: Record<string, unknown> = {}): Config {
	const data: Record<string, unknown> = {};
	deepMerge(data, initial);

	function get<T>(key: string): T | undefined;
	function get<T>(key: string, fallback: T): T;
	function get<T>(key: string, fallback?: T): T | undefined {
		const val = deepGet(data, key);
		return (val !== undefined ? val : fallback) as T | undefined;
	}

	return {
		layer,
		get,

		all(): Record<string, unknown> {
			return { ...data };
		},

		merge(other: Record<string, unknown>): void {
			deepMerge(data, other);
		},
	};
}

/**
 * Cascade multiple config layers into a single merged config.
 *
 * Layers are applied left-to-right, so later layers override earlier ones
 * on key conflicts.
 */
export function cascadeConfigs(...layers: Config[]): Config {
	const merged = createConfig("merged");
	for (const layer of layers) {
		merged.merge(layer.all());
	}
	return merged;
}

const projectConfigValidator = v.object({
	pom: v.optional(v.string().min(1).validate).validate,
	dependabot: v.optional(v.string().min(1).validate).validate,
	ecosystem: v.optional(v.string().pattern(/^[A-Za-z0-9_-]+$/).validate).validate,
	group: v.optional(v.string().min(1).validate).validate,
	format: v.optional(v.oneOf(["text", "json"] as const).validate).validate,
	logLevel: v.optional(v.oneOf(["debug", "info", "warn", "error", "fatal", "silent"] as const).validate).validate,
	logFormat: v.optional(v.oneOf(["text", "json"] as const).validate).validate,
}).validate;

/**
 * Load project-level settings from `<projectPath>/pomsync.json`.
 *
 * Returns an empty object if the file does not exist. Unknown keys are dropped.
 *
 * @throws {ConfigError} If the file exists but is not valid JSON or has invalid values.
 */
export function loadProjectConfig(projectPath: string): Partial<AuditSettings> {
	const configPath = path.join(projectPath, PROJECT_CONFIG_FILE);
	if (!fs.existsSync(configPath)) return {};

	let parsed: unknown;
	try {
		parsed = JSON.parse(fs.readFileSync(configPath, "utf-8"));
	} catch (err) {
		throw new ConfigError(`Failed to parse ${configPath}`, err instanceof Error ? err : undefined);
	}

	const result = validate(parsed, projectConfigValidator);
	if (!result.valid || !result.value) {
		const reasons = result.errors.map((e) => e.message).join("; ");
		throw new ConfigError(`Invalid ${configPath}: ${reasons}`);
	}
	return result.value;
}

/**
 * Read settings overrides from `POMSYNC_*` environment variables.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): Partial<AuditSettings> {
	const overrides: Record<string, unknown> = {
		pom: env.POMSYNC_POM?.trim() || undefined,
		dependabot: env.POMSYNC_DEPENDABOT?.trim() || undefined,
		ecosystem: env.POMSYNC_ECOSYSTEM?.trim() || undefined,
		group: env.POMSYNC_GROUP?.trim() || undefined,
		format: env.POMSYNC_FORMAT?.trim() || undefined,
		logFormat: env.POMSYNC_LOG_FORMAT?.trim() || undefined,
	};

	const result = validate(overrides, projectConfigValidator);
	if (!result.valid || !result.value) {
		const reasons = result.errors.map((e) => e.message).join("; ");
		throw new ConfigError(`Invalid POMSYNC_* environment: ${reasons}`);
	}
	return result.value;
}

/**
 * Resolve the settings for one audit run.
 *
 * Priority, lowest first: {@link DEFAULT_SETTINGS}, `pomsync.json`,
 * `POMSYNC_*` environment variables, then explicit overrides (CLI flags).
 */
export function resolveSettings(
	projectPath: string,
	overrides: Partial<AuditSettings> = {},
	env: NodeJS.ProcessEnv = process.env,
): AuditSettings {
	const merged = cascadeConfigs(
		createConfig("defaults", { ...DEFAULT_SETTINGS }),
		createConfig("project", loadProjectConfig(projectPath)),
		createConfig("env", loadEnvConfig(env)),
		createConfig("cli", overrides),
	);

	return {
		pom: merged.get("pom", DEFAULT_SETTINGS.pom),
		dependabot: merged.get("dependabot", DEFAULT_SETTINGS.dependabot),
		ecosystem: merged.get("ecosystem", DEFAULT_SETTINGS.ecosystem),
		group: merged.get("group", DEFAULT_SETTINGS.group),
		format: merged.get("format", DEFAULT_SETTINGS.format),
		logLevel: merged.get<string>("logLevel"),
		logFormat: merged.get<OutputFormat>("logFormat"),
	};
}
