/**
 * @pomsync/audit — File-level entry point.
 * Reads the manifest and the update-bot configuration, then runs the check.
 */

import fs from "fs";
import path from "path";
import { createLogger, InputError } from "@pomsync/core";
import { DEFAULT_CONTEXT, check } from "./checker.js";
import { parseManifest } from "./manifest-loader.js";
import type { AuditReport, AuditRule } from "./types.js";

export interface ProjectAuditOptions {
	/** Directory relative paths resolve against. Defaults to the working directory. */
	projectDir?: string;
	/** Manifest path. Defaults to `pom.xml`. */
	pomPath?: string;
	/** Update-bot configuration path. Defaults to `.github/dependabot.yml`. */
	dependabotPath?: string;
	ecosystem?: string;
	group?: string;
	rules?: readonly AuditRule[];
}

const log = createLogger("audit:project");

function readInput(filePath: string): string {
	if (!fs.existsSync(filePath)) {
		throw new InputError(`File not found: ${filePath}`, filePath);
	}
	try {
		return fs.readFileSync(filePath, "utf-8");
	} catch (err) {
		throw new InputError(`Failed to read ${filePath}`, filePath, err instanceof Error ? err : undefined);
	}
}

/**
 * Audit the project at `projectDir`.
 *
 * @throws {InputError} If either file is missing or unreadable.
 * @throws {ManifestError} If the manifest is not well-formed XML.
 */
export function auditProject(options: ProjectAuditOptions = {}): AuditReport {
	const projectDir = path.resolve(options.projectDir ?? process.cwd());
	const pomPath = path.resolve(projectDir, options.pomPath ?? "pom.xml");
	const dependabotPath = path.resolve(projectDir, options.dependabotPath ?? ".github/dependabot.yml");

	log.debug("auditing project", { projectDir, pomPath, dependabotPath });

	const manifest = parseManifest(readInput(pomPath), pomPath);
	const configText = readInput(dependabotPath);

	const violations = check(manifest.root, configText, {
		ecosystem: options.ecosystem ?? DEFAULT_CONTEXT.ecosystem,
		group: options.group ?? DEFAULT_CONTEXT.group,
		manifestName: path.basename(pomPath),
		configName: path.basename(dependabotPath),
		rules: options.rules,
	});

	return { ok: violations.length === 0, violations };
}
