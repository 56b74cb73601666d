/**
 * @pomsync/core — Foundation types shared by the auditor and the CLI.
 */

// ─── Configuration ───────────────────────────────────────────────────────────

/** The scope/priority tier of a configuration layer. */
export type ConfigLayer = "defaults" | "project" | "env" | "cli" | "merged";

/** A configuration store with dot-notation key access and layer awareness. */
export interface Config {
	get<T>(key: string): T | undefined;
	get<T>(key: string, fallback: T): T;
	layer: ConfigLayer;
	all(): Record<string, unknown>;
	merge(other: Record<string, unknown>): void;
}

// ─── Settings ────────────────────────────────────────────────────────────────

/** How the CLI reports the outcome of an audit. */
export type OutputFormat = "text" | "json";

/** Resolved settings for one audit run. */
export interface AuditSettings {
	/** Path of the build manifest, relative to the project directory. */
	pom: string;
	/** Path of the update-bot configuration, relative to the project directory. */
	dependabot: string;
	/** Package ecosystem whose block holds the plugin group. */
	ecosystem: string;
	/** Name of the update group that must track managed plugin groupIds. */
	group: string;
	format: OutputFormat;
	logLevel?: string;
	/** Log line format on stderr; `json` installs the JSON transport. */
	logFormat?: OutputFormat;
}

export const DEFAULT_SETTINGS: AuditSettings = {
	pom: "pom.xml",
	dependabot: ".github/dependabot.yml",
	ecosystem: "maven",
	group: "maven-plugins",
	format: "text",
};
