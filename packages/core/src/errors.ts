/**
 * Typed error hierarchy for pomsync.
 *
 * All pomsync errors extend {@link PomsyncError} with a machine-readable
 * `code` string for programmatic error handling. Consistency problems found
 * by the auditor are never thrown; they are returned as violations. These
 * errors cover the cases where an audit cannot run at all.
 */

/**
 * Base error class for all pomsync errors.
 *
 * Carries a machine-readable `code` field (e.g. `"MANIFEST_ERROR"`) in
 * addition to the human-readable `message`.
 */
export class PomsyncError extends Error {
	readonly code: string;

	constructor(message: string, code: string, cause?: Error) {
		super(message, { cause });
		this.name = "PomsyncError";
		this.code = code;
	}
}

/**
 * The build manifest could not be turned into an element tree
 * (malformed XML, no root element).
 */
export class ManifestError extends PomsyncError {
	readonly source: string;

	constructor(message: string, source: string, cause?: Error) {
		super(message, "MANIFEST_ERROR", cause);
		this.name = "ManifestError";
		this.source = source;
	}
}

/**
 * Configuration error (unreadable project file, invalid JSON, bad value).
 */
export class ConfigError extends PomsyncError {
	constructor(message: string, cause?: Error) {
		super(message, "CONFIG_ERROR", cause);
		this.name = "ConfigError";
	}
}

/**
 * An input file the audit needs is missing or unreadable.
 */
export class InputError extends PomsyncError {
	readonly filePath: string;

	constructor(message: string, filePath: string, cause?: Error) {
		super(message, "INPUT_ERROR", cause);
		this.name = "InputError";
		this.filePath = filePath;
	}
}

/** Bad command-line usage (unknown flag, missing flag value). */
export class UsageError extends PomsyncError {
	constructor(message: string) {
		super(message, "USAGE_ERROR");
		this.name = "UsageError";
	}
}
