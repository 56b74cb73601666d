/**
 * Structured, pluggable logging for pomsync.
 *
 * Lightweight logger with level filtering, pluggable transports
 * and contextual metadata. All transports write to stderr
 * so that stdout stays reserved for audit results.
 */

// ─── Log Level ───────────────────────────────────────────────────────────────

export enum LogLevel {
	DEBUG = 0,
	INFO = 1,
	WARN = 2,
	ERROR = 3,
	FATAL = 4,
	SILENT = 5,
}

const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
	[LogLevel.DEBUG]: "DEBUG",
	[LogLevel.INFO]: "INFO",
	[LogLevel.WARN]: "WARN",
	[LogLevel.ERROR]: "ERROR",
	[LogLevel.FATAL]: "FATAL",
	[LogLevel.SILENT]: "SILENT",
};

const LOG_LEVEL_PARSE: Record<string, LogLevel> = {
	debug: LogLevel.DEBUG,
	info: LogLevel.INFO,
	warn: LogLevel.WARN,
	error: LogLevel.ERROR,
	fatal: LogLevel.FATAL,
	silent: LogLevel.SILENT,
};

/**
 * Parse a level name ("debug", "WARN", ...). Returns `undefined` for
 * unknown names.
 */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
	if (!name) return undefined;
	const key = name.trim().toLowerCase();
	return Object.hasOwn(LOG_LEVEL_PARSE, key) ? LOG_LEVEL_PARSE[key] : undefined;
}

// ─── Types ───────────────────────────────────────────────────────────────────

export interface LogEntry {
	/** ISO-8601 timestamp */
	timestamp: string;
	level: LogLevel;
	levelName: string;
	message: string;
	/** Structured context metadata */
	context: Record<string, unknown>;
	error?: { name: string; message: string; stack?: string };
	/** Duration in milliseconds for timed operations */
	duration?: number;
	/** Package or module name that produced this log */
	package?: string;
}

export interface LogTransport {
	write(entry: LogEntry): void;
}

export interface LoggerConfig {
	/** Minimum level to emit. Entries below this level are discarded. */
	level?: LogLevel;
	/** Output transports. Defaults to [ConsoleTransport]. */
	transports?: LogTransport[];
	/** Default context merged into every log entry. */
	defaultContext?: Record<string, unknown>;
}

// ─── Global Configuration ────────────────────────────────────────────────────

let globalConfig: LoggerConfig = {};

/**
 * Configure global logging defaults. Affects every logger that has not set
 * its own level or transports, including loggers created before this call.
 */
export function configureLogging(config: LoggerConfig): void {
	globalConfig = { ...config };
}

export function getLoggingConfig(): LoggerConfig {
	return { ...globalConfig };
}

/** Reset global config to defaults. Primarily for testing. */
export function resetLoggingConfig(): void {
	globalConfig = {};
}

// ─── ANSI Colors ─────────────────────────────────────────────────────────────

const ANSI_RESET = "\x1b[0m";
const ANSI_DIM = "\x1b[2m";
const ANSI_BOLD = "\x1b[1m";

const LEVEL_COLORS: Record<LogLevel, string> = {
	[LogLevel.DEBUG]: "\x1b[36m",   // cyan
	[LogLevel.INFO]: "\x1b[32m",    // green
	[LogLevel.WARN]: "\x1b[33m",    // yellow
	[LogLevel.ERROR]: "\x1b[31m",   // red
	[LogLevel.FATAL]: "\x1b[35;1m", // bold magenta
	[LogLevel.SILENT]: "",
};

// ─── Transports ──────────────────────────────────────────────────────────────

/**
 * Console transport — human-readable colored output with timestamps.
 */
export class ConsoleTransport implements LogTransport {
	private readonly useColors: boolean;

	constructor(opts?: { colors?: boolean }) {
		this.useColors = opts?.colors ?? (process.stderr.isTTY ?? false);
	}

	write(entry: LogEntry): void {
		const ts = entry.timestamp.slice(11, 23); // HH:mm:ss.SSS
		const lvl = LOG_LEVEL_NAMES[entry.level].padEnd(5);
		const pkg = entry.package ? ` [${entry.package}]` : "";

		let line: string;
		if (this.useColors) {
			const color = LEVEL_COLORS[entry.level];
			line = `${ANSI_DIM}${ts}${ANSI_RESET} ${color}${lvl}${ANSI_RESET}${ANSI_BOLD}${pkg}${ANSI_RESET} ${entry.message}`;
		} else {
			line = `${ts} ${lvl}${pkg} ${entry.message}`;
		}

		const ctxKeys = Object.keys(entry.context);
		if (ctxKeys.length > 0) {
			const ctxStr = ctxKeys
				.map((k) => `${k}=${JSON.stringify(entry.context[k])}`)
				.join(" ");
			line += ` ${this.useColors ? ANSI_DIM : ""}${ctxStr}${this.useColors ? ANSI_RESET : ""}`;
		}

		if (entry.duration !== undefined) {
			line += ` duration=${entry.duration}ms`;
		}
		if (entry.error) {
			line += `\n  ${entry.error.name}: ${entry.error.message}`;
		}

		process.stderr.write(line + "\n");
	}
}

/**
 * JSON transport — one JSON object per line, on stderr unless another
 * stream is given.
 */
export class JsonTransport implements LogTransport {
	private readonly stream: NodeJS.WritableStream;

	constructor(opts?: { stream?: NodeJS.WritableStream }) {
		this.stream = opts?.stream ?? process.stderr;
	}

	write(entry: LogEntry): void {
		const obj: Record<string, unknown> = {
			timestamp: entry.timestamp,
			level: LOG_LEVEL_NAMES[entry.level],
			message: entry.message,
			package: entry.package,
		};

		if (Object.keys(entry.context).length > 0) {
			obj.context = entry.context;
		}
		if (entry.error) obj.error = entry.error;
		if (entry.duration !== undefined) obj.duration = entry.duration;

		this.stream.write(JSON.stringify(obj) + "\n");
	}
}

// ─── Logger ──────────────────────────────────────────────────────────────────

/**
 * Resolve the effective log level: explicit config, then the global config,
 * then the `LOG_LEVEL` environment variable, then WARN.
 */
function resolveLevel(configLevel?: LogLevel): LogLevel {
	if (configLevel !== undefined) {
		return configLevel;
	}

	if (globalConfig.level !== undefined) {
		return globalConfig.level;
	}

	return parseLogLevel(process.env.LOG_LEVEL) ?? LogLevel.WARN;
}

export class Logger {
	private readonly name: string;
	/** Explicit level; when unset the level is resolved on every call. */
	private readonly level: LogLevel | undefined;
	/** Explicit transports; when unset the global ones apply. */
	private readonly transports: LogTransport[] | undefined;
	private readonly context: Record<string, unknown>;

	constructor(name: string, config?: LoggerConfig) {
		this.name = name;
		this.level = config?.level;
		this.transports = config?.transports;
		this.context = { ...(config?.defaultContext ?? {}) };
	}

	debug(message: string, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.DEBUG, message, undefined, ctx);
	}

	info(message: string, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.INFO, message, undefined, ctx);
	}

	warn(message: string, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.WARN, message, undefined, ctx);
	}

	/** Log an ERROR message with optional Error object. */
	error(message: string, error?: unknown, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.ERROR, message, error, ctx);
	}

	/**
	 * Return a new logger with additional context merged in.
	 * Does not mutate the original logger.
	 */
	withContext(ctx: Record<string, unknown>): Logger {
		return new Logger(this.name, {
			level: this.level,
			transports: this.transports,
			defaultContext: { ...this.context, ...ctx },
		});
	}

	/** The effective level: explicit, else global, else `LOG_LEVEL`, else WARN. */
	getLevel(): LogLevel {
		return resolveLevel(this.level);
	}

	getName(): string {
		return this.name;
	}

	// ─── Internal ────────────────────────────────────────────────────────

	private emit(
		level: LogLevel,
		message: string,
		error?: unknown,
		ctx?: Record<string, unknown>,
	): void {
		if (level < this.getLevel()) return;

		const entry: LogEntry = {
			timestamp: new Date().toISOString(),
			level,
			levelName: LOG_LEVEL_NAMES[level],
			message,
			context: { ...(globalConfig.defaultContext ?? {}), ...this.context, ...(ctx ?? {}) },
			package: this.name,
		};

		if (entry.context.duration !== undefined) {
			entry.duration = Number(entry.context.duration);
			delete entry.context.duration;
		}

		if (error) {
			entry.error = error instanceof Error
				? { name: error.name, message: error.message, stack: error.stack }
				: { name: "Error", message: String(error) };
		}

		const transports = this.transports ?? globalConfig.transports ?? [new ConsoleTransport()];
		for (const transport of transports) {
			try {
				transport.write(entry);
			} catch {
				// A broken transport must not take the audit down with it
			}
		}
	}
}

// ─── Factory ─────────────────────────────────────────────────────────────────

/**
 * Create a named logger with global defaults.
 *
 * @param name - Module identifier (e.g. "audit:checker", "cli")
 */
export function createLogger(name: string): Logger {
	return new Logger(name);
}
