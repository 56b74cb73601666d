/**
 * @pomsync/cli — Argument parser.
 *
 * Simple CLI argument parser with no external dependencies.
 * Parses flags, the command, and positional arguments from argv.
 */

import { UsageError } from "@pomsync/core";
import type { OutputFormat } from "@pomsync/core";

export interface ParsedArgs {
	command?: string;
	/** Project directory (--dir). */
	dir?: string;
	/** Manifest path (--pom). */
	pom?: string;
	/** Update-bot configuration path (--dependabot). */
	dependabot?: string;
	ecosystem?: string;
	group?: string;
	json?: boolean;
	/** Log line format (--log-format). */
	logFormat?: OutputFormat;
	verbose?: boolean;
	version?: boolean;
	help?: boolean;
	rest: string[];
}

/** Known commands. `check` is the default. */
export const COMMANDS = new Set(["check"]);

const LOG_FORMATS: readonly OutputFormat[] = ["text", "json"];

const VALUE_FLAGS: Record<string, "dir" | "pom" | "dependabot" | "ecosystem" | "group" | "logFormat"> = {
	"-C": "dir",
	"--dir": "dir",
	"--pom": "pom",
	"--dependabot": "dependabot",
	"--ecosystem": "ecosystem",
	"--group": "group",
	"--log-format": "logFormat",
};

/**
 * Parse process.argv (or a custom argv array) into structured arguments.
 *
 * Expects argv WITHOUT the leading `node` and script path entries,
 * i.e., pass `process.argv.slice(2)`. Accepts both `--flag value` and
 * `--flag=value`.
 *
 * @throws {UsageError} On an unknown flag or a flag missing its value.
 */
export function parseArgs(argv: string[]): ParsedArgs {
	const result: ParsedArgs = {
		rest: [],
	};

	let i = 0;

	while (i < argv.length) {
		let arg = argv[i];
		let inlineValue: string | undefined;

		const eq = arg.indexOf("=");
		if (arg.startsWith("--") && eq !== -1) {
			inlineValue = arg.slice(eq + 1);
			arg = arg.slice(0, eq);
		}

		// ─── Flags with values ──────────────────────────────────────────
		const key = Object.hasOwn(VALUE_FLAGS, arg) ? VALUE_FLAGS[arg] : undefined;
		if (key !== undefined) {
			const value = inlineValue ?? argv[i + 1];
			if (value === undefined || (inlineValue === undefined && value.startsWith("-"))) {
				throw new UsageError(`Option ${arg} requires a value`);
			}
			if (key === "logFormat") {
				const format = LOG_FORMATS.find((f) => f === value);
				if (format === undefined) {
					throw new UsageError(`Option ${arg} must be one of: ${LOG_FORMATS.join(", ")}`);
				}
				result.logFormat = format;
			} else {
				result[key] = value;
			}
			i += inlineValue === undefined ? 2 : 1;
			continue;
		}

		// ─── Boolean flags ──────────────────────────────────────────────
		if (arg === "--json") {
			result.json = true;
			i++;
			continue;
		}

		if (arg === "--verbose") {
			result.verbose = true;
			i++;
			continue;
		}

		if (arg === "-v" || arg === "--version") {
			result.version = true;
			i++;
			continue;
		}

		if (arg === "-h" || arg === "--help") {
			result.help = true;
			i++;
			continue;
		}

		if (arg.startsWith("-")) {
			throw new UsageError(`Unknown option: ${arg}`);
		}

		// ─── Positional ─────────────────────────────────────────────────
		if (result.command === undefined && result.rest.length === 0 && COMMANDS.has(arg)) {
			result.command = arg;
		} else {
			result.rest.push(arg);
		}
		i++;
	}

	return result;
}

export const HELP_TEXT = `
pomsync — keep Maven version management and Dependabot groups in sync

Usage:
  pomsync [check] [options]

Checks:
  - plugin versions are declared only in <pluginManagement>
  - dependency versions are declared only in <dependencyManagement>
  - every <pluginManagement> groupId is covered by the plugin update group
  - every pattern of the plugin update group still matches a groupId

Options:
  -C, --dir <path>              Project directory (default: current directory)
  --pom <path>                  Manifest path (default: pom.xml)
  --dependabot <path>           Dependabot config (default: .github/dependabot.yml)
  --ecosystem <name>            Package ecosystem block (default: maven)
  --group <name>                Plugin update group (default: maven-plugins)
  --json                        Print the report as JSON
  --verbose                     Log debug output to stderr
  --log-format <text|json>      Log line format on stderr (default: text)
  -v, --version                 Show version
  -h, --help                    Show this help

Settings may also come from <dir>/pomsync.json and POMSYNC_* variables.
`;

/**
 * Print the CLI help text.
 */
export function printHelp(out: NodeJS.WritableStream = process.stdout): void {
	out.write(HELP_TEXT.trimStart());
}
