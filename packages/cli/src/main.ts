/**
 * @pomsync/cli — Main orchestration.
 *
 * `run()` resolves settings (defaults, pomsync.json, POMSYNC_* variables,
 * flags), audits the project and renders the report. It never exits the
 * process itself; the bin does that with the returned code.
 */

import path from "path";
import {
	configureLogging,
	createLogger,
	getLoggingConfig,
	JsonTransport,
	LogLevel,
	parseLogLevel,
	PomsyncError,
	resolveSettings,
} from "@pomsync/core";
import type { AuditSettings } from "@pomsync/core";
import { auditProject } from "@pomsync/audit";
import { parseArgs, printHelp } from "./args.js";
import { renderJson, renderText } from "./report.js";

export const VERSION = "0.1.0";

/** Exit status: every check passed. */
export const EXIT_OK = 0;
/** Exit status: at least one violation. */
export const EXIT_VIOLATIONS = 1;
/** Exit status: the audit could not run (bad usage, unreadable input). */
export const EXIT_ERROR = 2;

/** Streams and environment `run()` talks to. */
export interface CliIO {
	stdout: NodeJS.WritableStream;
	stderr: NodeJS.WritableStream;
	env: NodeJS.ProcessEnv;
	cwd: string;
}

const log = createLogger("cli");

function defaultIO(): CliIO {
	return { stdout: process.stdout, stderr: process.stderr, env: process.env, cwd: process.cwd() };
}

/**
 * Run the CLI with `argv` (without the node and script entries).
 *
 * @returns The process exit status.
 */
export function run(argv: string[], io: CliIO = defaultIO()): number {
	try {
		const args = parseArgs(argv);

		if (args.help) {
			printHelp(io.stdout);
			return EXIT_OK;
		}
		if (args.version) {
			io.stdout.write(`pomsync ${VERSION}\n`);
			return EXIT_OK;
		}
		if (args.rest.length > 0) {
			io.stderr.write(`Unexpected argument: ${args.rest[0]}\n`);
			return EXIT_ERROR;
		}

		const projectDir = path.resolve(io.cwd, args.dir ?? ".");
		const overrides: Partial<AuditSettings> = {
			pom: args.pom,
			dependabot: args.dependabot,
			ecosystem: args.ecosystem,
			group: args.group,
			format: args.json ? "json" : undefined,
			logFormat: args.logFormat,
		};
		const settings = resolveSettings(projectDir, overrides, io.env);

		const logging = getLoggingConfig();
		const level = args.verbose ? LogLevel.DEBUG : parseLogLevel(settings.logLevel);
		if (level !== undefined) logging.level = level;
		if (settings.logFormat === "json") {
			logging.transports = [new JsonTransport({ stream: io.stderr })];
		}
		configureLogging(logging);
		log.debug("resolved settings", { projectDir, ...settings });

		const report = auditProject({
			projectDir,
			pomPath: settings.pom,
			dependabotPath: settings.dependabot,
			ecosystem: settings.ecosystem,
			group: settings.group,
		});

		const rendered = settings.format === "json" ? renderJson(report) : renderText(report);
		if (rendered.stdout) io.stdout.write(rendered.stdout);
		if (rendered.stderr) io.stderr.write(rendered.stderr);

		return report.ok ? EXIT_OK : EXIT_VIOLATIONS;
	} catch (err) {
		if (err instanceof PomsyncError) {
			io.stderr.write(`pomsync: ${err.message}\n`);
			return EXIT_ERROR;
		}
		throw err;
	}
}
