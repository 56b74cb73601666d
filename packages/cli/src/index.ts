/**
 * @pomsync/cli — Public API re-exports.
 *
 * The CLI package primarily serves as the `pomsync` binary entry point.
 * These re-exports allow scripts to invoke the CLI programmatically.
 */

export { parseArgs, printHelp, HELP_TEXT, COMMANDS } from "./args.js";
export type { ParsedArgs } from "./args.js";
export { run, VERSION, EXIT_OK, EXIT_VIOLATIONS, EXIT_ERROR } from "./main.js";
export type { CliIO } from "./main.js";
export { renderText, renderJson, SUCCESS_MESSAGE } from "./report.js";
export type { RenderedReport } from "./report.js";
