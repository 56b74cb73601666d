#!/usr/bin/env node

/**
 * @pomsync/cli — Entry point.
 */

import { run } from "./main.js";

try {
	process.exitCode = run(process.argv.slice(2));
} catch (err) {
	process.stderr.write(`Fatal: ${err instanceof Error ? err.stack ?? err.message : String(err)}\n`);
	process.exitCode = 2;
}
