/**
 * @pomsync/cli — Report rendering.
 */

import type { AuditReport } from "@pomsync/audit";

export const SUCCESS_MESSAGE = "OK: plugin/dependency versions and dependabot patterns are consistent";

/** Rendered report: what goes to stdout and what goes to stderr. */
export interface RenderedReport {
	stdout: string;
	stderr: string;
}

/**
 * Text form: one `ERROR:` line per violation on stderr, or the success
 * line on stdout.
 */
export function renderText(report: AuditReport): RenderedReport {
	if (report.ok) {
		return { stdout: `${SUCCESS_MESSAGE}\n`, stderr: "" };
	}
	return {
		stdout: "",
		stderr: report.violations.map((v) => `ERROR: ${v.message}\n`).join(""),
	};
}

/** JSON form: the whole report as one document on stdout. */
export function renderJson(report: AuditReport): RenderedReport {
	return {
		stdout: JSON.stringify({ ok: report.ok, violations: report.violations }, null, 2) + "\n",
		stderr: "",
	};
}
