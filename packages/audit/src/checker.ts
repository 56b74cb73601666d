/**
 * @pomsync/audit — Consistency checker.
 * Runs every rule against a manifest and an update-bot configuration.
 */

import { createLogger } from "@pomsync/core";
import { COVERAGE_RULES } from "./rules/coverage.js";
import { VERSION_RULES } from "./rules/versions.js";
import type { AuditContext, AuditReport, AuditRule, CheckOptions, ManifestElement, Violation } from "./types.js";

/** Rules in reporting order: stray versions first, then group coverage. */
export const DEFAULT_RULES: readonly AuditRule[] = [...VERSION_RULES, ...COVERAGE_RULES];

export const DEFAULT_CONTEXT: AuditContext = {
	ecosystem: "maven",
	group: "maven-plugins",
	manifestName: "pom.xml",
	configName: "dependabot.yml",
};

const defaultLogger = createLogger("audit:checker");

/**
 * Check a manifest tree against update-bot configuration text.
 *
 * Every rule runs; nothing short-circuits, so one call surfaces every
 * problem. A rule that throws contributes a violation naming the rule
 * instead of aborting the run. The result depends only on the inputs.
 *
 * @example
 * ```ts
 * const { root } = parseManifest(pomXml);
 * const violations = check(root, dependabotYml);
 * if (violations.length > 0) process.exitCode = 1;
 * ```
 */
export function check(manifestRoot: ManifestElement, configText: string, options: CheckOptions = {}): Violation[] {
	const logger = options.logger ?? defaultLogger;
	const rules = options.rules ?? DEFAULT_RULES;
	const context: AuditContext = {
		ecosystem: options.ecosystem ?? DEFAULT_CONTEXT.ecosystem,
		group: options.group ?? DEFAULT_CONTEXT.group,
		manifestName: options.manifestName ?? DEFAULT_CONTEXT.manifestName,
		configName: options.configName ?? DEFAULT_CONTEXT.configName,
	};
	const input = { manifest: manifestRoot, configText };
	const violations: Violation[] = [];

	for (const rule of rules) {
		const ruleLog = logger.withContext({ rule: rule.id });
		try {
			const found = rule.evaluate(input, context);
			ruleLog.debug("rule finished", { violations: found.length });
			violations.push(...found);
		} catch (err) {
			ruleLog.error("rule threw", err);
			violations.push({
				ruleId: rule.id,
				severity: "error",
				message: `Rule "${rule.name}" threw an error during evaluation: ${err instanceof Error ? err.message : String(err)}`,
			});
		}
	}

	logger.debug("check complete", { rules: rules.length, violations: violations.length });
	return violations;
}

/** {@link check}, wrapped in an {@link AuditReport}. */
export function audit(manifestRoot: ManifestElement, configText: string, options: CheckOptions = {}): AuditReport {
	const violations = check(manifestRoot, configText, options);
	return { ok: violations.length === 0, violations };
}
