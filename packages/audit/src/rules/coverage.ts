/**
 * @pomsync/audit — Update-group coverage rules.
 * The plugin update group must track exactly the managed plugin groupIds.
 */

import { extractGroupPatterns } from "../block-extractor.js";
import { covers } from "../coverage.js";
import { childText, elementsOfKind, findAll } from "../manifest.js";
import type { AuditContext, AuditInput, AuditRule, ManifestElement, Violation } from "../types.js";

/**
 * Distinct, sorted groupIds of the plugins inside `<pluginManagement>`.
 * Plugins without a groupId contribute nothing.
 */
export function managedPluginGroupIds(root: ManifestElement): string[] {
	const managed = elementsOfKind(root, "plugin", "pluginManagement");
	const groupIds = new Set<string>();
	for (const plugin of findAll(root, "plugin")) {
		if (!managed.has(plugin.index)) continue;
		const groupId = childText(plugin, "groupId");
		if (groupId !== undefined) groupIds.add(groupId);
	}
	return [...groupIds].sort();
}

/**
 * Reports managed plugin groupIds that no pattern of the update group covers.
 *
 * When the pattern list cannot be located at all, reports that once instead,
 * and {@link stalePatterns} stays silent.
 */
export const uncoveredGroupIds: AuditRule = {
	id: "coverage.uncovered-group",
	name: "Uncovered Plugin GroupIds",
	description: "Every <pluginManagement> plugin groupId must be covered by a pattern of the plugin update group",
	evaluate(input: AuditInput, context: AuditContext): Violation[] {
		const patterns = extractGroupPatterns(input.configText, context.ecosystem, context.group);
		if (patterns.length === 0) {
			return [{
				ruleId: this.id,
				severity: "error",
				message: `${context.configName}: could not find patterns for the '${context.group}' group`,
			}];
		}

		return managedPluginGroupIds(input.manifest)
			.filter((groupId) => !patterns.some((p) => covers(p, groupId)))
			.map((groupId) => ({
				ruleId: this.id,
				severity: "error" as const,
				message: `${context.configName}: plugin groupId '${groupId}' from <pluginManagement> is not covered by any pattern in the '${context.group}' group`,
			}));
	},
};

/** Reports patterns of the update group that cover no managed plugin groupId. */
export const stalePatterns: AuditRule = {
	id: "coverage.stale-pattern",
	name: "Stale Group Patterns",
	description: "Every pattern of the plugin update group must cover at least one <pluginManagement> plugin groupId",
	evaluate(input: AuditInput, context: AuditContext): Violation[] {
		const patterns = extractGroupPatterns(input.configText, context.ecosystem, context.group);
		const groupIds = managedPluginGroupIds(input.manifest);

		return patterns
			.filter((pattern) => !groupIds.some((groupId) => covers(pattern, groupId)))
			.map((pattern) => ({
				ruleId: this.id,
				severity: "error" as const,
				message: `${context.configName}: pattern '${pattern}' in the '${context.group}' group does not match any plugin groupId in <pluginManagement>`,
			}));
	},
};

export const COVERAGE_RULES: AuditRule[] = [uncoveredGroupIds, stalePatterns];
