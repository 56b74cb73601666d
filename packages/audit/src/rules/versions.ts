/**
 * @pomsync/audit — Stray version rules.
 * A version written outside its management section drifts silently.
 */

import { childOf, coordinatesOf, elementsOfKind, findAll, formatCoordinate } from "../manifest.js";
import type { AuditContext, AuditInput, AuditRule, ManifestElement, Violation } from "../types.js";

/**
 * Violations for every element of `kind` that is not exempt and still
 * declares a non-empty `<version>`. Whitespace counts as content; the
 * reported version is trimmed.
 */
function strayVersions(
	root: ManifestElement,
	kind: string,
	exempt: ReadonlySet<number>,
	section: string,
	ruleId: string,
	context: AuditContext,
): Violation[] {
	const violations: Violation[] = [];

	for (const el of findAll(root, kind)) {
		if (exempt.has(el.index)) continue;
		const declared = childOf(el, "version")?.text;
		if (!declared) continue;
		const version = declared.trim();

		violations.push({
			ruleId,
			severity: "error",
			message: `${context.manifestName}: ${formatCoordinate(coordinatesOf(el))} has <version>${version}</version> defined outside <${section}>`,
		});
	}

	return violations;
}

/** Plugin versions belong in `<pluginManagement>`. */
export const strayPluginVersions: AuditRule = {
	id: "versions.stray-plugin",
	name: "Stray Plugin Versions",
	description: "Reports <plugin> elements outside <pluginManagement> that declare a <version>",
	evaluate(input: AuditInput, context: AuditContext): Violation[] {
		const managed = elementsOfKind(input.manifest, "plugin", "pluginManagement");
		return strayVersions(input.manifest, "plugin", managed, "pluginManagement", this.id, context);
	},
};

/**
 * Dependency versions belong in `<dependencyManagement>`. Dependencies
 * declared inside a `<plugin>` are not governed by dependency management and
 * are exempt.
 */
export const strayDependencyVersions: AuditRule = {
	id: "versions.stray-dependency",
	name: "Stray Dependency Versions",
	description: "Reports <dependency> elements outside <dependencyManagement> that declare a <version>",
	evaluate(input: AuditInput, context: AuditContext): Violation[] {
		const exempt = new Set([
			...elementsOfKind(input.manifest, "dependency", "dependencyManagement"),
			...elementsOfKind(input.manifest, "dependency", "plugin"),
		]);
		return strayVersions(input.manifest, "dependency", exempt, "dependencyManagement", this.id, context);
	},
};

export const VERSION_RULES: AuditRule[] = [strayPluginVersions, strayDependencyVersions];
