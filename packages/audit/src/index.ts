// @pomsync/audit — Build manifest / update-bot consistency auditor
export * from "./types.js";
export { check, audit, DEFAULT_RULES, DEFAULT_CONTEXT } from "./checker.js";
export { auditProject } from "./project.js";
export type { ProjectAuditOptions } from "./project.js";

// Manifest tree
export {
	createManifest,
	findAll,
	elementsOfKind,
	childOf,
	childText,
	coordinatesOf,
	formatCoordinate,
	UNKNOWN_COORDINATE,
} from "./manifest.js";
export { parseManifest, POM_NAMESPACE } from "./manifest-loader.js";

// Configuration text scanning
export {
	extractBlockList,
	extractGroupPatterns,
	groupPatternsChain,
	ecosystemMarker,
	keyMarker,
} from "./block-extractor.js";
export { covers, globToRegExp, DUMMY_ARTIFACT } from "./coverage.js";

// Built-in rules
export {
	strayPluginVersions,
	strayDependencyVersions,
	VERSION_RULES,
} from "./rules/versions.js";
export {
	uncoveredGroupIds,
	stalePatterns,
	managedPluginGroupIds,
	COVERAGE_RULES,
} from "./rules/coverage.js";
