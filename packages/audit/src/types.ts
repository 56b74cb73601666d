/**
 * @pomsync/audit — Consistency auditor types.
 */

import type { Logger } from "@pomsync/core";

// ─── Manifest Tree ──────────────────────────────────────────────────────────

/**
 * One node of a parsed build manifest.
 *
 * `index` is the node's preorder position in its tree, assigned once when the
 * tree is built. Membership tests use it instead of value equality: two
 * `<plugin>` elements with the same coordinates at different positions are
 * different elements.
 */
export interface ManifestElement {
	readonly index: number;
	/** Local element name, e.g. "plugin" or "pluginManagement". */
	readonly kind: string;
	/** Direct text content, untrimmed. Empty for container elements. */
	readonly text: string;
	readonly children: readonly ManifestElement[];
}

/** A manifest tree plus the number of nodes in it. */
export interface ManifestDocument {
	readonly root: ManifestElement;
	readonly size: number;
}

/** Plain description of a manifest node, used to build a {@link ManifestDocument}. */
export interface ManifestNodeInit {
	kind: string;
	text?: string;
	children?: ManifestNodeInit[];
}

/** Identifying pair of an artifact; either side falls back to "unknown". */
export interface Coordinate {
	groupId: string;
	artifactId: string;
}

// ─── Violations ─────────────────────────────────────────────────────────────

/** A single consistency problem. Every violation fails the audit. */
export interface Violation {
	ruleId: string;
	message: string;
	severity: "error";
}

// ─── Rules ──────────────────────────────────────────────────────────────────

/** Names and labels a rule needs beyond the two documents. */
export interface AuditContext {
	/** Package ecosystem whose block holds the plugin group (e.g. "maven"). */
	ecosystem: string;
	/** Update group that must track managed plugin groupIds (e.g. "maven-plugins"). */
	group: string;
	/** Label of the manifest used in messages (e.g. "pom.xml"). */
	manifestName: string;
	/** Label of the update-bot configuration used in messages (e.g. "dependabot.yml"). */
	configName: string;
}

/** The two documents under audit. */
export interface AuditInput {
	manifest: ManifestElement;
	configText: string;
}

/** A consistency rule. Returns every violation it finds, in a stable order. */
export interface AuditRule {
	id: string;
	name: string;
	description: string;
	evaluate(input: AuditInput, context: AuditContext): Violation[];
}

/** Options accepted by {@link check}. Unset fields take the Maven/Dependabot defaults. */
export interface CheckOptions extends Partial<AuditContext> {
	logger?: Logger;
	/** Rules to run, in order. Defaults to {@link DEFAULT_RULES}. */
	rules?: readonly AuditRule[];
}

/** Outcome of an audit: ok only when there are no violations. */
export interface AuditReport {
	ok: boolean;
	violations: Violation[];
}
