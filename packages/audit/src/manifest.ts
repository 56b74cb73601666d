/**
 * @pomsync/audit — Manifest tree construction and traversal.
 *
 * Builds index-stamped element trees and answers "which elements of kind K
 * sit inside a section S" with index sets, so that membership is a question
 * of position in the tree rather than of equal-looking coordinates.
 */

import type { Coordinate, ManifestDocument, ManifestElement, ManifestNodeInit } from "./types.js";

/** Fallback used for a coordinate whose sub-element is absent or blank. */
export const UNKNOWN_COORDINATE = "unknown";

// ─── Construction ───────────────────────────────────────────────────────────

/**
 * Build a manifest tree from a plain description, stamping every node with
 * its preorder index.
 *
 * @example
 * ```ts
 * const { root } = createManifest({
 *   kind: "project",
 *   children: [{ kind: "build", children: [{ kind: "plugins", children: [] }] }],
 * });
 * ```
 */
export function createManifest(init: ManifestNodeInit): ManifestDocument {
	let next = 0;

	const build = (node: ManifestNodeInit): ManifestElement => {
		const index = next++;
		const children = (node.children ?? []).map(build);
		return Object.freeze({
			index,
			kind: node.kind,
			text: node.text ?? "",
			children: Object.freeze(children),
		});
	};

	const root = build(init);
	return { root, size: next };
}

// ─── Document Walker ────────────────────────────────────────────────────────

/**
 * Every element of `kind` in the subtree rooted at `root` (root included),
 * in document order.
 */
export function findAll(root: ManifestElement, kind: string): ManifestElement[] {
	const found: ManifestElement[] = [];
	const stack: ManifestElement[] = [root];

	while (stack.length > 0) {
		const node = stack.pop();
		if (node === undefined) break;
		if (node.kind === kind) found.push(node);
		for (let i = node.children.length - 1; i >= 0; i--) {
			stack.push(node.children[i]);
		}
	}

	return found;
}

/**
 * Indices of the elements of `kind` in the tree.
 *
 * With `insideSection`, only elements at or below an element whose kind is
 * `insideSection` are counted: every such section is collected first, then
 * each one's subtree is walked on its own, and the results are unioned.
 */
export function elementsOfKind(root: ManifestElement, kind: string, insideSection?: string): Set<number> {
	const indices = new Set<number>();

	if (insideSection === undefined) {
		for (const el of findAll(root, kind)) indices.add(el.index);
		return indices;
	}

	for (const section of findAll(root, insideSection)) {
		for (const el of findAll(section, kind)) indices.add(el.index);
	}
	return indices;
}

// ─── Coordinate Extractor ───────────────────────────────────────────────────

/** First direct child of `element` with the given kind. */
export function childOf(element: ManifestElement, kind: string): ManifestElement | undefined {
	return element.children.find((c) => c.kind === kind);
}

/**
 * Trimmed text of the first direct child of the given kind, or `undefined`
 * when there is no such child or its text is blank.
 */
export function childText(element: ManifestElement, kind: string): string | undefined {
	const text = childOf(element, kind)?.text.trim();
	return text ? text : undefined;
}

/** The groupId/artifactId pair of an element, with "unknown" for missing parts. */
export function coordinatesOf(element: ManifestElement): Coordinate {
	return {
		groupId: childText(element, "groupId") ?? UNKNOWN_COORDINATE,
		artifactId: childText(element, "artifactId") ?? UNKNOWN_COORDINATE,
	};
}

/** `groupId:artifactId` form used in messages. */
export function formatCoordinate(coord: Coordinate): string {
	return `${coord.groupId}:${coord.artifactId}`;
}
