/**
 * @pomsync/audit — Indentation-delimited block extraction.
 *
 * Finds one nested list inside loosely-indented configuration text (such as
 * dependabot.yml) by comparing leading-whitespace counts line by line. There
 * is no YAML grammar here: anything outside the chain of markers being
 * followed is never looked at.
 *
 * Blank lines and comment lines (`#` after trimming) are dropped before the
 * scan starts, so they can never end a block or take part in an indentation
 * comparison.
 */

// ─── Scanning ───────────────────────────────────────────────────────────────

/** A non-blank, non-comment line of the input. */
interface ScannedLine {
	/** Zero-based position in the original text. */
	lineNo: number;
	/** Raw count of leading whitespace characters (tabs and spaces alike). */
	indent: number;
	/** Trimmed content. */
	content: string;
}

/** One list entry: a single leading dash, optional quotes around one scalar. */
const LIST_ITEM = /^-\s*["']?([^"'\s]+)["']?/;

function scan(text: string): ScannedLine[] {
	const lines: ScannedLine[] = [];
	text.split(/\r\n|\r|\n/).forEach((raw, lineNo) => {
		const content = raw.trim();
		if (content.length === 0 || content.startsWith("#")) return;
		lines.push({ lineNo, indent: raw.length - raw.trimStart().length, content });
	});
	return lines;
}

/**
 * Position of the first line after `parentPos` matching `marker`, or -1 once
 * a line at or below the parent's indentation closes the parent's block.
 */
function findNested(lines: readonly ScannedLine[], parentPos: number, marker: RegExp): number {
	const parentIndent = lines[parentPos].indent;
	for (let i = parentPos + 1; i < lines.length; i++) {
		if (lines[i].indent <= parentIndent) return -1;
		if (marker.test(lines[i].content)) return i;
	}
	return -1;
}

// ─── Extraction ─────────────────────────────────────────────────────────────

/**
 * Follow a chain of markers down through nested blocks and return the list
 * items under the last one.
 *
 * `chain[0]` is tested against every line until one matches; each later
 * marker must appear inside the block opened by the marker before it. Items
 * are the lines indented deeper than the last marker, up to the first line
 * that is not.
 *
 * @returns The items in file order, or `[]` when any marker is missing.
 */
export function extractBlockList(text: string, chain: readonly RegExp[]): string[] {
	if (chain.length === 0) return [];

	const lines = scan(text);
	let pos = lines.findIndex((line) => chain[0].test(line.content));
	if (pos === -1) return [];

	for (const marker of chain.slice(1)) {
		pos = findNested(lines, pos, marker);
		if (pos === -1) return [];
	}

	const listIndent = lines[pos].indent;
	const items: string[] = [];
	for (const line of lines.slice(pos + 1)) {
		if (line.indent <= listIndent) break;
		const match = LIST_ITEM.exec(line.content);
		if (match) items.push(match[1]);
	}
	return items;
}

// ─── Dependabot Markers ─────────────────────────────────────────────────────

function escapeRegex(str: string): string {
	return str.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** `package-ecosystem: maven`, with or without quotes, anywhere on the line. */
export function ecosystemMarker(ecosystem: string): RegExp {
	return new RegExp(`package-ecosystem:\\s*["']?${escapeRegex(ecosystem)}\\b`);
}

/** A mapping key that opens a nested block: `name:` with nothing after it but a comment. */
export function keyMarker(name: string): RegExp {
	return new RegExp(`^["']?${escapeRegex(name)}["']?:\\s*(?:#.*)?$`);
}

/**
 * Marker chain ecosystem → `groups` → group → `patterns` of a dependabot.yml.
 */
export function groupPatternsChain(ecosystem: string, group: string): RegExp[] {
	return [ecosystemMarker(ecosystem), keyMarker("groups"), keyMarker(group), keyMarker("patterns")];
}

/**
 * Patterns listed for `group` under the `ecosystem` update block.
 *
 * @example
 * ```ts
 * extractGroupPatterns(dependabotYml, "maven", "maven-plugins");
 * // ["org.apache.maven.plugins:*", "org.codehaus.mojo:*"]
 * ```
 */
export function extractGroupPatterns(text: string, ecosystem: string, group: string): string[] {
	return extractBlockList(text, groupPatternsChain(ecosystem, group));
}
