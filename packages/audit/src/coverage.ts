/**
 * @pomsync/audit — Wildcard coverage matching.
 *
 * Update-group patterns are written as `groupId:artifactId` globs
 * (`org.apache.maven.plugins:*`). Coverage only concerns the groupId half, so
 * a groupId is tested as `groupId:DUMMY`: a pattern covers the groupId when
 * its groupId part matches and its artifact part accepts an arbitrary token.
 * An artifact part narrower than `*` (`org.foo:maven-*`) therefore covers
 * nothing, and a bare glob without a colon covers only when its last
 * wildcard can absorb the `:DUMMY` suffix (`com.example.*`).
 */

/** Artifact token appended to a groupId before matching. */
export const DUMMY_ARTIFACT = "DUMMY";

function escapeRegex(str: string): string {
	return str.replace(/[.*+?^${}()|[\]\\/-]/g, "\\$&");
}

function escapeClassChar(ch: string): string {
	return ch.replace(/[\\\][^-]/g, "\\$&");
}

/**
 * Translate the body of a bracket expression into a RegExp fragment.
 * Out-of-order ranges (`z-a`) match nothing and are dropped; a set left
 * empty never matches, a negated empty set matches any character.
 */
function bracketToRegExp(body: string): string {
	const negate = body.startsWith("!");
	let items = "";
	let k = negate ? 1 : 0;

	while (k < body.length) {
		const lo = body[k];
		if (k + 2 < body.length && body[k + 1] === "-") {
			const hi = body[k + 2];
			if (lo <= hi) items += `${escapeClassChar(lo)}-${escapeClassChar(hi)}`;
			k += 3;
		} else {
			items += escapeClassChar(lo);
			k++;
		}
	}

	if (items === "") return negate ? "." : "(?!)";
	return `[${negate ? "^" : ""}${items}]`;
}

/**
 * Convert an fnmatch-style glob to an anchored RegExp.
 *
 * Supports:
 *   *       — any run of characters, separators included
 *   ?       — any single character
 *   [seq]   — one character from seq (ranges allowed)
 *   [!seq]  — one character not in seq
 *
 * An unterminated `[` is a literal bracket. A range whose ends are out of
 * order matches nothing. Matching is case-sensitive.
 */
export function globToRegExp(pattern: string): RegExp {
	let regexStr = "";
	let i = 0;

	while (i < pattern.length) {
		const ch = pattern[i];
		i++;

		if (ch === "*") {
			regexStr += ".*";
		} else if (ch === "?") {
			regexStr += ".";
		} else if (ch === "[") {
			// A "]" right after "[" or "[!" belongs to the set
			let j = i;
			if (j < pattern.length && pattern[j] === "!") j++;
			if (j < pattern.length && pattern[j] === "]") j++;
			while (j < pattern.length && pattern[j] !== "]") j++;

			if (j >= pattern.length) {
				regexStr += "\\[";
			} else {
				regexStr += bracketToRegExp(pattern.slice(i, j));
				i = j + 1;
			}
		} else {
			regexStr += escapeRegex(ch);
		}
	}

	return new RegExp(`^${regexStr}$`, "s");
}

/** Whether `pattern` covers the groupId `identifier`. */
export function covers(pattern: string, identifier: string): boolean {
	return globToRegExp(pattern).test(`${identifier}:${DUMMY_ARTIFACT}`);
}
