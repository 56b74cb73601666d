/**
 * @pomsync/audit — XML manifest loader.
 *
 * Parses pom.xml text into the index-stamped element tree the rules walk.
 * Elements in the POM namespace (or in no namespace) keep their local name
 * as their kind; elements from any other namespace are keyed `{ns}local` so
 * they can never be mistaken for a POM element of the same local name.
 */

import { DOMParser } from "@xmldom/xmldom";
import type { Element, Node } from "@xmldom/xmldom";
import { createLogger, ManifestError } from "@pomsync/core";
import { createManifest } from "./manifest.js";
import type { ManifestDocument, ManifestNodeInit } from "./types.js";

export const POM_NAMESPACE = "http://maven.apache.org/POM/4.0.0";

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;
const CDATA_SECTION_NODE = 4;

const log = createLogger("audit:manifest-loader");

function isElement(node: Node): node is Element {
	return node.nodeType === ELEMENT_NODE;
}

function kindOf(el: Element): string {
	const local = el.localName ?? el.nodeName;
	const ns = el.namespaceURI;
	return !ns || ns === POM_NAMESPACE ? local : `{${ns}}${local}`;
}

function toInit(el: Element): ManifestNodeInit {
	const children: ManifestNodeInit[] = [];
	let text = "";

	for (let i = 0; i < el.childNodes.length; i++) {
		const child = el.childNodes.item(i);
		if (child === null) continue;
		if (isElement(child)) {
			children.push(toInit(child));
		} else if (child.nodeType === TEXT_NODE || child.nodeType === CDATA_SECTION_NODE) {
			text += child.nodeValue ?? "";
		}
	}

	return { kind: kindOf(el), text, children };
}

/**
 * Parse manifest XML into a {@link ManifestDocument}.
 *
 * @param xml - The manifest text.
 * @param source - Label used in error messages (usually the file path).
 * @throws {ManifestError} If the text is not well-formed or has no root element.
 */
export function parseManifest(xml: string, source = "pom.xml"): ManifestDocument {
	const problems: string[] = [];
	const parser = new DOMParser({
		onError: (level, message) => {
			if (level === "warning") {
				log.debug(`xml warning in ${source}`, { detail: message });
			} else {
				problems.push(message);
			}
		},
	});

	let root: Element | null;
	try {
		root = parser.parseFromString(xml, "text/xml").documentElement;
	} catch (err) {
		throw new ManifestError(
			`${source}: not well-formed XML: ${problems[0]?.trim() ?? (err instanceof Error ? err.message : String(err))}`,
			source,
			err instanceof Error ? err : undefined,
		);
	}

	if (problems.length > 0) {
		throw new ManifestError(`${source}: not well-formed XML: ${problems[0].trim()}`, source);
	}

	if (!root) {
		throw new ManifestError(`${source}: no root element`, source);
	}

	const manifest = createManifest(toInit(root));
	log.debug(`parsed ${source}`, { elements: manifest.size, root: manifest.root.kind });
	return manifest;
}
