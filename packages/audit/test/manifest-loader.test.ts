import { describe, it, expect } from "vitest";
import { ManifestError } from "@pomsync/core";
import { parseManifest, findAll, childText, POM_NAMESPACE } from "@pomsync/audit";

describe("parseManifest", () => {
	it("should map POM-namespaced elements to their local names", () => {
		const { root } = parseManifest(`<?xml version="1.0"?>
<project xmlns="${POM_NAMESPACE}" xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance">
  <build><plugins><plugin><groupId>g</groupId></plugin></plugins></build>
</project>`);
		expect(root.kind).toBe("project");
		expect(root.children.map((c) => c.kind)).toEqual(["build"]);
		expect(findAll(root, "plugin")).toHaveLength(1);
	});

	it("should accept manifests without a namespace", () => {
		const { root, size } = parseManifest("<project><build/></project>");
		expect(root.kind).toBe("project");
		expect(size).toBe(2);
	});

	it("should give un-namespaced elements their plain names at every depth", () => {
		const { root } = parseManifest(`<project>
  <build><plugins><plugin><groupId>org.foo</groupId><version>1</version></plugin></plugins></build>
</project>`);
		const [plugin] = findAll(root, "plugin");
		expect(plugin.children.map((c) => c.kind)).toEqual(["groupId", "version"]);
		expect(childText(plugin, "groupId")).toBe("org.foo");
	});

	it("should key foreign-namespace elements by namespace and local name", () => {
		const { root } = parseManifest(`<project xmlns="${POM_NAMESPACE}" xmlns:o="urn:other">
  <o:plugin/>
  <plugin/>
</project>`);
		expect(root.children.map((c) => c.kind)).toEqual(["{urn:other}plugin", "plugin"]);
	});

	it("should stamp elements in document order and skip comments", () => {
		const { root, size } = parseManifest(`<project>
  <!-- <plugin><version>0</version></plugin> -->
  <a><b/></a>
  <c/>
</project>`);
		expect(size).toBe(4);
		expect(findAll(root, "plugin")).toEqual([]);
		expect(root.children.map((c) => [c.kind, c.index])).toEqual([["a", 1], ["c", 3]]);
	});

	it("should collect direct text, CDATA included", () => {
		const { root } = parseManifest("<plugin><version> <![CDATA[2.0]]> </version><groupId>g<x/>h</groupId></plugin>");
		expect(childText(root, "version")).toBe("2.0");
		expect(childText(root, "groupId")).toBe("gh");
	});

	it("should decode entities in text", () => {
		const { root } = parseManifest("<plugin><artifactId>a&amp;b</artifactId></plugin>");
		expect(childText(root, "artifactId")).toBe("a&b");
	});

	it("should reject mismatched tags", () => {
		expect(() => parseManifest("<project><build></project>", "broken.xml")).toThrow(ManifestError);
		expect(() => parseManifest("<project><build></project>", "broken.xml")).toThrow(/^broken\.xml: /);
	});

	it("should report the parser's complaint for a wrong end tag", () => {
		expect(() => parseManifest("<project><a></b></project>", "wrong.xml")).toThrow(/^wrong\.xml: not well-formed XML: \S/);
	});

	it("should reject empty input", () => {
		expect(() => parseManifest("")).toThrow(ManifestError);
	});

	it("should record the source on the error", () => {
		try {
			parseManifest("", "some/pom.xml");
			expect.unreachable();
		} catch (err) {
			expect(err).toBeInstanceOf(ManifestError);
			if (err instanceof ManifestError) {
				expect(err.source).toBe("some/pom.xml");
				expect(err.code).toBe("MANIFEST_ERROR");
			}
		}
	});
});
