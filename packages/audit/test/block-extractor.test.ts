import { describe, it, expect } from "vitest";
import {
	extractBlockList,
	extractGroupPatterns,
	groupPatternsChain,
	ecosystemMarker,
	keyMarker,
} from "@pomsync/audit";

const DEPENDABOT = `version: 2
updates:
  - package-ecosystem: "github-actions"
    directory: "/"
    groups:
      maven-plugins:
        patterns:
          - "should-not-appear:*"
  - package-ecosystem: maven
    directory: "/"
    schedule:
      interval: weekly
    groups:
      maven-plugins:
        patterns:
          - "org.apache.maven.plugins:*"
          - 'org.codehaus.mojo:*'
          - com.example.*:*
      everything-else:
        patterns:
          - "*"
`;

const EXPECTED = ["org.apache.maven.plugins:*", "org.codehaus.mojo:*", "com.example.*:*"];

describe("extractGroupPatterns", () => {
	it("should extract the group's patterns from the ecosystem block", () => {
		expect(extractGroupPatterns(DEPENDABOT, "maven", "maven-plugins")).toEqual(EXPECTED);
	});

	it("should read another group of the same block", () => {
		expect(extractGroupPatterns(DEPENDABOT, "maven", "everything-else")).toEqual(["*"]);
	});

	it("should be unaffected by blank and comment lines anywhere in the block", () => {
		const noisy = `version: 2
updates:

  - package-ecosystem: maven
# top-level comment
    groups:

      maven-plugins:
  # shallow comment
        patterns:
          - "org.apache.maven.plugins:*"

# another comment at column zero
          - 'org.codehaus.mojo:*'
        # comment at the marker's own indentation
          - com.example.*:*
`;
		expect(extractGroupPatterns(noisy, "maven", "maven-plugins")).toEqual(EXPECTED);
	});

	it("should stop at the first line indented at or below the list marker", () => {
		const text = `updates:
  - package-ecosystem: maven
    groups:
      maven-plugins:
        patterns:
          - "kept:*"
        - "same-indent:*"
          - "after-stop:*"
`;
		expect(extractGroupPatterns(text, "maven", "maven-plugins")).toEqual(["kept:*"]);
	});

	it("should skip lines inside the list that are not list items", () => {
		const text = `- package-ecosystem: maven
  groups:
    maven-plugins:
      patterns:
        - "a:*"
          continuation
        - "b:*"
`;
		expect(extractGroupPatterns(text, "maven", "maven-plugins")).toEqual(["a:*", "b:*"]);
	});

	it("should return an empty list when the ecosystem block is missing", () => {
		expect(extractGroupPatterns(DEPENDABOT, "npm", "maven-plugins")).toEqual([]);
	});

	it("should return an empty list when there is no groups key under the ecosystem", () => {
		const text = `version: 2
updates:
  - package-ecosystem: maven
    directory: "/"
    schedule:
      interval: daily
`;
		expect(extractGroupPatterns(text, "maven", "maven-plugins")).toEqual([]);
	});

	it("should not follow a groups key that lies outside the ecosystem block", () => {
		const text = `updates:
  - package-ecosystem: maven
    directory: "/"
groups:
  maven-plugins:
    patterns:
      - "x:*"
`;
		expect(extractGroupPatterns(text, "maven", "maven-plugins")).toEqual([]);
	});

	it("should return an empty list when the group has no patterns key", () => {
		const text = `- package-ecosystem: maven
  groups:
    maven-plugins:
      exclude-patterns:
        - "x:*"
`;
		expect(extractGroupPatterns(text, "maven", "maven-plugins")).toEqual([]);
	});

	it("should ignore a commented-out ecosystem declaration", () => {
		const text = `# package-ecosystem: maven
groups:
  maven-plugins:
    patterns:
      - "decoy:*"
updates:
  - package-ecosystem: maven
    groups:
      maven-plugins:
        patterns:
          - "real:*"
`;
		expect(extractGroupPatterns(text, "maven", "maven-plugins")).toEqual(["real:*"]);
	});

	it("should handle CRLF line endings", () => {
		expect(extractGroupPatterns(DEPENDABOT.replace(/\n/g, "\r\n"), "maven", "maven-plugins")).toEqual(EXPECTED);
	});

	it("should count tabs as single indentation characters", () => {
		const text = "- package-ecosystem: maven\n\tgroups:\n\t\tmaven-plugins:\n\t\t\tpatterns:\n\t\t\t\t- a:*\n\t\t\t- b:*\n";
		expect(extractGroupPatterns(text, "maven", "maven-plugins")).toEqual(["a:*"]);
	});

	it("should accept quoted keys and trailing comments on keys", () => {
		const text = `- package-ecosystem: 'maven'
  groups: # grouped updates
    "maven-plugins":
      patterns:   # plugin coordinates
        - "a:*"
`;
		expect(extractGroupPatterns(text, "maven", "maven-plugins")).toEqual(["a:*"]);
	});
});

describe("extractBlockList", () => {
	it("should return an empty list for an empty chain", () => {
		expect(extractBlockList(DEPENDABOT, [])).toEqual([]);
	});

	it("should follow an arbitrary chain of markers", () => {
		const text = `root:
  child:
    items:
      - one
      - "two"
other:
  - three
`;
		expect(extractBlockList(text, [/^root:$/, keyMarker("child"), keyMarker("items")])).toEqual(["one", "two"]);
	});

	it("should return the items directly under the first marker when the chain has one entry", () => {
		expect(extractBlockList("list:\n  - a\n  - b\nnext: 1\n", [/^list:/])).toEqual(["a", "b"]);
	});
});

describe("markers", () => {
	it("should match the ecosystem with or without quotes as a whole word", () => {
		const marker = ecosystemMarker("maven");
		expect(marker.test(`- package-ecosystem: maven`)).toBe(true);
		expect(marker.test(`- package-ecosystem: "maven"`)).toBe(true);
		expect(marker.test(`package-ecosystem:maven`)).toBe(true);
		expect(marker.test(`- package-ecosystem: mavenish`)).toBe(false);
		expect(marker.test(`- package-ecosystem: gradle`)).toBe(false);
	});

	it("should escape regex characters in key names", () => {
		const marker = keyMarker("a.b");
		expect(marker.test("a.b:")).toBe(true);
		expect(marker.test("axb:")).toBe(false);
	});

	it("should require a key to open a block", () => {
		const marker = keyMarker("groups");
		expect(marker.test("groups:")).toBe(true);
		expect(marker.test("groups: {}")).toBe(false);
		expect(marker.test("my-groups:")).toBe(false);
	});

	it("should build the ecosystem, groups, group, patterns chain", () => {
		const chain = groupPatternsChain("maven", "maven-plugins");
		expect(chain).toHaveLength(4);
		expect(chain[1].test("groups:")).toBe(true);
		expect(chain[2].test("maven-plugins:")).toBe(true);
		expect(chain[3].test("patterns:")).toBe(true);
	});
});
