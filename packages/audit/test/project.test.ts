import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { InputError, ManifestError } from "@pomsync/core";
import { auditProject } from "@pomsync/audit";

const POM = `<project xmlns="http://maven.apache.org/POM/4.0.0">
  <build>
    <pluginManagement>
      <plugins>
        <plugin>
          <groupId>org.codehaus.mojo</groupId>
          <artifactId>exec-maven-plugin</artifactId>
          <version>3.2.0</version>
        </plugin>
      </plugins>
    </pluginManagement>
  </build>
</project>
`;

function dependabot(group: string, pattern: string): string {
	return `version: 2
updates:
  - package-ecosystem: maven
    directory: /
    groups:
      ${group}:
        patterns:
          - "${pattern}"
`;
}

describe("auditProject", () => {
	let projectDir: string;

	beforeEach(() => {
		projectDir = mkdtempSync(join(tmpdir(), "pomsync-project-"));
		mkdirSync(join(projectDir, ".github"));
		writeFileSync(join(projectDir, "pom.xml"), POM);
		writeFileSync(join(projectDir, ".github", "dependabot.yml"), dependabot("maven-plugins", "org.codehaus.mojo:*"));
	});

	afterEach(() => {
		rmSync(projectDir, { recursive: true, force: true });
	});

	it("should pass a consistent project at the default locations", () => {
		expect(auditProject({ projectDir })).toEqual({ ok: true, violations: [] });
	});

	it("should prefix messages with the file names", () => {
		writeFileSync(join(projectDir, ".github", "dependabot.yml"), dependabot("maven-plugins", "org.other:*"));
		const report = auditProject({ projectDir });
		expect(report.ok).toBe(false);
		expect(report.violations.map((v) => v.message)).toEqual([
			"dependabot.yml: plugin groupId 'org.codehaus.mojo' from <pluginManagement> is not covered by any pattern in the 'maven-plugins' group",
			"dependabot.yml: pattern 'org.other:*' in the 'maven-plugins' group does not match any plugin groupId in <pluginManagement>",
		]);
	});

	it("should resolve custom paths against the project directory", () => {
		mkdirSync(join(projectDir, "build"));
		writeFileSync(join(projectDir, "build", "parent.xml"), POM.replace(
			"    </pluginManagement>\n",
			"    </pluginManagement>\n    <plugins><plugin><groupId>g</groupId><artifactId>a</artifactId><version>1</version></plugin></plugins>\n",
		));
		writeFileSync(join(projectDir, "bot.yml"), dependabot("build-plugins", "org.codehaus.mojo:*"));

		const report = auditProject({
			projectDir,
			pomPath: "build/parent.xml",
			dependabotPath: "bot.yml",
			group: "build-plugins",
		});
		expect(report.violations.map((v) => v.message)).toEqual([
			"parent.xml: g:a has <version>1</version> defined outside <pluginManagement>",
		]);
	});

	it("should throw InputError for a missing manifest", () => {
		rmSync(join(projectDir, "pom.xml"));
		expect(() => auditProject({ projectDir })).toThrow(InputError);
		expect(() => auditProject({ projectDir })).toThrow(`File not found: ${join(projectDir, "pom.xml")}`);
	});

	it("should throw InputError for a missing update-bot configuration", () => {
		rmSync(join(projectDir, ".github"), { recursive: true });
		try {
			auditProject({ projectDir });
			expect.unreachable();
		} catch (err) {
			expect(err).toBeInstanceOf(InputError);
			if (err instanceof InputError) {
				expect(err.filePath).toBe(join(projectDir, ".github", "dependabot.yml"));
				expect(err.code).toBe("INPUT_ERROR");
			}
		}
	});

	it("should throw ManifestError for a malformed manifest", () => {
		writeFileSync(join(projectDir, "pom.xml"), "<project><build></project>");
		expect(() => auditProject({ projectDir })).toThrow(ManifestError);
	});
});
