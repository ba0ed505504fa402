import type { MockInstance } from "vitest";
import { mkdir, readFile, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import { runCli } from "../../src/cli/index.js";
import { joinOutput, withTempHome } from "./cli.helpers.js";

async function seedEmptyCanonical(canonicalRoot: string): Promise<void> {
	await mkdir(canonicalRoot, { recursive: true });
	await writeFile(
		path.join(canonicalRoot, "manifest.json"),
		`${JSON.stringify({
			version: "1.0",
			updatedDate: "2025-12-01",
			importedFrom: [],
			activeTargets: { rules: ["cursor"], skills: [] },
			rules: [],
		})}\n`,
		"utf8",
	);
}

async function readManifestIds(canonicalRoot: string): Promise<string[]> {
	const manifest = JSON.parse(await readFile(path.join(canonicalRoot, "manifest.json"), "utf8"));
	return manifest.rules.map((rule: { id: string }) => rule.id);
}

async function pathExists(candidate: string): Promise<boolean> {
	try {
		await stat(candidate);
		return true;
	} catch {
		return false;
	}
}

describe.sequential("rule commands", () => {
	let logSpy: ReturnType<typeof vi.spyOn>;
	let errorSpy: ReturnType<typeof vi.spyOn>;
	let exitSpy: MockInstance<typeof process.exit>;

	beforeEach(() => {
		logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
		errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
		exitSpy = vi.spyOn(process, "exit").mockImplementation(() => undefined as never);
	});

	afterEach(() => {
		logSpy.mockRestore();
		errorSpy.mockRestore();
		exitSpy.mockRestore();
	});

	it("adds a rule and syncs it to cursor", async () => {
		await withTempHome(async (homeDir, canonicalRoot) => {
			await seedEmptyCanonical(canonicalRoot);

			await runCli([
				"node",
				"agent-rules-sync",
				"add-rule",
				"new-rule",
				"--description",
				"A new rule",
				"--yes",
				"--root",
				canonicalRoot,
			]);

			expect(await readFile(path.join(canonicalRoot, "rules", "new-rule.md"), "utf8")).toBe(
				"# New Rule\n\nTODO: Add rule content.\n",
			);
			const cursorRule = await readFile(path.join(homeDir, ".cursor", "rules", "new-rule.mdc"), "utf8");
			expect(cursorRule.startsWith('---\ndescription: "A new rule"\nalwaysApply: true\n---\n')).toBe(
				true,
			);
			expect(await readManifestIds(canonicalRoot)).toEqual(["new-rule"]);
			expect(joinOutput(logSpy.mock.calls)).toContain("Created rules/new-rule.md");
			expect(exitSpy).not.toHaveBeenCalled();
		});
	});

	it("rejects a duplicate id", async () => {
		await withTempHome(async (_homeDir, canonicalRoot) => {
			await seedEmptyCanonical(canonicalRoot);
			await runCli(["node", "agent-rules-sync", "add-rule", "dup", "--yes", "--root", canonicalRoot]);

			await runCli(["node", "agent-rules-sync", "add-rule", "dup", "--yes", "--root", canonicalRoot]);

			expect(errorSpy).toHaveBeenCalledWith("Error: rule 'dup' already exists");
			expect(exitSpy).toHaveBeenCalledWith(1);
			expect(await readManifestIds(canonicalRoot)).toEqual(["dup"]);
		});
	});

	it("removes a rule and its generated file", async () => {
		await withTempHome(async (homeDir, canonicalRoot) => {
			await seedEmptyCanonical(canonicalRoot);
			await runCli(["node", "agent-rules-sync", "add-rule", "gone", "--yes", "--root", canonicalRoot]);
			expect(await pathExists(path.join(homeDir, ".cursor", "rules", "gone.mdc"))).toBe(true);

			await runCli(["node", "agent-rules-sync", "remove-rule", "gone", "--yes", "--root", canonicalRoot]);

			expect(await pathExists(path.join(canonicalRoot, "rules", "gone.md"))).toBe(false);
			expect(await pathExists(path.join(homeDir, ".cursor", "rules", "gone.mdc"))).toBe(false);
			expect(await readManifestIds(canonicalRoot)).toEqual([]);
		});
	});

	it("reports an unknown rule on removal", async () => {
		await withTempHome(async (_homeDir, canonicalRoot) => {
			await seedEmptyCanonical(canonicalRoot);

			await runCli(["node", "agent-rules-sync", "remove-rule", "missing", "--root", canonicalRoot]);

			expect(errorSpy).toHaveBeenCalledWith("Error: rule 'missing' not found in manifest");
			expect(exitSpy).toHaveBeenCalledWith(1);
		});
	});
});
