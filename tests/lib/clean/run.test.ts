import path from "node:path";
import { createScriptedDecisions } from "../../../src/lib/decisions.js";
import { planClean } from "../../../src/lib/clean/discover.js";
import { formatCleanSummary, runClean } from "../../../src/lib/clean/run.js";
import { readManifest } from "../../../src/lib/manifest/store.js";
import { skillTarget } from "../../../src/lib/manifest/types.js";
import { runSync } from "../../../src/lib/sync/run.js";
import {
	buildManifest,
	canonicalPaths,
	createTestContext,
	isSymlink,
	messages,
	pathExists,
	readText,
	seedManifest,
	seedRule,
	withTempHome,
	writeText,
} from "../engine.helpers.js";

const LATER = new Date("2026-01-15T11:00:00Z");

async function syncWorkspace(homeDir: string) {
	const paths = canonicalPaths();
	await seedManifest(
		paths,
		buildManifest({
			activeTargets: { rules: ["cursor", "claude"], skills: [skillTarget("cursor")] },
			rules: [{ id: "rule-a", file: "rule-a.md", importedFrom: "manual" }],
		}),
	);
	await seedRule(paths, "rule-a", "# A\nContent.\n");
	await writeText(path.join(paths.skillsDir, "alpha", "SKILL.md"), "# alpha\n");
	await writeText(path.join(homeDir, ".claude", "CLAUDE.md"), "My notes\n");
	await writeText(path.join(homeDir, ".cursor", "rules", "mine.mdc"), "---\n---\nHand-written.\n");
	const { ctx } = createTestContext();
	await runSync(ctx);
	return paths;
}

describe.sequential("runClean", () => {
	it("removes generated output, restores originals, and keeps the canonical store", async () => {
		await withTempHome(async (homeDir) => {
			const paths = await syncWorkspace(homeDir);
			const claudeFile = path.join(homeDir, ".claude", "CLAUDE.md");
			expect(await readText(claudeFile)).not.toBe("My notes\n");
			const { ctx } = createTestContext({ command: "clean", now: () => LATER });

			const summary = await runClean(ctx);

			expect(summary).toEqual({
				generatedRemoved: 2,
				linksRemoved: 1,
				restored: 1,
				aborted: false,
				dryRun: false,
			});
			expect(formatCleanSummary(summary)).toBe(
				"2 generated removed, 1 symlinks removed\n1 files restored from backup",
			);
			expect(await readText(claudeFile)).toBe("My notes\n");
			expect(await pathExists(path.join(homeDir, ".cursor", "rules", "rule-a.mdc"))).toBe(false);
			expect(await readText(path.join(homeDir, ".cursor", "rules", "mine.mdc"))).toBe(
				"---\n---\nHand-written.\n",
			);
			expect(await pathExists(path.join(homeDir, ".cursor", "skills", "alpha"))).toBe(false);
			expect(await readText(path.join(paths.rulesDir, "rule-a.md"))).toBe("# A\nContent.\n");
			expect(await pathExists(path.join(paths.skillsDir, "alpha", "SKILL.md"))).toBe(true);
			expect((await readManifest(paths)).rules.map((rule) => rule.id)).toEqual(["rule-a"]);
		});
	});

	it("plans only generated files and store links", async () => {
		await withTempHome(async (homeDir) => {
			const paths = await syncWorkspace(homeDir);
			const { ctx } = createTestContext({ command: "clean", now: () => LATER });

			const plan = await planClean(ctx, await readManifest(paths));

			expect(plan.generatedFiles).toEqual([
				path.join(homeDir, ".cursor", "rules", "rule-a.mdc"),
				path.join(homeDir, ".claude", "CLAUDE.md"),
			]);
			expect(plan.skillLinks).toEqual([path.join(homeDir, ".cursor", "skills", "alpha")]);
			expect(plan.restorable).toEqual([path.join(homeDir, ".claude", "CLAUDE.md")]);
		});
	});

	it("changes nothing under dry-run", async () => {
		await withTempHome(async (homeDir) => {
			await syncWorkspace(homeDir);
			const claudeFile = path.join(homeDir, ".claude", "CLAUDE.md");
			const generated = await readText(claudeFile);
			const { ctx } = createTestContext({
				command: "clean",
				now: () => LATER,
				options: { dryRun: true },
			});

			const summary = await runClean(ctx);

			expect(formatCleanSummary(summary)).toBe(
				"2 generated removed, 1 symlinks removed\n1 files restored from backup\n(dry-run)",
			);
			expect(await readText(claudeFile)).toBe(generated);
			expect(await isSymlink(path.join(homeDir, ".cursor", "skills", "alpha"))).toBe(true);
		});
	});

	it("stops when the user declines", async () => {
		await withTempHome(async (homeDir) => {
			await syncWorkspace(homeDir);
			const decisions = createScriptedDecisions({ confirm: [false] });
			const { ctx, logs } = createTestContext({ command: "clean", decisions, now: () => LATER });

			const summary = await runClean(ctx);

			expect(summary.aborted).toBe(true);
			expect(formatCleanSummary(summary)).toBe("Clean aborted.");
			expect(decisions.prompts).toEqual(["  Proceed?"]);
			expect(messages(logs).at(-1)).toBe("  Aborted.");
			expect(await pathExists(path.join(homeDir, ".cursor", "rules", "rule-a.mdc"))).toBe(true);
		});
	});

	it("reports when there is nothing to clean", async () => {
		await withTempHome(async () => {
			await seedManifest(canonicalPaths(), buildManifest());
			const { ctx, logs } = createTestContext({ command: "clean" });

			const summary = await runClean(ctx);

			expect(summary.generatedRemoved).toBe(0);
			expect(messages(logs)).toEqual([
				"Nothing to clean -- no generated files or skill symlinks found.",
			]);
		});
	});
});
