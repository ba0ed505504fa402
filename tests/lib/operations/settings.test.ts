import path from "node:path";
import { createScriptedDecisions } from "../../../src/lib/decisions.js";
import { UnsupportedKeyError } from "../../../src/lib/errors.js";
import { readManifest } from "../../../src/lib/manifest/store.js";
import { skillTarget } from "../../../src/lib/manifest/types.js";
import { reconfigureTargets } from "../../../src/lib/operations/reconfigure.js";
import { setManifestKey } from "../../../src/lib/operations/settings.js";
import { formatStatus, showStatus } from "../../../src/lib/operations/status.js";
import {
	buildManifest,
	canonicalPaths,
	createTestContext,
	messages,
	pathExists,
	readText,
	seedManifest,
	withTempHome,
	writeText,
} from "../engine.helpers.js";

describe.sequential("setManifestKey", () => {
	it("stores comma-separated paths as a list", async () => {
		await withTempHome(async () => {
			const paths = canonicalPaths();
			await seedManifest(paths, buildManifest());
			const { ctx, logs } = createTestContext({ command: "set" });

			const outcome = await setManifestKey(ctx, "agentsMd.paths", "~/a/AGENTS.md, ~/b");

			expect(outcome.value).toEqual(["~/a/AGENTS.md", "~/b"]);
			expect((await readManifest(paths)).agentsMdConfig.paths).toEqual(["~/a/AGENTS.md", "~/b"]);
			expect(messages(logs, "info")).toEqual(['  Set agentsMd.paths = ["~/a/AGENTS.md","~/b"]']);
		});
	});

	it("rejects unsupported keys and leaves the manifest alone", async () => {
		await withTempHome(async () => {
			const paths = canonicalPaths();
			await seedManifest(paths, buildManifest());
			const before = await readText(paths.manifestPath);
			const { ctx } = createTestContext({ command: "set" });

			await expect(setManifestKey(ctx, "activeTargets", "cursor")).rejects.toThrow(
				UnsupportedKeyError,
			);
			expect(await readText(paths.manifestPath)).toBe(before);
		});
	});
});

describe.sequential("reconfigureTargets", () => {
	it("replaces the active targets with the selection and syncs them", async () => {
		await withTempHome(async (homeDir) => {
			const paths = canonicalPaths();
			await seedManifest(paths, buildManifest({ activeTargets: { rules: ["claude"], skills: [] } }));
			const decisions = createScriptedDecisions({ selectMany: [["kiro", "cursor"], ["codex"]] });
			const { ctx, logs } = createTestContext({ command: "reconfigure", decisions });

			const outcome = await reconfigureTargets(ctx);

			expect(outcome.manifest.activeTargets).toEqual({
				rules: ["cursor", "kiro"],
				skills: [skillTarget("codex")],
			});
			expect((await readManifest(paths)).activeTargets.rules).toEqual(["cursor", "kiro"]);
			expect(await pathExists(path.join(homeDir, ".kiro", "steering", "conventions.md"))).toBe(true);
			expect(messages(logs).slice(0, 2)).toEqual([
				"  Current rule targets:  claude",
				"  Current skill targets: ",
			]);
		});
	});
});

describe.sequential("showStatus", () => {
	it("reports rules, targets, skills, and paths", async () => {
		await withTempHome(async () => {
			const paths = canonicalPaths();
			await seedManifest(
				paths,
				buildManifest({
					updatedDate: "2026-01-10",
					activeTargets: { rules: ["cursor", "claude"], skills: [skillTarget("cursor")] },
					rules: [
						{
							id: "style",
							file: "style.md",
							importedFrom: "cursor",
							cursorMeta: { alwaysApply: true, globs: "*.ts", description: "Style" },
							exclude: ["codex"],
						},
					],
				}),
			);
			await writeText(path.join(paths.skillsDir, "review", "SKILL.md"), "# review\n");
			const { ctx } = createTestContext({ command: "status" });

			const report = await showStatus(ctx);

			expect(report).toEqual({
				root: paths.root,
				rules: [
					{
						id: "style",
						importedFrom: "cursor",
						flags: ["alwaysApply", "globs=*.ts"],
						description: "Style",
						exclude: ["codex"],
					},
				],
				activeTargets: { rules: ["cursor", "claude"], skills: ["cursor"] },
				skills: ["review"],
				agentsMdPaths: [],
				lastSynced: "2026-01-10",
			});
			expect(formatStatus(report, false).split("\n")).toEqual([
				"Rules (1)",
				`  ${"style".padEnd(30)} [cursor]  alwaysApply, globs=*.ts Style (not for codex)`,
				"Active Targets",
				"  Rules  -> cursor, claude",
				"  Skills -> cursor",
				"Skills (1)",
				"  review",
				"AGENTS.md Paths",
				"  (none configured)",
				"Last Synced",
				"  2026-01-10",
			]);
		});
	});
});
