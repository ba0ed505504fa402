import { mkdir, readlink, symlink } from "node:fs/promises";
import path from "node:path";
import { reconcileSkillLinks } from "../../../src/lib/skills/reconcile.js";
import {
	canonicalPaths,
	createTestContext,
	isSymlink,
	messages,
	pathExists,
	withTempHome,
	writeText,
} from "../engine.helpers.js";

async function seedStore(names: string[]) {
	const { skillsDir } = canonicalPaths();
	for (const name of names) {
		await writeText(path.join(skillsDir, name, "SKILL.md"), `# ${name}\n`);
	}
	return skillsDir;
}

describe.sequential("reconcileSkillLinks", () => {
	it("links every canonical skill and changes nothing on a second run", async () => {
		await withTempHome(async (homeDir) => {
			const skillsDir = await seedStore(["alpha", "beta"]);
			const targetDir = path.join(homeDir, ".codex", "skills");
			const { ctx } = createTestContext();

			const first = await reconcileSkillLinks(ctx, targetDir);
			const second = await reconcileSkillLinks(ctx, targetDir);

			expect(first).toEqual({ created: ["alpha", "beta"], removed: [], preserved: [] });
			expect(second).toEqual({ created: [], removed: [], preserved: [] });
			expect(await readlink(path.join(targetDir, "alpha"))).toBe(path.join(skillsDir, "alpha"));
		});
	});

	it("prunes stale store links, repoints retargeted ones, and preserves real entries", async () => {
		await withTempHome(async (homeDir) => {
			const skillsDir = await seedStore(["alpha", "beta"]);
			const targetDir = path.join(homeDir, ".cursor", "skills");
			const external = path.join(homeDir, "elsewhere", "tool");
			await mkdir(external, { recursive: true });
			await writeText(path.join(targetDir, "beta", "SKILL.md"), "hand-made\n");
			await symlink(path.join(skillsDir, "beta"), path.join(targetDir, "alpha"));
			await symlink(path.join(skillsDir, "gone"), path.join(targetDir, "old"));
			await symlink(external, path.join(targetDir, "external"));
			const { ctx } = createTestContext();

			const result = await reconcileSkillLinks(ctx, targetDir);

			expect(result).toEqual({ created: ["alpha"], removed: ["alpha", "old"], preserved: ["beta"] });
			expect(await readlink(path.join(targetDir, "alpha"))).toBe(path.join(skillsDir, "alpha"));
			expect(await pathExists(path.join(targetDir, "old"))).toBe(false);
			expect(await isSymlink(path.join(targetDir, "external"))).toBe(true);
			expect(await isSymlink(path.join(targetDir, "beta"))).toBe(false);

			const again = await reconcileSkillLinks(ctx, targetDir);
			expect(again).toEqual({ created: [], removed: [], preserved: ["beta"] });
		});
	});

	it("does nothing when the store does not exist", async () => {
		await withTempHome(async (homeDir) => {
			const targetDir = path.join(homeDir, ".gemini", "skills");
			const { ctx } = createTestContext();

			expect(await reconcileSkillLinks(ctx, targetDir)).toEqual({
				created: [],
				removed: [],
				preserved: [],
			});
			expect(await pathExists(targetDir)).toBe(false);
		});
	});

	it("reports planned links without touching the filesystem under dry-run", async () => {
		await withTempHome(async (homeDir) => {
			const skillsDir = await seedStore(["alpha"]);
			const targetDir = path.join(homeDir, ".codex", "skills");
			const { ctx, logs } = createTestContext({ options: { dryRun: true } });

			const result = await reconcileSkillLinks(ctx, targetDir);

			expect(result.created).toEqual(["alpha"]);
			expect(await pathExists(targetDir)).toBe(false);
			expect(messages(logs)).toEqual([
				`[dry-run] Would symlink ${path.join(targetDir, "alpha")} -> ${path.join(skillsDir, "alpha")}`,
			]);
		});
	});
});
