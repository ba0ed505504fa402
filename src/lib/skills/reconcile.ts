import type { Dirent, Stats } from "node:fs";
import { lstat, mkdir, readdir, readlink, realpath, symlink } from "node:fs/promises";
import path from "node:path";
import { isWithinDirectory } from "../canonical-paths.js";
import type { EngineContext } from "../engine-context.js";
import { removeGeneratedFile } from "../file-writer.js";
import { listCanonicalSkills } from "../rules/store.js";

export type SkillLinkResult = {
	created: string[];
	removed: string[];
	preserved: string[];
};

export function emptySkillLinkResult(): SkillLinkResult {
	return { created: [], removed: [], preserved: [] };
}

function isMissing(error: unknown): boolean {
	const code = (error as NodeJS.ErrnoException).code;
	return code === "ENOENT" || code === "ENOTDIR";
}

async function lstatOrNull(candidate: string): Promise<Stats | null> {
	try {
		return await lstat(candidate);
	} catch (error) {
		if (isMissing(error)) {
			return null;
		}
		throw error;
	}
}

// Missing paths resolve lexically so dangling links still compare.
async function resolvePath(candidate: string): Promise<string> {
	try {
		return await realpath(candidate);
	} catch (error) {
		const code = (error as NodeJS.ErrnoException).code;
		if (!isMissing(error) && code !== "ELOOP") {
			throw error;
		}
		return path.resolve(candidate);
	}
}

export async function resolveLinkTarget(linkPath: string): Promise<string> {
	try {
		return await realpath(linkPath);
	} catch (error) {
		const code = (error as NodeJS.ErrnoException).code;
		if (!isMissing(error) && code !== "ELOOP") {
			throw error;
		}
		return path.resolve(path.dirname(linkPath), await readlink(linkPath));
	}
}

/**
 * Both the lexical and the real location of the skills store, so links resolve
 * into it whichever form they were created with.
 */
export async function resolveStoreRoots(skillsDir: string): Promise<string[]> {
	const lexical = path.resolve(skillsDir);
	const real = await resolvePath(skillsDir);
	return real === lexical ? [lexical] : [lexical, real];
}

export function isUnderStore(roots: string[], candidate: string): boolean {
	return roots.some((root) => candidate !== root && isWithinDirectory(root, candidate));
}

export async function listSymlinks(directory: string): Promise<string[]> {
	let entries: Dirent[];
	try {
		entries = await readdir(directory, { withFileTypes: true });
	} catch (error) {
		if (isMissing(error)) {
			return [];
		}
		throw error;
	}
	return entries
		.filter((entry) => entry.isSymbolicLink())
		.map((entry) => entry.name)
		.sort();
}

async function unlinkSkill(ctx: EngineContext, linkPath: string): Promise<void> {
	if (ctx.options.dryRun) {
		ctx.logger.info(`[dry-run] Would remove link ${linkPath}`);
		return;
	}
	await removeGeneratedFile(ctx, linkPath);
}

/**
 * Points `targetDir/<name>` at every canonical skill directory.
 *
 * Links into the canonical store that are stale or retargeted are pruned first.
 * Real files and directories are never replaced. A second run with the same
 * canonical store changes nothing.
 */
export async function reconcileSkillLinks(
	ctx: EngineContext,
	targetDir: string,
): Promise<SkillLinkResult> {
	const result = emptySkillLinkResult();
	const storeDir = ctx.paths.skillsDir;
	if (!(await lstatOrNull(storeDir))?.isDirectory()) {
		return result;
	}
	const { dryRun } = ctx.options;
	if (!dryRun) {
		await mkdir(targetDir, { recursive: true });
	}

	const roots = await resolveStoreRoots(storeDir);
	const canonical = await listCanonicalSkills(ctx.paths);
	const expected = new Map<string, string>();
	for (const name of canonical) {
		expected.set(name, await resolvePath(path.join(storeDir, name)));
	}

	for (const name of await listSymlinks(targetDir)) {
		const linkPath = path.join(targetDir, name);
		const resolved = await resolveLinkTarget(linkPath);
		if (!isUnderStore(roots, resolved) || expected.get(name) === resolved) {
			continue;
		}
		await unlinkSkill(ctx, linkPath);
		result.removed.push(name);
	}

	for (const name of canonical) {
		const linkPath = path.join(targetDir, name);
		const skillPath = path.join(storeDir, name);
		// Under dry-run a pruned link is still on disk; treat it as gone.
		const stats = result.removed.includes(name) ? null : await lstatOrNull(linkPath);
		if (stats && !stats.isSymbolicLink()) {
			ctx.logger.verbose(`Skipping ${linkPath} (not a symlink, preserving)`);
			result.preserved.push(name);
			continue;
		}
		if (stats) {
			if ((await resolveLinkTarget(linkPath)) === expected.get(name)) {
				continue;
			}
			await unlinkSkill(ctx, linkPath);
			result.removed.push(name);
		}
		if (dryRun) {
			ctx.logger.info(`[dry-run] Would symlink ${linkPath} -> ${skillPath}`);
		} else {
			await symlink(skillPath, linkPath, "dir");
			ctx.logger.verbose(`Symlinked ${name}`);
		}
		result.created.push(name);
	}
	return result;
}
