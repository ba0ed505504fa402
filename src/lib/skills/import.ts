import { cp, lstat, mkdir } from "node:fs/promises";
import path from "node:path";
import type { EngineContext } from "../engine-context.js";

async function exists(candidate: string): Promise<boolean> {
	try {
		await lstat(candidate);
		return true;
	} catch (error) {
		const code = (error as NodeJS.ErrnoException).code;
		if (code === "ENOENT" || code === "ENOTDIR") {
			return false;
		}
		throw error;
	}
}

/**
 * Copies discovered skill directories into the canonical store.
 *
 * This is the only place skills are copied; afterwards consumers get symlinks.
 * A name already in the store, or seen earlier in `skillDirs`, is skipped.
 * Returns the names copied (or, under dry-run, the names that would be).
 */
export async function importSkills(ctx: EngineContext, skillDirs: string[]): Promise<string[]> {
	const storeDir = ctx.paths.skillsDir;
	const { dryRun } = ctx.options;
	if (!dryRun) {
		await mkdir(storeDir, { recursive: true });
	}
	const imported: string[] = [];
	const seen = new Set<string>();
	for (const source of skillDirs) {
		const name = path.basename(source);
		const destination = path.join(storeDir, name);
		if (seen.has(name) || (await exists(destination))) {
			ctx.logger.verbose(`Skill '${name}' already exists, skipping`);
			continue;
		}
		seen.add(name);
		if (dryRun) {
			ctx.logger.info(`[dry-run] Would copy skill ${name}`);
			imported.push(name);
			continue;
		}
		await cp(source, destination, { recursive: true, dereference: true });
		ctx.logger.info(`  Copied skill: ${name}`);
		imported.push(name);
	}
	return imported;
}
