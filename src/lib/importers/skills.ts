import type { Dirent } from "node:fs";
import { readdir } from "node:fs/promises";
import path from "node:path";

// Directories consumers manage themselves.
export const RESERVED_SKILL_NAMES: ReadonlySet<string> = new Set([".system", "cursor-migration-map"]);
export const RESERVED_SKILL_PREFIXES: readonly string[] = ["pattern-"];

export function isReservedSkillName(name: string): boolean {
	return (
		RESERVED_SKILL_NAMES.has(name) ||
		RESERVED_SKILL_PREFIXES.some((prefix) => name.startsWith(prefix))
	);
}

/**
 * Lists importable skill directories in a consumer's skills dir, by name.
 * Symlinks are skipped since they already point into a managed store.
 */
export async function discoverSkillDirectories(skillsDir: string | undefined): Promise<string[]> {
	if (!skillsDir) {
		return [];
	}
	let entries: Dirent[];
	try {
		entries = await readdir(skillsDir, { withFileTypes: true });
	} catch (error) {
		const code = (error as NodeJS.ErrnoException).code;
		if (code === "ENOENT" || code === "ENOTDIR") {
			return [];
		}
		throw error;
	}
	return entries
		.filter((entry) => entry.isDirectory() && !entry.isSymbolicLink())
		.map((entry) => entry.name)
		.filter((name) => !isReservedSkillName(name))
		.sort()
		.map((name) => path.join(skillsDir, name));
}
