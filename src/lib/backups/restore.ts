import type { Dirent } from "node:fs";
import { copyFile, mkdir, readdir } from "node:fs/promises";
import path from "node:path";
import type { EngineContext } from "../engine-context.js";
import { type BackupSession, resolveOriginalPath } from "./session.js";

export type SessionFile = {
	mirroredPath: string;
	originalPath: string;
};

async function walkFiles(directory: string): Promise<string[]> {
	let entries: Dirent[];
	try {
		entries = await readdir(directory, { withFileTypes: true });
	} catch (error) {
		const code = (error as NodeJS.ErrnoException).code;
		if (code === "ENOENT" || code === "ENOTDIR") {
			return [];
		}
		throw error;
	}
	const files: string[] = [];
	for (const entry of entries.sort((left, right) => left.name.localeCompare(right.name))) {
		const entryPath = path.join(directory, entry.name);
		if (entry.isDirectory()) {
			files.push(...(await walkFiles(entryPath)));
		} else if (entry.isFile()) {
			files.push(entryPath);
		}
	}
	return files;
}

export async function listSessionFiles(session: BackupSession): Promise<SessionFile[]> {
	const files = await walkFiles(session.filesRoot);
	return files.map((mirroredPath) => ({
		mirroredPath,
		originalPath: resolveOriginalPath(session.filesRoot, mirroredPath),
	}));
}

// Session files whose original path is one of `targets`.
export async function findRestorableFiles(
	session: BackupSession,
	targets: Iterable<string>,
): Promise<SessionFile[]> {
	const wanted = new Set(Array.from(targets, (target) => path.resolve(target)));
	const files = await listSessionFiles(session);
	return files.filter((file) => wanted.has(path.resolve(file.originalPath)));
}

/**
 * Copies backed-up originals for `targets` back into place and returns how many
 * were (or, under dry-run, would be) restored.
 */
export async function restoreFromBackup(
	ctx: EngineContext,
	session: BackupSession,
	targets: Iterable<string>,
): Promise<number> {
	const restorable = await findRestorableFiles(session, targets);
	for (const file of restorable) {
		if (ctx.options.dryRun) {
			ctx.logger.info(`[dry-run] Would restore ${file.originalPath}`);
			continue;
		}
		await mkdir(path.dirname(file.originalPath), { recursive: true });
		await copyFile(file.mirroredPath, file.originalPath);
		ctx.logger.info(`  Restored ${file.originalPath}`);
	}
	return restorable.length;
}
