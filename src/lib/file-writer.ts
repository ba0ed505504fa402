import { lstat, mkdir, readFile, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { createTwoFilesPatch } from "diff";
import type { EngineContext } from "./engine-context.js";

export type WriteStatus = "created" | "updated" | "unchanged" | "dry-run";

async function readExisting(filePath: string): Promise<string | null> {
	try {
		return await readFile(filePath, "utf8");
	} catch (error) {
		const code = (error as NodeJS.ErrnoException).code;
		if (code === "ENOENT" || code === "EISDIR") {
			return null;
		}
		throw error;
	}
}

async function isSymlink(candidate: string): Promise<boolean> {
	try {
		return (await lstat(candidate)).isSymbolicLink();
	} catch (error) {
		const code = (error as NodeJS.ErrnoException).code;
		if (code === "ENOENT" || code === "ENOTDIR") {
			return false;
		}
		throw error;
	}
}

export function buildUnifiedDiff(
	filePath: string,
	existing: string,
	next: string,
	labels: { from?: string; to?: string } = {},
): string {
	if (existing === next) {
		return "";
	}
	return createTwoFilesPatch(
		labels.from ?? filePath,
		labels.to ?? `${filePath} (new)`,
		existing,
		next,
		undefined,
		undefined,
		{ context: 3 },
	);
}

/**
 * The single write path for everything the engine produces.
 *
 * Dry runs only report the write. Diff previews print the change and skip files
 * whose content would not change. An existing destination is captured in the
 * backup session before it is overwritten.
 */
export async function writeGeneratedFile(
	ctx: EngineContext,
	filePath: string,
	content: string,
): Promise<WriteStatus> {
	const { logger, options } = ctx;
	if (options.dryRun) {
		logger.verbose(
			`[dry-run] Would write ${filePath} (${Buffer.byteLength(content, "utf8")} bytes)`,
		);
		return "dry-run";
	}

	const existing = await readExisting(filePath);
	if (options.showDiff && existing !== null) {
		const diffText = buildUnifiedDiff(filePath, existing, content);
		if (!diffText) {
			logger.verbose(`${filePath} (unchanged)`);
			return "unchanged";
		}
		logger.info(diffText);
	}

	await mkdir(path.dirname(filePath), { recursive: true });
	if (existing !== null) {
		await ctx.backups.backupFile(filePath);
	}
	await writeFile(filePath, content, "utf8");
	logger.verbose(`Wrote ${filePath}`);
	return existing === null ? "created" : "updated";
}

export async function removeGeneratedFile(ctx: EngineContext, filePath: string): Promise<boolean> {
	const { logger, options } = ctx;
	if (options.dryRun) {
		logger.verbose(`[dry-run] Would remove ${filePath}`);
		return false;
	}
	if (!(await isSymlink(filePath))) {
		await ctx.backups.backupFile(filePath);
	}
	await rm(filePath, { force: true });
	logger.verbose(`Removed ${filePath}`);
	return true;
}
