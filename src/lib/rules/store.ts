import type { Dirent } from "node:fs";
import { readdir, readFile, stat } from "node:fs/promises";
import path from "node:path";
import type { CanonicalPaths } from "../canonical-paths.js";
import type { EngineContext } from "../engine-context.js";
import { removeGeneratedFile, type WriteStatus, writeGeneratedFile } from "../file-writer.js";
import type { RuleRecord } from "../manifest/types.js";

export const RULE_FILE_EXTENSION = ".md";
export const RULE_ID_PATTERN = /^[a-z0-9]+(?:-[a-z0-9]+)*$/;

export function ruleFileName(id: string): string {
	return `${id}${RULE_FILE_EXTENSION}`;
}

export function ruleFilePath(paths: CanonicalPaths, rule: Pick<RuleRecord, "file">): string {
	return path.join(paths.rulesDir, rule.file);
}

export async function ruleFileExists(paths: CanonicalPaths, file: string): Promise<boolean> {
	try {
		return (await stat(path.join(paths.rulesDir, file))).isFile();
	} catch (error) {
		const code = (error as NodeJS.ErrnoException).code;
		if (code === "ENOENT" || code === "ENOTDIR") {
			return false;
		}
		throw error;
	}
}

// A rule whose file went missing renders as empty rather than failing the whole target.
export async function readRuleContent(
	paths: CanonicalPaths,
	rule: Pick<RuleRecord, "file">,
): Promise<string> {
	try {
		return await readFile(ruleFilePath(paths, rule), "utf8");
	} catch (error) {
		const code = (error as NodeJS.ErrnoException).code;
		if (code === "ENOENT") {
			return "";
		}
		throw error;
	}
}

export async function writeRuleContent(
	ctx: EngineContext,
	file: string,
	content: string,
): Promise<WriteStatus> {
	return writeGeneratedFile(ctx, path.join(ctx.paths.rulesDir, file), content);
}

export async function removeRuleFile(ctx: EngineContext, file: string): Promise<boolean> {
	if (!(await ruleFileExists(ctx.paths, file))) {
		return false;
	}
	return removeGeneratedFile(ctx, path.join(ctx.paths.rulesDir, file));
}

export async function listSubdirectories(directory: string): Promise<string[]> {
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
	return entries
		.filter((entry) => entry.isDirectory())
		.map((entry) => entry.name)
		.sort();
}

export async function listCanonicalSkills(paths: CanonicalPaths): Promise<string[]> {
	return listSubdirectories(paths.skillsDir);
}
