import { readFile } from "node:fs/promises";
import path from "node:path";
import type { EngineContext } from "../engine-context.js";
import { removeGeneratedFile, writeGeneratedFile } from "../file-writer.js";
import { buildFrontmatter, type FrontmatterMap, parseFrontmatter } from "../frontmatter.js";
import { buildGeneratedHeader, isGenerated } from "../generated-marker.js";
import { listFilesWithExtension } from "../importers/sources.js";
import type { CursorMeta } from "../manifest/types.js";
import type { RuleDocument } from "./rule-documents.js";
import { emptyGeneratorResult, type GeneratorResult } from "./types.js";

export function buildRuleFrontmatter(cursorMeta: CursorMeta | undefined): string {
	const meta: FrontmatterMap = {};
	if (cursorMeta?.description !== undefined) {
		meta.description = cursorMeta.description;
	}
	if (cursorMeta?.alwaysApply !== undefined) {
		meta.alwaysApply = cursorMeta.alwaysApply;
	}
	if (cursorMeta?.globs !== undefined) {
		meta.globs = cursorMeta.globs;
	}
	return Object.keys(meta).length > 0 ? buildFrontmatter(meta) : "---\n---";
}

export function renderPerFileRule(document: RuleDocument, now: Date): string {
	const frontmatter = buildRuleFrontmatter(document.rule.cursorMeta);
	return `${frontmatter}\n\n${buildGeneratedHeader(now)}\n${document.content}`;
}

/**
 * Writes one `<id><extension>` per active rule, then removes generated files
 * for ids that are no longer active. Hand-written files are left in place.
 */
export async function generatePerFileRules(
	ctx: EngineContext,
	documents: RuleDocument[],
	rulesDir: string,
	extension: string,
): Promise<GeneratorResult> {
	const result = emptyGeneratorResult();
	const now = ctx.now();
	const activeIds = new Set<string>();
	for (const document of documents) {
		activeIds.add(document.rule.id);
		const filePath = path.join(rulesDir, `${document.rule.id}${extension}`);
		await writeGeneratedFile(ctx, filePath, renderPerFileRule(document, now));
		result.written.push(filePath);
	}

	for (const filePath of (await listFilesWithExtension(rulesDir, extension)) ?? []) {
		if (activeIds.has(path.basename(filePath, extension))) {
			continue;
		}
		const { body } = parseFrontmatter(await readFile(filePath, "utf8"));
		if (!isGenerated(body)) {
			continue;
		}
		await removeGeneratedFile(ctx, filePath);
		result.removed.push(filePath);
	}
	return result;
}
