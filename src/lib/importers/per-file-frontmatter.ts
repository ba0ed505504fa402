import path from "node:path";
import type { ResolvedConsumer } from "../consumers/registry.js";
import type { EngineContext } from "../engine-context.js";
import { type FrontmatterMap, parseFrontmatter } from "../frontmatter.js";
import { isGenerated } from "../generated-marker.js";
import type { CursorMeta, ImportedRule } from "../manifest/types.js";
import { countLines, fileStem, listFilesWithExtension, readOptionalText } from "./sources.js";

export function pickCursorMeta(meta: FrontmatterMap): CursorMeta | undefined {
	const picked: CursorMeta = {};
	if (typeof meta.alwaysApply === "boolean") {
		picked.alwaysApply = meta.alwaysApply;
	}
	if (typeof meta.description === "string") {
		picked.description = meta.description;
	}
	if (typeof meta.globs === "string") {
		picked.globs = meta.globs;
	}
	return Object.keys(picked).length > 0 ? picked : undefined;
}

export async function importPerFileRules(
	ctx: EngineContext,
	consumer: ResolvedConsumer,
	rulesDir: string,
	extension: string,
): Promise<ImportedRule[]> {
	const files = await listFilesWithExtension(rulesDir, extension);
	if (!files) {
		ctx.logger.info(`  ${consumer.label}: no rules directory found, skipping`);
		return [];
	}

	const rules: ImportedRule[] = [];
	for (const filePath of files) {
		const text = await readOptionalText(filePath);
		if (text === null) {
			continue;
		}
		const name = path.basename(filePath);
		const { meta, body } = parseFrontmatter(text);
		if (isGenerated(body)) {
			ctx.logger.info(`  ${consumer.label}: skipping generated file ${name}`);
			continue;
		}
		const rule: ImportedRule = { id: fileStem(filePath), content: body, source: consumer.id };
		const cursorMeta = pickCursorMeta(meta);
		if (cursorMeta) {
			rule.cursorMeta = cursorMeta;
		}
		rules.push(rule);
		ctx.logger.info(`  ${consumer.label}: imported ${name} (${countLines(body)} lines)`);
	}
	return rules;
}
