import path from "node:path";
import type { ResolvedConsumer } from "../consumers/registry.js";
import type { EngineContext } from "../engine-context.js";
import { isGenerated } from "../generated-marker.js";
import type { ImportedRule } from "../manifest/types.js";
import { countLines, fileStem, listFilesWithExtension, readOptionalText } from "./sources.js";

export async function importFlatDirectory(
	ctx: EngineContext,
	consumer: ResolvedConsumer,
	rulesDir: string,
	extension: string,
): Promise<ImportedRule[]> {
	const files = await listFilesWithExtension(rulesDir, extension);
	if (!files) {
		ctx.logger.info(`  ${consumer.label}: no ${path.basename(rulesDir)} directory found, skipping`);
		return [];
	}

	const rules: ImportedRule[] = [];
	for (const filePath of files) {
		const text = await readOptionalText(filePath);
		if (text === null) {
			continue;
		}
		const name = path.basename(filePath);
		if (isGenerated(text)) {
			ctx.logger.info(`  ${consumer.label}: skipping generated file ${name}`);
			continue;
		}
		rules.push({ id: fileStem(filePath), content: text.trim(), source: consumer.id });
		ctx.logger.info(`  ${consumer.label}: imported ${name} (${countLines(text)} lines)`);
	}
	return rules;
}
