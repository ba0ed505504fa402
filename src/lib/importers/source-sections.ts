import path from "node:path";
import type { ResolvedConsumer } from "../consumers/registry.js";
import type { EngineContext } from "../engine-context.js";
import { isGenerated } from "../generated-marker.js";
import type { ImportedRule } from "../manifest/types.js";
import { countLines, readOptionalText } from "./sources.js";

const SOURCE_MARKER = /^## Source:\s*(.+)$/m;

export function splitSourceSections(text: string): Array<{ name: string; content: string }> {
	// With a capture group, split alternates: preamble, name, content, name, content...
	const parts = text.split(SOURCE_MARKER);
	const sections: Array<{ name: string; content: string }> = [];
	for (let index = 1; index < parts.length; index += 2) {
		sections.push({ name: parts[index].trim(), content: (parts[index + 1] ?? "").trim() });
	}
	return sections;
}

export async function importSourceSections(
	ctx: EngineContext,
	consumer: ResolvedConsumer,
	rulesFile: string,
): Promise<ImportedRule[]> {
	const fileName = path.basename(rulesFile);
	const text = await readOptionalText(rulesFile);
	if (text === null) {
		ctx.logger.info(`  ${consumer.label}: no ${fileName} found, skipping`);
		return [];
	}
	if (isGenerated(text)) {
		ctx.logger.info(`  ${consumer.label}: skipping generated ${fileName}`);
		return [];
	}

	return splitSourceSections(text).map(({ name, content }) => {
		ctx.logger.info(
			`  ${consumer.label}: imported section '${name}' (${countLines(content)} lines)`,
		);
		return { id: name.replace(/\.mdc$/, ""), content, source: consumer.id };
	});
}
