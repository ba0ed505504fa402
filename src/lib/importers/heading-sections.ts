import path from "node:path";
import type { ResolvedConsumer } from "../consumers/registry.js";
import type { EngineContext } from "../engine-context.js";
import { isGenerated } from "../generated-marker.js";
import type { ImportedRule } from "../manifest/types.js";
import { countLines, readOptionalText } from "./sources.js";

const HEADING_LINE = /^(# .+)$/m;

export function slugifyHeading(heading: string): string {
	return heading
		.toLowerCase()
		.replace(/[^a-z0-9]+/g, "-")
		.replace(/^-+|-+$/g, "");
}

export function splitHeadingSections(
	text: string,
): Array<{ id: string; heading: string; content: string }> {
	const parts = text.split(HEADING_LINE);
	const sections: Array<{ id: string; heading: string; content: string }> = [];
	for (let index = 1; index < parts.length; index += 2) {
		const headingLine = parts[index];
		const heading = headingLine.replace(/^[# ]+/, "").trim();
		const segment = (parts[index + 1] ?? "").trim();
		sections.push({
			id: slugifyHeading(heading),
			heading,
			content: `${headingLine}\n${segment}`.trim(),
		});
	}
	return sections;
}

export async function importHeadingSections(
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

	return splitHeadingSections(text).map(({ id, heading, content }) => {
		ctx.logger.info(`  ${consumer.label}: imported '${heading}' (${countLines(content)} lines)`);
		return { id, content, source: consumer.id };
	});
}
