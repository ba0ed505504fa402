import type { EngineContext } from "../engine-context.js";
import { writeGeneratedFile } from "../file-writer.js";
import { buildGeneratedHeader } from "../generated-marker.js";
import type { RuleDocument } from "./rule-documents.js";
import { emptyGeneratorResult, type GeneratorResult } from "./types.js";

export function renderConcatenatedRules(
	documents: RuleDocument[],
	options: { headed: boolean; now: Date },
): string {
	const parts = [buildGeneratedHeader(options.now), ""];
	for (const { rule, content } of documents) {
		if (options.headed) {
			parts.push(`## Rule: ${rule.id}\n`);
		}
		parts.push(content, "");
	}
	return parts.join("\n");
}

export async function generateConcatenatedRules(
	ctx: EngineContext,
	documents: RuleDocument[],
	rulesFile: string,
	headed: boolean,
): Promise<GeneratorResult> {
	const result = emptyGeneratorResult();
	const content = renderConcatenatedRules(documents, { headed, now: ctx.now() });
	await writeGeneratedFile(ctx, rulesFile, content);
	result.written.push(rulesFile);
	return result;
}
