import type { ResolvedConsumer } from "../consumers/registry.js";
import type { EngineContext } from "../engine-context.js";
import type { Manifest } from "../manifest/types.js";
import { reconcileSkillLinks } from "../skills/reconcile.js";
import { generateConcatenatedRules } from "./concatenated.js";
import { generatePerFileRules } from "./per-file.js";
import { loadRuleDocuments } from "./rule-documents.js";
import { generateSummary } from "./summary.js";
import { emptyGeneratorResult, type GeneratorResult } from "./types.js";

async function renderRules(
	ctx: EngineContext,
	manifest: Manifest,
	consumer: ResolvedConsumer,
): Promise<GeneratorResult> {
	const { rules } = consumer;
	if (rules.kind === "skills-only") {
		return emptyGeneratorResult();
	}
	const documents = await loadRuleDocuments(ctx.paths, manifest, consumer.id);
	switch (rules.kind) {
		case "per-file":
			return generatePerFileRules(ctx, documents, rules.rulesDir, rules.extension);
		case "concatenated":
			return generateConcatenatedRules(ctx, documents, rules.rulesFile, rules.headed);
		case "summary":
			return generateSummary(ctx, documents, manifest.agentsMdConfig);
	}
}

/**
 * Renders one consumer's artifacts and reconciles its skill links when it has
 * a skills directory.
 */
export async function runGenerator(
	ctx: EngineContext,
	manifest: Manifest,
	consumer: ResolvedConsumer,
): Promise<GeneratorResult> {
	const result = await renderRules(ctx, manifest, consumer);
	if (consumer.skillsDir) {
		result.skills = await reconcileSkillLinks(ctx, consumer.skillsDir);
	}
	return result;
}

export type { GeneratorResult } from "./types.js";
