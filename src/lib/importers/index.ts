import type { ImportSource, ResolvedConsumer } from "../consumers/registry.js";
import type { EngineContext } from "../engine-context.js";
import type { ImportedRule } from "../manifest/types.js";
import { RULE_ID_PATTERN } from "../rules/store.js";
import { importFlatDirectory } from "./flat-directory.js";
import { importHeadingSections } from "./heading-sections.js";
import { importPerFileRules } from "./per-file-frontmatter.js";
import { discoverSkillDirectories } from "./skills.js";
import { importSourceSections } from "./source-sections.js";
import { emptyImportResult, type ImportResult } from "./types.js";

async function importRules(
	ctx: EngineContext,
	consumer: ResolvedConsumer,
	source: ImportSource,
): Promise<ImportedRule[]> {
	switch (source.kind) {
		case "per-file-frontmatter":
			return importPerFileRules(ctx, consumer, source.rulesDir, source.extension);
		case "source-sections":
			return importSourceSections(ctx, consumer, source.rulesFile);
		case "heading-sections":
			return importHeadingSections(ctx, consumer, source.rulesFile);
		case "flat-directory":
			return importFlatDirectory(ctx, consumer, source.rulesDir, source.extension);
	}
}

// Ids become file names under rules/, so anything add-rule would reject is left behind.
function keepValidIds(ctx: EngineContext, rules: ImportedRule[]): ImportedRule[] {
	return rules.filter((rule) => {
		if (RULE_ID_PATTERN.test(rule.id)) {
			return true;
		}
		ctx.logger.warn(
			`Skipping rule '${rule.id}' from ${rule.source}: ids must be lowercase letters or digits joined by hyphens.`,
		);
		return false;
	});
}

/**
 * Scans one consumer's existing rules and skills.
 *
 * A consumer without an import shape contributes nothing.
 */
export async function importFromConsumer(
	ctx: EngineContext,
	consumer: ResolvedConsumer,
): Promise<ImportResult> {
	if (!consumer.importSource) {
		return emptyImportResult();
	}
	const rules = keepValidIds(ctx, await importRules(ctx, consumer, consumer.importSource));
	const skills = await discoverSkillDirectories(consumer.skillsDir);
	return { rules, skills };
}

// Consumers run in the order given so the first source of a shared rule id wins dedup.
export async function importFromConsumers(
	ctx: EngineContext,
	consumers: ResolvedConsumer[],
): Promise<ImportResult> {
	const combined = emptyImportResult();
	for (const consumer of consumers) {
		const result = await importFromConsumer(ctx, consumer);
		combined.rules.push(...result.rules);
		combined.skills.push(...result.skills);
	}
	return combined;
}

export type { ImportResult } from "./types.js";
