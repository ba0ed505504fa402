import type { EngineContext } from "../engine-context.js";
import { buildUnifiedDiff } from "../file-writer.js";
import type { ImportedRule } from "../manifest/types.js";
import { formatRatio, isDuplicate, similarityRatio } from "./similarity.js";

/**
 * Collapses imported rules that share an id.
 *
 * The first rule seen for an id is kept. A later rule with near-identical
 * content is dropped. A genuine conflict keeps the first rule unless an
 * interactive decision provider answers "no" to keeping it, in which case the
 * kept rule is removed and the later one is appended.
 */
export async function deduplicateRules(
	ctx: EngineContext,
	rules: ImportedRule[],
): Promise<ImportedRule[]> {
	const { logger, decisions } = ctx;
	const seen = new Map<string, ImportedRule>();
	let result: ImportedRule[] = [];

	for (const rule of rules) {
		const existing = seen.get(rule.id);
		if (!existing) {
			seen.set(rule.id, rule);
			result.push(rule);
			continue;
		}

		const ratio = similarityRatio(existing.content, rule.content);
		if (isDuplicate(ratio)) {
			logger.info(
				`  Duplicate '${rule.id}' from ${rule.source} matches ${existing.source} (${formatRatio(ratio)}), skipping`,
			);
			continue;
		}

		logger.warn(
			`'${rule.id}' from ${rule.source} differs from ${existing.source} (${formatRatio(ratio)})`,
		);
		if (!decisions.interactive) {
			continue;
		}
		logger.info(
			buildUnifiedDiff(rule.id, existing.content, rule.content, {
				from: `${existing.source}/${rule.id}`,
				to: `${rule.source}/${rule.id}`,
			}),
		);
		const keepExisting = await decisions.confirm(`  Keep version from ${existing.source}?`, true);
		if (!keepExisting) {
			seen.set(rule.id, rule);
			result = result.filter((entry) => entry.id !== rule.id);
			result.push(rule);
		}
	}
	return result;
}
