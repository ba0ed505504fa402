import type { CanonicalPaths } from "../canonical-paths.js";
import type { ConsumerId } from "../consumers/registry.js";
import { type Manifest, type RuleRecord, rulesForTarget } from "../manifest/types.js";
import { readRuleContent } from "../rules/store.js";

export type RuleDocument = {
	rule: RuleRecord;
	content: string;
};

// Active rules for one consumer, in manifest order, with their canonical bodies.
export async function loadRuleDocuments(
	paths: CanonicalPaths,
	manifest: Manifest,
	consumerId: ConsumerId,
): Promise<RuleDocument[]> {
	const documents: RuleDocument[] = [];
	for (const rule of rulesForTarget(manifest, consumerId)) {
		documents.push({ rule, content: await readRuleContent(paths, rule) });
	}
	return documents;
}
