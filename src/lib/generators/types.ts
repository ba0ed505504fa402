import type { SkillLinkResult } from "../skills/reconcile.js";

export type GeneratorResult = {
	written: string[];
	removed: string[];
	skills: SkillLinkResult | null;
	skippedReason?: string;
};

export function emptyGeneratorResult(): GeneratorResult {
	return { written: [], removed: [], skills: null };
}
