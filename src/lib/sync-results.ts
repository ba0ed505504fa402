import type { ConsumerId } from "./consumers/registry.js";
import type { SkillLinkResult } from "./skills/reconcile.js";

export type SyncStatus = "synced" | "skipped" | "failed";
export type SyncPhase = "rules" | "skills";

export type SyncResult = {
	consumerId: ConsumerId;
	phase: SyncPhase;
	status: SyncStatus;
	message: string;
	written: string[];
	removed: string[];
	skills: SkillLinkResult | null;
	error?: string | null;
};

export type SyncSummary = {
	root: string;
	results: SyncResult[];
	warnings: string[];
	hadFailures: boolean;
	ruleTargets: number;
	skillTargets: number;
	dryRun: boolean;
	persisted: boolean;
};

export function buildSummary(input: {
	root: string;
	results: SyncResult[];
	warnings?: string[];
	dryRun: boolean;
	persisted: boolean;
}): SyncSummary {
	const counted = input.results.filter((result) => result.status !== "failed");
	return {
		root: input.root,
		results: input.results,
		warnings: input.warnings ?? [],
		hadFailures: input.results.some((result) => result.status === "failed"),
		ruleTargets: counted.filter((result) => result.phase === "rules").length,
		skillTargets: counted.filter((result) => result.phase === "skills").length,
		dryRun: input.dryRun,
		persisted: input.persisted,
	};
}

export function formatSkillCounts(skills: SkillLinkResult): string {
	return `${skills.created.length} linked, ${skills.removed.length} removed, ${skills.preserved.length} preserved`;
}

export function formatSummary(summary: SyncSummary, jsonOutput: boolean): string {
	if (jsonOutput) {
		return JSON.stringify(summary, null, 2);
	}

	const lines = summary.results.map((result) => result.message);
	for (const warning of summary.warnings) {
		lines.push(`Warning: ${warning}`);
	}
	const dry = summary.dryRun ? " (dry-run)" : "";
	lines.push(
		`${summary.ruleTargets} rule targets, ${summary.skillTargets} skill targets synced.${dry}`,
	);
	return lines.join("\n");
}
