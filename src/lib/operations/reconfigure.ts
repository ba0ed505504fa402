import {
	type ConsumerId,
	formatConsumerOption,
	getConsumer,
	RULE_TARGET_IDS,
	SKILL_TARGET_IDS,
} from "../consumers/registry.js";
import type { EngineContext } from "../engine-context.js";
import { readManifest, writeManifest } from "../manifest/store.js";
import { type Manifest, skillTarget } from "../manifest/types.js";
import { runSync } from "../sync/run.js";
import type { SyncSummary } from "../sync-results.js";

export type ReconfigureOutcome = {
	manifest: Manifest;
	sync: SyncSummary;
};

async function selectTargets(
	ctx: EngineContext,
	prompt: string,
	ids: readonly ConsumerId[],
	current: ConsumerId[],
): Promise<ConsumerId[]> {
	const options = ids.map((id) => ({ id, label: formatConsumerOption(getConsumer(id)) }));
	const selected = await ctx.decisions.selectMany(prompt, options, current);
	return ids.filter((id) => selected.includes(id));
}

// Re-selects the active targets, defaulting to the current ones, then syncs.
export async function reconfigureTargets(ctx: EngineContext): Promise<ReconfigureOutcome> {
	const manifest = await readManifest(ctx.paths);
	const currentRules = manifest.activeTargets.rules;
	const currentSkills = manifest.activeTargets.skills.map((selection) => selection.name);
	ctx.logger.info(`  Current rule targets:  ${currentRules.join(", ")}`);
	ctx.logger.info(`  Current skill targets: ${currentSkills.join(", ")}`);

	const rules = await selectTargets(ctx, "Select rule targets:", RULE_TARGET_IDS, currentRules);
	const skills = await selectTargets(ctx, "Select skill targets:", SKILL_TARGET_IDS, currentSkills);
	const next: Manifest = {
		...manifest,
		activeTargets: { rules, skills: skills.map(skillTarget) },
	};
	await writeManifest(ctx, next);
	const sync = await runSync(ctx, { manifest: next });
	return { manifest: next, sync };
}
