import {
	CONSUMER_IDS,
	type ConsumerId,
	getConsumer,
	isConsumerId,
	type ResolvedConsumer,
} from "../consumers/registry.js";
import type { EngineContext } from "../engine-context.js";
import { UnknownConsumerError } from "../errors.js";
import { type GeneratorResult, runGenerator } from "../generators/index.js";
import { readManifest, writeManifest } from "../manifest/store.js";
import { type Manifest, rulesForTarget } from "../manifest/types.js";
import { reconcileSkillLinks } from "../skills/reconcile.js";
import {
	buildSummary,
	formatSkillCounts,
	type SyncPhase,
	type SyncResult,
	type SyncSummary,
} from "../sync-results.js";

export type SyncRequest = {
	// Restricts the run to a single consumer.
	only?: string | null;
	// Skips the manifest read when the caller already holds it.
	manifest?: Manifest;
};

export type SyncPlan = {
	ruleTargets: ConsumerId[];
	skillTargets: ConsumerId[];
};

export function validateOnly(only: string | null | undefined): ConsumerId | null {
	if (!only) {
		return null;
	}
	if (!isConsumerId(only)) {
		throw new UnknownConsumerError(only, CONSUMER_IDS);
	}
	return only;
}

export function planSync(manifest: Manifest, only: ConsumerId | null): SyncPlan {
	const ruleTargets = manifest.activeTargets.rules;
	const skillTargets = manifest.activeTargets.skills.map((selection) => selection.name);
	if (!only) {
		return { ruleTargets, skillTargets };
	}
	return {
		ruleTargets: ruleTargets.filter((id) => id === only),
		skillTargets: skillTargets.filter((id) => id === only),
	};
}

function describeRules(consumer: ResolvedConsumer, ruleCount: number, output: GeneratorResult) {
	if (output.skippedReason) {
		return `Skipped ${consumer.label}: ${output.skippedReason}.`;
	}
	const removed = output.removed.length > 0 ? `, ${output.removed.length} stale removed` : "";
	return `Synced ${ruleCount} rules to ${consumer.label}${removed}.`;
}

function failedResult(consumerId: ConsumerId, phase: SyncPhase, label: string, error: unknown) {
	const message = error instanceof Error ? error.message : String(error);
	const result: SyncResult = {
		consumerId,
		phase,
		status: "failed",
		message: `Failed to sync ${label}: ${message}`,
		written: [],
		removed: [],
		skills: null,
		error: message,
	};
	return result;
}

async function runRulesPhase(
	ctx: EngineContext,
	manifest: Manifest,
	targets: ConsumerId[],
): Promise<SyncResult[]> {
	const results: SyncResult[] = [];
	for (const consumerId of targets) {
		const consumer = getConsumer(consumerId);
		try {
			const output = await runGenerator(ctx, manifest, consumer);
			const ruleCount = rulesForTarget(manifest, consumerId).length;
			results.push({
				consumerId,
				phase: "rules",
				status: output.skippedReason ? "skipped" : "synced",
				message: describeRules(consumer, ruleCount, output),
				written: output.written,
				removed: output.removed,
				skills: output.skills,
			});
		} catch (error) {
			results.push(failedResult(consumerId, "rules", consumer.label, error));
		}
	}
	return results;
}

async function runSkillsPhase(
	ctx: EngineContext,
	manifest: Manifest,
	targets: ConsumerId[],
	ruleResults: SyncResult[],
): Promise<SyncResult[]> {
	const results: SyncResult[] = [];
	for (const consumerId of targets) {
		const consumer = getConsumer(consumerId);
		const { skillsDir } = consumer;
		if (!skillsDir) {
			continue;
		}
		try {
			let skills = ruleResults.find((result) => result.consumerId === consumerId)?.skills ?? null;
			if (consumer.rules.kind === "skills-only") {
				skills = (await runGenerator(ctx, manifest, consumer)).skills;
			} else if (!skills) {
				skills = await reconcileSkillLinks(ctx, skillsDir);
			}
			results.push({
				consumerId,
				phase: "skills",
				status: "synced",
				message: skills
					? `Linked skills for ${consumer.label} (${formatSkillCounts(skills)}).`
					: `Linked skills for ${consumer.label}.`,
				written: [],
				removed: [],
				skills,
			});
		} catch (error) {
			results.push(failedResult(consumerId, "skills", consumer.label, error));
		}
	}
	return results;
}

/**
 * Renders every active target, then persists the manifest.
 *
 * A failing target is reported and the others still run; the manifest is only
 * rewritten when no target failed and the run is not a dry run.
 */
export async function runSync(ctx: EngineContext, request: SyncRequest = {}): Promise<SyncSummary> {
	const only = validateOnly(request.only);
	const manifest = request.manifest ?? (await readManifest(ctx.paths));
	const plan = planSync(manifest, only);
	const warnings: string[] = [];
	if (only && plan.ruleTargets.length === 0 && plan.skillTargets.length === 0) {
		warnings.push(`'${only}' is not an active rule or skill target.`);
	}

	const ruleResults = await runRulesPhase(ctx, manifest, plan.ruleTargets);
	const skillResults = await runSkillsPhase(ctx, manifest, plan.skillTargets, ruleResults);
	const results = [...ruleResults, ...skillResults];

	const failed = results.filter((result) => result.status === "failed").length;
	let persisted = false;
	if (failed > 0) {
		warnings.push(`Manifest not updated because ${failed} target(s) failed.`);
	} else if (!ctx.options.dryRun) {
		await writeManifest(ctx, manifest);
		persisted = true;
	}

	return buildSummary({
		root: ctx.paths.root,
		results,
		warnings,
		dryRun: ctx.options.dryRun,
		persisted,
	});
}
