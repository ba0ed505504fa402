import { readFile } from "node:fs/promises";
import { expandHome } from "../canonical-paths.js";
import { CONSUMER_IDS, type ConsumerId, isConsumerId } from "../consumers/registry.js";
import type { EngineContext } from "../engine-context.js";
import {
	DuplicateRuleIdError,
	InvalidRuleIdError,
	RuleNotFoundError,
	UnknownConsumerError,
} from "../errors.js";
import { readManifest, writeManifest } from "../manifest/store.js";
import type { CursorMeta, Manifest, RuleRecord } from "../manifest/types.js";
import {
	RULE_ID_PATTERN,
	removeRuleFile,
	ruleFileExists,
	ruleFileName,
	writeRuleContent,
} from "../rules/store.js";
import { runSync } from "../sync/run.js";
import type { SyncSummary } from "../sync-results.js";

export type AddRuleRequest = {
	id: string;
	// Path of a file whose content becomes the rule body.
	file?: string | null;
	description?: string | null;
	alwaysApply?: boolean;
	exclude?: string[];
};

export type RuleChangeOutcome = {
	rule: RuleRecord;
	manifest: Manifest;
	// Null under dry-run, where nothing is written or synced.
	sync: SyncSummary | null;
};

export function titleFromId(id: string): string {
	return id
		.split("-")
		.filter(Boolean)
		.map((word) => word.charAt(0).toUpperCase() + word.slice(1))
		.join(" ");
}

export function defaultRuleContent(id: string): string {
	return `# ${titleFromId(id)}\n\nTODO: Add rule content.\n`;
}

function validateExclude(values: string[]): ConsumerId[] {
	return values.map((value) => {
		if (!isConsumerId(value)) {
			throw new UnknownConsumerError(value, CONSUMER_IDS);
		}
		return value;
	});
}

/**
 * Creates `rules/<id>.md`, registers it in the manifest and syncs.
 * Every check runs before anything is written.
 */
export async function addRule(
	ctx: EngineContext,
	request: AddRuleRequest,
): Promise<RuleChangeOutcome> {
	const { id } = request;
	if (!RULE_ID_PATTERN.test(id)) {
		throw new InvalidRuleIdError(id);
	}
	const manifest = await readManifest(ctx.paths);
	const file = ruleFileName(id);
	if (manifest.rules.some((rule) => rule.id === id) || (await ruleFileExists(ctx.paths, file))) {
		throw new DuplicateRuleIdError(id);
	}
	const exclude = validateExclude(request.exclude ?? []);
	const content = request.file
		? await readFile(expandHome(request.file), "utf8")
		: defaultRuleContent(id);

	const cursorMeta: CursorMeta = { alwaysApply: request.alwaysApply ?? true };
	if (request.description) {
		cursorMeta.description = request.description;
	}
	const rule: RuleRecord = { id, file, importedFrom: "manual", cursorMeta };
	if (exclude.length > 0) {
		rule.exclude = exclude;
	}
	const next: Manifest = { ...manifest, rules: [...manifest.rules, rule] };

	if (ctx.options.dryRun) {
		ctx.logger.info(`[dry-run] Would create rules/${file}`);
		ctx.logger.info(`[dry-run] Would add '${id}' to manifest and sync`);
		return { rule, manifest, sync: null };
	}

	await writeRuleContent(ctx, file, content);
	ctx.logger.info(`Created rules/${file}`);
	await writeManifest(ctx, next);
	const sync = await runSync(ctx, { manifest: next });
	return { rule, manifest: next, sync };
}

export async function removeRule(ctx: EngineContext, id: string): Promise<RuleChangeOutcome> {
	const manifest = await readManifest(ctx.paths);
	const rule = manifest.rules.find((candidate) => candidate.id === id);
	if (!rule) {
		throw new RuleNotFoundError(id);
	}
	const next: Manifest = {
		...manifest,
		rules: manifest.rules.filter((candidate) => candidate.id !== id),
	};

	if (ctx.options.dryRun) {
		ctx.logger.info(`[dry-run] Would remove rules/${rule.file}`);
		ctx.logger.info(`[dry-run] Would remove '${id}' from manifest and sync`);
		return { rule, manifest, sync: null };
	}

	if (await removeRuleFile(ctx, rule.file)) {
		ctx.logger.info(`Removed rules/${rule.file}`);
	}
	await writeManifest(ctx, next);
	const sync = await runSync(ctx, { manifest: next });
	return { rule, manifest: next, sync };
}
