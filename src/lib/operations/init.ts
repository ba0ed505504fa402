import { lstat, rm } from "node:fs/promises";
import path from "node:path";
import { formatDisplayPath } from "../canonical-paths.js";
import {
	type ConsumerId,
	formatConsumerOption,
	getConsumer,
	IMPORT_SOURCE_IDS,
	type ImportSource,
	RULE_TARGET_IDS,
	SKILL_TARGET_IDS,
} from "../consumers/registry.js";
import { deduplicateRules } from "../dedup/deduplicate.js";
import type { EngineContext } from "../engine-context.js";
import { importFromConsumers } from "../importers/index.js";
import { splitListValue } from "../manifest/settable-keys.js";
import { writeManifest } from "../manifest/store.js";
import {
	type ImportedRule,
	INIT_AGENTS_MD_CONFIG,
	MANIFEST_VERSION,
	type Manifest,
	type RuleRecord,
	skillTarget,
} from "../manifest/types.js";
import { ruleFileName, writeRuleContent } from "../rules/store.js";
import { importSkills } from "../skills/import.js";
import { runSync } from "../sync/run.js";
import type { SyncSummary } from "../sync-results.js";

export type InitRequest = {
	// Preselects sources instead of the detected ones.
	sources?: ConsumerId[];
	agentsMdPaths?: string[];
};

export type InitOutcome =
	| { status: "aborted"; reason: string }
	| {
			status: "completed";
			manifest: Manifest;
			rulesWritten: string[];
			skillsImported: string[];
			sync: SyncSummary | null;
	  };

async function pathExists(candidate: string): Promise<boolean> {
	try {
		await lstat(candidate);
		return true;
	} catch (error) {
		const code = (error as NodeJS.ErrnoException).code;
		if (code === "ENOENT" || code === "ENOTDIR") {
			return false;
		}
		throw error;
	}
}

export function importSourceLocation(source: ImportSource): string {
	return source.kind === "per-file-frontmatter" || source.kind === "flat-directory"
		? source.rulesDir
		: source.rulesFile;
}

export async function detectSources(): Promise<ConsumerId[]> {
	const detected: ConsumerId[] = [];
	for (const id of IMPORT_SOURCE_IDS) {
		const { importSource } = getConsumer(id);
		if (importSource && (await pathExists(importSourceLocation(importSource)))) {
			detected.push(id);
		}
	}
	return detected;
}

export function rulePreview(rule: ImportedRule): string {
	for (const line of rule.content.split(/\r?\n/)) {
		const trimmed = line.trim();
		if (trimmed && !trimmed.startsWith("#")) {
			return trimmed.slice(0, 80);
		}
	}
	return "(empty)";
}

async function confirmOverwrite(ctx: EngineContext): Promise<boolean> {
	const { paths, logger, decisions } = ctx;
	const existing: string[] = [];
	for (const candidate of [paths.manifestPath, paths.rulesDir, paths.skillsDir]) {
		if (await pathExists(candidate)) {
			existing.push(candidate);
		}
	}
	if (existing.length === 0) {
		return true;
	}
	logger.warn(`init will overwrite existing canonical content in ${formatDisplayPath(paths.root)}:`);
	for (const candidate of existing) {
		logger.info(`    - ${candidate}`);
	}
	logger.info("  Source agent files are only read, never modified.");
	return decisions.confirm("  Proceed?", true);
}

async function selectSources(ctx: EngineContext, request: InitRequest): Promise<ConsumerId[]> {
	const options = IMPORT_SOURCE_IDS.map((id) => {
		const consumer = getConsumer(id);
		const location = consumer.importSource ? importSourceLocation(consumer.importSource) : "n/a";
		return { id, label: `${consumer.label}  (${formatDisplayPath(location)})` };
	});
	const defaults = request.sources ?? (await detectSources());
	const selected = await ctx.decisions.selectMany(
		"Step 1: Which agents do you currently have rules configured in?",
		options,
		defaults,
	);
	// Registry order, so the first source of a shared rule id is deterministic.
	return IMPORT_SOURCE_IDS.filter((id) => selected.includes(id));
}

async function selectTargets(
	ctx: EngineContext,
	prompt: string,
	ids: readonly ConsumerId[],
	defaults: ConsumerId[],
): Promise<ConsumerId[]> {
	const options = ids.map((id) => ({ id, label: formatConsumerOption(getConsumer(id)) }));
	const selected = await ctx.decisions.selectMany(prompt, options, defaults);
	return ids.filter((id) => selected.includes(id));
}

async function resolveAgentsMdPaths(
	ctx: EngineContext,
	request: InitRequest,
	ruleTargets: ConsumerId[],
): Promise<string[]> {
	if (request.agentsMdPaths) {
		return request.agentsMdPaths;
	}
	if (!ruleTargets.includes("agents-md") || !ctx.decisions.interactive) {
		return [];
	}
	const raw = await ctx.decisions.ask(
		"AGENTS.md output paths (comma-separated, e.g. ~/Code/AGENTS.md):",
		"",
	);
	return splitListValue(raw);
}

function toRuleRecord(rule: ImportedRule): RuleRecord {
	const record: RuleRecord = { id: rule.id, file: ruleFileName(rule.id), importedFrom: rule.source };
	if (rule.cursorMeta) {
		record.cursorMeta = rule.cursorMeta;
	}
	return record;
}

/**
 * First-time setup: imports rules and skills from the selected consumers into
 * the canonical store, writes the manifest, then syncs every selected target.
 * Under dry-run nothing is written.
 */
export async function initFromSources(
	ctx: EngineContext,
	request: InitRequest = {},
): Promise<InitOutcome> {
	const { logger, paths } = ctx;
	if (!(await confirmOverwrite(ctx))) {
		logger.info("  Aborted.");
		return { status: "aborted", reason: "overwrite declined" };
	}

	const sources = await selectSources(ctx, request);
	if (sources.length === 0) {
		logger.info("  No sources selected. Aborted.");
		return { status: "aborted", reason: "no sources selected" };
	}

	logger.info("Step 2: Scanning selected sources...");
	const imported = await importFromConsumers(ctx, sources.map((id) => getConsumer(id)));
	let rules = imported.rules;
	if (sources.length > 1) {
		logger.info("  Deduplicating...");
		rules = await deduplicateRules(ctx, rules);
	}

	const selectedRuleIds = await ctx.decisions.selectMany(
		`Step 2b: Select rules to import (${rules.length} found):`,
		rules.map((rule) => ({
			id: rule.id,
			label: `${rule.id.padEnd(30)} [${rule.source.padEnd(6)}]  ${rulePreview(rule)}`,
		})),
		rules.map((rule) => rule.id),
	);
	if (selectedRuleIds.length === 0) {
		logger.info("  No rules selected. Aborted.");
		return { status: "aborted", reason: "no rules selected" };
	}
	rules = rules.filter((rule) => selectedRuleIds.includes(rule.id));

	let skillDirs = imported.skills;
	if (skillDirs.length > 0) {
		const selectedSkills = await ctx.decisions.selectMany(
			`Step 2c: Select skills to import (${skillDirs.length} found):`,
			skillDirs.map((dir) => ({
				id: path.basename(dir),
				label: `${path.basename(dir).padEnd(30)} [${formatDisplayPath(path.dirname(dir))}]`,
			})),
			skillDirs.map((dir) => path.basename(dir)),
		);
		skillDirs = skillDirs.filter((dir) => selectedSkills.includes(path.basename(dir)));
	}
	logger.info(`  Selected: ${rules.length} rules, ${skillDirs.length} skills`);

	const ruleTargets = await selectTargets(
		ctx,
		"Step 3a: Which agents do you want to sync RULES to?",
		RULE_TARGET_IDS,
		[...RULE_TARGET_IDS],
	);
	const skillTargets = await selectTargets(
		ctx,
		"Step 3b: Which agents do you want to sync SKILLS to?",
		SKILL_TARGET_IDS,
		[...SKILL_TARGET_IDS],
	);
	const agentsMdPaths = await resolveAgentsMdPaths(ctx, request, ruleTargets);

	const manifest: Manifest = {
		version: MANIFEST_VERSION,
		updatedDate: "",
		importedFrom: sources,
		activeTargets: { rules: ruleTargets, skills: skillTargets.map(skillTarget) },
		rules: rules.map(toRuleRecord),
		agentsMdConfig: { ...INIT_AGENTS_MD_CONFIG, paths: agentsMdPaths },
	};

	if (ctx.options.dryRun) {
		for (const rule of manifest.rules) {
			logger.info(`[dry-run] Would create rules/${rule.file}`);
		}
		const skillsImported = await importSkills(ctx, skillDirs);
		logger.info(`[dry-run] Would write ${paths.manifestPath} and sync`);
		return {
			status: "completed",
			manifest,
			rulesWritten: [],
			skillsImported,
			sync: null,
		};
	}

	logger.info("Writing canonical source");
	await ctx.backups.backupDirectory(paths.rulesDir);
	await rm(paths.rulesDir, { recursive: true, force: true });
	const rulesWritten: string[] = [];
	for (const rule of rules) {
		const file = ruleFileName(rule.id);
		await writeRuleContent(ctx, file, `${rule.content}\n`);
		logger.info(`Created rules/${file}`);
		rulesWritten.push(file);
	}

	const skillsImported = await importSkills(ctx, skillDirs);
	logger.info(`  ${skillsImported.length} skills imported`);

	await writeManifest(ctx, manifest);
	logger.info(`Wrote ${paths.manifestPath}`);

	const sync = await runSync(ctx, { manifest });
	logger.info(
		`Done! Edit rules in ${formatDisplayPath(paths.rulesDir)} and run 'sync' to propagate.`,
	);
	return { status: "completed", manifest, rulesWritten, skillsImported, sync };
}
