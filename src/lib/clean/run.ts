import { rm } from "node:fs/promises";
import { restoreFromBackup } from "../backups/restore.js";
import { formatDisplayPath } from "../canonical-paths.js";
import type { EngineContext } from "../engine-context.js";
import { readManifest } from "../manifest/store.js";
import { type CleanPlan, planClean } from "./discover.js";

export type CleanSummary = {
	generatedRemoved: number;
	linksRemoved: number;
	restored: number;
	aborted: boolean;
	dryRun: boolean;
};

export function formatCleanPlan(plan: CleanPlan): string[] {
	const restorable = new Set(plan.restorable);
	const lines = [`Generated rule files (${plan.generatedFiles.length})`];
	for (const filePath of plan.generatedFiles) {
		const tag = restorable.has(filePath) ? " <- will restore from backup" : "";
		lines.push(`  ${filePath}${tag}`);
	}
	lines.push(`Skill symlinks (${plan.skillLinks.length})`);
	for (const linkPath of plan.skillLinks) {
		lines.push(`  ${linkPath}`);
	}
	lines.push(
		`Total: ${plan.generatedFiles.length} generated, ${plan.skillLinks.length} symlinks`,
	);
	if (plan.session && plan.restorable.length > 0) {
		lines.push(
			`${plan.restorable.length} files will be restored from backup (${plan.session.timestamp})`,
		);
	}
	return lines;
}

async function removeManaged(ctx: EngineContext, target: string, kind: string): Promise<void> {
	if (ctx.options.dryRun) {
		ctx.logger.verbose(`[dry-run] Would remove ${kind} ${target}`);
		return;
	}
	// Generated outputs are rebuilt by sync, so they are not backed up here.
	await rm(target, { force: true });
	ctx.logger.verbose(`Removed ${kind} ${target}`);
}

/**
 * Removes generated files and managed skill links, then restores originals
 * recorded in the latest backup session. The canonical store is not touched.
 */
export async function runClean(ctx: EngineContext): Promise<CleanSummary> {
	const manifest = await readManifest(ctx.paths);
	const plan = await planClean(ctx, manifest);
	const summary: CleanSummary = {
		generatedRemoved: 0,
		linksRemoved: 0,
		restored: 0,
		aborted: false,
		dryRun: ctx.options.dryRun,
	};

	if (plan.generatedFiles.length === 0 && plan.skillLinks.length === 0) {
		ctx.logger.info("Nothing to clean -- no generated files or skill symlinks found.");
		return summary;
	}

	for (const line of formatCleanPlan(plan)) {
		ctx.logger.info(line);
	}
	ctx.logger.info(`Your canonical source in ${formatDisplayPath(ctx.paths.root)} is not affected.`);
	if (!(await ctx.decisions.confirm("  Proceed?", true))) {
		ctx.logger.info("  Aborted.");
		return { ...summary, aborted: true };
	}

	for (const filePath of plan.generatedFiles) {
		await removeManaged(ctx, filePath, "file");
		summary.generatedRemoved += 1;
	}
	for (const linkPath of plan.skillLinks) {
		await removeManaged(ctx, linkPath, "symlink");
		summary.linksRemoved += 1;
	}
	if (plan.session && plan.restorable.length > 0) {
		summary.restored = await restoreFromBackup(ctx, plan.session, plan.restorable);
	}
	return summary;
}

export function formatCleanSummary(summary: CleanSummary): string {
	if (summary.aborted) {
		return "Clean aborted.";
	}
	const lines = [
		`${summary.generatedRemoved} generated removed, ${summary.linksRemoved} symlinks removed`,
	];
	if (summary.restored > 0) {
		lines.push(`${summary.restored} files restored from backup`);
	}
	if (summary.dryRun) {
		lines.push("(dry-run)");
	}
	return lines.join("\n");
}
