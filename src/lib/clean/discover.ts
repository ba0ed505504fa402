import { readFile } from "node:fs/promises";
import path from "node:path";
import { findRestorableFiles } from "../backups/restore.js";
import { type BackupSession, latestBackupSession } from "../backups/session.js";
import { getConsumer, type ResolvedConsumer } from "../consumers/registry.js";
import type { EngineContext } from "../engine-context.js";
import { parseFrontmatter } from "../frontmatter.js";
import { isGenerated } from "../generated-marker.js";
import { expandSummaryPaths } from "../generators/summary.js";
import { listFilesWithExtension, readOptionalText } from "../importers/sources.js";
import type { Manifest } from "../manifest/types.js";
import {
	isUnderStore,
	listSymlinks,
	resolveLinkTarget,
	resolveStoreRoots,
} from "../skills/reconcile.js";

export type CleanPlan = {
	generatedFiles: string[];
	skillLinks: string[];
	session: BackupSession | null;
	// Discovered paths that have an original in the latest backup session.
	restorable: string[];
};

async function isGeneratedFile(filePath: string): Promise<boolean> {
	const text = await readOptionalText(filePath);
	return text !== null && isGenerated(text);
}

async function findGeneratedFiles(
	ctx: EngineContext,
	manifest: Manifest,
	consumer: ResolvedConsumer,
): Promise<string[]> {
	const { rules } = consumer;
	switch (rules.kind) {
		case "per-file": {
			const found: string[] = [];
			const files = await listFilesWithExtension(rules.rulesDir, rules.extension);
			for (const filePath of files ?? []) {
				const { body } = parseFrontmatter(await readFile(filePath, "utf8"));
				if (isGenerated(body)) {
					found.push(filePath);
				}
			}
			return found;
		}
		case "concatenated":
			return (await isGeneratedFile(rules.rulesFile)) ? [rules.rulesFile] : [];
		case "summary": {
			const found: string[] = [];
			for (const target of await expandSummaryPaths(manifest.agentsMdConfig.paths, ctx.logger)) {
				if (await isGeneratedFile(target)) {
					found.push(target);
				}
			}
			return found;
		}
		case "skills-only":
			return [];
	}
}

async function findSkillLinks(ctx: EngineContext, skillsDir: string): Promise<string[]> {
	const roots = await resolveStoreRoots(ctx.paths.skillsDir);
	const found: string[] = [];
	for (const name of await listSymlinks(skillsDir)) {
		const linkPath = path.join(skillsDir, name);
		if (isUnderStore(roots, await resolveLinkTarget(linkPath))) {
			found.push(linkPath);
		}
	}
	return found;
}

/**
 * Finds everything a previous sync produced for the active targets: generated
 * files, which carry the marker, and skill links that resolve into the
 * canonical store. Targets no longer active are not inspected.
 */
export async function planClean(ctx: EngineContext, manifest: Manifest): Promise<CleanPlan> {
	const generatedFiles: string[] = [];
	for (const consumerId of manifest.activeTargets.rules) {
		for (const filePath of await findGeneratedFiles(ctx, manifest, getConsumer(consumerId))) {
			if (!generatedFiles.includes(filePath)) {
				generatedFiles.push(filePath);
			}
		}
	}

	const skillLinks: string[] = [];
	for (const selection of manifest.activeTargets.skills) {
		const { skillsDir } = getConsumer(selection.name);
		if (!skillsDir) {
			continue;
		}
		for (const linkPath of await findSkillLinks(ctx, skillsDir)) {
			if (!skillLinks.includes(linkPath)) {
				skillLinks.push(linkPath);
			}
		}
	}

	const session = await latestBackupSession(ctx.paths.backupsDir);
	const restorable = session
		? (await findRestorableFiles(session, [...generatedFiles, ...skillLinks])).map(
				(file) => file.originalPath,
			)
		: [];
	return { generatedFiles, skillLinks, session, restorable };
}
