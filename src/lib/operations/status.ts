import type { EngineContext } from "../engine-context.js";
import { readManifest } from "../manifest/store.js";
import type { RuleOrigin } from "../manifest/types.js";
import { listCanonicalSkills } from "../rules/store.js";

export type RuleStatus = {
	id: string;
	importedFrom: RuleOrigin;
	flags: string[];
	description: string;
	exclude: string[];
};

export type StatusReport = {
	root: string;
	rules: RuleStatus[];
	activeTargets: { rules: string[]; skills: string[] };
	skills: string[];
	agentsMdPaths: string[];
	lastSynced: string | null;
};

export async function showStatus(ctx: EngineContext): Promise<StatusReport> {
	const manifest = await readManifest(ctx.paths);
	const rules = manifest.rules.map((rule) => {
		const flags: string[] = [];
		if (rule.cursorMeta?.alwaysApply) {
			flags.push("alwaysApply");
		}
		if (rule.cursorMeta?.globs) {
			flags.push(`globs=${rule.cursorMeta.globs}`);
		}
		return {
			id: rule.id,
			importedFrom: rule.importedFrom,
			flags,
			description: rule.cursorMeta?.description ?? "",
			exclude: rule.exclude ?? [],
		};
	});
	return {
		root: ctx.paths.root,
		rules,
		activeTargets: {
			rules: [...manifest.activeTargets.rules],
			skills: manifest.activeTargets.skills.map((selection) => selection.name),
		},
		skills: await listCanonicalSkills(ctx.paths),
		agentsMdPaths: [...manifest.agentsMdConfig.paths],
		lastSynced: manifest.updatedDate || null,
	};
}

function chunk<T>(items: T[], size: number): T[][] {
	const chunks: T[][] = [];
	for (let index = 0; index < items.length; index += size) {
		chunks.push(items.slice(index, index + size));
	}
	return chunks;
}

export function formatStatus(report: StatusReport, jsonOutput: boolean): string {
	if (jsonOutput) {
		return JSON.stringify(report, null, 2);
	}
	const lines = [`Rules (${report.rules.length})`];
	if (report.rules.length === 0) {
		lines.push("  (none)");
	}
	for (const rule of report.rules) {
		const excluded = rule.exclude.length > 0 ? ` (not for ${rule.exclude.join(", ")})` : "";
		lines.push(
			`  ${rule.id.padEnd(30)} [${rule.importedFrom.padEnd(6)}]  ${rule.flags.join(", ").padEnd(20)} ${rule.description}${excluded}`.trimEnd(),
		);
	}

	lines.push("Active Targets");
	lines.push(`  Rules  -> ${report.activeTargets.rules.join(", ")}`);
	lines.push(`  Skills -> ${report.activeTargets.skills.join(", ")}`);

	lines.push(`Skills (${report.skills.length})`);
	if (report.skills.length === 0) {
		lines.push("  (none)");
	}
	for (const row of chunk(report.skills, 4)) {
		lines.push(`  ${row.map((name) => name.padEnd(20)).join("  ")}`.trimEnd());
	}

	lines.push("AGENTS.md Paths");
	if (report.agentsMdPaths.length === 0) {
		lines.push("  (none configured)");
	}
	for (const entry of report.agentsMdPaths) {
		lines.push(`  ${entry}`);
	}

	lines.push("Last Synced");
	lines.push(`  ${report.lastSynced ?? "never"}`);
	return lines.join("\n");
}
