import type { ConsumerId } from "../consumers/registry.js";

export const MANIFEST_VERSION = "1.0";

export type RuleOrigin = ConsumerId | "manual" | "test";

export type CursorMeta = {
	alwaysApply?: boolean;
	description?: string;
	globs?: string;
};

export type RuleRecord = {
	id: string;
	file: string;
	importedFrom: RuleOrigin;
	cursorMeta?: CursorMeta;
	exclude?: ConsumerId[];
};

export type ImportedRule = {
	id: string;
	content: string;
	source: ConsumerId;
	cursorMeta?: CursorMeta;
};

export type SkillSyncMode = "symlink";
export type SkillConflictStrategy = "preserve";

export type SkillTargetSelection = {
	name: ConsumerId;
	syncMode: SkillSyncMode;
	conflictStrategy: SkillConflictStrategy;
};

export type ActiveTargets = {
	rules: ConsumerId[];
	skills: SkillTargetSelection[];
};

export type AgentsMdConfig = {
	paths: string[];
	header: string;
	preamble: string;
};

export type Manifest = {
	version: string;
	updatedDate: string;
	importedFrom: string[];
	activeTargets: ActiveTargets;
	rules: RuleRecord[];
	agentsMdConfig: AgentsMdConfig;
};

export const DEFAULT_AGENTS_MD_HEADER = "# AGENTS Rules";

export const INIT_AGENTS_MD_CONFIG: AgentsMdConfig = {
	paths: [],
	header: "# Workspace AGENTS Rules",
	preamble: "These rules apply across this workspace unless explicitly overridden.",
};

export function skillTarget(name: ConsumerId): SkillTargetSelection {
	return { name, syncMode: "symlink", conflictStrategy: "preserve" };
}

export function rulesForTarget(manifest: Manifest, target: ConsumerId): RuleRecord[] {
	return manifest.rules.filter((rule) => !(rule.exclude ?? []).includes(target));
}
