import path from "node:path";
import { CONSUMER_IDS, type ConsumerId, isConsumerId } from "../consumers/registry.js";
import { InvalidManifestError, UnknownConsumerError } from "../errors.js";
import {
	type AgentsMdConfig,
	type CursorMeta,
	DEFAULT_AGENTS_MD_HEADER,
	type Manifest,
	type RuleOrigin,
	type RuleRecord,
	type SkillTargetSelection,
	skillTarget,
} from "./types.js";

function isPlainObject(value: unknown): value is Record<string, unknown> {
	return !!value && typeof value === "object" && !Array.isArray(value);
}

function readString(value: unknown): string | null {
	return typeof value === "string" ? value : null;
}

function readStringList(value: unknown, label: string, errors: string[]): string[] {
	if (value === undefined) {
		return [];
	}
	if (!Array.isArray(value) || value.some((entry) => typeof entry !== "string")) {
		errors.push(`${label} must be an array of strings.`);
		return [];
	}
	return value.filter((entry): entry is string => typeof entry === "string");
}

function requireConsumer(value: string): ConsumerId {
	if (!isConsumerId(value)) {
		throw new UnknownConsumerError(value, CONSUMER_IDS);
	}
	return value;
}

export function isSafeRuleFile(file: string): boolean {
	if (!file || path.isAbsolute(file)) {
		return false;
	}
	const normalized = path.normalize(file);
	return normalized !== ".." && !normalized.startsWith(`..${path.sep}`);
}

function validateCursorMeta(value: unknown, label: string, errors: string[]): CursorMeta | undefined {
	if (value === undefined || value === null) {
		return undefined;
	}
	if (!isPlainObject(value)) {
		errors.push(`${label} must be an object.`);
		return undefined;
	}
	const meta: CursorMeta = {};
	if (value.alwaysApply !== undefined) {
		if (typeof value.alwaysApply !== "boolean") {
			errors.push(`${label}.alwaysApply must be a boolean.`);
		} else {
			meta.alwaysApply = value.alwaysApply;
		}
	}
	for (const key of ["description", "globs"] as const) {
		const raw = value[key];
		if (raw === undefined) {
			continue;
		}
		if (typeof raw !== "string") {
			errors.push(`${label}.${key} must be a string.`);
			continue;
		}
		meta[key] = raw;
	}
	return meta;
}

function validateOrigin(value: unknown, label: string, errors: string[]): RuleOrigin {
	if (value === "manual" || value === "test") {
		return value;
	}
	if (typeof value === "string" && isConsumerId(value)) {
		return value;
	}
	errors.push(`${label} must be a consumer id, "manual", or "test".`);
	return "manual";
}

function validateRule(
	value: unknown,
	index: number,
	seen: Set<string>,
	errors: string[],
): RuleRecord | null {
	const label = `rules[${index}]`;
	if (!isPlainObject(value)) {
		errors.push(`${label} must be an object.`);
		return null;
	}
	const id = readString(value.id)?.trim();
	if (!id) {
		errors.push(`${label}.id must be a non-empty string.`);
		return null;
	}
	if (seen.has(id)) {
		errors.push(`${label}.id "${id}" is duplicated.`);
		return null;
	}
	seen.add(id);
	const file = readString(value.file);
	if (!file || !isSafeRuleFile(file)) {
		errors.push(`${label}.file must be a relative path inside the rules directory.`);
		return null;
	}
	const record: RuleRecord = {
		id,
		file,
		importedFrom: validateOrigin(value.importedFrom, `${label}.importedFrom`, errors),
	};
	const cursorMeta = validateCursorMeta(value.cursorMeta, `${label}.cursorMeta`, errors);
	if (cursorMeta) {
		record.cursorMeta = cursorMeta;
	}
	if (value.exclude !== undefined) {
		const exclude = readStringList(value.exclude, `${label}.exclude`, errors);
		record.exclude = exclude.map(requireConsumer);
	}
	return record;
}

function validateSkillTarget(
	value: unknown,
	index: number,
	errors: string[],
): SkillTargetSelection | null {
	const label = `activeTargets.skills[${index}]`;
	// Bare consumer ids are accepted as shorthand for the default selection.
	if (typeof value === "string") {
		return skillTarget(requireConsumer(value));
	}
	if (!isPlainObject(value)) {
		errors.push(`${label} must be an object or a consumer id.`);
		return null;
	}
	const name = readString(value.name);
	if (!name) {
		errors.push(`${label}.name must be a string.`);
		return null;
	}
	const selection = skillTarget(requireConsumer(name));
	if (value.syncMode !== undefined && value.syncMode !== selection.syncMode) {
		errors.push(`${label}.syncMode must be "${selection.syncMode}".`);
	}
	if (value.conflictStrategy !== undefined && value.conflictStrategy !== selection.conflictStrategy) {
		errors.push(`${label}.conflictStrategy must be "${selection.conflictStrategy}".`);
	}
	return selection;
}

function validateAgentsMdConfig(value: unknown, errors: string[]): AgentsMdConfig {
	if (value === undefined) {
		return { paths: [], header: DEFAULT_AGENTS_MD_HEADER, preamble: "" };
	}
	if (!isPlainObject(value)) {
		errors.push("agentsMdConfig must be an object.");
		return { paths: [], header: DEFAULT_AGENTS_MD_HEADER, preamble: "" };
	}
	return {
		paths: readStringList(value.paths, "agentsMdConfig.paths", errors),
		header: readString(value.header) ?? DEFAULT_AGENTS_MD_HEADER,
		preamble: readString(value.preamble) ?? "",
	};
}

/**
 * Checks a decoded manifest document and returns it in its typed form.
 *
 * Unregistered consumer ids raise {@link UnknownConsumerError}; every other
 * problem is collected into one {@link InvalidManifestError}.
 */
export function validateManifest(raw: unknown, manifestPath: string): Manifest {
	const errors: string[] = [];
	if (!isPlainObject(raw)) {
		throw new InvalidManifestError(manifestPath, ["manifest must be a JSON object."]);
	}

	const activeRaw = isPlainObject(raw.activeTargets) ? raw.activeTargets : null;
	if (!activeRaw) {
		errors.push("activeTargets must be an object.");
	}
	const ruleTargets = readStringList(activeRaw?.rules, "activeTargets.rules", errors).map(
		requireConsumer,
	);
	const skillEntries = activeRaw?.skills ?? [];
	const skillTargets: SkillTargetSelection[] = [];
	if (!Array.isArray(skillEntries)) {
		errors.push("activeTargets.skills must be an array.");
	} else {
		skillEntries.forEach((entry, index) => {
			const selection = validateSkillTarget(entry, index, errors);
			if (selection) {
				skillTargets.push(selection);
			}
		});
	}

	const rules: RuleRecord[] = [];
	if (!Array.isArray(raw.rules)) {
		errors.push("rules must be an array.");
	} else {
		const seen = new Set<string>();
		raw.rules.forEach((entry, index) => {
			const record = validateRule(entry, index, seen, errors);
			if (record) {
				rules.push(record);
			}
		});
	}

	const manifest: Manifest = {
		version: readString(raw.version) ?? "1.0",
		updatedDate: readString(raw.updatedDate) ?? "",
		importedFrom: readStringList(raw.importedFrom, "importedFrom", errors),
		activeTargets: { rules: ruleTargets, skills: skillTargets },
		rules,
		agentsMdConfig: validateAgentsMdConfig(raw.agentsMdConfig, errors),
	};

	if (errors.length > 0) {
		throw new InvalidManifestError(manifestPath, errors);
	}
	return manifest;
}
