import { UnsupportedKeyError } from "../errors.js";
import type { AgentsMdConfig, Manifest } from "./types.js";

export type SettingValue = string | string[];

type SettableKey = {
	key: string;
	field: keyof AgentsMdConfig;
	kind: "string" | "list";
};

const SETTABLE: readonly SettableKey[] = [
	{ key: "agentsMd.paths", field: "paths", kind: "list" },
	{ key: "agentsMd.header", field: "header", kind: "string" },
	{ key: "agentsMd.preamble", field: "preamble", kind: "string" },
];

export const SETTABLE_KEYS: readonly string[] = SETTABLE.map((entry) => entry.key);

function findSettable(key: string): SettableKey {
	const entry = SETTABLE.find((candidate) => candidate.key === key);
	if (!entry) {
		throw new UnsupportedKeyError(key, [...SETTABLE_KEYS].sort());
	}
	return entry;
}

export function splitListValue(raw: string): string[] {
	return raw
		.split(",")
		.map((entry) => entry.trim())
		.filter(Boolean);
}

export function assertSettableKey(key: string): void {
	findSettable(key);
}

export function readManifestKey(manifest: Manifest, key: string): SettingValue {
	return manifest.agentsMdConfig[findSettable(key).field];
}

// List keys take comma-separated input; the returned manifest is a new object.
export function applyManifestKey(manifest: Manifest, key: string, rawValue: string): Manifest {
	const entry = findSettable(key);
	const agentsMdConfig: AgentsMdConfig = { ...manifest.agentsMdConfig };
	if (entry.field === "paths") {
		agentsMdConfig.paths = splitListValue(rawValue);
	} else {
		agentsMdConfig[entry.field] = rawValue;
	}
	return { ...manifest, agentsMdConfig };
}
