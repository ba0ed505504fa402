import type { EngineContext } from "../engine-context.js";
import {
	applyManifestKey,
	assertSettableKey,
	readManifestKey,
	type SettingValue,
} from "../manifest/settable-keys.js";
import { readManifest, writeManifest } from "../manifest/store.js";
import type { Manifest } from "../manifest/types.js";

export type SetKeyOutcome = {
	key: string;
	value: SettingValue;
	manifest: Manifest;
};

export function formatSettingValue(value: SettingValue): string {
	return Array.isArray(value) ? JSON.stringify(value) : value;
}

export async function setManifestKey(
	ctx: EngineContext,
	key: string,
	rawValue: string,
): Promise<SetKeyOutcome> {
	const manifest = await readManifest(ctx.paths);
	assertSettableKey(key);
	const next = applyManifestKey(manifest, key, rawValue);
	await writeManifest(ctx, next);
	const value = readManifestKey(next, key);
	ctx.logger.info(`  Set ${key} = ${formatSettingValue(value)}`);
	return { key, value, manifest: next };
}
