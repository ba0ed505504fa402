import { readFile } from "node:fs/promises";
import type { CanonicalPaths } from "../canonical-paths.js";
import type { EngineContext } from "../engine-context.js";
import { InvalidManifestError, NotInitializedError } from "../errors.js";
import { type WriteStatus, writeGeneratedFile } from "../file-writer.js";
import type { Manifest } from "./types.js";
import { validateManifest } from "./validate.js";

export function formatManifestDate(date: Date): string {
	return date.toISOString().slice(0, 10);
}

export async function readManifest(paths: CanonicalPaths): Promise<Manifest> {
	let contents: string;
	try {
		contents = await readFile(paths.manifestPath, "utf8");
	} catch (error) {
		const code = (error as NodeJS.ErrnoException).code;
		if (code === "ENOENT") {
			throw new NotInitializedError(paths.manifestPath);
		}
		throw error;
	}

	let raw: unknown;
	try {
		raw = JSON.parse(contents);
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new InvalidManifestError(paths.manifestPath, [`invalid JSON: ${message}`]);
	}
	return validateManifest(raw, paths.manifestPath);
}

export function serializeManifest(manifest: Manifest): string {
	return `${JSON.stringify(manifest, null, 2)}\n`;
}

/**
 * Stamps `updatedDate` and writes the manifest through the backed-up write path.
 * The passed manifest is not modified.
 */
export async function writeManifest(ctx: EngineContext, manifest: Manifest): Promise<WriteStatus> {
	const stamped: Manifest = { ...manifest, updatedDate: formatManifestDate(ctx.now()) };
	return writeGeneratedFile(ctx, ctx.paths.manifestPath, serializeManifest(stamped));
}
