import type { Dirent } from "node:fs";
import { readdir, readFile } from "node:fs/promises";
import path from "node:path";

export async function readOptionalText(filePath: string): Promise<string | null> {
	try {
		return await readFile(filePath, "utf8");
	} catch (error) {
		const code = (error as NodeJS.ErrnoException).code;
		if (code === "ENOENT" || code === "ENOTDIR" || code === "EISDIR") {
			return null;
		}
		throw error;
	}
}

// Null when the directory does not exist; otherwise regular files with the extension, by name.
export async function listFilesWithExtension(
	directory: string,
	extension: string,
): Promise<string[] | null> {
	let entries: Dirent[];
	try {
		entries = await readdir(directory, { withFileTypes: true });
	} catch (error) {
		const code = (error as NodeJS.ErrnoException).code;
		if (code === "ENOENT" || code === "ENOTDIR") {
			return null;
		}
		throw error;
	}
	return entries
		.filter((entry) => entry.isFile() && entry.name.endsWith(extension))
		.map((entry) => entry.name)
		.sort()
		.map((name) => path.join(directory, name));
}

export function fileStem(filePath: string): string {
	return path.basename(filePath, path.extname(filePath));
}

export function countLines(text: string): number {
	if (!text) {
		return 0;
	}
	const lines = text.split(/\r?\n/);
	return lines.at(-1) === "" ? lines.length - 1 : lines.length;
}
