import type { ImportedRule } from "../manifest/types.js";

export type ImportResult = {
	rules: ImportedRule[];
	// Absolute paths of skill directories found in the consumer's skills dir.
	skills: string[];
};

export function emptyImportResult(): ImportResult {
	return { rules: [], skills: [] };
}
