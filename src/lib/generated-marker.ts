export const GENERATED_HEADER = "# Generated from ~/.ai-agent/ -- do not edit directly";
export const REGENERATE_HINT = "# Run: agent-rules-sync sync";

export function formatSyncTimestamp(date: Date): string {
	return `${date.toISOString().slice(0, 19)}Z`;
}

export function isGenerated(text: string): boolean {
	return text.trimStart().startsWith(GENERATED_HEADER);
}

// Three lines, each newline-terminated.
export function buildGeneratedHeader(now: Date = new Date()): string {
	return `${GENERATED_HEADER}\n${REGENERATE_HINT}\n# Last synced: ${formatSyncTimestamp(now)}\n`;
}
