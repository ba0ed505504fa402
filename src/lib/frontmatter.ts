export type FrontmatterValue = string | boolean;
export type FrontmatterMap = Record<string, FrontmatterValue>;

export const FRONTMATTER_MARKER = "---";

const ENTRY_PATTERN = /^(\w+)\s*:\s*(.+)$/;

function parseScalar(rawValue: string): FrontmatterValue {
	const trimmed = rawValue.trim();
	const lowered = trimmed.toLowerCase();
	if (lowered === "true" || lowered === "false") {
		return lowered === "true";
	}
	if (trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
		return trimmed.slice(1, -1);
	}
	if (trimmed.length >= 2 && trimmed.startsWith("'") && trimmed.endsWith("'")) {
		return trimmed.slice(1, -1);
	}
	return trimmed;
}

function parseEntries(block: string): FrontmatterMap {
	const meta: FrontmatterMap = {};
	for (const line of block.split(/\r?\n/)) {
		const trimmed = line.trim();
		if (!trimmed || trimmed.startsWith("#")) {
			continue;
		}
		const match = trimmed.match(ENTRY_PATTERN);
		if (!match) {
			continue;
		}
		const [, key, rawValue] = match;
		meta[key] = parseScalar(rawValue);
	}
	return meta;
}

/**
 * Splits a leading `---` delimited block of flat `key: value` pairs from a document.
 *
 * A document without an opening marker, or whose block is never closed, comes back
 * unchanged with empty metadata.
 */
export function parseFrontmatter(text: string): { meta: FrontmatterMap; body: string } {
	if (!text.startsWith(FRONTMATTER_MARKER)) {
		return { meta: {}, body: text };
	}
	const end = text.indexOf(FRONTMATTER_MARKER, FRONTMATTER_MARKER.length);
	if (end === -1) {
		return { meta: {}, body: text };
	}
	const block = text.slice(FRONTMATTER_MARKER.length, end);
	const body = text.slice(end + FRONTMATTER_MARKER.length).replace(/^\n+/, "");
	return { meta: parseEntries(block), body };
}

function formatValue(value: FrontmatterValue): string {
	if (typeof value === "boolean") {
		return value ? "true" : "false";
	}
	if (value.includes(" ") || value.includes(":") || value.includes('"')) {
		return `"${value}"`;
	}
	return value;
}

export function buildFrontmatter(meta: FrontmatterMap): string {
	const lines = [FRONTMATTER_MARKER];
	for (const [key, value] of Object.entries(meta)) {
		lines.push(`${key}: ${formatValue(value)}`);
	}
	lines.push(FRONTMATTER_MARKER);
	return lines.join("\n");
}
