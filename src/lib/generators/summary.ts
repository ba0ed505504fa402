import { stat } from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import { expandHome } from "../canonical-paths.js";
import type { EngineContext } from "../engine-context.js";
import { writeGeneratedFile } from "../file-writer.js";
import { buildGeneratedHeader } from "../generated-marker.js";
import type { Logger } from "../logger.js";
import type { AgentsMdConfig } from "../manifest/types.js";
import type { RuleDocument } from "./rule-documents.js";
import { emptyGeneratorResult, type GeneratorResult } from "./types.js";

export const SUMMARY_FILE_NAME = "AGENTS.md";
export const SUMMARY_LINE_LIMIT = 120;

const GLOB_CHARACTERS = /[*?[]/;

async function isDirectory(candidate: string): Promise<boolean> {
	try {
		return (await stat(candidate)).isDirectory();
	} catch (error) {
		const code = (error as NodeJS.ErrnoException).code;
		if (code === "ENOENT" || code === "ENOTDIR") {
			return false;
		}
		throw error;
	}
}

async function toSummaryFile(candidate: string): Promise<string> {
	return (await isDirectory(candidate)) ? path.join(candidate, SUMMARY_FILE_NAME) : candidate;
}

/**
 * Turns configured output paths into concrete files. Patterns expand through
 * fast-glob (sorted); a directory stands for its `AGENTS.md`.
 */
export async function expandSummaryPaths(patterns: string[], logger: Logger): Promise<string[]> {
	const resolved: string[] = [];
	for (const pattern of patterns) {
		const expanded = expandHome(pattern);
		if (!GLOB_CHARACTERS.test(expanded)) {
			resolved.push(await toSummaryFile(path.resolve(expanded)));
			continue;
		}
		const matches = (await fg(expanded, { onlyFiles: false, absolute: true })).sort();
		if (matches.length === 0) {
			logger.warn(`glob '${pattern}' matched no files`);
		}
		for (const match of matches) {
			resolved.push(await toSummaryFile(path.normalize(match)));
		}
	}
	return resolved;
}

export function summarizeRule({ rule, content }: RuleDocument): string {
	if (rule.cursorMeta?.description) {
		return rule.cursorMeta.description;
	}
	for (const line of content.split(/\r?\n/)) {
		const trimmed = line.trim();
		if (trimmed && !trimmed.startsWith("#")) {
			return trimmed.slice(0, SUMMARY_LINE_LIMIT);
		}
	}
	return rule.id;
}

export function renderSummary(
	documents: RuleDocument[],
	config: AgentsMdConfig,
	now: Date,
): string {
	const lines = [buildGeneratedHeader(now), config.header, ""];
	if (config.preamble) {
		lines.push(config.preamble, "");
	}
	documents.forEach((document, index) => {
		lines.push(`${index + 1}. **${document.rule.id}** -- ${summarizeRule(document)}`);
	});
	lines.push("");
	return lines.join("\n");
}

export async function generateSummary(
	ctx: EngineContext,
	documents: RuleDocument[],
	config: AgentsMdConfig,
): Promise<GeneratorResult> {
	const result = emptyGeneratorResult();
	if (config.paths.length === 0) {
		ctx.logger.info("  AGENTS.md: no paths configured, skipping");
		result.skippedReason = "no paths configured";
		return result;
	}
	const targets = await expandSummaryPaths(config.paths, ctx.logger);
	if (targets.length === 0) {
		result.skippedReason = "no paths matched";
		return result;
	}
	const content = renderSummary(documents, config, ctx.now());
	for (const target of targets) {
		await writeGeneratedFile(ctx, target, content);
		result.written.push(target);
	}
	return result;
}
