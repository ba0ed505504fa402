import { createScriptedDecisions } from "../../../src/lib/decisions.js";
import { deduplicateRules } from "../../../src/lib/dedup/deduplicate.js";
import {
	formatRatio,
	isDuplicate,
	similarityRatio,
} from "../../../src/lib/dedup/similarity.js";
import type { ImportedRule } from "../../../src/lib/manifest/types.js";
import { createTestContext, messages } from "../engine.helpers.js";

const NEAR_A = "Always write unit tests for every exported function in the package.";
const NEAR_B = "Always write unit tests for every exported function in the packages.";

function rule(id: string, source: ImportedRule["source"], content: string): ImportedRule {
	return { id, source, content };
}

describe("similarityRatio", () => {
	it("treats empty and identical strings as identical", () => {
		expect(similarityRatio("", "")).toBe(1);
		expect(similarityRatio("same", "same")).toBe(1);
	});

	it("scores matched characters over the combined length", () => {
		expect(similarityRatio("abcdefghij", "abcdefghix")).toBe(0.9);
	});

	it("gives up once the pair cannot be a duplicate", () => {
		expect(similarityRatio("aaaa", "bbbb")).toBeNull();
		expect(similarityRatio("abcd", "abxd")).toBeNull();
		expect(similarityRatio("abcdefghij", "jihgfedcba")).toBeNull();
		expect(isDuplicate(null)).toBe(false);
	});

	it("settles large differing rules quickly", () => {
		const left = Array.from(
			{ length: 200 },
			(_, index) => `- left rule line ${index} keeps tabs`,
		).join("\n");
		const right = Array.from(
			{ length: 200 },
			(_, index) => `* other guidance ${index * 7} prefers spaces`,
		).join("\n");
		const started = Date.now();

		expect(similarityRatio(left, right)).toBeNull();
		expect(Date.now() - started).toBeLessThan(5000);
	});

	it("still scores large near-identical rules exactly", () => {
		const base = Array.from({ length: 800 }, (_, index) => `- rule line ${index}`).join("\n");
		const edited = `${base}!`;

		expect(similarityRatio(base, edited)).toBe((2 * base.length) / (2 * base.length + 1));
	});

	it("uses a strict 0.8 threshold", () => {
		expect(isDuplicate(0.8)).toBe(false);
		expect(isDuplicate(0.81)).toBe(true);
		expect(isDuplicate(similarityRatio(NEAR_A, NEAR_B))).toBe(true);
	});

	it("formats ratios as whole percentages", () => {
		expect(formatRatio(0.754)).toBe("75%");
		expect(formatRatio(1)).toBe("100%");
		expect(formatRatio(null)).toBe("under 80%");
	});
});

describe("deduplicateRules", () => {
	it("drops near-identical rules and keeps the first source", async () => {
		const { ctx, logs } = createTestContext({ command: "init" });
		const rules = [rule("shared", "cursor", NEAR_A), rule("shared", "codex", NEAR_B)];

		const result = await deduplicateRules(ctx, rules);

		expect(result).toEqual([rules[0]]);
		expect(messages(logs, "info")).toHaveLength(1);
		expect(messages(logs, "info")[0]).toMatch(/^ {2}Duplicate 'shared' from codex matches cursor \(\d+%\), skipping$/);
	});

	it("keeps the first version of a conflict when not interactive", async () => {
		const { ctx, logs } = createTestContext({ command: "init" });
		const rules = [
			rule("shared", "cursor", "aaaa"),
			rule("other", "cursor", "other"),
			rule("shared", "claude", "bbbb"),
		];

		const result = await deduplicateRules(ctx, rules);

		expect(result).toEqual([rules[0], rules[1]]);
		expect(messages(logs, "warn")).toEqual(["'shared' from claude differs from cursor (under 80%)"]);
	});

	it("replaces the kept version when the user declines it", async () => {
		const decisions = createScriptedDecisions({ confirm: [false] });
		const { ctx } = createTestContext({ command: "init", decisions });
		const rules = [
			rule("shared", "cursor", "aaaa"),
			rule("other", "cursor", "other"),
			rule("shared", "claude", "bbbb"),
		];

		const result = await deduplicateRules(ctx, rules);

		expect(result).toEqual([rules[1], rules[2]]);
		expect(decisions.prompts).toEqual(["  Keep version from cursor?"]);
	});

	it("keeps the first version when the user accepts it", async () => {
		const decisions = createScriptedDecisions({ confirm: [true] });
		const { ctx } = createTestContext({ command: "init", decisions });
		const rules = [rule("shared", "cursor", "aaaa"), rule("shared", "claude", "bbbb")];

		expect(await deduplicateRules(ctx, rules)).toEqual([rules[0]]);
	});

	it("is idempotent", async () => {
		const { ctx } = createTestContext({ command: "init" });
		const rules = [
			rule("a", "cursor", NEAR_A),
			rule("a", "codex", NEAR_B),
			rule("b", "claude", "# B\nBody."),
			rule("b", "kiro", "completely different"),
		];

		const once = await deduplicateRules(ctx, rules);
		const twice = await deduplicateRules(ctx, once);

		expect(twice).toEqual(once);
		expect(once.map((entry) => `${entry.source}:${entry.id}`)).toEqual(["cursor:a", "claude:b"]);
	});
});
