import {
	buildGeneratedHeader,
	formatSyncTimestamp,
	GENERATED_HEADER,
	isGenerated,
} from "../../src/lib/generated-marker.js";

describe("generated marker", () => {
	it("formats the sync timestamp to the second", () => {
		expect(formatSyncTimestamp(new Date("2026-01-15T10:20:30.456Z"))).toBe("2026-01-15T10:20:30Z");
	});

	it("builds a three-line header", () => {
		expect(buildGeneratedHeader(new Date("2026-01-15T10:20:30.456Z"))).toBe(
			"# Generated from ~/.ai-agent/ -- do not edit directly\n" +
				"# Run: agent-rules-sync sync\n" +
				"# Last synced: 2026-01-15T10:20:30Z\n",
		);
	});

	it("detects the header after leading whitespace", () => {
		expect(isGenerated(`  \n\t${GENERATED_HEADER}\nrest`)).toBe(true);
	});

	it("rejects text where the header is not first", () => {
		expect(isGenerated(`x${GENERATED_HEADER}`)).toBe(false);
		expect(isGenerated("# Generated from ~/.ai-agent/ -- do not edit")).toBe(false);
		expect(isGenerated("")).toBe(false);
	});
});
