import { parseSelection, promptConfirm, promptSelectMany } from "../../src/cli/prompts.js";

const options = [
	{ id: "cursor", label: "Cursor" },
	{ id: "codex", label: "Codex" },
	{ id: "claude", label: "Claude Code" },
];

function scriptedAsk(answers: string[]) {
	const queue = [...answers];
	return async () => queue.shift() ?? "";
}

describe("terminal prompts", () => {
	let errorSpy: ReturnType<typeof vi.spyOn>;

	beforeEach(() => {
		errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
	});

	afterEach(() => {
		errorSpy.mockRestore();
	});

	it("parses numbers, all, and none", () => {
		expect(parseSelection("3, 1", options)).toEqual(["cursor", "claude"]);
		expect(parseSelection("1 2", options)).toEqual(["cursor", "codex"]);
		expect(parseSelection("ALL", options)).toEqual(["cursor", "codex", "claude"]);
		expect(parseSelection("none", options)).toEqual([]);
		expect(parseSelection("4", options)).toBeNull();
		expect(parseSelection("x", options)).toBeNull();
	});

	it("accepts defaults on an empty answer and retries invalid input", async () => {
		expect(await promptSelectMany(scriptedAsk([""]), "Pick:", options, ["codex"])).toEqual(["codex"]);
		expect(await promptSelectMany(scriptedAsk(["9", "2"]), "Pick:", options, [])).toEqual(["codex"]);
		expect(errorSpy).toHaveBeenCalledWith("Please enter numbers between 1 and 3.");
	});

	it("confirms with yes/no and falls back to the default", async () => {
		expect(await promptConfirm(scriptedAsk(["NO"]), "Proceed?", true)).toBe(false);
		expect(await promptConfirm(scriptedAsk([""]), "Proceed?", true)).toBe(true);
		expect(await promptConfirm(scriptedAsk(["maybe", "yes"]), "Proceed?", false)).toBe(true);
	});
});
