import type { MockInstance } from "vitest";
import { mkdir, readFile, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import { runCli } from "../../src/cli/index.js";
import { joinOutput, withTempHome } from "./cli.helpers.js";

async function seedCanonical(canonicalRoot: string): Promise<void> {
	await mkdir(path.join(canonicalRoot, "rules"), { recursive: true });
	await writeFile(path.join(canonicalRoot, "rules", "style.md"), "# Style\nUse tabs.\n", "utf8");
	await writeFile(
		path.join(canonicalRoot, "manifest.json"),
		`${JSON.stringify(
			{
				version: "1.0",
				updatedDate: "2025-12-01",
				importedFrom: ["claude"],
				activeTargets: { rules: ["claude"], skills: [] },
				rules: [{ id: "style", file: "style.md", importedFrom: "claude" }],
				agentsMdConfig: { paths: [], header: "# AGENTS Rules", preamble: "" },
			},
			null,
			2,
		)}\n`,
		"utf8",
	);
}

async function pathExists(candidate: string): Promise<boolean> {
	try {
		await stat(candidate);
		return true;
	} catch {
		return false;
	}
}

describe.sequential("sync command", () => {
	let logSpy: ReturnType<typeof vi.spyOn>;
	let errorSpy: ReturnType<typeof vi.spyOn>;
	let exitSpy: MockInstance<typeof process.exit>;

	beforeEach(() => {
		logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
		errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
		exitSpy = vi.spyOn(process, "exit").mockImplementation(() => undefined as never);
	});

	afterEach(() => {
		logSpy.mockRestore();
		errorSpy.mockRestore();
		exitSpy.mockRestore();
	});

	it("writes every active target and prints the summary", async () => {
		await withTempHome(async (homeDir, canonicalRoot) => {
			await seedCanonical(canonicalRoot);

			await runCli(["node", "agent-rules-sync", "sync", "--yes", "--root", canonicalRoot]);

			const claude = await readFile(path.join(homeDir, ".claude", "CLAUDE.md"), "utf8");
			expect(claude).toContain("# Style\nUse tabs.\n");
			expect(joinOutput(logSpy.mock.calls)).toContain(
				"Synced 1 rules to Claude Code.\n1 rule targets, 0 skill targets synced.",
			);
			expect(exitSpy).not.toHaveBeenCalled();
		});
	});

	it("writes nothing with --dry-run", async () => {
		await withTempHome(async (homeDir, canonicalRoot) => {
			await seedCanonical(canonicalRoot);

			await runCli(["node", "agent-rules-sync", "sync", "--dry-run", "--root", canonicalRoot]);

			expect(await pathExists(path.join(homeDir, ".claude"))).toBe(false);
			expect(joinOutput(logSpy.mock.calls)).toContain("1 rule targets, 0 skill targets synced. (dry-run)");
		});
	});

	it("prints a JSON summary with --json", async () => {
		await withTempHome(async (_homeDir, canonicalRoot) => {
			await seedCanonical(canonicalRoot);

			await runCli(["node", "agent-rules-sync", "sync", "--yes", "--json", "--root", canonicalRoot]);

			const [[printed]] = logSpy.mock.calls;
			const summary = JSON.parse(String(printed));
			expect(summary.ruleTargets).toBe(1);
			expect(summary.persisted).toBe(true);
			expect(summary.results[0].consumerId).toBe("claude");
		});
	});

	it("rejects an unknown --only value", async () => {
		await withTempHome(async (_homeDir, canonicalRoot) => {
			await seedCanonical(canonicalRoot);

			await runCli(["node", "agent-rules-sync", "sync", "--only", "vim", "--root", canonicalRoot]);

			expect(errorSpy).toHaveBeenCalledWith(
				"Error: unknown agent 'vim'. Options: cursor, codex, claude, gemini, kiro, antigravity, agents-md",
			);
			expect(exitSpy).toHaveBeenCalledWith(1);
		});
	});

	it("reports a missing manifest", async () => {
		await withTempHome(async (_homeDir, canonicalRoot) => {
			await runCli(["node", "agent-rules-sync", "sync", "--root", canonicalRoot]);

			expect(errorSpy).toHaveBeenCalledWith(
				`Error: ${path.join(canonicalRoot, "manifest.json")} not found. Run 'init' first.`,
			);
			expect(exitSpy).toHaveBeenCalledWith(1);
		});
	});
});

describe.sequential("status, set, and clean commands", () => {
	let logSpy: ReturnType<typeof vi.spyOn>;
	let errorSpy: ReturnType<typeof vi.spyOn>;
	let exitSpy: MockInstance<typeof process.exit>;

	beforeEach(() => {
		logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
		errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
		exitSpy = vi.spyOn(process, "exit").mockImplementation(() => undefined as never);
	});

	afterEach(() => {
		logSpy.mockRestore();
		errorSpy.mockRestore();
		exitSpy.mockRestore();
	});

	it("prints status as JSON", async () => {
		await withTempHome(async (_homeDir, canonicalRoot) => {
			await seedCanonical(canonicalRoot);

			await runCli(["node", "agent-rules-sync", "status", "--json", "--root", canonicalRoot]);

			const [[printed]] = logSpy.mock.calls;
			expect(JSON.parse(String(printed))).toEqual({
				root: canonicalRoot,
				rules: [
					{ id: "style", importedFrom: "claude", flags: [], description: "", exclude: [] },
				],
				activeTargets: { rules: ["claude"], skills: [] },
				skills: [],
				agentsMdPaths: [],
				lastSynced: "2025-12-01",
			});
		});
	});

	it("updates a setting", async () => {
		await withTempHome(async (_homeDir, canonicalRoot) => {
			await seedCanonical(canonicalRoot);

			await runCli([
				"node",
				"agent-rules-sync",
				"set",
				"agentsMd.header",
				"# Team Rules",
				"--root",
				canonicalRoot,
			]);

			const manifest = JSON.parse(await readFile(path.join(canonicalRoot, "manifest.json"), "utf8"));
			expect(manifest.agentsMdConfig.header).toBe("# Team Rules");
			expect(logSpy).toHaveBeenCalledWith("  Set agentsMd.header = # Team Rules");
		});
	});

	it("rejects an unsupported setting", async () => {
		await withTempHome(async (_homeDir, canonicalRoot) => {
			await seedCanonical(canonicalRoot);

			await runCli(["node", "agent-rules-sync", "set", "rules", "x", "--root", canonicalRoot]);

			expect(errorSpy).toHaveBeenCalledWith(
				"Error: unsupported key 'rules'. Supported: agentsMd.header, agentsMd.paths, agentsMd.preamble",
			);
			expect(exitSpy).toHaveBeenCalledWith(1);
		});
	});

	it("removes what sync generated", async () => {
		await withTempHome(async (homeDir, canonicalRoot) => {
			await seedCanonical(canonicalRoot);
			await runCli(["node", "agent-rules-sync", "sync", "--yes", "--root", canonicalRoot]);
			logSpy.mockClear();

			await runCli(["node", "agent-rules-sync", "clean", "--yes", "--root", canonicalRoot]);

			expect(await pathExists(path.join(homeDir, ".claude", "CLAUDE.md"))).toBe(false);
			expect(await pathExists(path.join(canonicalRoot, "rules", "style.md"))).toBe(true);
			expect(logSpy).toHaveBeenLastCalledWith("1 generated removed, 0 symlinks removed");
		});
	});
});
