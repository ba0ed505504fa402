import os from "node:os";
import path from "node:path";

export const DEFAULT_CANONICAL_DIR = ".ai-agent";
export const CANONICAL_ROOT_ENV = "AGENT_RULES_SYNC_ROOT";

export type CanonicalRootSource = "default" | "env" | "override";

export type CanonicalPaths = {
	root: string;
	source: CanonicalRootSource;
	manifestPath: string;
	rulesDir: string;
	skillsDir: string;
	backupsDir: string;
};

function normalizeRequestedPath(value?: string | null): string | null {
	if (!value) {
		return null;
	}
	const trimmed = value.trim();
	return trimmed.length > 0 ? trimmed : null;
}

export function expandHome(value: string, homeDir: string = os.homedir()): string {
	if (value === "~") {
		return homeDir;
	}
	if (value.startsWith("~/") || value.startsWith("~\\")) {
		return path.join(homeDir, value.slice(2));
	}
	return value;
}

export function resolveCanonicalPaths(
	options: { root?: string | null; env?: NodeJS.ProcessEnv; cwd?: string } = {},
): CanonicalPaths {
	const homeDir = os.homedir();
	const override = normalizeRequestedPath(options.root);
	const fromEnv = normalizeRequestedPath((options.env ?? process.env)[CANONICAL_ROOT_ENV]);
	const source: CanonicalRootSource = override ? "override" : fromEnv ? "env" : "default";
	const requested = override ?? fromEnv;
	const root = requested
		? path.resolve(options.cwd ?? process.cwd(), expandHome(requested, homeDir))
		: path.join(homeDir, DEFAULT_CANONICAL_DIR);

	return {
		root,
		source,
		manifestPath: path.join(root, "manifest.json"),
		rulesDir: path.join(root, "rules"),
		skillsDir: path.join(root, "skills"),
		backupsDir: path.join(root, "backups"),
	};
}

export function isWithinDirectory(parent: string, candidate: string): boolean {
	const relative = path.relative(parent, candidate);
	return relative === "" || (!relative.startsWith("..") && !path.isAbsolute(relative));
}

export function formatDisplayPath(absolutePath: string, homeDir: string = os.homedir()): string {
	const relative = path.relative(homeDir, absolutePath);
	const isWithinHome = relative && !relative.startsWith("..") && !path.isAbsolute(relative);
	return isWithinHome ? `~/${relative.split(path.sep).join("/")}` : absolutePath;
}
