import type { Dirent } from "node:fs";
import { copyFile, cp, lstat, mkdir, readdir, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { Logger } from "../logger.js";

export const SESSION_META_FILE = "meta.json";
export const SESSION_FILES_DIR = "files";
// Mirrors originals that live outside the home directory.
export const ABSOLUTE_MIRROR_DIR = "_absolute";

export type BackupSessionMeta = {
	created: string;
	command: string;
};

export type BackupSession = {
	timestamp: string;
	command: string;
	directory: string;
	filesRoot: string;
};

export type BackupSessionsOptions = {
	backupsDir: string;
	command: string;
	dryRun: boolean;
	logger: Logger;
	now?: () => Date;
};

function pad(value: number): string {
	return String(value).padStart(2, "0");
}

export function formatSessionTimestamp(date: Date): string {
	return (
		`${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
		`T${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}Z`
	);
}

export function resolveMirrorPath(
	filesRoot: string,
	originalPath: string,
	homeDir: string = os.homedir(),
): string {
	const absolute = path.resolve(originalPath);
	const relative = path.relative(homeDir, absolute);
	if (relative && !relative.startsWith("..") && !path.isAbsolute(relative)) {
		return path.join(filesRoot, relative);
	}
	const sanitized = absolute.replace(/^[A-Za-z]:/, "").replace(/^[\\/]+/, "");
	return path.join(filesRoot, ABSOLUTE_MIRROR_DIR, sanitized);
}

export function resolveOriginalPath(
	filesRoot: string,
	mirroredPath: string,
	homeDir: string = os.homedir(),
): string {
	const relative = path.relative(filesRoot, mirroredPath);
	const [head, ...rest] = relative.split(path.sep);
	if (head === ABSOLUTE_MIRROR_DIR && rest.length > 0) {
		return path.join(path.sep, ...rest);
	}
	return path.join(homeDir, relative);
}

async function lstatOrNull(candidate: string) {
	try {
		return await lstat(candidate);
	} catch (error) {
		const code = (error as NodeJS.ErrnoException).code;
		if (code === "ENOENT" || code === "ENOTDIR") {
			return null;
		}
		throw error;
	}
}

// Sessions are append-only: a second command in the same second gets a numbered sibling.
async function claimSessionDirectory(backupsDir: string, timestamp: string): Promise<string> {
	await mkdir(backupsDir, { recursive: true });
	for (let attempt = 0; ; attempt++) {
		const name = attempt === 0 ? timestamp : `${timestamp}-${attempt}`;
		try {
			await mkdir(path.join(backupsDir, name));
			return name;
		} catch (error) {
			if ((error as NodeJS.ErrnoException).code !== "EEXIST") {
				throw error;
			}
		}
	}
}

const SESSION_NAME = /^(.*?)(?:-(\d+))?$/;

// Orders by timestamp, then by same-second sequence number.
export function compareSessionNames(left: string, right: string): number {
	const [, leftBase = left, leftSeq = "0"] = SESSION_NAME.exec(left) ?? [];
	const [, rightBase = right, rightSeq = "0"] = SESSION_NAME.exec(right) ?? [];
	if (leftBase !== rightBase) {
		return leftBase < rightBase ? -1 : 1;
	}
	return Number(leftSeq) - Number(rightSeq);
}

/**
 * Owns the backup session of one command invocation.
 *
 * The session directory is created on the first backup, so commands that never
 * mutate anything leave the backups root untouched. Every original is captured at
 * most once, which keeps the session equal to the state before the command ran.
 */
export class BackupSessions {
	private active: BackupSession | null = null;
	private readonly captured = new Set<string>();
	private readonly options: BackupSessionsOptions;

	constructor(options: BackupSessionsOptions) {
		this.options = options;
	}

	get current(): BackupSession | null {
		return this.active;
	}

	async init(command: string = this.options.command): Promise<BackupSession> {
		if (this.active) {
			return this.active;
		}
		const now = this.options.now?.() ?? new Date();
		const created = formatSessionTimestamp(now);
		const name = this.options.dryRun
			? created
			: await claimSessionDirectory(this.options.backupsDir, created);
		const directory = path.join(this.options.backupsDir, name);
		const session: BackupSession = {
			timestamp: name,
			command,
			directory,
			filesRoot: path.join(directory, SESSION_FILES_DIR),
		};
		if (!this.options.dryRun) {
			const meta: BackupSessionMeta = { created, command };
			await writeFile(
				path.join(directory, SESSION_META_FILE),
				`${JSON.stringify(meta, null, 2)}\n`,
				"utf8",
			);
		}
		this.active = session;
		return session;
	}

	async backupFile(filePath: string): Promise<string | null> {
		const stats = await lstatOrNull(filePath);
		if (!stats || stats.isSymbolicLink() || !stats.isFile()) {
			return null;
		}
		const key = path.resolve(filePath);
		if (this.captured.has(key)) {
			return null;
		}
		if (this.options.dryRun) {
			this.options.logger.verbose(`[dry-run] Would backup ${filePath}`);
			return null;
		}
		const session = await this.init();
		const destination = resolveMirrorPath(session.filesRoot, filePath);
		await mkdir(path.dirname(destination), { recursive: true });
		await copyFile(filePath, destination);
		this.captured.add(key);
		this.options.logger.verbose(`Backed up ${filePath}`);
		return destination;
	}

	async backupDirectory(directoryPath: string): Promise<string | null> {
		const stats = await lstatOrNull(directoryPath);
		if (!stats || stats.isSymbolicLink() || !stats.isDirectory()) {
			return null;
		}
		const key = path.resolve(directoryPath);
		if (this.captured.has(key)) {
			return null;
		}
		if (this.options.dryRun) {
			this.options.logger.verbose(`[dry-run] Would backup dir ${directoryPath}`);
			return null;
		}
		const session = await this.init();
		const destination = resolveMirrorPath(session.filesRoot, directoryPath);
		await rm(destination, { recursive: true, force: true });
		await mkdir(path.dirname(destination), { recursive: true });
		await cp(directoryPath, destination, { recursive: true, dereference: true });
		this.captured.add(key);
		this.options.logger.verbose(`Backed up dir ${directoryPath}`);
		return destination;
	}
}

async function readSessionMeta(directory: string): Promise<BackupSessionMeta | null> {
	let contents: string;
	try {
		contents = await readFile(path.join(directory, SESSION_META_FILE), "utf8");
	} catch {
		return null;
	}
	try {
		const parsed: unknown = JSON.parse(contents);
		if (!parsed || typeof parsed !== "object") {
			return null;
		}
		const created = "created" in parsed ? parsed.created : undefined;
		const command = "command" in parsed ? parsed.command : undefined;
		return {
			created: typeof created === "string" ? created : path.basename(directory),
			command: typeof command === "string" ? command : "unknown",
		};
	} catch {
		return null;
	}
}

export async function listBackupSessions(backupsDir: string): Promise<BackupSession[]> {
	let entries: Dirent[];
	try {
		entries = await readdir(backupsDir, { withFileTypes: true });
	} catch (error) {
		const code = (error as NodeJS.ErrnoException).code;
		if (code === "ENOENT") {
			return [];
		}
		throw error;
	}

	const sessions: BackupSession[] = [];
	for (const entry of entries) {
		if (!entry.isDirectory()) {
			continue;
		}
		const directory = path.join(backupsDir, entry.name);
		const meta = await readSessionMeta(directory);
		if (!meta) {
			continue;
		}
		sessions.push({
			timestamp: entry.name,
			command: meta.command,
			directory,
			filesRoot: path.join(directory, SESSION_FILES_DIR),
		});
	}
	return sessions.sort((left, right) => compareSessionNames(left.timestamp, right.timestamp));
}

export async function latestBackupSession(backupsDir: string): Promise<BackupSession | null> {
	const sessions = await listBackupSessions(backupsDir);
	return sessions.at(-1) ?? null;
}
