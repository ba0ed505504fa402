import { BackupSessions } from "./backups/session.js";
import type { CanonicalPaths } from "./canonical-paths.js";
import { createAutoConfirmDecisions, type DecisionProvider } from "./decisions.js";
import { createConsoleLogger, type Logger } from "./logger.js";

export type EngineOptions = {
	dryRun: boolean;
	showDiff: boolean;
	verbose: boolean;
	autoConfirm: boolean;
};

export const DEFAULT_ENGINE_OPTIONS: EngineOptions = {
	dryRun: false,
	showDiff: false,
	verbose: false,
	autoConfirm: true,
};

export type EngineContext = {
	command: string;
	paths: CanonicalPaths;
	options: EngineOptions;
	logger: Logger;
	decisions: DecisionProvider;
	backups: BackupSessions;
	now: () => Date;
};

export type CreateEngineContextOptions = {
	command: string;
	paths: CanonicalPaths;
	options?: Partial<EngineOptions>;
	logger?: Logger;
	decisions?: DecisionProvider;
	now?: () => Date;
};

export function createEngineContext(input: CreateEngineContextOptions): EngineContext {
	const options: EngineOptions = { ...DEFAULT_ENGINE_OPTIONS, ...input.options };
	const logger = input.logger ?? createConsoleLogger({ verbose: options.verbose });
	const now = input.now ?? (() => new Date());
	const decisions =
		options.autoConfirm || !input.decisions
			? createAutoConfirmDecisions(logger)
			: input.decisions;
	return {
		command: input.command,
		paths: input.paths,
		options,
		logger,
		decisions,
		backups: new BackupSessions({
			backupsDir: input.paths.backupsDir,
			command: input.command,
			dryRun: options.dryRun,
			logger,
			now,
		}),
		now,
	};
}
