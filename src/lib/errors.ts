export const EXIT_CODES = {
	success: 0,
	"not-initialized": 1,
	"invalid-manifest": 1,
	"unknown-consumer": 1,
	"unsupported-key": 1,
	"duplicate-rule-id": 1,
	"invalid-rule-id": 1,
	"rule-not-found": 1,
} as const;

export type ExitCodeReason = keyof typeof EXIT_CODES;
export type ExitCode = (typeof EXIT_CODES)[ExitCodeReason];

export function exitCodeFor(reason: ExitCodeReason): ExitCode {
	return EXIT_CODES[reason];
}

export class RulesSyncError extends Error {
	readonly reason: ExitCodeReason;
	readonly exitCode: ExitCode;

	constructor(reason: ExitCodeReason, message: string) {
		super(message);
		this.name = new.target.name;
		this.reason = reason;
		this.exitCode = exitCodeFor(reason);
	}
}

export class NotInitializedError extends RulesSyncError {
	constructor(manifestPath: string) {
		super("not-initialized", `${manifestPath} not found. Run 'init' first.`);
	}
}

export class InvalidManifestError extends RulesSyncError {
	constructor(manifestPath: string, problems: string[]) {
		super("invalid-manifest", `Invalid manifest ${manifestPath}:\n- ${problems.join("\n- ")}`);
	}
}

export class UnknownConsumerError extends RulesSyncError {
	readonly consumerId: string;

	constructor(consumerId: string, known: readonly string[]) {
		super("unknown-consumer", `unknown agent '${consumerId}'. Options: ${known.join(", ")}`);
		this.consumerId = consumerId;
	}
}

export class UnsupportedKeyError extends RulesSyncError {
	constructor(key: string, supported: readonly string[]) {
		super("unsupported-key", `unsupported key '${key}'. Supported: ${supported.join(", ")}`);
	}
}

export class DuplicateRuleIdError extends RulesSyncError {
	constructor(ruleId: string) {
		super("duplicate-rule-id", `rule '${ruleId}' already exists`);
	}
}

export class InvalidRuleIdError extends RulesSyncError {
	constructor(ruleId: string) {
		super(
			"invalid-rule-id",
			`invalid rule id '${ruleId}'. Use lowercase letters, digits, and single hyphens.`,
		);
	}
}

export class RuleNotFoundError extends RulesSyncError {
	constructor(ruleId: string) {
		super("rule-not-found", `rule '${ruleId}' not found in manifest`);
	}
}

export function isRulesSyncError(error: unknown): error is RulesSyncError {
	return error instanceof RulesSyncError;
}
