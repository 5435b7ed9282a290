export const EXIT_CODES = {
	success: 0,
	failure: 1,
	"invalid-usage": 2,
} as const;

export type ExitCodeReason = keyof typeof EXIT_CODES;
export type ExitCode = (typeof EXIT_CODES)[ExitCodeReason];

export type ErrorCode =
	| "not-found"
	| "conflict"
	| "name-collision"
	| "scope-unavailable"
	| "io-error"
	| "not-comparable"
	| "invalid-name"
	| "invalid-argument";

const USAGE_CODES: ReadonlySet<ErrorCode> = new Set(["invalid-name", "invalid-argument"]);

export function exitCodeFor(reason: ExitCodeReason): ExitCode {
	return EXIT_CODES[reason];
}

export class AgentCfgError extends Error {
	readonly code: ErrorCode;
	readonly exitCode: ExitCode;

	constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
		this.code = code;
		this.exitCode = USAGE_CODES.has(code) ? exitCodeFor("invalid-usage") : exitCodeFor("failure");
	}
}

export class NotFoundError extends AgentCfgError {
	constructor(message: string) {
		super("not-found", message);
	}
}

export class ConflictError extends AgentCfgError {
	constructor(message: string) {
		super("conflict", message);
	}
}

export class NameCollisionError extends AgentCfgError {
	constructor(message: string) {
		super("name-collision", message);
	}
}

export class ScopeUnavailableError extends AgentCfgError {
	constructor(message: string) {
		super("scope-unavailable", message);
	}
}

export class IoError extends AgentCfgError {
	constructor(message: string, cause?: unknown) {
		super("io-error", cause instanceof Error ? `${message}: ${cause.message}` : message, {
			cause,
		});
	}
}

export class NotComparableError extends AgentCfgError {
	constructor(message: string) {
		super("not-comparable", message);
	}
}

export class InvalidNameError extends AgentCfgError {
	constructor(message: string) {
		super("invalid-name", message);
	}
}

export class InvalidArgumentError extends AgentCfgError {
	constructor(message: string) {
		super("invalid-argument", message);
	}
}

export function isAgentCfgError(error: unknown): error is AgentCfgError {
	return error instanceof AgentCfgError;
}

export function errnoCode(error: unknown): string | undefined {
	if (error instanceof Error && "code" in error && typeof error.code === "string") {
		return error.code;
	}
	return undefined;
}
