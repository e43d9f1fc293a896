/**
 * LedgerError hierarchy — structured error classification.
 *
 * Every rejected call surfaces one of these. The category tells a caller
 * whether resubmitting the same call could ever succeed without some other
 * call changing state first.
 */

/** Error severity categories. */
export const ErrorCategory = {
	Retryable: "retryable",
	NonRetryable: "non_retryable",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Options for constructing LedgerError subclasses with optional cause chain. */
interface LedgerErrorOptions {
	readonly cause?: unknown;
}

type ErrorContext = Record<string, unknown> & LedgerErrorOptions;

/** Base error class for all ledger operations. */
export class LedgerError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;
	readonly hint: string | undefined;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: Record<string, unknown> = {},
		hint?: string,
	) {
		super(message);
		this.name = "LedgerError";
		this.category = category;
		this.code = code;
		this.context = context;
		this.hint = hint;
	}

	get isRetryable(): boolean {
		return this.category === ErrorCategory.Retryable;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			...(this.hint !== undefined && { hint: this.hint }),
			retryable: this.isRetryable,
			context: this.context,
		};
	}
}

// ── Specific error types ─────────────────────────────────────────────

/** A non-owner attempted an administrative operation. */
export class UnauthorizedError extends LedgerError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "UNAUTHORIZED", ErrorCategory.NonRetryable, rest);
		this.name = "UnauthorizedError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** An argument can never be accepted, e.g. the null identity as new owner. */
export class InvalidArgumentError extends LedgerError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "INVALID_ARGUMENT", ErrorCategory.NonRetryable, rest);
		this.name = "InvalidArgumentError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** A position-mutating call targeted a deactivated pool. */
export class PoolInactiveError extends LedgerError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(
			message,
			"POOL_INACTIVE",
			ErrorCategory.NonRetryable,
			rest,
			"wait for the owner to reactivate the pool",
		);
		this.name = "PoolInactiveError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** The call requires an open position and the caller has none in this pool. */
export class NoActivePositionError extends LedgerError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "NO_ACTIVE_POSITION", ErrorCategory.NonRetryable, rest, "deposit first");
		this.name = "NoActivePositionError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal error for invalid or missing configuration. */
export class ConfigError extends LedgerError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "CONFIG_ERROR", ErrorCategory.Fatal, rest);
		this.name = "ConfigError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal error for unexpected internal failures (event log I/O, corrupt replay). */
export class SystemError extends LedgerError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "SYSTEM_ERROR", ErrorCategory.Fatal, rest);
		this.name = "SystemError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Classification helper ────────────────────────────────────────────

/** Pass LedgerErrors through; wrap anything else as a SystemError keeping the cause. */
export function classifyError(error: unknown): LedgerError {
	if (error instanceof LedgerError) return error;
	if (error instanceof Error) {
		return new SystemError(error.message, { cause: error });
	}
	return new SystemError(String(error), { cause: error });
}

// ── Type guards ──────────────────────────────────────────────────────

export function isUnauthorizedError(e: unknown): e is UnauthorizedError {
	return e instanceof UnauthorizedError;
}

export function isInvalidArgumentError(e: unknown): e is InvalidArgumentError {
	return e instanceof InvalidArgumentError;
}

export function isPoolInactiveError(e: unknown): e is PoolInactiveError {
	return e instanceof PoolInactiveError;
}

export function isNoActivePositionError(e: unknown): e is NoActivePositionError {
	return e instanceof NoActivePositionError;
}

export function isConfigError(e: unknown): e is ConfigError {
	return e instanceof ConfigError;
}

export function isSystemError(e: unknown): e is SystemError {
	return e instanceof SystemError;
}
