/**
 * repolens Error Hierarchy
 *
 * Every error surfaced to callers carries a kind and a human message so the
 * UI layer can render it without re-deriving the cause.
 */

// ============================================================================
// Base Error Class
// ============================================================================

export type ErrorKind =
	| "io"
	| "service"
	| "budget_exceeded"
	| "no_relevant_context"
	| "cancelled"
	| "config"
	| "invariant";

export class RepoLensError extends Error {
	/** Error kind for programmatic handling */
	readonly kind: ErrorKind;
	/** Stable error code */
	readonly code: string;
	/** Additional context */
	readonly context?: Record<string, unknown>;
	/** Whether retrying the same operation may succeed */
	readonly recoverable: boolean;

	constructor(
		message: string,
		kind: ErrorKind,
		code: string,
		options?: {
			context?: Record<string, unknown>;
			recoverable?: boolean;
			cause?: unknown;
		},
	) {
		super(message, { cause: options?.cause });
		this.name = "RepoLensError";
		this.kind = kind;
		this.code = code;
		this.context = options?.context;
		this.recoverable = options?.recoverable ?? false;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			kind: this.kind,
			code: this.code,
			message: this.message,
			context: this.context,
			recoverable: this.recoverable,
		};
	}
}

// ============================================================================
// File System Errors
// ============================================================================

export class IoError extends RepoLensError {
	readonly path: string;

	constructor(path: string, cause?: unknown) {
		const detail = cause instanceof Error ? cause.message : String(cause ?? "unknown error");
		super(`Cannot read ${path}: ${detail}`, "io", "IO_ERROR", {
			context: { path },
			cause,
		});
		this.name = "IoError";
		this.path = path;
	}
}

// ============================================================================
// Service Errors
// ============================================================================

/**
 * LLM call failure. Transient failures (network, timeout, rate limit, 5xx)
 * are retried by the client; permanent ones are not.
 */
export class ServiceError extends RepoLensError {
	readonly transient: boolean;
	readonly status?: number;

	constructor(
		message: string,
		options: { transient: boolean; status?: number; retryAfterMs?: number; cause?: unknown },
	) {
		super(message, "service", options.transient ? "SERVICE_TRANSIENT" : "SERVICE_PERMANENT", {
			context: {
				status: options.status,
				retryAfterMs: options.retryAfterMs,
			},
			recoverable: options.transient,
			cause: options.cause,
		});
		this.name = "ServiceError";
		this.transient = options.transient;
		this.status = options.status;
	}

	get retryAfterMs(): number | undefined {
		const value = this.context?.retryAfterMs;
		return typeof value === "number" ? value : undefined;
	}
}

// ============================================================================
// Retrieval & Budget Errors
// ============================================================================

export class BudgetExceededError extends RepoLensError {
	readonly requiredTokens: number;
	readonly tokenBudget: number;

	constructor(requiredTokens: number, tokenBudget: number, what = "Context") {
		super(
			`${what} needs ${requiredTokens} tokens but the token budget is ${tokenBudget}`,
			"budget_exceeded",
			"BUDGET_EXCEEDED",
			{ context: { requiredTokens, tokenBudget } },
		);
		this.name = "BudgetExceededError";
		this.requiredTokens = requiredTokens;
		this.tokenBudget = tokenBudget;
	}
}

export class NoRelevantContextError extends RepoLensError {
	readonly query: string;

	constructor(query: string, indexedFiles: number) {
		super(
			indexedFiles === 0
				? "The index is empty. Index the project before asking questions."
				: `No indexed file matches "${query}"`,
			"no_relevant_context",
			"NO_RELEVANT_CONTEXT",
			{ context: { query, indexedFiles } },
		);
		this.name = "NoRelevantContextError";
		this.query = query;
	}
}

// ============================================================================
// Control Flow Errors
// ============================================================================

export class CancelledError extends RepoLensError {
	constructor(operation: string, cause?: unknown) {
		super(`${operation} was cancelled`, "cancelled", "CANCELLED", {
			context: { operation },
			cause,
		});
		this.name = "CancelledError";
	}
}

export class ConfigError extends RepoLensError {
	constructor(message: string, context?: Record<string, unknown>, cause?: unknown) {
		super(message, "config", "CONFIG_ERROR", { context, cause });
		this.name = "ConfigError";
	}
}

/**
 * Broken local invariant (e.g. a corrupted turn index). A programmer error,
 * not a runtime condition.
 */
export class InvariantViolationError extends RepoLensError {
	constructor(message: string, context?: Record<string, unknown>) {
		super(message, "invariant", "INVARIANT_VIOLATION", { context });
		this.name = "InvariantViolationError";
	}
}

// ============================================================================
// Helpers
// ============================================================================

export function isRepoLensError(error: unknown): error is RepoLensError {
	return error instanceof RepoLensError;
}

/**
 * Normalize any thrown value into a RepoLensError.
 * Abort errors become CancelledError; anything else unknown is treated
 * as a permanent service failure.
 */
export function toRepoLensError(error: unknown, operation = "Operation"): RepoLensError {
	if (error instanceof RepoLensError) {
		return error;
	}
	if (error instanceof Error && error.name === "AbortError") {
		return new CancelledError(operation, error);
	}
	const message = error instanceof Error ? error.message : String(error);
	return new ServiceError(message, { transient: false, cause: error });
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
