/**
 * LLM Client
 *
 * Multi-provider LLM client used for file summarization and chat.
 * Supports: Anthropic API, Local (Ollama/LM Studio, OpenAI-compatible)
 */

import { estimateTokens } from "../core/tokens.js";
import { CancelledError, RepoLensError, ServiceError, errorMessage, toRepoLensError } from "../errors.js";
import type {
	ILLMClient,
	LLMGenerateOptions,
	LLMMessage,
	LLMProvider,
	LLMResponse,
	LLMUsageStats,
} from "../types.js";
import { combineAbortSignals, delay } from "./abort.js";
import type { ApiCallLog } from "./call-log.js";
import type { RateLimiter } from "./rate-limiter.js";

// ============================================================================
// Re-exports
// ============================================================================

export type { ILLMClient, LLMGenerateOptions, LLMMessage, LLMProvider, LLMResponse };

// ============================================================================
// Constants
// ============================================================================

/** Default models per provider */
export const DEFAULT_LLM_MODELS: Record<LLMProvider, string> = {
	anthropic: "claude-sonnet-4-5",
	local: "llama3.2",
};

/** Attempts per call, including the first */
const MAX_RETRIES = 3;

/** Base delay for exponential backoff (ms) */
const BASE_RETRY_DELAY = 1000;

const DEFAULT_TIMEOUT_MS = 120_000;

/** HTTP statuses worth retrying */
const TRANSIENT_STATUSES = new Set([408, 409, 425, 429]);

// ============================================================================
// Error Classification
// ============================================================================

export function isTransientStatus(status: number): boolean {
	return TRANSIENT_STATUSES.has(status) || status >= 500;
}

/**
 * Parse a Retry-After header (seconds or HTTP date) into milliseconds
 */
export function parseRetryAfter(header: string | null, now = Date.now()): number | undefined {
	if (!header) return undefined;
	const seconds = Number(header);
	if (Number.isFinite(seconds)) {
		return Math.max(0, seconds * 1000);
	}
	const date = Date.parse(header);
	return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}

/**
 * Build the ServiceError for a non-2xx response
 */
export function httpError(
	providerName: string,
	status: number,
	detail: string,
	retryAfter?: string | null,
): ServiceError {
	return new ServiceError(`${providerName} API error (${status}): ${detail}`, {
		transient: isTransientStatus(status),
		status,
		retryAfterMs: parseRetryAfter(retryAfter ?? null),
	});
}

// ============================================================================
// Base Client Class
// ============================================================================

export interface BaseClientOptions {
	/** Per-attempt timeout in ms */
	timeoutMs?: number;
	/** Attempts per call, including the first */
	maxRetries?: number;
	/** Backoff base; attempt n waits base * 2^n plus jitter */
	baseRetryDelayMs?: number;
	rateLimiter?: RateLimiter;
	callLog?: ApiCallLog;
}

export abstract class BaseLLMClient implements ILLMClient {
	protected provider: LLMProvider;
	protected model: string;
	protected timeout: number;
	protected maxRetries: number;
	protected baseRetryDelayMs: number;
	private rateLimiter?: RateLimiter;
	private callLog?: ApiCallLog;
	private accumulatedUsage: LLMUsageStats = { inputTokens: 0, outputTokens: 0, calls: 0 };

	constructor(provider: LLMProvider, model: string, options: BaseClientOptions = {}) {
		this.provider = provider;
		this.model = model;
		this.timeout = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
		this.maxRetries = Math.max(1, options.maxRetries ?? MAX_RETRIES);
		this.baseRetryDelayMs = options.baseRetryDelayMs ?? BASE_RETRY_DELAY;
		this.rateLimiter = options.rateLimiter;
		this.callLog = options.callLog;
	}

	getProvider(): LLMProvider {
		return this.provider;
	}

	getModel(): string {
		return this.model;
	}

	getAccumulatedUsage(): LLMUsageStats {
		return { ...this.accumulatedUsage };
	}

	resetAccumulatedUsage(): void {
		this.accumulatedUsage = { inputTokens: 0, outputTokens: 0, calls: 0 };
	}

	protected accumulateUsage(usage?: LLMResponse["usage"]): void {
		if (usage) {
			this.accumulatedUsage.inputTokens += usage.inputTokens;
			this.accumulatedUsage.outputTokens += usage.outputTokens;
		}
		this.accumulatedUsage.calls++;
	}

	/** URL the provider posts to, recorded in the call log */
	protected abstract get endpointUrl(): string;

	/**
	 * Perform one HTTP attempt. Non-2xx responses must be thrown as
	 * ServiceError (see httpError); everything else is classified here.
	 */
	protected abstract send(
		messages: LLMMessage[],
		options: LLMGenerateOptions,
		signal: AbortSignal | undefined,
	): Promise<LLMResponse>;

	async complete(messages: LLMMessage[], options: LLMGenerateOptions = {}): Promise<LLMResponse> {
		const response = await this.withRetry(
			(attempt) => this.attempt(messages, options, attempt),
			options.abortSignal,
		);
		this.accumulateUsage(response.usage);
		return response;
	}

	protected async withRetry<T>(
		fn: (attempt: number) => Promise<T>,
		signal?: AbortSignal,
		maxRetries = this.maxRetries,
	): Promise<T> {
		let lastError: RepoLensError | undefined;

		for (let attempt = 0; attempt < maxRetries; attempt++) {
			try {
				return await fn(attempt);
			} catch (error) {
				lastError = toRepoLensError(error, "LLM request");

				// Only transient service failures are retried
				if (!(lastError instanceof ServiceError) || !lastError.transient) {
					throw lastError;
				}

				if (attempt < maxRetries - 1) {
					await delay(this.backoffDelay(attempt, lastError.retryAfterMs), signal, "LLM request");
				}
			}
		}

		throw lastError ?? new ServiceError("Failed after retries", { transient: true });
	}

	protected backoffDelay(attempt: number, retryAfterMs?: number): number {
		const exponential = this.baseRetryDelayMs * Math.pow(2, attempt);
		const jitter = Math.random() * exponential * 0.25;
		return Math.max(exponential + jitter, retryAfterMs ?? 0);
	}

	private async attempt(
		messages: LLMMessage[],
		options: LLMGenerateOptions,
		attempt: number,
	): Promise<LLMResponse> {
		const callerSignal = options.abortSignal;
		if (callerSignal?.aborted) {
			throw new CancelledError("LLM request");
		}

		if (this.rateLimiter) {
			const promptTokens = messages.reduce(
				(sum, m) => sum + estimateTokens(m.content),
				estimateTokens(options.systemPrompt ?? ""),
			);
			await this.rateLimiter.acquire(promptTokens, callerSignal);
		}

		const timeoutController = new AbortController();
		const timeoutId = setTimeout(() => timeoutController.abort(), this.timeout);
		const signal = combineAbortSignals(timeoutController.signal, callerSignal);
		const startedAt = Date.now();
		const timestamp = new Date(startedAt).toISOString();
		const purpose = options.purpose ?? "complete";

		try {
			const response = await this.send(messages, options, signal);
			this.callLog?.record({
				timestamp,
				endpoint: this.endpointUrl,
				purpose,
				model: response.model,
				attempt: attempt + 1,
				status: "ok",
				httpStatus: 200,
				responseTimeMs: Date.now() - startedAt,
				inputTokens: response.usage?.inputTokens,
				outputTokens: response.usage?.outputTokens,
			});
			return response;
		} catch (error) {
			let classified: RepoLensError;
			if (callerSignal?.aborted) {
				classified = new CancelledError("LLM request", error);
			} else if (timeoutController.signal.aborted) {
				classified = new ServiceError(`${this.provider} request timed out after ${this.timeout}ms`, {
					transient: true,
					cause: error,
				});
			} else if (error instanceof RepoLensError) {
				classified = error;
			} else if (error instanceof TypeError) {
				// fetch() rejects with TypeError on network failures
				classified = new ServiceError(`Cannot reach ${this.endpointUrl}: ${errorMessage(error)}`, {
					transient: true,
					cause: error,
				});
			} else {
				classified = toRepoLensError(error, "LLM request");
			}

			this.callLog?.record({
				timestamp,
				endpoint: this.endpointUrl,
				purpose,
				model: options.model ?? this.model,
				attempt: attempt + 1,
				status: "error",
				httpStatus: classified instanceof ServiceError ? classified.status : undefined,
				responseTimeMs: Date.now() - startedAt,
				error: classified.message,
			});
			throw classified;
		} finally {
			clearTimeout(timeoutId);
		}
	}
}

// ============================================================================
// Client Options
// ============================================================================

export interface LLMClientOptions extends BaseClientOptions {
	/** LLM provider to use (default: anthropic) */
	provider?: LLMProvider;
	/** Model to use (overrides default) */
	model?: string;
	/** API key (for Anthropic) */
	apiKey?: string;
	/** Endpoint URL (for local providers) */
	endpoint?: string;
}

// ============================================================================
// Factory Function
// ============================================================================

/**
 * Create an LLM client for a provider
 */
export async function createLLMClient(options: LLMClientOptions = {}): Promise<ILLMClient> {
	const provider = options.provider ?? "anthropic";
	const model = options.model ?? DEFAULT_LLM_MODELS[provider];

	switch (provider) {
		case "anthropic": {
			const { AnthropicLLMClient } = await import("./providers/anthropic.js");
			return new AnthropicLLMClient({ ...options, model });
		}

		case "local": {
			const { LocalLLMClient } = await import("./providers/local.js");
			return new LocalLLMClient({ ...options, model });
		}
	}
}
