/**
 * Request and token rate limiting for LLM calls.
 *
 * Sliding windows over the last minute and the last day. A call is admitted
 * only if the request count, the per-minute tokens and the daily tokens all
 * stay within their limits after counting it.
 */

import { ServiceError } from "../errors.js";
import type { RateLimitConfig } from "../types.js";
import { delay } from "./abort.js";

export const DEFAULT_RATE_LIMITS: Required<RateLimitConfig> = {
	requestsPerMinute: 1000,
	tokensPerMinute: 80_000,
	tokensPerDay: 2_500_000,
};

const MINUTE_MS = 60_000;
const DAY_MS = 24 * 60 * MINUTE_MS;

interface UsageEntry {
	at: number;
	tokens: number;
}

export interface RateLimiterOptions extends RateLimitConfig {
	/** Longest acquire() will wait before giving up (default: 60s) */
	maxWaitMs?: number;
	/** Clock, replaceable in tests */
	now?: () => number;
}

export interface RateLimitUsage {
	requestsLastMinute: number;
	tokensLastMinute: number;
	tokensLastDay: number;
}

export class RateLimiter {
	private readonly limits: Required<RateLimitConfig>;
	private readonly maxWaitMs: number;
	private readonly now: () => number;
	private entries: UsageEntry[] = [];

	constructor(options: RateLimiterOptions = {}) {
		this.limits = {
			requestsPerMinute: options.requestsPerMinute ?? DEFAULT_RATE_LIMITS.requestsPerMinute,
			tokensPerMinute: options.tokensPerMinute ?? DEFAULT_RATE_LIMITS.tokensPerMinute,
			tokensPerDay: options.tokensPerDay ?? DEFAULT_RATE_LIMITS.tokensPerDay,
		};
		this.maxWaitMs = options.maxWaitMs ?? MINUTE_MS;
		this.now = options.now ?? Date.now;
	}

	/**
	 * Admit a call of `tokens` tokens if every limit allows it, counting it.
	 */
	tryAcquire(tokens: number): boolean {
		const now = this.now();
		this.prune(now);
		const usage = this.usageAt(now);

		if (usage.tokensLastDay + tokens > this.limits.tokensPerDay) return false;
		if (usage.tokensLastMinute + tokens > this.limits.tokensPerMinute) return false;
		if (usage.requestsLastMinute + 1 > this.limits.requestsPerMinute) return false;

		this.entries.push({ at: now, tokens });
		return true;
	}

	/**
	 * Wait until a call of `tokens` tokens is admitted.
	 *
	 * @throws ServiceError (permanent) when the call can never fit or the
	 *   wait would exceed maxWaitMs
	 */
	async acquire(tokens: number, signal?: AbortSignal): Promise<void> {
		if (tokens > this.maxRequestTokens) {
			throw new ServiceError(
				`Request of ~${tokens} tokens exceeds the configured rate limit`,
				{ transient: false },
			);
		}

		const started = this.now();
		while (!this.tryAcquire(tokens)) {
			const wait = this.nextReleaseIn(tokens);
			if (this.now() - started + wait > this.maxWaitMs) {
				throw new ServiceError(`Rate limit reached; next slot in ${Math.ceil(wait / 1000)}s`, {
					transient: false,
					retryAfterMs: wait,
				});
			}
			await delay(wait, signal, "Rate limit wait");
		}
	}

	getUsage(): RateLimitUsage {
		const now = this.now();
		this.prune(now);
		return this.usageAt(now);
	}

	/** Largest single request that can ever be admitted */
	get maxRequestTokens(): number {
		return Math.min(this.limits.tokensPerMinute, this.limits.tokensPerDay);
	}

	private usageAt(now: number): RateLimitUsage {
		let requestsLastMinute = 0;
		let tokensLastMinute = 0;
		let tokensLastDay = 0;
		for (const entry of this.entries) {
			tokensLastDay += entry.tokens;
			if (now - entry.at < MINUTE_MS) {
				requestsLastMinute++;
				tokensLastMinute += entry.tokens;
			}
		}
		return { requestsLastMinute, tokensLastMinute, tokensLastDay };
	}

	private prune(now: number): void {
		this.entries = this.entries.filter((e) => now - e.at < DAY_MS);
	}

	/** Milliseconds until enough usage leaves the windows for `tokens` */
	private nextReleaseIn(tokens: number): number {
		const now = this.now();
		const usage = this.usageAt(now);

		if (usage.tokensLastDay + tokens > this.limits.tokensPerDay) {
			let freed = 0;
			for (const entry of this.entries) {
				freed += entry.tokens;
				if (usage.tokensLastDay - freed + tokens <= this.limits.tokensPerDay) {
					return Math.max(1, entry.at + DAY_MS - now);
				}
			}
		}

		let freedTokens = 0;
		let freedRequests = 0;
		for (const entry of this.entries) {
			if (now - entry.at >= MINUTE_MS) continue;
			freedTokens += entry.tokens;
			freedRequests++;
			if (
				usage.tokensLastMinute - freedTokens + tokens <= this.limits.tokensPerMinute &&
				usage.requestsLastMinute - freedRequests + 1 <= this.limits.requestsPerMinute
			) {
				return Math.max(1, entry.at + MINUTE_MS - now);
			}
		}
		return MINUTE_MS;
	}
}
