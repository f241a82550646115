/**
 * Abort helpers
 *
 * Combines multiple AbortSignals into a single signal for fetch cancellation,
 * and provides a delay that stops early when its signal aborts.
 */

import { CancelledError } from "../errors.js";

export function combineAbortSignals(
	...signals: Array<AbortSignal | undefined>
): AbortSignal | undefined {
	const active = signals.filter((s): s is AbortSignal => s !== undefined);
	if (active.length === 0) return undefined;
	if (active.length === 1) return active[0];
	// Holds no listeners on the inputs, so a long-lived caller signal does not accumulate them
	return AbortSignal.any(active);
}

/**
 * Wait for ms milliseconds. Rejects with CancelledError if the signal aborts.
 */
export function delay(ms: number, signal?: AbortSignal, operation = "Wait"): Promise<void> {
	if (signal?.aborted) {
		return Promise.reject(new CancelledError(operation));
	}
	return new Promise<void>((resolve, reject) => {
		const onAbort = () => {
			clearTimeout(timer);
			reject(new CancelledError(operation));
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, ms);
		signal?.addEventListener("abort", onAbort, { once: true });
	});
}
