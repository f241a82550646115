/**
 * Bounded task pool
 *
 * AdmissionGate is a counting semaphore: at most `limit` holders at once,
 * waiters admitted in FIFO order. runBounded feeds a list through the gate
 * and only returns once every admitted task has settled.
 */

import { ConfigError } from "../errors.js";

type Waiter = (admitted: boolean) => void;

export class AdmissionGate {
	readonly limit: number;
	private active = 0;
	private waiters: Waiter[] = [];

	constructor(limit: number) {
		if (!Number.isInteger(limit) || limit < 1) {
			throw new ConfigError(`Concurrency must be a positive integer, got ${limit}`, { limit });
		}
		this.limit = limit;
	}

	/** Tasks currently holding a slot */
	get inFlight(): number {
		return this.active;
	}

	/**
	 * Wait for a slot. Resolves false (without taking a slot) if the
	 * signal aborts first.
	 */
	acquire(signal?: AbortSignal): Promise<boolean> {
		if (signal?.aborted) {
			return Promise.resolve(false);
		}
		if (this.active < this.limit) {
			this.active++;
			return Promise.resolve(true);
		}

		return new Promise<boolean>((resolve) => {
			const waiter: Waiter = (admitted) => {
				signal?.removeEventListener("abort", onAbort);
				resolve(admitted);
			};
			const onAbort = () => {
				this.waiters = this.waiters.filter((w) => w !== waiter);
				resolve(false);
			};
			signal?.addEventListener("abort", onAbort, { once: true });
			this.waiters.push(waiter);
		});
	}

	release(): void {
		const next = this.waiters.shift();
		if (next) {
			// Slot passes straight to the next waiter
			next(true);
			return;
		}
		if (this.active > 0) {
			this.active--;
		}
	}
}

export interface BoundedRunOptions {
	signal?: AbortSignal;
}

export interface BoundedRunResult {
	/** Items handed to the worker */
	admitted: number;
	/** True when the signal stopped admission before every item ran */
	cancelled: boolean;
}

/**
 * Run worker over items with at most `limit` in flight. Items are admitted
 * in order; an abort stops admission but never interrupts running tasks.
 * A worker rejection is rethrown after all admitted tasks settle.
 */
export async function runBounded<T>(
	items: readonly T[],
	limit: number,
	worker: (item: T, index: number, gate: AdmissionGate) => Promise<void>,
	options: BoundedRunOptions = {},
): Promise<BoundedRunResult> {
	const gate = new AdmissionGate(limit);
	const tasks: Promise<void>[] = [];
	let cancelled = false;

	for (let i = 0; i < items.length; i++) {
		const admitted = await gate.acquire(options.signal);
		if (!admitted) {
			cancelled = true;
			break;
		}
		tasks.push(worker(items[i], i, gate).finally(() => gate.release()));
	}

	const results = await Promise.allSettled(tasks);
	const failure = results.find((r): r is PromiseRejectedResult => r.status === "rejected");
	if (failure) {
		throw failure.reason;
	}

	return { admitted: tasks.length, cancelled };
}
