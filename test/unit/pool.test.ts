import { describe, expect, test } from "vitest";
import { AdmissionGate, runBounded } from "../../src/core/pool.js";
import { ConfigError } from "../../src/errors.js";
import { tick } from "../helpers.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
	let resolve = () => {};
	const promise = new Promise<void>((r) => {
		resolve = r;
	});
	return { promise, resolve };
}

describe("AdmissionGate", () => {
	test("rejects a limit below one", () => {
		expect(() => new AdmissionGate(0)).toThrow(ConfigError);
		expect(() => new AdmissionGate(1.5)).toThrow(ConfigError);
	});

	test("admits waiters in FIFO order", async () => {
		const gate = new AdmissionGate(1);
		expect(await gate.acquire()).toBe(true);

		const order: string[] = [];
		const first = gate.acquire().then(() => order.push("first"));
		const second = gate.acquire().then(() => order.push("second"));

		gate.release();
		await first;
		gate.release();
		await second;

		expect(order).toEqual(["first", "second"]);
		expect(gate.inFlight).toBe(1);
	});

	test("a waiter resolves false when its signal aborts", async () => {
		const gate = new AdmissionGate(1);
		await gate.acquire();

		const controller = new AbortController();
		const waiting = gate.acquire(controller.signal);
		controller.abort();

		expect(await waiting).toBe(false);
		gate.release();
		expect(gate.inFlight).toBe(0);
	});
});

describe("runBounded", () => {
	test("never exceeds the limit", async () => {
		let active = 0;
		let peak = 0;

		const result = await runBounded(Array.from({ length: 12 }, (_, i) => i), 3, async () => {
			active++;
			peak = Math.max(peak, active);
			await tick();
			active--;
		});

		expect(result).toEqual({ admitted: 12, cancelled: false });
		expect(peak).toBe(3);
	});

	test("abort stops admission but lets running tasks finish", async () => {
		const controller = new AbortController();
		const gates = [deferred(), deferred(), deferred(), deferred()];
		const finished: number[] = [];

		const run = runBounded(
			[0, 1, 2, 3],
			2,
			async (item) => {
				await gates[item].promise;
				finished.push(item);
			},
			{ signal: controller.signal },
		);

		await tick();
		controller.abort();
		gates[0].resolve();
		gates[1].resolve();

		expect(await run).toEqual({ admitted: 2, cancelled: true });
		expect(finished.sort()).toEqual([0, 1]);
	});

	test("rethrows a worker failure after every task settles", async () => {
		const finished: number[] = [];
		const run = runBounded([0, 1, 2], 3, async (item) => {
			await tick();
			if (item === 0) throw new Error("worker failed");
			finished.push(item);
		});

		await expect(run).rejects.toThrow("worker failed");
		expect(finished.sort()).toEqual([1, 2]);
	});
});
