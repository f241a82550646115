/**
 * Index Store
 *
 * Owns every FileRecord. Writes to one path are applied in call order
 * through a per-path promise chain; readers only ever see whole records
 * and snapshots never change after they are taken.
 */

import { InvariantViolationError } from "../errors.js";
import type { FileRecord, IndexSnapshot } from "../types.js";
import type { RecordStore } from "./record-store.js";

function freezeRecord(record: FileRecord): FileRecord {
	Object.freeze(record.status);
	return Object.freeze(record);
}

function validateRecord(record: FileRecord): void {
	if (!record.path || record.path.includes("\\") || record.path.startsWith("/")) {
		throw new InvariantViolationError(`Invalid record path "${record.path}"`, { path: record.path });
	}
	if (record.status.state === "indexed") {
		if (record.summary.trim().length === 0) {
			throw new InvariantViolationError(`Indexed record ${record.path} has an empty summary`, {
				path: record.path,
			});
		}
		if (!record.fingerprint) {
			throw new InvariantViolationError(`Indexed record ${record.path} has no fingerprint`, {
				path: record.path,
			});
		}
	}
}

export class IndexStore {
	private store: RecordStore;
	/** Tail of the write chain for each path with pending writes */
	private chains = new Map<string, Promise<void>>();

	constructor(store: RecordStore) {
		this.store = store;
	}

	/**
	 * Insert or fully replace the record for record.path
	 */
	async upsert(record: FileRecord): Promise<void> {
		validateRecord(record);
		const copy: FileRecord = { ...record, status: { ...record.status } };
		await this.enqueue(record.path, () => this.store.put(copy));
	}

	get(path: string): FileRecord | undefined {
		const record = this.store.get(path);
		return record ? freezeRecord(record) : undefined;
	}

	async remove(path: string): Promise<boolean> {
		return this.enqueue(path, () => this.store.delete(path));
	}

	/**
	 * Remove every record whose path is not in livePaths.
	 * Returns the removed paths in order.
	 */
	async sweep(livePaths: Iterable<string>): Promise<string[]> {
		const live = new Set(livePaths);
		const stale = this.store
			.list()
			.map((r) => r.path)
			.filter((path) => !live.has(path));

		const removed: string[] = [];
		for (const path of stale) {
			if (await this.remove(path)) {
				removed.push(path);
			}
		}
		return removed;
	}

	snapshot(): IndexSnapshot {
		const records = this.store.list().map(freezeRecord);
		return Object.freeze({
			records: Object.freeze(records),
			takenAt: new Date().toISOString(),
		});
	}

	size(): number {
		return this.store.count();
	}

	/** Resolves once every write queued so far has been applied */
	async flush(): Promise<void> {
		await Promise.all(this.chains.values());
	}

	async clear(): Promise<void> {
		await this.flush();
		this.store.clear();
	}

	getMetadata(key: string): string | undefined {
		return this.store.getMetadata(key);
	}

	setMetadata(key: string, value: string): void {
		this.store.setMetadata(key, value);
	}

	close(): void {
		this.store.close();
	}

	private enqueue<T>(path: string, op: () => T): Promise<T> {
		const previous = this.chains.get(path) ?? Promise.resolve();
		const result = previous.then(op);
		const tail = result.then(
			() => undefined,
			() => undefined,
		);
		this.chains.set(path, tail);
		void tail.then(() => {
			if (this.chains.get(path) === tail) {
				this.chains.delete(path);
			}
		});
		return result;
	}
}
