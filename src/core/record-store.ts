/**
 * File record persistence
 *
 * RecordStore is the storage capability behind the Index Store. Operations
 * are synchronous; ordering and snapshot consistency are handled by
 * IndexStore on top.
 */

import { InvariantViolationError } from "../errors.js";
import type { FileRecord, IndexStatus } from "../types.js";
import { createDatabaseSync, type SQLiteDatabase } from "./sqlite.js";

// ============================================================================
// Interface
// ============================================================================

export interface RecordStore {
	put(record: FileRecord): void;
	get(path: string): FileRecord | undefined;
	/** Returns false when no record existed */
	delete(path: string): boolean;
	/** Every record, sorted by path */
	list(): FileRecord[];
	count(): number;
	clear(): void;
	getMetadata(key: string): string | undefined;
	setMetadata(key: string, value: string): void;
	close(): void;
}

function cloneRecord(record: FileRecord): FileRecord {
	return { ...record, status: { ...record.status } };
}

// ============================================================================
// In-memory Store
// ============================================================================

export class MemoryRecordStore implements RecordStore {
	private records = new Map<string, FileRecord>();
	private metadata = new Map<string, string>();

	put(record: FileRecord): void {
		this.records.set(record.path, cloneRecord(record));
	}

	get(path: string): FileRecord | undefined {
		const record = this.records.get(path);
		return record ? cloneRecord(record) : undefined;
	}

	delete(path: string): boolean {
		return this.records.delete(path);
	}

	list(): FileRecord[] {
		return [...this.records.values()]
			.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0))
			.map(cloneRecord);
	}

	count(): number {
		return this.records.size;
	}

	clear(): void {
		this.records.clear();
	}

	getMetadata(key: string): string | undefined {
		return this.metadata.get(key);
	}

	setMetadata(key: string, value: string): void {
		this.metadata.set(key, value);
	}

	close(): void {
		// nothing to release
	}
}

// ============================================================================
// SQLite Store
// ============================================================================

interface FileRow {
	path: string;
	fingerprint: string;
	byte_length: number;
	token_estimate: number;
	summary: string;
	language: string;
	last_indexed_at: string;
	status: string;
	failure_reason: string | null;
}

function rowToRecord(row: FileRow): FileRecord {
	let status: IndexStatus;
	switch (row.status) {
		case "indexed":
			status = { state: "indexed" };
			break;
		case "pending":
			status = { state: "pending" };
			break;
		case "failed":
			status = { state: "failed", reason: row.failure_reason ?? "unknown error" };
			break;
		default:
			throw new InvariantViolationError(`Unknown status "${row.status}" stored for ${row.path}`, {
				path: row.path,
			});
	}

	return {
		path: row.path,
		fingerprint: row.fingerprint,
		byteLength: row.byte_length,
		tokenEstimate: row.token_estimate,
		summary: row.summary,
		language: row.language,
		lastIndexedAt: row.last_indexed_at,
		status,
	};
}

export class SqliteRecordStore implements RecordStore {
	private db: SQLiteDatabase;
	/** Only a database opened here is closed here */
	private ownsDb: boolean;

	constructor(dbPathOrDatabase: string | SQLiteDatabase) {
		if (typeof dbPathOrDatabase === "string") {
			this.db = createDatabaseSync(dbPathOrDatabase);
			this.ownsDb = true;
		} else {
			this.db = dbPathOrDatabase;
			this.ownsDb = false;
		}
		this.initializeSchema();
	}

	private initializeSchema(): void {
		this.db.exec(`
      CREATE TABLE IF NOT EXISTS files (
        path TEXT PRIMARY KEY,
        fingerprint TEXT NOT NULL,
        byte_length INTEGER NOT NULL,
        token_estimate INTEGER NOT NULL,
        summary TEXT NOT NULL,
        language TEXT NOT NULL,
        last_indexed_at TEXT NOT NULL,
        status TEXT NOT NULL,
        failure_reason TEXT
      );

      CREATE TABLE IF NOT EXISTS metadata (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_files_status ON files(status);
    `);
	}

	put(record: FileRecord): void {
		this.db
			.prepare(
				`INSERT INTO files (path, fingerprint, byte_length, token_estimate, summary, language, last_indexed_at, status, failure_reason)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(path) DO UPDATE SET
           fingerprint = excluded.fingerprint,
           byte_length = excluded.byte_length,
           token_estimate = excluded.token_estimate,
           summary = excluded.summary,
           language = excluded.language,
           last_indexed_at = excluded.last_indexed_at,
           status = excluded.status,
           failure_reason = excluded.failure_reason`,
			)
			.run(
				record.path,
				record.fingerprint,
				record.byteLength,
				record.tokenEstimate,
				record.summary,
				record.language,
				record.lastIndexedAt,
				record.status.state,
				record.status.state === "failed" ? record.status.reason : null,
			);
	}

	get(path: string): FileRecord | undefined {
		const row = this.db.prepare<FileRow>("SELECT * FROM files WHERE path = ?").get(path);
		return row ? rowToRecord(row) : undefined;
	}

	delete(path: string): boolean {
		return this.db.prepare("DELETE FROM files WHERE path = ?").run(path).changes > 0;
	}

	list(): FileRecord[] {
		return this.db
			.transaction(() => this.db.prepare<FileRow>("SELECT * FROM files ORDER BY path").all())
			.map(rowToRecord);
	}

	count(): number {
		const row = this.db.prepare<{ count: number }>("SELECT COUNT(*) AS count FROM files").get();
		return row?.count ?? 0;
	}

	clear(): void {
		this.db.exec("DELETE FROM files");
	}

	getMetadata(key: string): string | undefined {
		return this.db.prepare<{ value: string }>("SELECT value FROM metadata WHERE key = ?").get(key)
			?.value;
	}

	setMetadata(key: string, value: string): void {
		this.db
			.prepare("INSERT OR REPLACE INTO metadata (key, value) VALUES (?, ?)")
			.run(key, value);
	}

	close(): void {
		if (this.ownsDb) {
			this.db.close();
		}
	}
}
