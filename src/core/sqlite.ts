/**
 * SQLite Abstraction Layer
 *
 * Thin typed wrapper over better-sqlite3 so stores only see exec, prepare
 * and transaction. Pass ":memory:" for a private in-memory database.
 */

import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";

export type SqlValue = string | number | bigint | null;

export interface RunResult {
	changes: number;
	lastInsertRowid: number | bigint;
}

export interface Statement<Row> {
	run(...params: SqlValue[]): RunResult;
	get(...params: SqlValue[]): Row | undefined;
	all(...params: SqlValue[]): Row[];
}

export interface SQLiteDatabase {
	exec(sql: string): void;
	prepare<Row = unknown>(sql: string): Statement<Row>;
	close(): void;
	/** Execute a function within a transaction (auto-commits or rolls back) */
	transaction<T>(fn: () => T): T;
}

/**
 * Open a SQLite database (synchronous)
 */
export function createDatabaseSync(path: string): SQLiteDatabase {
	if (path !== ":memory:") {
		const dir = dirname(path);
		if (!existsSync(dir)) {
			mkdirSync(dir, { recursive: true });
		}
	}

	const db = new Database(path);
	if (path !== ":memory:") {
		db.pragma("journal_mode = WAL");
	}
	db.pragma("busy_timeout = 5000");

	return {
		exec: (sql: string) => {
			db.exec(sql);
		},
		prepare: <Row = unknown>(sql: string): Statement<Row> => {
			const stmt = db.prepare<SqlValue[], Row>(sql);
			return {
				run: (...params: SqlValue[]): RunResult => {
					const result = stmt.run(...params);
					return {
						changes: result.changes,
						lastInsertRowid: result.lastInsertRowid,
					};
				},
				get: (...params: SqlValue[]) => stmt.get(...params),
				all: (...params: SqlValue[]) => stmt.all(...params),
			};
		},
		close: () => {
			db.close();
		},
		transaction: <T>(fn: () => T): T => db.transaction(fn)(),
	};
}
