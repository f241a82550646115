/**
 * Conversation persistence
 *
 * Append-only turn log keyed by session id. appendTurns writes the session
 * header and every given turn in one transaction, or nothing.
 */

import { InvariantViolationError } from "../errors.js";
import { createDatabaseSync, type SQLiteDatabase } from "../core/sqlite.js";
import type { ConversationTurn, SessionHeader, TurnRole } from "../types.js";

// ============================================================================
// Interface
// ============================================================================

export interface ConversationStore {
	getSession(id: string): SessionHeader | undefined;
	/** Turns of a session ordered by index */
	loadTurns(sessionId: string): ConversationTurn[];
	/**
	 * Insert the header if missing (or fill an empty title) and append turns.
	 * Fails without writing anything if any turn index is already taken.
	 */
	appendTurns(header: SessionHeader, turns: readonly ConversationTurn[]): void;
	/** Sessions, most recently created first */
	listSessions(): SessionHeader[];
	deleteSession(id: string): boolean;
	close(): void;
}

// ============================================================================
// In-memory Store
// ============================================================================

export class MemoryConversationStore implements ConversationStore {
	private sessions = new Map<string, SessionHeader>();
	private turns = new Map<string, ConversationTurn[]>();

	getSession(id: string): SessionHeader | undefined {
		const header = this.sessions.get(id);
		return header ? { ...header } : undefined;
	}

	loadTurns(sessionId: string): ConversationTurn[] {
		return (this.turns.get(sessionId) ?? []).map((t) => ({ ...t, contextPaths: [...t.contextPaths] }));
	}

	appendTurns(header: SessionHeader, turns: readonly ConversationTurn[]): void {
		const existing = this.turns.get(header.id) ?? [];
		const taken = new Set(existing.map((t) => t.index));
		for (const turn of turns) {
			if (taken.has(turn.index)) {
				throw new InvariantViolationError(`Turn ${turn.index} already exists in session ${header.id}`, {
					sessionId: header.id,
					index: turn.index,
				});
			}
			taken.add(turn.index);
		}

		const stored = this.sessions.get(header.id);
		if (!stored) {
			this.sessions.set(header.id, { ...header });
		} else if (!stored.title && header.title) {
			this.sessions.set(header.id, { ...stored, title: header.title });
		}
		this.turns.set(header.id, [
			...existing,
			...turns.map((t) => ({ ...t, contextPaths: [...t.contextPaths] })),
		]);
	}

	listSessions(): SessionHeader[] {
		return [...this.sessions.values()]
			.sort((a, b) => (a.createdAt < b.createdAt ? 1 : a.createdAt > b.createdAt ? -1 : 0))
			.map((h) => ({ ...h }));
	}

	deleteSession(id: string): boolean {
		this.turns.delete(id);
		return this.sessions.delete(id);
	}

	close(): void {
		// nothing to release
	}
}

// ============================================================================
// SQLite Store
// ============================================================================

interface SessionRow {
	id: string;
	title: string;
	project_path: string | null;
	created_at: string;
}

interface TurnRow {
	turn_index: number;
	role: string;
	text: string;
	context_paths: string;
	created_at: string;
}

function rowToHeader(row: SessionRow): SessionHeader {
	return {
		id: row.id,
		title: row.title,
		projectPath: row.project_path ?? undefined,
		createdAt: row.created_at,
	};
}

function parseRole(value: string, sessionId: string): TurnRole {
	if (value === "user" || value === "assistant") return value;
	throw new InvariantViolationError(`Unknown turn role "${value}" in session ${sessionId}`, { sessionId });
}

function parseContextPaths(value: string, sessionId: string): string[] {
	const parsed: unknown = JSON.parse(value);
	if (Array.isArray(parsed) && parsed.every((p): p is string => typeof p === "string")) {
		return parsed;
	}
	throw new InvariantViolationError(`Corrupted context paths in session ${sessionId}`, { sessionId });
}

export class SqliteConversationStore implements ConversationStore {
	private db: SQLiteDatabase;
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
      CREATE TABLE IF NOT EXISTS conversations (
        id TEXT PRIMARY KEY,
        title TEXT NOT NULL,
        project_path TEXT,
        created_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS conversation_turns (
        session_id TEXT NOT NULL REFERENCES conversations(id) ON DELETE CASCADE,
        turn_index INTEGER NOT NULL,
        role TEXT NOT NULL,
        text TEXT NOT NULL,
        context_paths TEXT NOT NULL DEFAULT '[]',
        created_at TEXT NOT NULL,
        PRIMARY KEY (session_id, turn_index)
      );
    `);
	}

	getSession(id: string): SessionHeader | undefined {
		const row = this.db.prepare<SessionRow>("SELECT * FROM conversations WHERE id = ?").get(id);
		return row ? rowToHeader(row) : undefined;
	}

	loadTurns(sessionId: string): ConversationTurn[] {
		return this.db
			.prepare<TurnRow>(
				"SELECT turn_index, role, text, context_paths, created_at FROM conversation_turns WHERE session_id = ? ORDER BY turn_index",
			)
			.all(sessionId)
			.map((row) => ({
				index: row.turn_index,
				role: parseRole(row.role, sessionId),
				text: row.text,
				contextPaths: parseContextPaths(row.context_paths, sessionId),
				createdAt: row.created_at,
			}));
	}

	appendTurns(header: SessionHeader, turns: readonly ConversationTurn[]): void {
		this.db.transaction(() => {
			this.db
				.prepare(
					`INSERT INTO conversations (id, title, project_path, created_at) VALUES (?, ?, ?, ?)
           ON CONFLICT(id) DO UPDATE SET title = excluded.title WHERE conversations.title = ''`,
				)
				.run(header.id, header.title, header.projectPath ?? null, header.createdAt);

			const exists = this.db.prepare<{ found: number }>(
				"SELECT 1 AS found FROM conversation_turns WHERE session_id = ? AND turn_index = ?",
			);
			const insert = this.db.prepare(
				"INSERT INTO conversation_turns (session_id, turn_index, role, text, context_paths, created_at) VALUES (?, ?, ?, ?, ?, ?)",
			);
			for (const turn of turns) {
				if (exists.get(header.id, turn.index)) {
					throw new InvariantViolationError(`Turn ${turn.index} already exists in session ${header.id}`, {
						sessionId: header.id,
						index: turn.index,
					});
				}
				insert.run(
					header.id,
					turn.index,
					turn.role,
					turn.text,
					JSON.stringify(turn.contextPaths),
					turn.createdAt,
				);
			}
		});
	}

	listSessions(): SessionHeader[] {
		return this.db
			.prepare<SessionRow>("SELECT * FROM conversations ORDER BY created_at DESC, id")
			.all()
			.map(rowToHeader);
	}

	deleteSession(id: string): boolean {
		return this.db.transaction(() => {
			this.db.prepare("DELETE FROM conversation_turns WHERE session_id = ?").run(id);
			return this.db.prepare("DELETE FROM conversations WHERE id = ?").run(id).changes > 0;
		});
	}

	close(): void {
		if (this.ownsDb) {
			this.db.close();
		}
	}
}
