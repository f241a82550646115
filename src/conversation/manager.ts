/**
 * Conversation Manager
 *
 * Sessions move from "empty" to "active" on their first committed
 * exchange. Turn indices start at 0 and grow by one with no gaps; a user
 * turn is only ever committed together with its assistant reply.
 */

import { randomUUID } from "node:crypto";
import { InvariantViolationError } from "../errors.js";
import type { ConversationTurn, SessionHeader, SessionState, TurnRole } from "../types.js";
import type { ConversationStore } from "./store.js";

/** Session titles are the first user message, cut to this length */
export const MAX_TITLE_LENGTH = 60;

export function titleFromMessage(text: string): string {
	const collapsed = text.trim().replace(/\s+/g, " ");
	return collapsed.length > MAX_TITLE_LENGTH ? collapsed.slice(0, MAX_TITLE_LENGTH) : collapsed;
}

function freezeTurn(turn: ConversationTurn): ConversationTurn {
	Object.freeze(turn.contextPaths);
	return Object.freeze(turn);
}

/**
 * Check that turns are indexed 0..n-1 in order
 */
function validateTurnLog(sessionId: string, turns: readonly ConversationTurn[]): void {
	turns.forEach((turn, position) => {
		if (turn.index !== position) {
			throw new InvariantViolationError(
				`Session ${sessionId} has turn index ${turn.index} at position ${position}`,
				{ sessionId, index: turn.index, position },
			);
		}
	});
}

// ============================================================================
// Session
// ============================================================================

export class ConversationSession {
	private store: ConversationStore;
	private header: SessionHeader;
	private turns: ConversationTurn[];
	private now: () => Date;

	constructor(store: ConversationStore, header: SessionHeader, turns: ConversationTurn[], now: () => Date) {
		validateTurnLog(header.id, turns);
		this.store = store;
		this.header = { ...header };
		this.turns = turns.map(freezeTurn);
		this.now = now;
	}

	get id(): string {
		return this.header.id;
	}

	get title(): string {
		return this.header.title;
	}

	get projectPath(): string | undefined {
		return this.header.projectPath;
	}

	get createdAt(): string {
		return this.header.createdAt;
	}

	get state(): SessionState {
		return this.turns.length === 0 ? "empty" : "active";
	}

	get length(): number {
		return this.turns.length;
	}

	/**
	 * Every turn in order. The returned array is a frozen copy; iterating
	 * it again always yields the same turns.
	 */
	history(): readonly ConversationTurn[] {
		return Object.freeze([...this.turns]);
	}

	/** The last n turns, oldest first */
	recent(n: number): readonly ConversationTurn[] {
		if (n <= 0) return Object.freeze([]);
		return Object.freeze(this.turns.slice(-n));
	}

	/**
	 * Commit a user turn and its assistant reply together.
	 * Nothing is appended if the store write fails.
	 */
	appendExchange(
		userText: string,
		assistantText: string,
		contextPaths: readonly string[],
	): [ConversationTurn, ConversationTurn] {
		const createdAt = this.now().toISOString();
		const user = this.makeTurn(this.turns.length, "user", userText, [], createdAt);
		const assistant = this.makeTurn(this.turns.length + 1, "assistant", assistantText, contextPaths, createdAt);
		this.commit([user, assistant]);
		return [user, assistant];
	}

	/**
	 * Append a single turn. Used for imported or system-generated turns;
	 * chat exchanges go through appendExchange.
	 */
	appendTurn(role: TurnRole, text: string, contextPaths: readonly string[] = []): ConversationTurn {
		const turn = this.makeTurn(this.turns.length, role, text, contextPaths, this.now().toISOString());
		this.commit([turn]);
		return turn;
	}

	private makeTurn(
		index: number,
		role: TurnRole,
		text: string,
		contextPaths: readonly string[],
		createdAt: string,
	): ConversationTurn {
		return { index, role, text, contextPaths: [...contextPaths], createdAt };
	}

	private commit(turns: ConversationTurn[]): void {
		turns.forEach((turn, offset) => {
			if (turn.index !== this.turns.length + offset) {
				throw new InvariantViolationError(
					`Turn index ${turn.index} does not follow ${this.turns.length + offset - 1}`,
					{ sessionId: this.id, index: turn.index },
				);
			}
		});

		const firstUser = turns.find((t) => t.role === "user");
		const header: SessionHeader =
			!this.header.title && firstUser ? { ...this.header, title: titleFromMessage(firstUser.text) } : this.header;

		// Store first; local state only changes once the write succeeded
		this.store.appendTurns(header, turns);
		this.header = header;
		for (const turn of turns) {
			this.turns.push(freezeTurn(turn));
		}
	}
}

// ============================================================================
// Manager
// ============================================================================

export interface ConversationManagerOptions {
	/** Recorded on new sessions */
	projectPath?: string;
	/** Clock, replaceable in tests */
	now?: () => Date;
}

export class ConversationManager {
	private store: ConversationStore;
	private projectPath?: string;
	private now: () => Date;

	constructor(store: ConversationStore, options: ConversationManagerOptions = {}) {
		this.store = store;
		this.projectPath = options.projectPath;
		this.now = options.now ?? (() => new Date());
	}

	/**
	 * Load the session with this id, or create an empty one (with a random
	 * id when none is given). New sessions are persisted on their first turn.
	 *
	 * @throws InvariantViolationError if the stored turn log is corrupted
	 */
	start(sessionId?: string): ConversationSession {
		if (sessionId) {
			const header = this.store.getSession(sessionId);
			const turns = this.store.loadTurns(sessionId);
			if (header || turns.length > 0) {
				return new ConversationSession(
					this.store,
					header ?? { id: sessionId, title: "", createdAt: turns[0].createdAt },
					turns,
					this.now,
				);
			}
		}

		return new ConversationSession(
			this.store,
			{
				id: sessionId ?? randomUUID(),
				title: "",
				projectPath: this.projectPath,
				createdAt: this.now().toISOString(),
			},
			[],
			this.now,
		);
	}

	listSessions(): SessionHeader[] {
		return this.store.listSessions();
	}

	deleteSession(id: string): boolean {
		return this.store.deleteSession(id);
	}
}

export function createConversationManager(
	store: ConversationStore,
	options?: ConversationManagerOptions,
): ConversationManager {
	return new ConversationManager(store, options);
}
