import { describe, expect, test } from "vitest";
import { ConversationManager, MAX_TITLE_LENGTH, titleFromMessage } from "../../src/conversation/manager.js";
import {
	MemoryConversationStore,
	SqliteConversationStore,
	type ConversationStore,
} from "../../src/conversation/store.js";
import { createDatabaseSync } from "../../src/core/sqlite.js";
import { InvariantViolationError } from "../../src/errors.js";
import type { ConversationTurn, SessionHeader } from "../../src/types.js";

const T0 = new Date("2024-06-01T09:00:00.000Z");

function clock(start = T0): () => Date {
	let minutes = 0;
	return () => new Date(start.getTime() + minutes++ * 60_000);
}

class FailingStore extends MemoryConversationStore {
	override appendTurns(): void {
		throw new Error("disk full");
	}
}

const backends: Array<[string, () => ConversationStore]> = [
	["memory", () => new MemoryConversationStore()],
	["sqlite", () => new SqliteConversationStore(":memory:")],
];

describe("titleFromMessage", () => {
	test("collapses whitespace", () => {
		expect(titleFromMessage("  How   does\n parsing work?  ")).toBe("How does parsing work?");
	});

	test("cuts long messages", () => {
		const title = titleFromMessage("word ".repeat(30));
		expect(title).toHaveLength(MAX_TITLE_LENGTH);
		expect(title.startsWith("word word")).toBe(true);
	});
});

describe.each(backends)("ConversationManager (%s)", (_name, makeStore) => {
	test("a new session starts empty", () => {
		const session = new ConversationManager(makeStore()).start();
		expect(session.state).toBe("empty");
		expect(session.history()).toEqual([]);
		expect(session.id).toMatch(/^[0-9a-f-]{36}$/);
	});

	test("an exchange appends a user and an assistant turn", () => {
		const manager = new ConversationManager(makeStore(), { now: clock(), projectPath: "/work/demo" });
		const session = manager.start("s1");

		session.appendExchange("How is parsing done?", "By a recursive descent parser.", ["src/parser.rs"]);

		expect(session.state).toBe("active");
		expect(session.title).toBe("How is parsing done?");
		expect(session.history()).toEqual([
			{
				index: 0,
				role: "user",
				text: "How is parsing done?",
				contextPaths: [],
				createdAt: "2024-06-01T09:01:00.000Z",
			},
			{
				index: 1,
				role: "assistant",
				text: "By a recursive descent parser.",
				contextPaths: ["src/parser.rs"],
				createdAt: "2024-06-01T09:01:00.000Z",
			},
		]);
	});

	test("a restarted session has the same history", () => {
		const store = makeStore();
		const first = new ConversationManager(store, { now: clock() }).start("s1");
		first.appendExchange("q1", "a1", ["src/a.rs"]);
		first.appendExchange("q2", "a2", ["src/b.rs", "src/c.rs"]);

		const restored = new ConversationManager(store).start("s1");

		expect(restored.state).toBe("active");
		expect(restored.title).toBe("q1");
		expect(restored.history()).toEqual(first.history());
		expect(restored.history().map((t) => t.index)).toEqual([0, 1, 2, 3]);

		restored.appendExchange("q3", "a3", []);
		expect(new ConversationManager(store).start("s1").length).toBe(6);
	});

	test("the title is set once, from the first user message", () => {
		const store = makeStore();
		const session = new ConversationManager(store).start("s1");
		session.appendExchange("first question", "answer", []);
		session.appendExchange("second question", "answer", []);

		expect(session.title).toBe("first question");
		expect(store.getSession("s1")?.title).toBe("first question");
	});

	test("history is a frozen, repeatable view", () => {
		const session = new ConversationManager(makeStore()).start();
		session.appendExchange("q", "a", ["src/a.rs"]);

		const history = session.history();
		expect(Object.isFrozen(history)).toBe(true);
		expect(Object.isFrozen(history[1])).toBe(true);
		expect(Object.isFrozen(history[1].contextPaths)).toBe(true);
		expect([...history]).toEqual([...session.history()]);
	});

	test("recent returns the last n turns", () => {
		const session = new ConversationManager(makeStore()).start();
		session.appendExchange("q1", "a1", []);
		session.appendExchange("q2", "a2", []);

		expect(session.recent(3).map((t) => t.text)).toEqual(["a1", "q2", "a2"]);
		expect(session.recent(0)).toEqual([]);
	});

	test("sessions are listed newest first and can be deleted", () => {
		const store = makeStore();
		const manager = new ConversationManager(store, { now: clock() });
		manager.start("older").appendExchange("q", "a", []);
		manager.start("newer").appendExchange("q", "a", []);

		expect(manager.listSessions().map((s) => s.id)).toEqual(["newer", "older"]);
		expect(manager.deleteSession("older")).toBe(true);
		expect(manager.deleteSession("older")).toBe(false);
		expect(manager.listSessions().map((s) => s.id)).toEqual(["newer"]);
		expect(store.loadTurns("older")).toEqual([]);
	});

	test("a taken turn index is rejected without writing", () => {
		const store = makeStore();
		const header: SessionHeader = { id: "s1", title: "t", createdAt: T0.toISOString() };
		const turn = (index: number): ConversationTurn => ({
			index,
			role: index % 2 === 0 ? "user" : "assistant",
			text: `turn ${index}`,
			contextPaths: [],
			createdAt: T0.toISOString(),
		});
		store.appendTurns(header, [turn(0), turn(1)]);

		expect(() => store.appendTurns(header, [turn(2), turn(1)])).toThrow(InvariantViolationError);
		expect(store.loadTurns("s1").map((t) => t.index)).toEqual([0, 1]);
	});

	test("a stored log with a gap is rejected on load", () => {
		const store = makeStore();
		const header: SessionHeader = { id: "s1", title: "t", createdAt: T0.toISOString() };
		store.appendTurns(header, [
			{ index: 0, role: "user", text: "q", contextPaths: [], createdAt: T0.toISOString() },
			{ index: 2, role: "assistant", text: "a", contextPaths: [], createdAt: T0.toISOString() },
		]);

		expect(() => new ConversationManager(store).start("s1")).toThrow(InvariantViolationError);
	});
});

describe("ConversationSession atomicity", () => {
	test("a failed store write leaves the session unchanged", () => {
		const session = new ConversationManager(new FailingStore()).start("s1");

		expect(() => session.appendExchange("q", "a", [])).toThrow("disk full");
		expect(session.length).toBe(0);
		expect(session.state).toBe("empty");
		expect(session.title).toBe("");
	});
});

describe("SqliteConversationStore", () => {
	test("rejects an unknown stored role", () => {
		const db = createDatabaseSync(":memory:");
		const store = new SqliteConversationStore(db);
		store.appendTurns({ id: "s1", title: "t", createdAt: T0.toISOString() }, []);
		db.prepare(
			"INSERT INTO conversation_turns (session_id, turn_index, role, text, context_paths, created_at) VALUES (?, ?, ?, ?, ?, ?)",
		).run("s1", 0, "system", "hello", "[]", T0.toISOString());

		expect(() => store.loadTurns("s1")).toThrow(InvariantViolationError);
		db.close();
	});

	test("keeps the project path", () => {
		const store = new SqliteConversationStore(":memory:");
		const session = new ConversationManager(store, { projectPath: "/work/demo" }).start("s1");
		session.appendExchange("q", "a", []);

		expect(store.getSession("s1")).toEqual({
			id: "s1",
			title: "q",
			projectPath: "/work/demo",
			createdAt: session.createdAt,
		});
		store.close();
	});
});
