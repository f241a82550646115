import { unlinkSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { fingerprint } from "../../src/core/fingerprint.js";
import { IndexStore } from "../../src/core/index-store.js";
import { Indexer } from "../../src/core/indexer.js";
import { MemoryRecordStore } from "../../src/core/record-store.js";
import { CancelledError, ConfigError, ServiceError } from "../../src/errors.js";
import { LLMSummarizationClient, type SummarizationClient } from "../../src/summarization/client.js";
import { FakeSummarizer, MockLLMClient, createTree, removeTree, tick, writeTree } from "../helpers.js";

const FILES = {
	"src/parser.rs": "pub fn parse() {}",
	"src/network.rs": "pub fn connect() {}",
	"README.md": "# Demo",
	"node_modules/pkg/index.js": "module.exports = 1;",
	"notes.txt": "not indexed",
};

const FIXED_NOW = new Date("2024-05-01T12:00:00.000Z");

describe("Indexer", () => {
	let root: string;
	let store: IndexStore;

	beforeEach(() => {
		root = createTree(FILES);
		store = new IndexStore(new MemoryRecordStore());
	});

	afterEach(() => {
		store.close();
		removeTree(root);
	});

	function indexer(summarizer: SummarizationClient = new FakeSummarizer(), excludePatterns: string[] = []) {
		return new Indexer({ store, summarizer, excludePatterns, now: () => FIXED_NOW });
	}

	test("discovers eligible files sorted by path", () => {
		expect(indexer().discoverFiles(root, ["rs", ".md"])).toEqual([
			"README.md",
			"src/network.rs",
			"src/parser.rs",
		]);
	});

	test("exclude patterns apply to relative paths", () => {
		expect(indexer(new FakeSummarizer(), ["**/*.md"]).discoverFiles(root, ["rs", "md"])).toEqual([
			"src/network.rs",
			"src/parser.rs",
		]);
	});

	test("first run summarizes every eligible file", async () => {
		const summarizer = new FakeSummarizer();
		const report = await indexer(summarizer).run({ root, extensions: ["rs", "md"], concurrency: 2 });

		expect(report).toMatchObject({ discovered: 3, unchanged: 0, indexed: 3, failed: [], cancelled: false });
		expect(summarizer.summarized.sort()).toEqual(["README.md", "src/network.rs", "src/parser.rs"]);

		expect(store.get("src/parser.rs")).toEqual({
			path: "src/parser.rs",
			fingerprint: fingerprint("pub fn parse() {}"),
			byteLength: 17,
			// "Summary of src/parser.rs." is 25 characters
			tokenEstimate: 7,
			summary: "Summary of src/parser.rs.",
			language: "rust",
			lastIndexedAt: "2024-05-01T12:00:00.000Z",
			status: { state: "indexed" },
		});
		expect(store.getMetadata("root")).toBe(root);
		expect(store.getMetadata("lastIndexedAt")).toBe("2024-05-01T12:00:00.000Z");
	});

	test("second run over an unchanged tree makes no LLM calls", async () => {
		await indexer().run({ root, extensions: ["rs", "md"], concurrency: 2 });
		const before = store.snapshot().records;

		const summarizer = new FakeSummarizer();
		const report = await indexer(summarizer).run({ root, extensions: ["rs", "md"], concurrency: 2 });

		expect(summarizer.summarized).toEqual([]);
		expect(report).toMatchObject({ discovered: 3, unchanged: 3, indexed: 0, failed: [] });
		expect(store.snapshot().records).toEqual(before);
	});

	test("only the changed file is summarized again", async () => {
		await indexer().run({ root, extensions: ["rs", "md"], concurrency: 2 });
		writeTree(root, { "src/parser.rs": "pub fn parse() { todo() }" });

		const summarizer = new FakeSummarizer((request) => `Updated ${request.path}.`);
		const report = await indexer(summarizer).run({ root, extensions: ["rs", "md"], concurrency: 2 });

		expect(summarizer.summarized).toEqual(["src/parser.rs"]);
		expect(report.indexed).toBe(1);
		expect(report.unchanged).toBe(2);
		expect(store.get("src/parser.rs")?.summary).toBe("Updated src/parser.rs.");
		expect(store.get("src/parser.rs")?.fingerprint).toBe(fingerprint("pub fn parse() { todo() }"));
	});

	test("force re-summarizes unchanged files", async () => {
		await indexer().run({ root, extensions: ["rs"], concurrency: 1 });
		const summarizer = new FakeSummarizer();
		const report = await indexer(summarizer).run({ root, extensions: ["rs"], concurrency: 1, force: true });
		expect(report.indexed).toBe(2);
		expect(summarizer.summarized).toEqual(["src/network.rs", "src/parser.rs"]);
	});

	test("one failed summary does not affect the other files", async () => {
		const summarizer = new FakeSummarizer((request) => {
			if (request.path === "src/network.rs") {
				throw new ServiceError("rate limited", { transient: true, status: 429 });
			}
			return `Summary of ${request.path}.`;
		});

		const report = await indexer(summarizer).run({ root, extensions: ["rs", "md"], concurrency: 3 });

		expect(report.indexed).toBe(2);
		expect(report.failed).toEqual([{ path: "src/network.rs", reason: "rate limited" }]);
		expect(store.get("src/network.rs")).toMatchObject({
			summary: "",
			tokenEstimate: 0,
			fingerprint: fingerprint("pub fn connect() {}"),
			status: { state: "failed", reason: "rate limited" },
		});
		expect(store.get("src/parser.rs")?.status).toEqual({ state: "indexed" });
	});

	test("a blank summary fails that file and the run completes", async () => {
		const summarizer = new FakeSummarizer((request) =>
			request.path === "src/network.rs" ? "   " : `Summary of ${request.path}.`,
		);

		const report = await indexer(summarizer).run({ root, extensions: ["rs", "md"], concurrency: 2 });

		expect(report).toMatchObject({
			indexed: 2,
			failed: [{ path: "src/network.rs", reason: "Empty summary returned for src/network.rs" }],
			cancelled: false,
		});
		expect(store.get("src/network.rs")?.status).toEqual({
			state: "failed",
			reason: "Empty summary returned for src/network.rs",
		});
		expect(store.get("src/parser.rs")?.status).toEqual({ state: "indexed" });
		expect(store.getMetadata("lastIndexedAt")).toBe("2024-05-01T12:00:00.000Z");
	});

	test("a file that cannot be read is recorded as failed", async () => {
		const parserPath = join(root, "src/parser.rs");
		const summarizer = new FakeSummarizer((request) => {
			// Removed after discovery, before its turn in the pool
			if (request.path === "src/network.rs") unlinkSync(parserPath);
			return `Summary of ${request.path}.`;
		});

		const report = await indexer(summarizer).run({ root, extensions: ["rs", "md"], concurrency: 1 });

		const reason = `Cannot read src/parser.rs: ENOENT: no such file or directory, open '${parserPath}'`;
		expect(summarizer.summarized).toEqual(["README.md", "src/network.rs"]);
		expect(report).toMatchObject({ indexed: 2, failed: [{ path: "src/parser.rs", reason }] });
		expect(store.get("src/parser.rs")).toMatchObject({
			fingerprint: "",
			byteLength: 0,
			summary: "",
			status: { state: "failed", reason },
		});
		expect(store.get("src/network.rs")?.status).toEqual({ state: "indexed" });
	});

	test("a failed file is retried on the next run", async () => {
		let fail = true;
		const summarizer = new FakeSummarizer((request) => {
			if (fail && request.path === "src/network.rs") throw new Error("connection reset");
			return `Summary of ${request.path}.`;
		});

		await indexer(summarizer).run({ root, extensions: ["rs"], concurrency: 1 });
		fail = false;
		const report = await indexer(summarizer).run({ root, extensions: ["rs"], concurrency: 1 });

		expect(report).toMatchObject({ unchanged: 1, indexed: 1, failed: [] });
		expect(store.get("src/network.rs")?.status).toEqual({ state: "indexed" });
	});

	test("a cancelled summary is reported but not recorded", async () => {
		const summarizer = new FakeSummarizer((request) => {
			if (request.path === "src/network.rs") throw new CancelledError("Summarizing src/network.rs");
			return `Summary of ${request.path}.`;
		});

		const report = await indexer(summarizer).run({ root, extensions: ["rs"], concurrency: 1 });

		expect(report.failed).toEqual([
			{ path: "src/network.rs", reason: "Summarizing src/network.rs was cancelled" },
		]);
		expect(store.get("src/network.rs")).toBeUndefined();
	});

	test("sweep removes records for deleted files", async () => {
		await indexer().run({ root, extensions: ["rs", "md"], concurrency: 2 });
		unlinkSync(join(root, "README.md"));

		const report = await indexer().run({ root, extensions: ["rs", "md"], concurrency: 2, sweep: true });

		expect(report.removed).toEqual(["README.md"]);
		expect(store.snapshot().records.map((r) => r.path)).toEqual(["src/network.rs", "src/parser.rs"]);
	});

	test("without sweep, records of deleted files stay", async () => {
		await indexer().run({ root, extensions: ["rs", "md"], concurrency: 2 });
		unlinkSync(join(root, "README.md"));

		const report = await indexer().run({ root, extensions: ["rs", "md"], concurrency: 2 });

		expect(report.removed).toEqual([]);
		expect(store.size()).toBe(3);
	});

	test("never runs more summaries than the concurrency limit", async () => {
		writeTree(root, Object.fromEntries(Array.from({ length: 8 }, (_, i) => [`src/m${i}.rs`, `fn m${i}() {}`])));
		let active = 0;
		let peak = 0;
		const summarizer = new FakeSummarizer(async (request) => {
			active++;
			peak = Math.max(peak, active);
			await new Promise((resolve) => setTimeout(resolve, 20));
			active--;
			return `Summary of ${request.path}.`;
		});

		const report = await indexer(summarizer).run({ root, extensions: ["rs"], concurrency: 3 });

		expect(report.indexed).toBe(10);
		expect(peak).toBeLessThanOrEqual(3);
		expect(peak).toBeGreaterThan(1);
	});

	test("reports progress for every file", async () => {
		const progress: Array<[number, number, string]> = [];
		await indexer().run({
			root,
			extensions: ["rs", "md"],
			concurrency: 1,
			onProgress: (completed, total, path) => progress.push([completed, total, path]),
		});

		expect(progress).toEqual([
			[1, 3, "README.md"],
			[2, 3, "src/network.rs"],
			[3, 3, "src/parser.rs"],
		]);
	});

	test("an aborted run writes nothing and skips the sweep", async () => {
		await indexer().run({ root, extensions: ["rs", "md"], concurrency: 2 });
		unlinkSync(join(root, "README.md"));
		writeTree(root, { "src/parser.rs": "changed" });

		const controller = new AbortController();
		controller.abort();
		const summarizer = new FakeSummarizer();
		const report = await indexer(summarizer).run({
			root,
			extensions: ["rs", "md"],
			concurrency: 2,
			sweep: true,
			signal: controller.signal,
		});

		expect(report.cancelled).toBe(true);
		expect(report.removed).toEqual([]);
		expect(summarizer.summarized).toEqual([]);
		expect(store.get("src/parser.rs")?.summary).toBe("Summary of src/parser.rs.");
		expect(store.size()).toBe(3);
	});

	test("abort mid-run lets in-flight summaries finish", async () => {
		const controller = new AbortController();
		const summarizer = new FakeSummarizer(async (request) => {
			controller.abort();
			await tick();
			return `Summary of ${request.path}.`;
		});

		const report = await indexer(summarizer).run({
			root,
			extensions: ["rs", "md"],
			concurrency: 1,
			signal: controller.signal,
		});

		expect(report.cancelled).toBe(true);
		expect(report.indexed).toBe(1);
		expect(summarizer.summarized).toEqual(["README.md"]);
		expect(store.get("README.md")?.status).toEqual({ state: "indexed" });
	});

	test("invalid arguments are configuration errors", async () => {
		await expect(indexer().run({ root, extensions: ["rs"], concurrency: 0 })).rejects.toBeInstanceOf(ConfigError);
		await expect(indexer().run({ root, extensions: [], concurrency: 1 })).rejects.toBeInstanceOf(ConfigError);
		await expect(
			indexer().run({ root: join(root, "missing"), extensions: ["rs"], concurrency: 1 }),
		).rejects.toBeInstanceOf(ConfigError);
	});

	test("summaries go through the LLM with the file content", async () => {
		const llm = new MockLLMClient(() => "  Parses source text.  ");
		const summarizer = new LLMSummarizationClient(llm);

		const report = await indexer(summarizer).run({ root, extensions: ["rs"], concurrency: 1 });

		expect(report.indexed).toBe(2);
		expect(report.usage).toEqual({ inputTokens: 20, outputTokens: 10, calls: 2 });
		expect(store.get("src/parser.rs")?.summary).toBe("Parses source text.");
		expect(llm.calls[1].messages[0].content).toContain("File: src/parser.rs\n\npub fn parse() {}");
		expect(llm.calls[1].options.purpose).toBe("summarize");
	});
});
