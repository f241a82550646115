import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import {
	DEFAULT_EXCLUDE_PATTERNS,
	DEFAULT_EXTENSIONS,
	ensureIndexDir,
	getExcludePatterns,
	getLLMSpec,
	loadProjectConfig,
	parseGitignore,
	resolveSettings,
	saveProjectConfig,
} from "../../src/config.js";
import { ConfigError } from "../../src/errors.js";
import { createTree, removeTree } from "../helpers.js";

describe("config", () => {
	let home: string;
	let project: string;

	beforeEach(() => {
		home = createTree({});
		project = createTree({});
		vi.stubEnv("REPOLENS_HOME", home);
		vi.stubEnv("REPOLENS_LLM", "");
		vi.stubEnv("REPOLENS_LLM_ENDPOINT", "");
		vi.stubEnv("ANTHROPIC_API_KEY", "");
	});

	afterEach(() => {
		vi.unstubAllEnvs();
		removeTree(home);
		removeTree(project);
	});

	function writeJson(path: string, value: unknown): void {
		mkdirSync(join(path, ".."), { recursive: true });
		writeFileSync(path, JSON.stringify(value));
	}

	test("defaults apply when nothing is configured", () => {
		const settings = resolveSettings(project);

		expect(settings).toEqual({
			maxTokens: 1024,
			temperature: 0.7,
			timeoutMs: 120_000,
			maxRetries: 3,
			concurrency: 4,
			tokenBudget: 8000,
			topK: 5,
			historyTurns: 6,
			historyShare: 0.5,
			overflow: "skip",
			extensions: DEFAULT_EXTENSIONS,
			excludePatterns: DEFAULT_EXCLUDE_PATTERNS,
			indexDir: join(project, ".repolens"),
		});
	});

	test("project config wins over global config, environment over both", () => {
		writeJson(join(home, "config.json"), {
			llm: "ollama/llama3.2",
			maxTokens: 512,
			excludePatterns: ["**/*.gen.rs"],
		});
		writeJson(join(project, "repolens.json"), {
			llm: "a/haiku",
			tokenBudget: 4000,
			overflow: "stop",
			indexDir: "cache",
		});

		expect(resolveSettings(project).llm).toBe("a/haiku");

		vi.stubEnv("REPOLENS_LLM", "a/opus");
		const settings = resolveSettings(project, { topK: 2 });

		expect(settings.llm).toBe("a/opus");
		expect(settings.maxTokens).toBe(512);
		expect(settings.tokenBudget).toBe(4000);
		expect(settings.overflow).toBe("stop");
		expect(settings.topK).toBe(2);
		expect(settings.indexDir).toBe(join(project, "cache"));
		expect(settings.excludePatterns).toContain("**/*.gen.rs");
	});

	test("the API key comes from the environment first", () => {
		writeJson(join(home, "config.json"), { anthropicApiKey: "test-secret-global" });
		expect(resolveSettings(project).anthropicApiKey).toBe("test-secret-global");

		vi.stubEnv("ANTHROPIC_API_KEY", "test-secret");
		expect(resolveSettings(project).anthropicApiKey).toBe("test-secret");
	});

	test("an invalid project config names the field", () => {
		writeJson(join(project, "repolens.json"), { tokenBudget: -5 });
		expect(() => resolveSettings(project)).toThrow(ConfigError);
		expect(() => resolveSettings(project)).toThrow(/tokenBudget/);
	});

	test("an invalid global config names the field", () => {
		writeJson(join(home, "config.json"), { temperature: 3 });
		expect(() => resolveSettings(project)).toThrow(/temperature/);
	});

	test("invalid overrides are rejected", () => {
		expect(() => resolveSettings(project, { historyShare: 2 })).toThrow(/historyShare/);
		expect(() => resolveSettings(project, { extensions: [] })).toThrow(ConfigError);
	});

	test("malformed JSON is a configuration error", () => {
		writeFileSync(join(project, "repolens.json"), "{ not json");
		expect(() => loadProjectConfig(project)).toThrow(/Cannot parse/);
	});

	test("the project .env is loaded", () => {
		const previous = process.env.REPOLENS_LLM;
		delete process.env.REPOLENS_LLM;
		try {
			writeFileSync(join(project, ".env"), "REPOLENS_LLM=lmstudio/qwen2.5-coder\n");
			expect(resolveSettings(project).llm).toBe("lmstudio/qwen2.5-coder");
		} finally {
			delete process.env.REPOLENS_LLM;
			if (previous !== undefined) process.env.REPOLENS_LLM = previous;
		}
	});

	test("saveProjectConfig merges with the existing file", () => {
		saveProjectConfig(project, { topK: 3 });
		saveProjectConfig(project, { tokenBudget: 100 });

		expect(loadProjectConfig(project)).toEqual({ topK: 3, tokenBudget: 100 });
		expect(JSON.parse(readFileSync(join(project, ".repolens", "config.json"), "utf-8"))).toEqual({
			topK: 3,
			tokenBudget: 100,
		});
	});

	test("ensureIndexDir tags the directory as a cache", () => {
		const dir = join(project, ".repolens");
		ensureIndexDir(dir);
		expect(readFileSync(join(dir, "CACHEDIR.TAG"), "utf-8").startsWith("Signature: 8a477f597d28d172789f06886806bc55")).toBe(
			true,
		);
	});

	test("getLLMSpec follows the environment", () => {
		vi.stubEnv("REPOLENS_LLM", "ollama/qwen2.5-coder");
		expect(getLLMSpec(project)).toEqual({
			provider: "local",
			model: "qwen2.5-coder",
			endpoint: "http://localhost:11434/v1",
			displayName: "qwen2.5-coder (Local)",
		});
	});

	test("getLLMSpec falls back to the default", () => {
		expect(getLLMSpec(project).model).toBe("claude-sonnet-4-5");
	});

	describe("gitignore", () => {
		test("translates gitignore lines into globs", () => {
			writeFileSync(
				join(project, ".gitignore"),
				"# comment\n\nnode_modules/\n/build/\n*.log\ndocs/generated\n!keep.log\n",
			);

			expect(parseGitignore(project)).toEqual([
				"node_modules/**",
				"**/node_modules/**",
				"build/**",
				"*.log",
				"**/*.log",
				"*.log/**",
				"**/*.log/**",
				"docs/generated",
				"docs/generated/**",
			]);
		});

		test("no .gitignore means no patterns", () => {
			expect(parseGitignore(project)).toEqual([]);
		});

		test("useGitignore: false leaves gitignore patterns out", () => {
			writeFileSync(join(project, ".gitignore"), "secrets.txt\n");

			expect(getExcludePatterns(project)).toContain("**/secrets.txt");
			expect(getExcludePatterns(project, { excludePatterns: [] }, { useGitignore: false })).toEqual(
				DEFAULT_EXCLUDE_PATTERNS,
			);
		});
	});

	test("the global config directory comes from REPOLENS_HOME", () => {
		writeJson(join(home, "config.json"), { maxRetries: 5 });
		expect(existsSync(join(home, "config.json"))).toBe(true);
		expect(resolveSettings(project).maxRetries).toBe(5);
	});
});
