/**
 * Configuration management for repolens
 *
 * Handles both global config (~/.repolens/config.json) and
 * project-specific config (repolens.json or .repolens/config.json).
 * Environment variables (optionally loaded from the project's .env)
 * override both.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { isAbsolute, join } from "node:path";
import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import { ConfigError, errorMessage } from "./errors.js";
import { LLMResolver, type LLMSpec } from "./llm/resolver.js";
import type { GlobalConfig, ProjectConfig, ResolvedSettings } from "./types.js";

// ============================================================================
// Constants
// ============================================================================

/** Project config directory name (also the default index directory) */
export const PROJECT_CONFIG_DIR = ".repolens";

/** Project config file name (inside .repolens/) */
export const PROJECT_CONFIG_FILE = "config.json";

/** Project config file at root (simpler alternative) */
export const PROJECT_ROOT_CONFIG_FILE = "repolens.json";

/** Index database file name */
export const INDEX_DB_FILE = "index.db";

/** API call log file name */
export const API_CALL_LOG_FILE = "api-calls.log";

/** Default LLM spec when nothing is configured */
export const DEFAULT_LLM_SPEC = "a/sonnet";

/** Extensions indexed when the project does not say otherwise */
export const DEFAULT_EXTENSIONS = ["rs", "toml", "md", "py", "go", "ts", "js"];

/**
 * Default exclude patterns.
 * Patterns use ** prefix to match at any depth in the tree.
 */
export const DEFAULT_EXCLUDE_PATTERNS = [
	// Dependencies
	"**/node_modules/**",
	"**/vendor/**",
	"**/.pnpm/**",

	// Build outputs
	"**/dist/**",
	"**/build/**",
	"**/out/**",
	"**/target/**",
	"**/.next/**",
	"**/.cache/**",

	// Version control & editors
	"**/.git/**",
	"**/.hg/**",
	"**/.svn/**",
	"**/.idea/**",
	"**/.vscode/**",

	// Python
	"**/__pycache__/**",
	"**/.venv/**",
	"**/venv/**",

	// Generated & lock files
	"**/*.min.js",
	"**/*.map",
	"**/*.lock",
	"**/package-lock.json",
	"**/go.sum",

	// Misc
	"**/coverage/**",
	"**/.repolens/**",
	"**/.DS_Store",
];

// ============================================================================
// Environment Variables
// ============================================================================

export const ENV = {
	ANTHROPIC_API_KEY: "ANTHROPIC_API_KEY",
	/** Unified LLM spec (e.g., "a/sonnet", "ollama/llama3.2") */
	REPOLENS_LLM: "REPOLENS_LLM",
	/** Endpoint of a local OpenAI-compatible server */
	REPOLENS_LLM_ENDPOINT: "REPOLENS_LLM_ENDPOINT",
	/** Overrides the global config directory (~/.repolens) */
	REPOLENS_HOME: "REPOLENS_HOME",
	REPOLENS_DEBUG: "REPOLENS_DEBUG",
} as const;

// ============================================================================
// Schemas
// ============================================================================

const rateLimitSchema = z.object({
	requestsPerMinute: z.number().int().positive().optional(),
	tokensPerMinute: z.number().int().positive().optional(),
	tokensPerDay: z.number().int().positive().optional(),
});

const globalConfigSchema = z.object({
	llm: z.string().min(1).optional(),
	llmEndpoint: z.string().url().optional(),
	anthropicApiKey: z.string().min(1).optional(),
	excludePatterns: z.array(z.string()).default([]),
	maxTokens: z.number().int().positive().optional(),
	temperature: z.number().min(0).max(1).optional(),
	timeoutMs: z.number().int().positive().optional(),
	maxRetries: z.number().int().min(1).optional(),
	rateLimit: rateLimitSchema.optional(),
});

const projectConfigSchema = z.object({
	llm: z.string().min(1).optional(),
	extensions: z.array(z.string().min(1)).optional(),
	excludePatterns: z.array(z.string()).optional(),
	useGitignore: z.boolean().optional(),
	indexDir: z.string().min(1).optional(),
	concurrency: z.number().int().min(1).optional(),
	tokenBudget: z.number().int().positive().optional(),
	topK: z.number().int().min(1).optional(),
	historyTurns: z.number().int().min(0).optional(),
	historyShare: z.number().min(0).max(1).optional(),
	overflow: z.enum(["skip", "stop"]).optional(),
});

const settingsSchema = z.object({
	llm: z.string().min(1).optional(),
	llmEndpoint: z.string().url().optional(),
	anthropicApiKey: z.string().min(1).optional(),
	maxTokens: z.number().int().positive(),
	temperature: z.number().min(0).max(1),
	timeoutMs: z.number().int().positive(),
	maxRetries: z.number().int().min(1),
	rateLimit: rateLimitSchema.optional(),
	extensions: z.array(z.string().min(1)).min(1),
	excludePatterns: z.array(z.string()),
	indexDir: z.string().min(1),
	concurrency: z.number().int().min(1),
	tokenBudget: z.number().int().positive(),
	topK: z.number().int().min(1),
	historyTurns: z.number().int().min(0),
	historyShare: z.number().min(0).max(1),
	overflow: z.enum(["skip", "stop"]),
});

/** Defaults for every setting not taken from a file or the environment */
export const DEFAULT_SETTINGS = {
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
} as const satisfies Partial<ResolvedSettings>;

function describeIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
		.join("; ");
}

function readJsonFile(path: string): unknown {
	try {
		return JSON.parse(readFileSync(path, "utf-8"));
	} catch (error) {
		throw new ConfigError(`Cannot parse ${path}: ${errorMessage(error)}`, { path }, error);
	}
}

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Global config directory. REPOLENS_HOME takes precedence over ~/.repolens.
 */
export function getGlobalConfigDir(): string {
	return process.env[ENV.REPOLENS_HOME] || join(homedir(), PROJECT_CONFIG_DIR);
}

export function getGlobalConfigPath(): string {
	return join(getGlobalConfigDir(), PROJECT_CONFIG_FILE);
}

/**
 * Load global configuration from ~/.repolens/config.json
 */
export function loadGlobalConfig(): GlobalConfig {
	const path = getGlobalConfigPath();
	if (!existsSync(path)) {
		return { excludePatterns: [] };
	}

	const parsed = globalConfigSchema.safeParse(readJsonFile(path));
	if (!parsed.success) {
		throw new ConfigError(`Invalid global config ${path}: ${describeIssues(parsed.error)}`, {
			path,
			fields: parsed.error.issues.map((i) => i.path.join(".")),
		});
	}
	return parsed.data;
}

/**
 * Load project configuration
 * Checks: 1) repolens.json (root), 2) .repolens/config.json
 */
export function loadProjectConfig(projectPath: string): ProjectConfig | null {
	const candidates = [
		join(projectPath, PROJECT_ROOT_CONFIG_FILE),
		join(projectPath, PROJECT_CONFIG_DIR, PROJECT_CONFIG_FILE),
	];

	for (const path of candidates) {
		if (!existsSync(path)) continue;

		const parsed = projectConfigSchema.safeParse(readJsonFile(path));
		if (!parsed.success) {
			throw new ConfigError(`Invalid project config ${path}: ${describeIssues(parsed.error)}`, {
				path,
				fields: parsed.error.issues.map((i) => i.path.join(".")),
			});
		}
		return parsed.data;
	}

	return null;
}

/**
 * Save project configuration to .repolens/config.json
 */
export function saveProjectConfig(projectPath: string, config: Partial<ProjectConfig>): void {
	const configDir = join(projectPath, PROJECT_CONFIG_DIR);
	if (!existsSync(configDir)) {
		mkdirSync(configDir, { recursive: true });
	}

	const existing = loadProjectConfig(projectPath) ?? {};
	const merged = { ...existing, ...config };
	writeFileSync(join(configDir, PROJECT_CONFIG_FILE), JSON.stringify(merged, null, 2), "utf-8");
}

/**
 * Load <projectPath>/.env into process.env. Variables already set win.
 */
export function loadEnvFile(projectPath: string): void {
	const envPath = join(projectPath, ".env");
	if (existsSync(envPath)) {
		loadDotenv({ path: envPath });
	}
}

// ============================================================================
// Exclusion Patterns
// ============================================================================

/**
 * Parse .gitignore file and return glob patterns
 */
export function parseGitignore(projectPath: string): string[] {
	const gitignorePath = join(projectPath, ".gitignore");
	if (!existsSync(gitignorePath)) {
		return [];
	}

	const patterns: string[] = [];
	for (const line of readFileSync(gitignorePath, "utf-8").split("\n")) {
		const trimmed = line.trim();

		// Negation is not supported
		if (!trimmed || trimmed.startsWith("#") || trimmed.startsWith("!")) {
			continue;
		}

		let pattern = trimmed;
		if (pattern.endsWith("/")) {
			pattern = pattern.slice(0, -1);
			if (!pattern.includes("/")) {
				patterns.push(`${pattern}/**`, `**/${pattern}/**`);
				continue;
			}
			patterns.push(`${pattern.replace(/^\//, "")}/**`);
			continue;
		}

		// A bare name matches a file or directory anywhere
		if (!pattern.includes("/")) {
			patterns.push(pattern, `**/${pattern}`, `${pattern}/**`, `**/${pattern}/**`);
			continue;
		}

		if (pattern.startsWith("/")) {
			pattern = pattern.slice(1);
		}
		patterns.push(pattern);
		if (!pattern.endsWith("**")) {
			patterns.push(`${pattern}/**`);
		}
	}

	return patterns;
}

/**
 * Get all exclude patterns for a project
 * Combines: defaults + global config + project config + gitignore (if enabled)
 */
export function getExcludePatterns(
	projectPath: string,
	global: GlobalConfig = loadGlobalConfig(),
	project: ProjectConfig | null = loadProjectConfig(projectPath),
): string[] {
	const patterns = new Set<string>(DEFAULT_EXCLUDE_PATTERNS);

	for (const p of global.excludePatterns) {
		patterns.add(p);
	}
	for (const p of project?.excludePatterns ?? []) {
		patterns.add(p);
	}

	if (project?.useGitignore !== false) {
		for (const p of parseGitignore(projectPath)) {
			patterns.add(p);
		}
	}

	return Array.from(patterns);
}

// ============================================================================
// Project Paths
// ============================================================================

/**
 * Get the index directory for a project
 * Respects custom indexDir from project config
 */
export function getIndexDir(
	projectPath: string,
	project: ProjectConfig | null = loadProjectConfig(projectPath),
): string {
	if (project?.indexDir) {
		return isAbsolute(project.indexDir) ? project.indexDir : join(projectPath, project.indexDir);
	}
	return join(projectPath, PROJECT_CONFIG_DIR);
}

/**
 * Ensure the index directory exists and is tagged as a cache directory
 */
export function ensureIndexDir(indexDir: string): void {
	if (!existsSync(indexDir)) {
		mkdirSync(indexDir, { recursive: true });
	}

	const cacheTagPath = join(indexDir, "CACHEDIR.TAG");
	if (!existsSync(cacheTagPath)) {
		writeFileSync(
			cacheTagPath,
			"Signature: 8a477f597d28d172789f06886806bc55\n# This file marks the directory as a cache directory.\n",
			"utf-8",
		);
	}
}

// ============================================================================
// LLM Configuration
// ============================================================================

/**
 * Get Anthropic API key from environment or config
 */
export function getAnthropicApiKey(global: GlobalConfig = loadGlobalConfig()): string | undefined {
	return process.env[ENV.ANTHROPIC_API_KEY] || global.anthropicApiKey;
}

/**
 * Get unified LLM spec from environment or config.
 *
 * Priority: REPOLENS_LLM env > project config llm > global config llm > default (a/sonnet)
 */
export function getLLMSpec(projectPath?: string): LLMSpec {
	const envSpec = process.env[ENV.REPOLENS_LLM];
	if (envSpec) {
		return LLMResolver.parseSpec(envSpec);
	}

	if (projectPath) {
		const projectConfig = loadProjectConfig(projectPath);
		if (projectConfig?.llm) {
			return LLMResolver.parseSpec(projectConfig.llm);
		}
	}

	const globalConfig = loadGlobalConfig();
	return LLMResolver.parseSpec(globalConfig.llm ?? DEFAULT_LLM_SPEC);
}

// ============================================================================
// Settings Resolution
// ============================================================================

/**
 * Resolve every setting for a project.
 *
 * Layering (lowest to highest): defaults, global config, project config,
 * environment (after loading the project's .env), explicit overrides.
 *
 * @throws ConfigError listing every invalid field
 */
export function resolveSettings(
	projectPath: string,
	overrides: Partial<ResolvedSettings> = {},
): ResolvedSettings {
	loadEnvFile(projectPath);

	const global = loadGlobalConfig();
	const project = loadProjectConfig(projectPath);

	const candidate = {
		...DEFAULT_SETTINGS,
		llm: process.env[ENV.REPOLENS_LLM] || project?.llm || global.llm,
		llmEndpoint: process.env[ENV.REPOLENS_LLM_ENDPOINT] || global.llmEndpoint,
		anthropicApiKey: getAnthropicApiKey(global),
		maxTokens: global.maxTokens ?? DEFAULT_SETTINGS.maxTokens,
		temperature: global.temperature ?? DEFAULT_SETTINGS.temperature,
		timeoutMs: global.timeoutMs ?? DEFAULT_SETTINGS.timeoutMs,
		maxRetries: global.maxRetries ?? DEFAULT_SETTINGS.maxRetries,
		rateLimit: global.rateLimit,
		extensions: project?.extensions ?? DEFAULT_EXTENSIONS,
		excludePatterns: getExcludePatterns(projectPath, global, project),
		indexDir: getIndexDir(projectPath, project),
		concurrency: project?.concurrency ?? DEFAULT_SETTINGS.concurrency,
		tokenBudget: project?.tokenBudget ?? DEFAULT_SETTINGS.tokenBudget,
		topK: project?.topK ?? DEFAULT_SETTINGS.topK,
		historyTurns: project?.historyTurns ?? DEFAULT_SETTINGS.historyTurns,
		historyShare: project?.historyShare ?? DEFAULT_SETTINGS.historyShare,
		overflow: project?.overflow ?? DEFAULT_SETTINGS.overflow,
		...overrides,
	};

	const parsed = settingsSchema.safeParse(candidate);
	if (!parsed.success) {
		throw new ConfigError(`Invalid settings: ${describeIssues(parsed.error)}`, {
			fields: parsed.error.issues.map((i) => i.path.join(".")),
		});
	}
	return parsed.data;
}
