/**
 * Core types for repolens
 */

// ============================================================================
// Index Record Types
// ============================================================================

/** Indexing status of a single file */
export type IndexStatus =
	| { state: "pending" }
	| { state: "indexed" }
	| { state: "failed"; reason: string };

export type IndexState = IndexStatus["state"];

/**
 * Latest indexed state of one file. At most one record exists per path.
 */
export interface FileRecord {
	/** Path relative to the indexed root, always "/"-separated */
	path: string;
	/** SHA-256 hex digest of the raw file bytes */
	fingerprint: string;
	/** Size of the file in bytes */
	byteLength: number;
	/** Estimated token count of the summary */
	tokenEstimate: number;
	/** Generated natural-language summary (empty unless indexed) */
	summary: string;
	/** Detected programming language */
	language: string;
	/** ISO timestamp of the last indexing attempt */
	lastIndexedAt: string;
	status: IndexStatus;
}

/**
 * Immutable view of every record at one instant.
 */
export interface IndexSnapshot {
	readonly records: readonly FileRecord[];
	/** ISO timestamp at which the snapshot was taken */
	readonly takenAt: string;
}

// ============================================================================
// Indexing Types
// ============================================================================

/** Progress callback (inFlight = tasks currently being summarized) */
export type IndexProgressCallback = (
	completed: number,
	total: number,
	path: string,
	inFlight: number,
) => void;

export interface IndexRunOptions {
	/** Root directory of the tree to index */
	root: string;
	/** File extensions to include, with or without the leading dot */
	extensions: Iterable<string>;
	/** Maximum summarization tasks in flight */
	concurrency: number;
	/** Stops admitting new tasks once aborted */
	signal?: AbortSignal;
	/** Remove records whose file disappeared from the tree */
	sweep?: boolean;
	/** Re-summarize every file regardless of fingerprint */
	force?: boolean;
	onProgress?: IndexProgressCallback;
}

export interface IndexRunReport {
	/** Eligible files found under the root */
	discovered: number;
	/** Files skipped because their fingerprint matched an indexed record */
	unchanged: number;
	/** Files summarized successfully in this run */
	indexed: number;
	/** Files that failed, with reasons */
	failed: Array<{ path: string; reason: string }>;
	/** Records removed by the sweep */
	removed: string[];
	/** Whether the run was cut short by its abort signal */
	cancelled: boolean;
	durationMs: number;
	/** Accumulated LLM usage during the run (if reported by provider) */
	usage?: LLMUsageStats;
}

// ============================================================================
// Retrieval Types
// ============================================================================

export interface RankedCandidate {
	path: string;
	/** Normalized relevance in (0, 1] */
	score: number;
	summary: string;
	tokenEstimate: number;
	lastIndexedAt: string;
}

/**
 * Relevance scorer. Implementations must be deterministic and return 0
 * for documents with no overlap with the query.
 */
export interface Scorer {
	/** Prepare a query once per rank call */
	prepare(query: string): PreparedQuery;
	/** Score one record against a prepared query, in [0, 1] */
	score(query: PreparedQuery, record: FileRecord): number;
}

export interface PreparedQuery {
	raw: string;
	terms: ReadonlySet<string>;
}

// ============================================================================
// Conversation Types
// ============================================================================

export type TurnRole = "user" | "assistant";

export interface ConversationTurn {
	/** Position in the session, starting at 0 with no gaps */
	index: number;
	role: TurnRole;
	text: string;
	/** Files included as context when this turn was produced */
	contextPaths: string[];
	/** ISO timestamp */
	createdAt: string;
}

export type SessionState = "empty" | "active";

export interface SessionHeader {
	id: string;
	title: string;
	/** Project the session was started from */
	projectPath?: string;
	createdAt: string;
}

/** Overflow behavior when a candidate does not fit the remaining budget */
export type OverflowPolicy = "skip" | "stop";

export type ContextStyle = "markdown" | "xml" | "plain";

export interface ContextFile {
	path: string;
	summary: string;
	tokenEstimate: number;
}

/**
 * The bounded bundle sent with a query: what the model actually saw.
 */
export interface ContextPayload {
	files: ContextFile[];
	history: ConversationTurn[];
	/** Recent turns that were dropped to fit the history slice */
	droppedHistoryTurns: number;
	/** History tokens plus file tokens */
	tokenEstimate: number;
	tokenBudget: number;
}

export interface AssistantReply {
	text: string;
	/** Files the answer was based on, in rank order */
	contextPaths: string[];
	payload: ContextPayload;
	model: string;
	usage?: LLMResponse["usage"];
}

// ============================================================================
// LLM Types
// ============================================================================

/** Supported LLM providers */
export type LLMProvider = "anthropic" | "local";

/** Message in LLM conversation */
export interface LLMMessage {
	role: "user" | "assistant" | "system";
	content: string;
}

/** Response from LLM */
export interface LLMResponse {
	/** Generated content */
	content: string;
	/** Model that generated the response */
	model: string;
	/** Usage statistics */
	usage?: {
		inputTokens: number;
		outputTokens: number;
	};
}

/** Options for LLM generation */
export interface LLMGenerateOptions {
	/** Model to use (overrides default) */
	model?: string;
	/** Temperature for generation (0-1) */
	temperature?: number;
	/** Maximum tokens to generate */
	maxTokens?: number;
	/** System prompt */
	systemPrompt?: string;
	/** Abort signal for cancellation */
	abortSignal?: AbortSignal;
	/** Short label recorded in the API call log */
	purpose?: string;
}

/** Accumulated LLM usage stats */
export interface LLMUsageStats {
	inputTokens: number;
	outputTokens: number;
	calls: number;
}

/**
 * LLM client interface
 * All LLM providers must implement this interface
 */
export interface ILLMClient {
	/** Generate completion from messages */
	complete(messages: LLMMessage[], options?: LLMGenerateOptions): Promise<LLMResponse>;
	/** Get the provider being used */
	getProvider(): LLMProvider;
	/** Get the model being used */
	getModel(): string;
	/** Get accumulated usage since last reset */
	getAccumulatedUsage(): LLMUsageStats;
	/** Reset accumulated usage counter */
	resetAccumulatedUsage(): void;
}

// ============================================================================
// Configuration Types
// ============================================================================

export interface RateLimitConfig {
	requestsPerMinute?: number;
	tokensPerMinute?: number;
	tokensPerDay?: number;
}

export interface GlobalConfig {
	/** Unified LLM spec (e.g., "a/sonnet", "ollama/llama3.2") */
	llm?: string;
	/** LLM endpoint URL (for local providers) */
	llmEndpoint?: string;
	/** Anthropic API key */
	anthropicApiKey?: string;
	/** Global exclude patterns */
	excludePatterns: string[];
	/** Maximum tokens the model may generate per call */
	maxTokens?: number;
	temperature?: number;
	/** Per-call timeout in ms */
	timeoutMs?: number;
	/** Attempts per call, including the first */
	maxRetries?: number;
	rateLimit?: RateLimitConfig;
}

export interface ProjectConfig {
	/** Override LLM spec for this project */
	llm?: string;
	/** File extensions to index */
	extensions?: string[];
	/** Additional exclude patterns (glob patterns) */
	excludePatterns?: string[];
	/** Use .gitignore patterns for exclusion (default: true) */
	useGitignore?: boolean;
	/** Custom index directory path (default: .repolens) */
	indexDir?: string;
	/** Maximum concurrent summarization tasks */
	concurrency?: number;
	/** Token budget of one chat request */
	tokenBudget?: number;
	/** Candidates kept by the retriever */
	topK?: number;
	/** Recent turns considered for context */
	historyTurns?: number;
	/** Share of the budget reserved for history (0-1) */
	historyShare?: number;
	overflow?: OverflowPolicy;
}

/** Fully resolved settings used to wire the components */
export interface ResolvedSettings {
	llm?: string;
	llmEndpoint?: string;
	anthropicApiKey?: string;
	maxTokens: number;
	temperature: number;
	timeoutMs: number;
	maxRetries: number;
	rateLimit?: RateLimitConfig;
	extensions: string[];
	excludePatterns: string[];
	indexDir: string;
	concurrency: number;
	tokenBudget: number;
	topK: number;
	historyTurns: number;
	historyShare: number;
	overflow: OverflowPolicy;
}
