/**
 * repolens - codebase indexing, retrieval and chat
 *
 * createRepoLens() wires every component for one project with explicit
 * handles; the individual classes are exported for custom assembly.
 */

import { join } from "node:path";
import {
	API_CALL_LOG_FILE,
	DEFAULT_LLM_SPEC,
	INDEX_DB_FILE,
	ensureIndexDir,
	resolveSettings,
} from "./config.js";
import { IndexStore } from "./core/index-store.js";
import { Indexer } from "./core/indexer.js";
import { MemoryRecordStore, SqliteRecordStore, type RecordStore } from "./core/record-store.js";
import { createDatabaseSync, type SQLiteDatabase } from "./core/sqlite.js";
import { ConversationManager } from "./conversation/manager.js";
import {
	MemoryConversationStore,
	SqliteConversationStore,
	type ConversationStore,
} from "./conversation/store.js";
import { ChatOrchestrator } from "./chat/orchestrator.js";
import { ApiCallLog } from "./llm/call-log.js";
import { RateLimiter } from "./llm/rate-limiter.js";
import { LLMResolver } from "./llm/resolver.js";
import { ContextAssembler } from "./retrieval/context-assembler.js";
import { Retriever } from "./retrieval/retriever.js";
import {
	DEFAULT_MAX_FILE_TOKENS,
	LLMSummarizationClient,
	SUMMARY_PROMPT_RESERVE,
	type SummarizationClient,
} from "./summarization/client.js";
import type {
	ContextStyle,
	ILLMClient,
	IndexRunOptions,
	IndexRunReport,
	ResolvedSettings,
	Scorer,
} from "./types.js";

// ============================================================================
// Re-exports
// ============================================================================

export * from "./types.js";
export * from "./errors.js";
export {
	DEFAULT_EXCLUDE_PATTERNS,
	DEFAULT_EXTENSIONS,
	DEFAULT_SETTINGS,
	ENV,
	getExcludePatterns,
	getIndexDir,
	getLLMSpec,
	loadGlobalConfig,
	loadProjectConfig,
	parseGitignore,
	resolveSettings,
	saveProjectConfig,
} from "./config.js";
export { createLogger, type Logger } from "./logger.js";
export { fingerprint, needsReindex } from "./core/fingerprint.js";
export { detectLanguage } from "./core/language.js";
export { estimateTokens } from "./core/tokens.js";
export { AdmissionGate, runBounded } from "./core/pool.js";
export { IndexStore } from "./core/index-store.js";
export { MemoryRecordStore, SqliteRecordStore, type RecordStore } from "./core/record-store.js";
export { Indexer, createIndexer, type IndexerOptions } from "./core/indexer.js";
export { LexicalScorer, tokenize } from "./retrieval/scorer.js";
export { Retriever, createRetriever } from "./retrieval/retriever.js";
export {
	ContextAssembler,
	createContextAssembler,
	type ContextAssemblerOptions,
} from "./retrieval/context-assembler.js";
export {
	ConversationManager,
	ConversationSession,
	createConversationManager,
} from "./conversation/manager.js";
export {
	MemoryConversationStore,
	SqliteConversationStore,
	type ConversationStore,
} from "./conversation/store.js";
export {
	ChatOrchestrator,
	createChatOrchestrator,
	type AskOptions,
	type AskResult,
} from "./chat/orchestrator.js";
export {
	LLMSummarizationClient,
	createSummarizationClient,
	type SummarizationClient,
} from "./summarization/client.js";
export { BaseLLMClient, createLLMClient, type LLMClientOptions } from "./llm/client.js";
export { LLMResolver, type LLMSpec } from "./llm/resolver.js";
export { RateLimiter } from "./llm/rate-limiter.js";
export { ApiCallLog, type ApiCallEntry } from "./llm/call-log.js";

// ============================================================================
// Factory
// ============================================================================

export interface RepoLensOptions {
	/** Settings that win over config files and the environment */
	settings?: Partial<ResolvedSettings>;
	/** Use this LLM client instead of resolving one from settings */
	llm?: ILLMClient;
	/** Keep the index and conversations in memory (nothing written to disk) */
	inMemory?: boolean;
	/** Replace the lexical scorer */
	scorer?: Scorer;
	contextStyle?: ContextStyle;
}

export interface RepoLens {
	readonly projectPath: string;
	readonly settings: ResolvedSettings;
	readonly store: IndexStore;
	readonly indexer: Indexer;
	readonly retriever: Retriever;
	readonly assembler: ContextAssembler;
	readonly conversations: ConversationManager;
	readonly orchestrator: ChatOrchestrator;
	readonly summarizer: SummarizationClient;
	readonly callLog: ApiCallLog;
	/** Index the project with the resolved settings */
	index(options?: Partial<Omit<IndexRunOptions, "root">>): Promise<IndexRunReport>;
	close(): void;
}

/**
 * Wire every component for the project at projectPath.
 *
 * @throws ConfigError when settings are invalid or no LLM can be created
 */
export async function createRepoLens(projectPath: string, options: RepoLensOptions = {}): Promise<RepoLens> {
	const settings = resolveSettings(projectPath, options.settings);

	const callLog = new ApiCallLog({
		filePath: options.inMemory ? undefined : join(settings.indexDir, API_CALL_LOG_FILE),
	});
	const rateLimiter = settings.rateLimit ? new RateLimiter(settings.rateLimit) : undefined;

	// The client is created before the database is opened, so a bad LLM
	// config leaves no handle behind
	const llm =
		options.llm ??
		(await LLMResolver.createClient(settings.llm ?? DEFAULT_LLM_SPEC, {
			apiKey: settings.anthropicApiKey,
			endpoint: settings.llmEndpoint,
			timeoutMs: settings.timeoutMs,
			maxRetries: settings.maxRetries,
			rateLimiter,
			callLog,
		}));

	const summarizer = new LLMSummarizationClient(llm, {
		maxTokens: settings.maxTokens,
		temperature: settings.temperature,
		maxFileTokens: rateLimiter
			? Math.max(1, Math.min(DEFAULT_MAX_FILE_TOKENS, rateLimiter.maxRequestTokens - SUMMARY_PROMPT_RESERVE))
			: undefined,
	});

	let db: SQLiteDatabase | undefined;
	let recordStore: RecordStore;
	let conversationStore: ConversationStore;
	if (options.inMemory) {
		recordStore = new MemoryRecordStore();
		conversationStore = new MemoryConversationStore();
	} else {
		ensureIndexDir(settings.indexDir);
		db = createDatabaseSync(join(settings.indexDir, INDEX_DB_FILE));
		try {
			recordStore = new SqliteRecordStore(db);
			conversationStore = new SqliteConversationStore(db);
		} catch (error) {
			db.close();
			throw error;
		}
	}

	const store = new IndexStore(recordStore);
	const indexer = new Indexer({ store, summarizer, excludePatterns: settings.excludePatterns });
	const retriever = new Retriever(options.scorer);
	const assembler = new ContextAssembler({
		historyTurns: settings.historyTurns,
		historyShare: settings.historyShare,
		overflow: settings.overflow,
	});
	const conversations = new ConversationManager(conversationStore, { projectPath });
	const orchestrator = new ChatOrchestrator({
		store,
		retriever,
		assembler,
		summarizer,
		topK: settings.topK,
		tokenBudget: settings.tokenBudget,
		contextStyle: options.contextStyle,
	});

	return {
		projectPath,
		settings,
		store,
		indexer,
		retriever,
		assembler,
		conversations,
		orchestrator,
		summarizer,
		callLog,
		index: (runOptions = {}) =>
			indexer.run({
				root: projectPath,
				extensions: settings.extensions,
				concurrency: settings.concurrency,
				...runOptions,
			}),
		close: () => {
			store.close();
			conversationStore.close();
			db?.close();
		},
	};
}
