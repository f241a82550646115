/**
 * Summarization Client
 *
 * The two LLM operations the rest of the system needs: summarize one file
 * for the index, and answer a query given assembled context and history.
 * Retries, timeouts and rate limiting live in the underlying ILLMClient.
 */

import { ServiceError } from "../errors.js";
import type { ConversationTurn, ILLMClient, LLMResponse, LLMUsageStats } from "../types.js";
import {
	CHAT_SYSTEM_PROMPT,
	SUMMARY_SYSTEM_PROMPT,
	buildChatMessages,
	buildFileSummaryPrompt,
} from "./prompts.js";

// ============================================================================
// Types
// ============================================================================

export interface SummarizeFileRequest {
	/** Path relative to the indexed root */
	path: string;
	language: string;
	content: string;
	signal?: AbortSignal;
}

export interface ChatRequest {
	/** Rendered context block */
	context: string;
	history: readonly ConversationTurn[];
	query: string;
	signal?: AbortSignal;
}

export interface SummarizationClient {
	/** Returns a non-empty summary or throws */
	summarizeFile(request: SummarizeFileRequest): Promise<string>;
	chat(request: ChatRequest): Promise<LLMResponse>;
	getUsage(): LLMUsageStats;
	resetUsage(): void;
}

export interface SummarizationClientOptions {
	/** Max tokens generated per call (default: 1024) */
	maxTokens?: number;
	/** Sampling temperature 0-1 (default: 0.7) */
	temperature?: number;
	/** File content sent for summarization is cut to about this many tokens */
	maxFileTokens?: number;
}

/** Stays under the default tokens-per-minute limit with the prompt around it */
export const DEFAULT_MAX_FILE_TOKENS = 60_000;

/** Tokens kept free for the system prompt and summary instructions */
export const SUMMARY_PROMPT_RESERVE = 1_000;

// ============================================================================
// LLM-backed Client
// ============================================================================

export class LLMSummarizationClient implements SummarizationClient {
	private llm: ILLMClient;
	private maxTokens: number;
	private temperature: number;
	private maxFileChars: number;

	constructor(llm: ILLMClient, options: SummarizationClientOptions = {}) {
		this.llm = llm;
		this.maxTokens = options.maxTokens ?? 1024;
		this.temperature = options.temperature ?? 0.7;
		this.maxFileChars = (options.maxFileTokens ?? DEFAULT_MAX_FILE_TOKENS) * 4;
	}

	async summarizeFile(request: SummarizeFileRequest): Promise<string> {
		const truncated = request.content.length > this.maxFileChars;
		const prompt = buildFileSummaryPrompt({
			path: request.path,
			language: request.language,
			content: truncated ? request.content.slice(0, this.maxFileChars) : request.content,
			truncated,
		});

		const response = await this.llm.complete([{ role: "user", content: prompt }], {
			systemPrompt: SUMMARY_SYSTEM_PROMPT,
			maxTokens: this.maxTokens,
			temperature: this.temperature,
			abortSignal: request.signal,
			purpose: "summarize",
		});

		const summary = response.content.trim();
		if (!summary) {
			throw new ServiceError(`Empty summary returned for ${request.path}`, { transient: false });
		}
		return summary;
	}

	async chat(request: ChatRequest): Promise<LLMResponse> {
		const response = await this.llm.complete(
			buildChatMessages(request.context, request.history, request.query),
			{
				systemPrompt: CHAT_SYSTEM_PROMPT,
				maxTokens: this.maxTokens,
				temperature: this.temperature,
				abortSignal: request.signal,
				purpose: "chat",
			},
		);

		const text = response.content.trim();
		if (!text) {
			throw new ServiceError("Empty reply from the chat model", { transient: false });
		}
		return { ...response, content: text };
	}

	getUsage(): LLMUsageStats {
		return this.llm.getAccumulatedUsage();
	}

	resetUsage(): void {
		this.llm.resetAccumulatedUsage();
	}
}

export function createSummarizationClient(
	llm: ILLMClient,
	options?: SummarizationClientOptions,
): SummarizationClient {
	return new LLMSummarizationClient(llm, options);
}
