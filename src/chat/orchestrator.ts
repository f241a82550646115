/**
 * Chat Orchestrator
 *
 * One question, end to end: snapshot the index, rank, assemble context,
 * ask the chat model, then commit the exchange. Failures come back as
 * values and never touch the conversation.
 */

import type { IndexStore } from "../core/index-store.js";
import type { ConversationSession } from "../conversation/manager.js";
import { BudgetExceededError, CancelledError, NoRelevantContextError, type RepoLensError, toRepoLensError } from "../errors.js";
import { createLogger } from "../logger.js";
import type { ContextAssembler } from "../retrieval/context-assembler.js";
import type { Retriever } from "../retrieval/retriever.js";
import type { SummarizationClient } from "../summarization/client.js";
import type { AssistantReply, ContextStyle } from "../types.js";

const log = createLogger("chat");

export type AskResult = { ok: true; reply: AssistantReply } | { ok: false; error: RepoLensError };

export interface AskOptions {
	signal?: AbortSignal;
	/** Overrides the orchestrator's topK */
	topK?: number;
	/** Overrides the orchestrator's token budget */
	tokenBudget?: number;
}

export interface ChatOrchestratorOptions {
	store: IndexStore;
	retriever: Retriever;
	assembler: ContextAssembler;
	summarizer: SummarizationClient;
	/** Candidates kept from ranking (default: 5) */
	topK?: number;
	/** Token budget per request (default: 8000) */
	tokenBudget?: number;
	/** How context is rendered into the prompt (default: markdown) */
	contextStyle?: ContextStyle;
}

export class ChatOrchestrator {
	private store: IndexStore;
	private retriever: Retriever;
	private assembler: ContextAssembler;
	private summarizer: SummarizationClient;
	private topK: number;
	private tokenBudget: number;
	private contextStyle: ContextStyle;

	constructor(options: ChatOrchestratorOptions) {
		this.store = options.store;
		this.retriever = options.retriever;
		this.assembler = options.assembler;
		this.summarizer = options.summarizer;
		this.topK = options.topK ?? 5;
		this.tokenBudget = options.tokenBudget ?? 8000;
		this.contextStyle = options.contextStyle ?? "markdown";
	}

	async ask(session: ConversationSession, query: string, options: AskOptions = {}): Promise<AskResult> {
		try {
			return { ok: true, reply: await this.answer(session, query, options) };
		} catch (error) {
			const failure = toRepoLensError(error, "Chat request");
			log.debug(`ask failed (${failure.kind}): ${failure.message}`);
			return { ok: false, error: failure };
		}
	}

	private async answer(session: ConversationSession, query: string, options: AskOptions): Promise<AssistantReply> {
		const { signal } = options;
		const tokenBudget = options.tokenBudget ?? this.tokenBudget;

		const snapshot = this.store.snapshot();
		const candidates = this.retriever.rank(query, snapshot, options.topK ?? this.topK);
		if (candidates.length === 0) {
			const indexed = snapshot.records.filter((r) => r.status.state === "indexed").length;
			throw new NoRelevantContextError(query, indexed);
		}

		const payload = this.assembler.assemble(candidates, session.history(), tokenBudget);
		if (payload.files.length === 0) {
			const smallest = Math.min(...candidates.map((c) => c.tokenEstimate));
			throw new BudgetExceededError(payload.tokenEstimate + smallest, tokenBudget);
		}

		if (signal?.aborted) {
			throw new CancelledError("Chat request");
		}

		const response = await this.summarizer.chat({
			context: this.assembler.render(payload, this.contextStyle),
			history: payload.history,
			query,
			signal,
		});

		// The reply is discarded if the caller gave up while it was in flight
		if (signal?.aborted) {
			throw new CancelledError("Chat request");
		}

		const contextPaths = payload.files.map((f) => f.path);
		session.appendExchange(query, response.content, contextPaths);

		return {
			text: response.content,
			contextPaths,
			payload,
			model: response.model,
			usage: response.usage,
		};
	}
}

export function createChatOrchestrator(options: ChatOrchestratorOptions): ChatOrchestrator {
	return new ChatOrchestrator(options);
}
