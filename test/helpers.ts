/**
 * Shared test doubles
 */

import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import type { ChatRequest, SummarizationClient, SummarizeFileRequest } from "../src/summarization/client.js";
import type {
	ILLMClient,
	LLMGenerateOptions,
	LLMMessage,
	LLMProvider,
	LLMResponse,
	LLMUsageStats,
} from "../src/types.js";

export type Responder = (messages: LLMMessage[], options: LLMGenerateOptions) => string | Promise<string>;

/** Scripted LLM: every call is recorded and answered by the responder */
export class MockLLMClient implements ILLMClient {
	readonly calls: Array<{ messages: LLMMessage[]; options: LLMGenerateOptions }> = [];
	private usage: LLMUsageStats = { inputTokens: 0, outputTokens: 0, calls: 0 };

	constructor(private responder: Responder = () => "Mock response") {}

	async complete(messages: LLMMessage[], options: LLMGenerateOptions = {}): Promise<LLMResponse> {
		this.calls.push({ messages, options });
		const content = await this.responder(messages, options);
		this.usage.inputTokens += 10;
		this.usage.outputTokens += 5;
		this.usage.calls++;
		return { content, model: "mock-model", usage: { inputTokens: 10, outputTokens: 5 } };
	}

	getProvider(): LLMProvider {
		return "local";
	}

	getModel(): string {
		return "mock-model";
	}

	getAccumulatedUsage(): LLMUsageStats {
		return { ...this.usage };
	}

	resetAccumulatedUsage(): void {
		this.usage = { inputTokens: 0, outputTokens: 0, calls: 0 };
	}
}

type SummaryHandler = (request: SummarizeFileRequest) => string | Promise<string>;
type ChatHandler = (request: ChatRequest) => string | Promise<string>;

/** Summarizer double that skips prompt building */
export class FakeSummarizer implements SummarizationClient {
	readonly summarized: string[] = [];
	readonly chats: ChatRequest[] = [];
	private calls = 0;

	constructor(
		private onSummarize: SummaryHandler = (request) => `Summary of ${request.path}.`,
		private onChat: ChatHandler = () => "Answer.",
	) {}

	async summarizeFile(request: SummarizeFileRequest): Promise<string> {
		this.summarized.push(request.path);
		this.calls++;
		return this.onSummarize(request);
	}

	async chat(request: ChatRequest): Promise<LLMResponse> {
		this.chats.push(request);
		this.calls++;
		return { content: await this.onChat(request), model: "fake-model" };
	}

	getUsage(): LLMUsageStats {
		return { inputTokens: 0, outputTokens: 0, calls: this.calls };
	}

	resetUsage(): void {
		this.calls = 0;
	}
}

/** Create a temporary directory tree from path → content */
export function createTree(files: Record<string, string>): string {
	const root = mkdtempSync(join(tmpdir(), "repolens-test-"));
	writeTree(root, files);
	return root;
}

export function writeTree(root: string, files: Record<string, string>): void {
	for (const [path, content] of Object.entries(files)) {
		const full = join(root, path);
		mkdirSync(dirname(full), { recursive: true });
		writeFileSync(full, content);
	}
}

export function removeTree(root: string): void {
	rmSync(root, { recursive: true, force: true });
}

export const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 0));
