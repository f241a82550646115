/**
 * Local LLM Provider
 *
 * Uses OpenAI-compatible API endpoints for local models.
 * Supports Ollama, LM Studio, and other local inference servers.
 */

import { z } from "zod";
import { ServiceError } from "../../errors.js";
import type { LLMGenerateOptions, LLMMessage, LLMResponse } from "../../types.js";
import { BaseLLMClient, DEFAULT_LLM_MODELS, httpError, type BaseClientOptions } from "../client.js";

// ============================================================================
// LM Studio Model Contention
// ============================================================================

/** Errors that indicate LM Studio is swapping models; worth retrying */
const MODEL_CONTENTION_ERRORS = [
	"Model unloaded",
	"Model is unloaded",
	"Model has unloaded",
	"Operation canceled",
];

export function isModelContentionError(message: string): boolean {
	return MODEL_CONTENTION_ERRORS.some((err) => message.includes(err));
}

// ============================================================================
// Types
// ============================================================================

export interface LocalOptions extends BaseClientOptions {
	model?: string;
	/** Base URL of the OpenAI-compatible server (default: Ollama) */
	endpoint?: string;
}

interface OpenAIMessage {
	role: "system" | "user" | "assistant";
	content: string;
}

const openAIResponseSchema = z.object({
	choices: z.array(
		z.object({
			message: z.object({ content: z.string().nullable() }),
		}),
	),
	model: z.string().optional(),
	usage: z
		.object({
			prompt_tokens: z.number(),
			completion_tokens: z.number(),
		})
		.optional(),
});

// ============================================================================
// Local LLM Client (OpenAI-compatible)
// ============================================================================

export const DEFAULT_LOCAL_ENDPOINT = "http://localhost:11434/v1";

/** Local models load slowly; allow a longer timeout */
const LOCAL_TIMEOUT_MS = 300_000;

export class LocalLLMClient extends BaseLLMClient {
	private endpoint: string;

	constructor(options: LocalOptions = {}) {
		super("local", options.model || DEFAULT_LLM_MODELS.local, {
			...options,
			timeoutMs: options.timeoutMs ?? LOCAL_TIMEOUT_MS,
		});

		this.endpoint = (options.endpoint || DEFAULT_LOCAL_ENDPOINT).replace(/\/+$/, "");
	}

	protected get endpointUrl(): string {
		return `${this.endpoint}/chat/completions`;
	}

	protected async send(
		messages: LLMMessage[],
		options: LLMGenerateOptions,
		signal: AbortSignal | undefined,
	): Promise<LLMResponse> {
		const body = {
			model: options.model || this.model,
			messages: this.convertMessages(messages, options.systemPrompt),
			...(options.maxTokens ? { max_tokens: options.maxTokens } : {}),
			...(options.temperature !== undefined ? { temperature: options.temperature } : {}),
			stream: false,
		};

		const response = await fetch(this.endpointUrl, {
			method: "POST",
			headers: { "Content-Type": "application/json" },
			body: JSON.stringify(body),
			signal,
		});

		if (!response.ok) {
			const errorBody = await response.text();

			if (isModelContentionError(errorBody)) {
				throw new ServiceError(`Local model is loading: ${errorBody}`, {
					transient: true,
					status: response.status,
				});
			}
			if (response.status === 404) {
				throw new ServiceError(
					`Local model "${this.model}" not found. Make sure it's available on your local server.`,
					{ transient: false, status: 404 },
				);
			}
			throw httpError("Local LLM", response.status, errorBody, response.headers.get("retry-after"));
		}

		const parsed = openAIResponseSchema.safeParse(await response.json());
		if (!parsed.success || parsed.data.choices.length === 0) {
			throw new ServiceError("Local LLM returned empty response", { transient: false });
		}

		return {
			content: parsed.data.choices[0].message.content ?? "",
			model: parsed.data.model || this.model,
			usage: parsed.data.usage
				? {
						inputTokens: parsed.data.usage.prompt_tokens,
						outputTokens: parsed.data.usage.completion_tokens,
					}
				: undefined,
		};
	}

	/**
	 * Convert messages to OpenAI format
	 */
	private convertMessages(messages: LLMMessage[], systemPrompt?: string): OpenAIMessage[] {
		const result: OpenAIMessage[] = [];
		if (systemPrompt) {
			result.push({ role: "system", content: systemPrompt });
		}
		for (const msg of messages) {
			result.push({ role: msg.role, content: msg.content });
		}
		return result;
	}
}
