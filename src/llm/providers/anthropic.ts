/**
 * Anthropic API LLM Provider
 *
 * Direct integration with Anthropic's Messages API for Claude models.
 */

import { z } from "zod";
import { ConfigError, ServiceError } from "../../errors.js";
import type { LLMGenerateOptions, LLMMessage, LLMResponse } from "../../types.js";
import { BaseLLMClient, DEFAULT_LLM_MODELS, httpError, type BaseClientOptions } from "../client.js";

// ============================================================================
// Types
// ============================================================================

export interface AnthropicOptions extends BaseClientOptions {
	/** API key for Anthropic (default: ANTHROPIC_API_KEY) */
	apiKey?: string;
	model?: string;
	/** Override the Messages API URL */
	endpoint?: string;
}

interface AnthropicMessage {
	role: "user" | "assistant";
	content: string;
}

const anthropicResponseSchema = z.object({
	content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
	model: z.string(),
	usage: z
		.object({
			input_tokens: z.number(),
			output_tokens: z.number(),
		})
		.optional(),
});

const anthropicErrorSchema = z.object({
	error: z.object({ type: z.string(), message: z.string() }),
});

/** Parsed JSON, or undefined when the body is not JSON */
function parseJson(text: string): unknown {
	try {
		return JSON.parse(text);
	} catch {
		return undefined;
	}
}

// ============================================================================
// Anthropic API Client
// ============================================================================

export const ANTHROPIC_API_URL = "https://api.anthropic.com/v1/messages";
export const ANTHROPIC_VERSION = "2023-06-01";

export class AnthropicLLMClient extends BaseLLMClient {
	private apiKey: string;
	private url: string;

	constructor(options: AnthropicOptions = {}) {
		super("anthropic", options.model || DEFAULT_LLM_MODELS.anthropic, options);

		const apiKey = options.apiKey || process.env.ANTHROPIC_API_KEY;
		if (!apiKey) {
			throw new ConfigError(
				"Anthropic API key required. Set ANTHROPIC_API_KEY environment variable or pass apiKey option.",
			);
		}
		this.apiKey = apiKey;
		this.url = options.endpoint || ANTHROPIC_API_URL;
	}

	protected get endpointUrl(): string {
		return this.url;
	}

	protected async send(
		messages: LLMMessage[],
		options: LLMGenerateOptions,
		signal: AbortSignal | undefined,
	): Promise<LLMResponse> {
		const systemPrompt = this.extractSystemPrompt(messages, options.systemPrompt);

		const body = {
			model: options.model || this.model,
			max_tokens: options.maxTokens || 4096,
			messages: this.convertMessages(messages),
			...(systemPrompt ? { system: systemPrompt } : {}),
			...(options.temperature !== undefined ? { temperature: options.temperature } : {}),
		};

		const response = await fetch(this.url, {
			method: "POST",
			headers: {
				"Content-Type": "application/json",
				"x-api-key": this.apiKey,
				"anthropic-version": ANTHROPIC_VERSION,
			},
			body: JSON.stringify(body),
			signal,
		});

		if (!response.ok) {
			const errorBody = await response.text();
			const parsedError = anthropicErrorSchema.safeParse(parseJson(errorBody));
			const errorMessage = parsedError.success ? parsedError.data.error.message : errorBody;

			if (response.status === 401) {
				throw new ServiceError("Anthropic API key is invalid", { transient: false, status: 401 });
			}
			throw httpError("Anthropic", response.status, errorMessage, response.headers.get("retry-after"));
		}

		const parsed = anthropicResponseSchema.safeParse(await response.json());
		if (!parsed.success) {
			throw new ServiceError(`Malformed Anthropic response: ${parsed.error.issues[0]?.message}`, {
				transient: false,
			});
		}

		const content = parsed.data.content
			.filter((block) => block.type === "text")
			.map((block) => block.text ?? "")
			.join("");

		return {
			content,
			model: parsed.data.model,
			usage: parsed.data.usage
				? {
						inputTokens: parsed.data.usage.input_tokens,
						outputTokens: parsed.data.usage.output_tokens,
					}
				: undefined,
		};
	}

	/**
	 * Extract system prompt from messages and options
	 */
	private extractSystemPrompt(messages: LLMMessage[], optionsSystemPrompt?: string): string | undefined {
		const parts: string[] = [];

		if (optionsSystemPrompt) {
			parts.push(optionsSystemPrompt);
		}
		for (const msg of messages) {
			if (msg.role === "system") {
				parts.push(msg.content);
			}
		}

		return parts.length > 0 ? parts.join("\n\n") : undefined;
	}

	/**
	 * Convert messages to Anthropic format (excluding system messages)
	 */
	private convertMessages(messages: LLMMessage[]): AnthropicMessage[] {
		const result: AnthropicMessage[] = [];
		for (const msg of messages) {
			if (msg.role !== "system") {
				result.push({ role: msg.role, content: msg.content });
			}
		}
		return result;
	}
}
