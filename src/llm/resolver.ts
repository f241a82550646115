/**
 * LLM Resolver
 *
 * Model spec parsing, provider detection, alias resolution and client
 * creation, so every caller interprets "a/sonnet" or "ollama/llama3.2"
 * the same way.
 */

import { ConfigError } from "../errors.js";
import type { ILLMClient, LLMProvider } from "../types.js";
import { createLLMClient, type LLMClientOptions } from "./client.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Parsed LLM specification with all resolved values
 */
export interface LLMSpec {
	provider: LLMProvider;
	/** Resolved model ID (with aliases expanded) */
	model: string;
	/** Custom endpoint (for local providers) */
	endpoint?: string;
	/** Human-readable display name */
	displayName: string;
}

// ============================================================================
// Constants
// ============================================================================

/** Provider aliases - short names to canonical providers */
const PROVIDER_ALIASES: Record<string, LLMProvider> = {
	anthropic: "anthropic",
	claude: "anthropic",
	a: "anthropic",
	ollama: "local",
	local: "local",
	lmstudio: "local",
};

/** Claude model aliases */
const CLAUDE_ALIASES: Record<string, string> = {
	opus: "claude-opus-4-5",
	"opus-4.5": "claude-opus-4-5",
	sonnet: "claude-sonnet-4-5",
	"sonnet-4.5": "claude-sonnet-4-5",
	haiku: "claude-haiku-4-5",
	"haiku-4.5": "claude-haiku-4-5",
};

/** Local provider endpoints */
const LOCAL_ENDPOINTS: Record<string, string> = {
	ollama: "http://localhost:11434/v1",
	lmstudio: "http://localhost:1234/v1",
};

const PROVIDER_DISPLAY_NAMES: Record<LLMProvider, string> = {
	anthropic: "Anthropic",
	local: "Local",
};

const DEFAULT_MODELS: Record<LLMProvider, string> = {
	anthropic: "claude-sonnet-4-5",
	local: "llama3.2",
};

function lookup<V>(table: Record<string, V>, key: string): V | undefined {
	return Object.hasOwn(table, key) ? table[key] : undefined;
}

// ============================================================================
// LLM Resolver Class
// ============================================================================

export class LLMResolver {
	/**
	 * Parse a model specification string into provider, model, and endpoint.
	 *
	 * Supported formats:
	 * - "a/sonnet" → { provider: "anthropic", model: "claude-sonnet-4-5" }
	 * - "ollama/llama3.2" → { provider: "local", endpoint: "localhost:11434" }
	 * - "lmstudio/qwen2.5-coder" → { provider: "local", endpoint: "localhost:1234" }
	 * - "claude-haiku-4-5" → auto-detected as anthropic
	 */
	static parseSpec(spec: string): LLMSpec {
		const trimmed = spec.trim();
		if (!trimmed) {
			throw new ConfigError("LLM spec must not be empty");
		}

		const parts = trimmed.split("/");
		const prefix = parts[0].toLowerCase();
		const rest = parts.slice(1).join("/");

		const localEndpoint = lookup(LOCAL_ENDPOINTS, prefix);
		if (localEndpoint) {
			const model = rest || (prefix === "ollama" ? DEFAULT_MODELS.local : "default");
			return {
				provider: "local",
				model,
				endpoint: localEndpoint,
				displayName: this.formatDisplayName("local", model),
			};
		}

		const provider = lookup(PROVIDER_ALIASES, prefix);
		if (provider) {
			const model = this.resolveModelAlias(rest || DEFAULT_MODELS[provider], provider);
			return { provider, model, displayName: this.formatDisplayName(provider, model) };
		}

		if (parts.length === 1) {
			const detected = this.detectProvider(trimmed);
			const model = this.resolveModelAlias(trimmed, detected);
			return { provider: detected, model, displayName: this.formatDisplayName(detected, model) };
		}

		throw new ConfigError(`Unsupported LLM provider "${parts[0]}" in spec "${spec}"`, { spec });
	}

	/**
	 * Detect provider from a bare model name.
	 */
	static detectProvider(model: string): LLMProvider {
		const normalized = model.toLowerCase();
		if (normalized.includes("claude") || lookup(CLAUDE_ALIASES, normalized)) {
			return "anthropic";
		}
		return "local";
	}

	/**
	 * Resolve model alias to full model ID.
	 * E.g., "sonnet" → "claude-sonnet-4-5" for anthropic provider
	 */
	static resolveModelAlias(alias: string, provider: LLMProvider): string {
		if (provider === "anthropic") {
			return lookup(CLAUDE_ALIASES, alias.toLowerCase()) ?? alias;
		}
		return alias;
	}

	/**
	 * E.g., ("anthropic", "claude-sonnet-4-5") → "claude-sonnet-4-5 (Anthropic)"
	 */
	static formatDisplayName(provider: LLMProvider, model: string): string {
		const shortModel = model.split("/").pop() || model;
		return `${shortModel} (${PROVIDER_DISPLAY_NAMES[provider]})`;
	}

	/**
	 * Parse spec and create LLM client in one call. Explicit options win
	 * over values derived from the spec.
	 */
	static async createClient(spec: string, options: LLMClientOptions = {}): Promise<ILLMClient> {
		const parsed = this.parseSpec(spec);
		return createLLMClient({
			...options,
			provider: options.provider ?? parsed.provider,
			model: options.model ?? parsed.model,
			endpoint: options.endpoint ?? parsed.endpoint,
		});
	}

	static isLocalProvider(spec: string): boolean {
		return this.parseSpec(spec).provider === "local";
	}
}
