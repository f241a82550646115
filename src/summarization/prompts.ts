/**
 * Summarization & Chat Prompts
 */

import type { ConversationTurn, LLMMessage } from "../types.js";

// ============================================================================
// File Summary Prompt
// ============================================================================

export const SUMMARY_SYSTEM_PROMPT = `You write short summaries of source files for a codebase question-answering index.

- Describe what the file is for and its key functionality
- Use the terms a developer would search for (component names, protocols, data formats)
- Do not start with "This file..." and do not repeat the path

Provide ONLY the summary text. No markdown formatting, no labels.`;

export interface FileSummaryInput {
	path: string;
	language: string;
	content: string;
	/** Set when content was cut to fit the request */
	truncated?: boolean;
}

export function buildFileSummaryPrompt(input: FileSummaryInput): string {
	const language = input.language === "unknown" ? "" : `${input.language} `;
	const note = input.truncated ? "\n\n(The file was truncated; summarize the visible part.)" : "";
	return `Provide a very concise summary (2-3 sentences max) of the following ${language}code, focusing on its main purpose and key functionalities.

File: ${input.path}

${input.content}${note}`;
}

// ============================================================================
// Chat Prompt
// ============================================================================

export const CHAT_SYSTEM_PROMPT =
	"You are an AI assistant helping with a codebase. Use the provided context and conversation history to answer questions.";

export const EARLIER_CONVERSATION_OMITTED = "(Earlier conversation omitted.)";

/**
 * Conversation history as alternating messages, followed by the query
 * wrapped with the rendered context.
 */
export function buildChatMessages(
	context: string,
	history: readonly ConversationTurn[],
	query: string,
): LLMMessage[] {
	const messages: LLMMessage[] = history.map((turn) => ({
		role: turn.role,
		content: turn.text,
	}));

	// History trimmed mid-exchange starts with an assistant turn
	if (messages.length > 0 && messages[0].role === "assistant") {
		messages.unshift({ role: "user", content: EARLIER_CONVERSATION_OMITTED });
	}

	messages.push({
		role: "user",
		content: `Based on the following context about a codebase and our previous conversation, please answer the user's query:

Context:
${context}

User query: ${query}`,
	});

	return messages;
}
