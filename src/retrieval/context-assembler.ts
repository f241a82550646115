/**
 * Context Assembler
 *
 * Packs conversation history and ranked file summaries into one token
 * budget. History is reserved first; files follow in rank order and are
 * included whole or not at all.
 */

import { estimateTokens } from "../core/tokens.js";
import { BudgetExceededError, ConfigError } from "../errors.js";
import type {
	ContextFile,
	ContextPayload,
	ContextStyle,
	ConversationTurn,
	OverflowPolicy,
	RankedCandidate,
} from "../types.js";

// ============================================================================
// Types
// ============================================================================

export interface ContextAssemblerOptions {
	/** Most recent turns considered for history (default: 6) */
	historyTurns?: number;
	/** Share of the budget history may take before older turns are dropped (default: 0.5) */
	historyShare?: number;
	/**
	 * What to do with a file that does not fit the remaining budget:
	 * "skip" tries the next candidate, "stop" ends file selection.
	 */
	overflow?: OverflowPolicy;
}

export function turnTokens(turn: ConversationTurn): number {
	return estimateTokens(turn.text);
}

// ============================================================================
// Context Assembler Class
// ============================================================================

export class ContextAssembler {
	private options: Required<ContextAssemblerOptions>;

	constructor(options: ContextAssemblerOptions = {}) {
		this.options = {
			historyTurns: options.historyTurns ?? 6,
			historyShare: options.historyShare ?? 0.5,
			overflow: options.overflow ?? "skip",
		};
		if (!Number.isInteger(this.options.historyTurns) || this.options.historyTurns < 0) {
			throw new ConfigError(`historyTurns must be a non-negative integer, got ${this.options.historyTurns}`);
		}
		if (this.options.historyShare < 0 || this.options.historyShare > 1) {
			throw new ConfigError(`historyShare must be between 0 and 1, got ${this.options.historyShare}`);
		}
	}

	get overflow(): OverflowPolicy {
		return this.options.overflow;
	}

	/**
	 * @throws BudgetExceededError when the newest history turn alone is
	 *   larger than the whole budget
	 */
	assemble(
		candidates: readonly RankedCandidate[],
		history: readonly ConversationTurn[],
		tokenBudget: number,
	): ContextPayload {
		if (!Number.isInteger(tokenBudget) || tokenBudget < 1) {
			throw new ConfigError(`Token budget must be a positive integer, got ${tokenBudget}`, {
				tokenBudget,
			});
		}

		// History: newest turns first in priority, oldest dropped first
		const recent = this.options.historyTurns > 0 ? history.slice(-this.options.historyTurns) : [];
		const historyCap = Math.floor(tokenBudget * this.options.historyShare);
		let historyTokens = recent.reduce((sum, turn) => sum + turnTokens(turn), 0);
		let dropped = 0;

		while (recent.length > 1 && historyTokens > historyCap) {
			const oldest = recent.shift();
			if (oldest) {
				historyTokens -= turnTokens(oldest);
				dropped++;
			}
		}
		if (historyTokens > tokenBudget) {
			throw new BudgetExceededError(historyTokens, tokenBudget, "The latest conversation turn");
		}

		// Files, in rank order, all-or-nothing
		const files: ContextFile[] = [];
		let remaining = tokenBudget - historyTokens;
		let fileTokens = 0;

		for (const candidate of candidates) {
			if (candidate.tokenEstimate > remaining) {
				if (this.options.overflow === "stop") break;
				continue;
			}
			files.push({
				path: candidate.path,
				summary: candidate.summary,
				tokenEstimate: candidate.tokenEstimate,
			});
			remaining -= candidate.tokenEstimate;
			fileTokens += candidate.tokenEstimate;
		}

		return {
			files,
			history: recent.map((turn) => ({ ...turn, contextPaths: [...turn.contextPaths] })),
			droppedHistoryTurns: dropped,
			tokenEstimate: historyTokens + fileTokens,
			tokenBudget,
		};
	}

	/**
	 * Render the file part of a payload as prompt context
	 */
	render(payload: ContextPayload, style: ContextStyle = "markdown"): string {
		if (payload.files.length === 0) return "";

		const body = payload.files.map((file) => formatFile(file, style)).join("\n\n");
		switch (style) {
			case "xml":
				return `<relevant_files>\n${body}\n</relevant_files>`;
			case "markdown":
				return `## Relevant Files\n\n${body}`;
			default:
				return `=== Relevant Files ===\n\n${body}`;
		}
	}
}

function escapeXml(text: string): string {
	return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;").replace(/"/g, "&quot;");
}

function formatFile(file: ContextFile, style: ContextStyle): string {
	switch (style) {
		case "xml":
			return `<file path="${escapeXml(file.path)}">\n${escapeXml(file.summary)}\n</file>`;
		case "markdown":
			return `### \`${file.path}\`\n${file.summary}`;
		default:
			return `File: ${file.path}\nSummary: ${file.summary}`;
	}
}

// ============================================================================
// Factory Function
// ============================================================================

export function createContextAssembler(options?: ContextAssemblerOptions): ContextAssembler {
	return new ContextAssembler(options);
}
