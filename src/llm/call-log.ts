/**
 * API call log
 *
 * One entry per HTTP attempt: endpoint, purpose, outcome and latency.
 * Entries are kept in memory (bounded) and optionally appended as JSON
 * lines to a file in the index directory.
 */

import { appendFileSync, existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { createLogger } from "../logger.js";

const log = createLogger("llm");

export interface ApiCallEntry {
	/** ISO timestamp of the attempt start */
	timestamp: string;
	endpoint: string;
	/** What the call was for ("summarize", "chat", ...) */
	purpose: string;
	model: string;
	attempt: number;
	status: "ok" | "error";
	/** HTTP status code, when a response arrived */
	httpStatus?: number;
	responseTimeMs: number;
	inputTokens?: number;
	outputTokens?: number;
	error?: string;
}

export interface ApiCallLogOptions {
	/** Append entries to this file as JSON lines */
	filePath?: string;
	/** In-memory entries kept (default: 500) */
	maxEntries?: number;
}

export class ApiCallLog {
	private readonly filePath?: string;
	private readonly maxEntries: number;
	private items: ApiCallEntry[] = [];
	private fileFailed = false;

	constructor(options: ApiCallLogOptions = {}) {
		this.filePath = options.filePath;
		this.maxEntries = options.maxEntries ?? 500;
	}

	record(entry: ApiCallEntry): void {
		this.items.push(entry);
		if (this.items.length > this.maxEntries) {
			this.items.splice(0, this.items.length - this.maxEntries);
		}

		log.debug(
			`${entry.purpose} ${entry.endpoint} attempt=${entry.attempt} ${entry.status}${entry.httpStatus ? ` (${entry.httpStatus})` : ""} ${entry.responseTimeMs}ms`,
		);

		if (this.filePath && !this.fileFailed) {
			try {
				const dir = dirname(this.filePath);
				if (!existsSync(dir)) {
					mkdirSync(dir, { recursive: true });
				}
				appendFileSync(this.filePath, `${JSON.stringify(entry)}\n`, "utf-8");
			} catch (error) {
				// Warn once, keep logging in memory
				this.fileFailed = true;
				log.warn(`Cannot write API call log ${this.filePath}:`, error);
			}
		}
	}

	entries(): readonly ApiCallEntry[] {
		return [...this.items];
	}

	clear(): void {
		this.items = [];
	}
}
