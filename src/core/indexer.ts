/**
 * Indexer
 *
 * Walks a source tree, detects which files changed since they were last
 * summarized, and summarizes those through a bounded pool. One file's
 * failure never stops the run.
 */

import { existsSync, readdirSync, statSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { extname, join, relative, sep } from "node:path";
import { minimatch } from "minimatch";
import { CancelledError, ConfigError, IoError, ServiceError, errorMessage, toRepoLensError } from "../errors.js";
import { createLogger } from "../logger.js";
import type { SummarizationClient } from "../summarization/client.js";
import type { FileRecord, IndexRunOptions, IndexRunReport, LLMUsageStats } from "../types.js";
import { fingerprint, needsReindex } from "./fingerprint.js";
import type { IndexStore } from "./index-store.js";
import { detectLanguage, normalizeExtensions } from "./language.js";
import { runBounded } from "./pool.js";
import { estimateTokens } from "./tokens.js";

const log = createLogger("indexer");

// ============================================================================
// Types
// ============================================================================

export interface IndexerOptions {
	store: IndexStore;
	summarizer: SummarizationClient;
	/** Glob patterns (relative to the root) that are never indexed */
	excludePatterns?: string[];
	/** Clock, replaceable in tests */
	now?: () => Date;
}

interface PendingFile {
	path: string;
	absolutePath: string;
}

// ============================================================================
// Indexer Class
// ============================================================================

export class Indexer {
	private store: IndexStore;
	private summarizer: SummarizationClient;
	private excludePatterns: string[];
	private now: () => Date;

	/** Directories to always exclude (fast path, no glob matching needed) */
	private static readonly ALWAYS_EXCLUDE_DIRS = new Set([
		"node_modules",
		".git",
		".svn",
		".hg",
		"dist",
		"build",
		"target",
		"coverage",
		"__pycache__",
		"venv",
		".venv",
		".idea",
		".vscode",
		".cache",
		".repolens",
	]);

	constructor(options: IndexerOptions) {
		this.store = options.store;
		this.summarizer = options.summarizer;
		this.excludePatterns = options.excludePatterns ?? [];
		this.now = options.now ?? (() => new Date());
	}

	/**
	 * Bring the index up to date with the tree under options.root.
	 *
	 * @throws ConfigError on invalid arguments
	 */
	async run(options: IndexRunOptions): Promise<IndexRunReport> {
		const startTime = Date.now();
		const extensions = normalizeExtensions(options.extensions);

		if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
			throw new ConfigError(`Concurrency must be a positive integer, got ${options.concurrency}`, {
				concurrency: options.concurrency,
			});
		}
		if (extensions.size === 0) {
			throw new ConfigError("At least one file extension is required");
		}
		if (!existsSync(options.root) || !statSync(options.root).isDirectory()) {
			throw new ConfigError(`Index root ${options.root} is not a directory`, { root: options.root });
		}

		const usageBefore = this.summarizer.getUsage();
		const files = this.discoverFiles(options.root, extensions);
		log.debug(`discovered ${files.length} files under ${options.root}`);

		const report: IndexRunReport = {
			discovered: files.length,
			unchanged: 0,
			indexed: 0,
			failed: [],
			removed: [],
			cancelled: false,
			durationMs: 0,
		};

		// Phase 1: change detection
		const pending: PendingFile[] = [];
		for (const path of files) {
			if (options.signal?.aborted) {
				report.cancelled = true;
				break;
			}

			const absolutePath = join(options.root, path);
			let bytes: Buffer;
			try {
				bytes = await readFile(absolutePath);
			} catch (error) {
				await this.recordFailure(path, "", 0, new IoError(path, error), report);
				continue;
			}

			if (!options.force && !needsReindex(this.store.get(path), fingerprint(bytes))) {
				report.unchanged++;
				continue;
			}
			pending.push({ path, absolutePath });
		}

		// Phase 2: summarize through the bounded pool
		if (!report.cancelled) {
			let completed = 0;
			const result = await runBounded(
				pending,
				options.concurrency,
				async (file, _index, gate) => {
					await this.indexFile(file, report);
					completed++;
					options.onProgress?.(completed, pending.length, file.path, gate.inFlight - 1);
				},
				{ signal: options.signal },
			);
			report.cancelled = result.cancelled || (options.signal?.aborted ?? false);
		}

		if (options.sweep && !report.cancelled) {
			report.removed = await this.store.sweep(files);
		}

		this.store.setMetadata("lastIndexedAt", this.now().toISOString());
		this.store.setMetadata("root", options.root);

		report.usage = usageDelta(usageBefore, this.summarizer.getUsage());
		report.durationMs = Date.now() - startTime;

		log.debug(
			`indexed=${report.indexed} unchanged=${report.unchanged} failed=${report.failed.length} removed=${report.removed.length} cancelled=${report.cancelled}`,
		);
		return report;
	}

	/**
	 * Eligible files under root, relative and "/"-separated, sorted by path
	 */
	discoverFiles(root: string, extensions: Iterable<string>): string[] {
		const allowed = normalizeExtensions(extensions);
		const files: string[] = [];

		const walk = (dir: string) => {
			const entries = readdirSync(dir, { withFileTypes: true });

			for (const entry of entries) {
				const fullPath = join(dir, entry.name);
				const relativePath = relative(root, fullPath).split(sep).join("/");

				if (this.shouldExclude(relativePath, entry.isDirectory())) {
					continue;
				}

				if (entry.isDirectory()) {
					walk(fullPath);
				} else if (entry.isFile()) {
					const ext = extname(entry.name).slice(1).toLowerCase();
					if (ext && allowed.has(ext)) {
						files.push(relativePath);
					}
				}
			}
		};

		walk(root);
		return files.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
	}

	/**
	 * Check if a path should be excluded
	 */
	private shouldExclude(relativePath: string, isDirectory: boolean): boolean {
		if (isDirectory) {
			for (const segment of relativePath.split("/")) {
				if (Indexer.ALWAYS_EXCLUDE_DIRS.has(segment)) {
					return true;
				}
			}
		}

		const pathToCheck = isDirectory ? `${relativePath}/` : relativePath;
		for (const pattern of this.excludePatterns) {
			if (
				minimatch(pathToCheck, pattern, { dot: true }) ||
				minimatch(relativePath, pattern, { dot: true })
			) {
				return true;
			}
		}

		return false;
	}

	private async indexFile(file: PendingFile, report: IndexRunReport): Promise<void> {
		let bytes: Buffer;
		try {
			bytes = await readFile(file.absolutePath);
		} catch (error) {
			await this.recordFailure(file.path, "", 0, new IoError(file.path, error), report);
			return;
		}

		const digest = fingerprint(bytes);
		const language = detectLanguage(file.path);

		let summary: string;
		try {
			summary = await this.summarizer.summarizeFile({
				path: file.path,
				language,
				content: bytes.toString("utf-8"),
			});
		} catch (error) {
			const failure = toRepoLensError(error, `Summarizing ${file.path}`);
			if (failure instanceof CancelledError) {
				// Nothing is written for a cancelled file
				report.failed.push({ path: file.path, reason: failure.message });
				return;
			}
			await this.recordFailure(file.path, digest, bytes.byteLength, failure, report);
			return;
		}

		summary = summary.trim();
		if (!summary) {
			const failure = new ServiceError(`Empty summary returned for ${file.path}`, { transient: false });
			await this.recordFailure(file.path, digest, bytes.byteLength, failure, report);
			return;
		}

		const record: FileRecord = {
			path: file.path,
			fingerprint: digest,
			byteLength: bytes.byteLength,
			tokenEstimate: estimateTokens(summary),
			summary,
			language,
			lastIndexedAt: this.now().toISOString(),
			status: { state: "indexed" },
		};
		try {
			await this.store.upsert(record);
		} catch (error) {
			await this.recordFailure(file.path, digest, bytes.byteLength, error, report);
			return;
		}
		report.indexed++;
	}

	private async recordFailure(
		path: string,
		digest: string,
		byteLength: number,
		error: unknown,
		report: IndexRunReport,
	): Promise<void> {
		const reason = errorMessage(error);
		log.warn(`Failed to index ${path}: ${reason}`);

		await this.store.upsert({
			path,
			fingerprint: digest,
			byteLength,
			tokenEstimate: 0,
			summary: "",
			language: detectLanguage(path),
			lastIndexedAt: this.now().toISOString(),
			status: { state: "failed", reason },
		});
		report.failed.push({ path, reason });
	}
}

function usageDelta(before: LLMUsageStats, after: LLMUsageStats): LLMUsageStats {
	return {
		inputTokens: after.inputTokens - before.inputTokens,
		outputTokens: after.outputTokens - before.outputTokens,
		calls: after.calls - before.calls,
	};
}

// ============================================================================
// Factory Function
// ============================================================================

export function createIndexer(options: IndexerOptions): Indexer {
	return new Indexer(options);
}
