/**
 * Retrieval Engine
 *
 * Ranks the indexed files of a snapshot against a query. Ties are broken
 * by most recent indexing, then by path, so equal inputs always produce
 * the same order.
 */

import type { IndexSnapshot, RankedCandidate, Scorer } from "../types.js";
import { LexicalScorer } from "./scorer.js";

export function compareCandidates(a: RankedCandidate, b: RankedCandidate): number {
	if (a.score !== b.score) return b.score - a.score;
	if (a.lastIndexedAt !== b.lastIndexedAt) return a.lastIndexedAt < b.lastIndexedAt ? 1 : -1;
	return a.path < b.path ? -1 : a.path > b.path ? 1 : 0;
}

export class Retriever {
	private scorer: Scorer;

	constructor(scorer: Scorer = new LexicalScorer()) {
		this.scorer = scorer;
	}

	rank(query: string, snapshot: IndexSnapshot, topK: number): RankedCandidate[] {
		if (topK < 1 || snapshot.records.length === 0) return [];

		const prepared = this.scorer.prepare(query);
		if (prepared.terms.size === 0) return [];

		const candidates: RankedCandidate[] = [];
		for (const record of snapshot.records) {
			if (record.status.state !== "indexed") continue;

			const score = this.scorer.score(prepared, record);
			if (score <= 0) continue;

			candidates.push({
				path: record.path,
				score,
				summary: record.summary,
				tokenEstimate: record.tokenEstimate,
				lastIndexedAt: record.lastIndexedAt,
			});
		}

		return candidates.sort(compareCandidates).slice(0, Math.floor(topK));
	}
}

export function createRetriever(scorer?: Scorer): Retriever {
	return new Retriever(scorer);
}
