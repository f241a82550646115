/**
 * Lexical relevance scoring
 *
 * Score = share of query terms that also appear in the file's summary or
 * path. Deterministic, in [0, 1], and 0 for files with no shared term.
 */

import type { FileRecord, PreparedQuery, Scorer } from "../types.js";

const STOP_WORDS = new Set([
	"a", "an", "and", "are", "as", "at", "be", "by", "can", "do", "does", "for",
	"from", "how", "in", "is", "it", "of", "on", "or", "the", "this", "that",
	"to", "what", "when", "where", "which", "who", "why", "with",
]);

/**
 * Lowercase terms of text. camelCase and snake_case identifiers are split,
 * stop words and single characters dropped.
 */
export function tokenize(text: string): string[] {
	return text
		.replace(/([a-z0-9])([A-Z])/g, "$1 $2")
		.replace(/([A-Z]+)([A-Z][a-z])/g, "$1 $2")
		.toLowerCase()
		.split(/[^a-z0-9]+/)
		.filter((term) => term.length > 1 && !STOP_WORDS.has(term));
}

export class LexicalScorer implements Scorer {
	prepare(query: string): PreparedQuery {
		return { raw: query, terms: new Set(tokenize(query)) };
	}

	score(query: PreparedQuery, record: FileRecord): number {
		if (query.terms.size === 0) return 0;

		const documentTerms = new Set([...tokenize(record.summary), ...tokenize(record.path)]);
		let matched = 0;
		for (const term of query.terms) {
			if (documentTerms.has(term)) matched++;
		}
		return matched / query.terms.size;
	}
}
