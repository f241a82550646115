/**
 * Language detection from file extension
 */

import { extname } from "node:path";

const EXTENSION_LANGUAGES: Record<string, string> = {
	rs: "rust",
	py: "python",
	go: "go",
	ts: "typescript",
	tsx: "typescript",
	js: "javascript",
	jsx: "javascript",
	mjs: "javascript",
	cjs: "javascript",
	java: "java",
	c: "c",
	h: "c",
	cpp: "cpp",
	cc: "cpp",
	hpp: "cpp",
	toml: "toml",
	md: "markdown",
	json: "json",
	yaml: "yaml",
	yml: "yaml",
};

export function detectLanguage(path: string): string {
	const ext = extname(path).slice(1).toLowerCase();
	return EXTENSION_LANGUAGES[ext] ?? "unknown";
}

/**
 * Normalize an extension list: lowercase, no leading dot, no duplicates
 */
export function normalizeExtensions(extensions: Iterable<string>): Set<string> {
	const result = new Set<string>();
	for (const ext of extensions) {
		const normalized = ext.trim().replace(/^\./, "").toLowerCase();
		if (normalized) result.add(normalized);
	}
	return result;
}
