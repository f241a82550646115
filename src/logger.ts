/**
 * Console logging helpers.
 *
 * Warnings always go to stderr. Debug traces are only printed when
 * REPOLENS_DEBUG is set, either to "1"/"true" (everything) or to a
 * comma-separated list of namespaces ("indexer,llm").
 */

export interface Logger {
	debug(message: string, ...details: unknown[]): void;
	warn(message: string, ...details: unknown[]): void;
}

function debugEnabled(namespace: string): boolean {
	const flag = process.env.REPOLENS_DEBUG;
	if (!flag) return false;
	if (flag === "1" || flag === "true" || flag === "*") return true;
	return flag
		.split(",")
		.map((s) => s.trim())
		.includes(namespace);
}

export function createLogger(namespace: string): Logger {
	const prefix = `[${namespace}]`;
	return {
		debug(message, ...details) {
			if (debugEnabled(namespace)) {
				console.error(`${prefix} ${message}`, ...details);
			}
		},
		warn(message, ...details) {
			console.warn(`${prefix} ${message}`, ...details);
		},
	};
}
