/**
 * Token estimation
 *
 * Rough estimate: ~4 characters per token. Used for budgeting only, never
 * sent to the provider.
 */

const CHARS_PER_TOKEN = 4;

export function estimateTokens(text: string): number {
	if (text.length === 0) return 0;
	return Math.ceil(text.length / CHARS_PER_TOKEN);
}
