/**
 * Change detection
 *
 * A file needs re-summarization when its content fingerprint differs from
 * the one recorded by the last successful indexing, or when it was never
 * indexed successfully.
 */

import { createHash } from "node:crypto";
import type { FileRecord } from "../types.js";

/**
 * SHA-256 hex digest of raw file bytes
 */
export function fingerprint(bytes: Uint8Array | string): string {
	return createHash("sha256").update(bytes).digest("hex");
}

export function needsReindex(existing: FileRecord | undefined, currentFingerprint: string): boolean {
	if (!existing) return true;
	if (existing.status.state !== "indexed") return true;
	return existing.fingerprint !== currentFingerprint;
}
