// ---------------------------------------------------------------------------
// Content Hash Computation
// SHA-256 over key-sorted JSON, used for event fingerprints and webhook ids
// ---------------------------------------------------------------------------

import { createHash } from "node:crypto";

/**
 * Serialize a value to JSON with object keys sorted at every depth, so the
 * output does not depend on insertion order.
 */
export function canonicalJson(value: unknown): string {
	return JSON.stringify(value, (_key, current: unknown) => {
		if (current !== null && typeof current === "object" && !Array.isArray(current)) {
			return Object.fromEntries(
				Object.entries(current).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
			);
		}
		return current;
	});
}

/** SHA-256 hex digest of the canonical JSON form of `value`. */
export function computeContentHash(value: unknown): string {
	return createHash("sha256").update(canonicalJson(value) ?? "null", "utf-8").digest("hex");
}
