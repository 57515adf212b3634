/**
 * Hashing utilities.
 *
 * @module @paramspace/common/utils/hash
 */

import { createHash } from "node:crypto";

/**
 * Generate a SHA-256 hash of the given content as a hex string.
 */
export function sha256Hash(content: string | Buffer): string {
	return createHash("sha256").update(content).digest("hex");
}

/**
 * Serialize a JSON-compatible value with object keys sorted at every depth.
 *
 * `undefined` object members are dropped, as `JSON.stringify` does.
 *
 * @example
 * ```ts
 * stableStringify({ b: 1, a: { d: 2, c: 3 } });
 * // => '{"a":{"c":3,"d":2},"b":1}'
 * ```
 */
export function stableStringify(value: unknown): string {
	if (value === undefined) {
		return "null";
	}
	if (value === null || typeof value !== "object") {
		return JSON.stringify(value);
	}
	if (Array.isArray(value)) {
		return `[${value.map((item) => stableStringify(item)).join(",")}]`;
	}
	const entries = Object.entries(value)
		.filter(([, item]) => item !== undefined)
		.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
		.map(([key, item]) => `${JSON.stringify(key)}:${stableStringify(item)}`);
	return `{${entries.join(",")}}`;
}

/**
 * Generate a deterministic hash from a JSON-serializable value.
 *
 * Key order does not affect the result.
 *
 * @example
 * ```ts
 * hashObject({ b: 2, a: 1 }) === hashObject({ a: 1, b: 2 }); // true
 * ```
 */
export function hashObject(value: unknown): string {
	return sha256Hash(stableStringify(value));
}
