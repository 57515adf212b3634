/**
 * Environment variable helpers.
 *
 * Typed readers with defaults, used by the logger setup and any caller that
 * tunes search space behavior from the environment.
 *
 * @module @paramspace/common/utils/env
 */

/**
 * Parse a boolean from an environment variable.
 *
 * Recognizes "true" and "1" as true (case-insensitive), "false" and "0" as
 * false. Anything else, or an unset variable, yields `defaultValue`.
 *
 * @example
 * ```ts
 * const pretty = envBool("PARAMSPACE_LOG_PRETTY", false);
 * ```
 */
export function envBool(key: string, defaultValue: boolean): boolean {
	const val = process.env[key]?.trim().toLowerCase();
	if (val === undefined || val === "") return defaultValue;
	if (val === "true" || val === "1") return true;
	if (val === "false" || val === "0") return false;
	return defaultValue;
}

/**
 * Get a string from an environment variable; unset and empty both yield
 * `defaultValue`.
 */
export function envStr(key: string, defaultValue: string): string {
	const val = process.env[key];
	return val === undefined || val === "" ? defaultValue : val;
}

/**
 * Read an environment variable restricted to a fixed set of values.
 *
 * Matching is case-insensitive. Values outside `allowed` fall back to
 * `defaultValue`.
 *
 * @example
 * ```ts
 * const level = envEnum("PARAMSPACE_LOG_LEVEL", ["debug", "info", "warn", "error"] as const, "info");
 * ```
 */
export function envEnum<const T extends string>(
	key: string,
	allowed: readonly T[],
	defaultValue: T,
): T {
	const val = process.env[key]?.trim().toLowerCase();
	if (val === undefined) return defaultValue;
	return allowed.find((candidate) => candidate.toLowerCase() === val) ?? defaultValue;
}
