/**
 * Base error class for the paramspace packages.
 *
 * @module @paramspace/common/errors/base
 */

/**
 * Root of every error the search space raises. `code` is one of
 * `ErrorCodes`, so callers can branch without matching messages.
 *
 * @example
 * ```ts
 * if (error instanceof ParamspaceError && error.code === ErrorCodes.CONSTRAINT_VIOLATED) {
 *   // ...
 * }
 * ```
 */
export class ParamspaceError extends Error {
	public readonly code: string;

	constructor(message: string, code: string, cause?: Error) {
		super(message, cause === undefined ? undefined : { cause });
		this.name = "ParamspaceError";
		this.code = code;
	}

	/**
	 * Plain-object form for structured logs. Stack traces are left out; a
	 * cause is reduced to its name and message.
	 */
	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			cause: this.cause instanceof Error ? { name: this.cause.name, message: this.cause.message } : undefined,
		};
	}
}
