import type { Logger as PinoLogger, LoggerOptions as PinoOptions } from "pino";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface NodeLoggerOptions {
	/** Service name for all logs */
	service: string;
	/** Log level (default: 'info') */
	level?: LogLevel;
	/** Environment name */
	environment?: string;
	/** Service version */
	version?: string;
	/** Enable pretty printing (default: based on NODE_ENV) */
	pretty?: boolean;
	/** Paths to censor in logged objects */
	redactPaths?: readonly string[];
	/** Base context to include in all logs */
	base?: Record<string, unknown>;
	/** Custom Pino options */
	pinoOptions?: Partial<PinoOptions>;
}

export type Logger = PinoLogger;
