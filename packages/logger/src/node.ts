import { envBool, envEnum, envStr } from "@paramspace/common";
import pino, { type DestinationStream } from "pino";
import { LOG_LEVELS, type Logger, type LogLevel, type NodeLoggerOptions } from "./types";

const severityMap: Record<string, string> = {
	debug: "DEBUG",
	info: "INFO",
	warn: "WARNING",
	error: "ERROR",
};

/**
 * Create a Pino logger for Node.js.
 *
 * - Uppercase severity labels under `severity`
 * - ISO timestamps
 * - `pino-pretty` transport when `pretty` is set (defaults on in development)
 * - Structured JSON otherwise
 */
export function createNodeLogger(options: NodeLoggerOptions, destination?: DestinationStream): Logger {
	const {
		service,
		level = "info",
		environment = envStr("NODE_ENV", "development"),
		version = process.env.npm_package_version,
		pretty = environment === "development",
		redactPaths = [],
		base = {},
		pinoOptions = {},
	} = options;

	const transport =
		pretty && !destination
			? {
					target: "pino-pretty",
					options: {
						colorize: true,
						translateTime: "SYS:standard",
						ignore: "pid,hostname",
						levelFirst: true,
						messageFormat: "{component} - {msg}",
					},
				}
			: undefined;

	return pino(
		{
			level,
			formatters: {
				level(label) {
					return { severity: severityMap[label] || label.toUpperCase() };
				},
				bindings(bindings) {
					const { pid: _pid, hostname: _hostname, ...rest } = bindings;
					return {
						service,
						environment,
						...(version ? { version } : {}),
						...base,
						...rest,
					};
				},
			},
			timestamp: pino.stdTimeFunctions.isoTime,
			...(redactPaths.length > 0 && {
				redact: { paths: [...redactPaths], censor: "[REDACTED]" },
			}),
			...(transport && { transport }),
			...pinoOptions,
		},
		destination,
	);
}

/**
 * Resolve level and pretty printing from `PARAMSPACE_LOG_LEVEL` and
 * `PARAMSPACE_LOG_PRETTY`; explicit options win.
 */
export function resolveLoggerOptions(options: NodeLoggerOptions): NodeLoggerOptions {
	const level: LogLevel = options.level ?? envEnum("PARAMSPACE_LOG_LEVEL", LOG_LEVELS, "info");
	const environment = options.environment ?? envStr("NODE_ENV", "development");
	const pretty = options.pretty ?? envBool("PARAMSPACE_LOG_PRETTY", environment === "development");
	return { ...options, level, environment, pretty };
}

/**
 * Create a child logger tagged with a component name.
 *
 * @param logger - Parent logger
 * @param component - Component label, rendered by the pretty transport
 */
export function withComponent(logger: Logger, component: string): Logger {
	return logger.child({ component });
}
