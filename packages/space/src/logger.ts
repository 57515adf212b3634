import { createNodeLogger, type Logger, resolveLoggerOptions, withComponent } from "@paramspace/logger";

const logger = createNodeLogger(resolveLoggerOptions({ service: "search-space" }));

/**
 * Logger for one search space component.
 */
export function componentLogger(component: string): Logger {
	return withComponent(logger, component);
}
