// Main exports for the logging package

import pino from "pino";

export { createNodeLogger, resolveLoggerOptions, withComponent } from "./node";
export * from "./types";
export { pino };
