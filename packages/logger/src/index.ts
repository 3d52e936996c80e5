/**
 * @fileoverview Public API of @yieldwatch/logger.
 */

export { createLogger, createChildLogger } from './createLogger.js';

export { attachGlobalHandlers, gracefulExit } from './errorHandler.js';

export { generateRunId, getRunContext, getRunId, withRunContext } from './run-context.js';

export { startTimer } from './perf-timer.js';

export { redactPII, redactValue, isSensitiveFieldName } from './formats.js';

export type { Logger, LoggerConfig, LogLevel, LogFields } from './types.js';
export type { RunContext } from './run-context.js';
export type { PerfTimer } from './perf-timer.js';
