/**
 * @fileoverview Logger factory for yieldwatch.
 * Creates winston loggers with redaction, standard fields and either JSON or
 * pretty-print output.
 */

import winston, { format } from 'winston';
import type { LoggerConfig, Logger } from './types.js';
import { redactPII, standardFields, prettyPrint } from './formats.js';

/**
 * Creates a configured logger.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: false });
 * const scanLogger = logger.child({ component: 'scanner' });
 * scanLogger.info('Universe loaded', { count: 1873 });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
  } = config;

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        level,
        format: json ? format.json() : prettyPrint,
        stderrLevels: ['error', 'warn'],
      })
    );
  }

  if (filePath) {
    // Files always get JSON lines, whatever the console shows.
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        format: format.json(),
      })
    );
  }

  return winston.createLogger({
    level,
    // Redact first, then add fields; each transport renders on its own.
    format: format.combine(redactPII(), standardFields),
    transports,
    // Global handlers decide when to exit.
    exitOnError: false,
    // A logger with no transports is valid (e.g. tests with console: false).
    silent: transports.length === 0,
  });
}

/**
 * Creates a child logger that adds `context` to every entry.
 */
export function createChildLogger(logger: Logger, context: Record<string, unknown>): Logger {
  return logger.child(context);
}
