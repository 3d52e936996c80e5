/**
 * @fileoverview Custom winston formats: redaction, standard fields and
 * pretty-print output.
 */

import { format } from 'winston';
import { getRunContext } from './run-context.js';

/**
 * Field names whose values never reach a log sink.
 */
const SENSITIVE_FIELD_PATTERNS = [
  /password/i,
  /passwd/i,
  /secret/i,
  /api[_-]?key/i,
  /token/i,
  /authorization/i,
  /cookie/i,
  /private[_-]?key/i,
];

const REDACTED = '[REDACTED]';

/** Winston's own fields; never redacted or re-printed. */
const CORE_FIELDS = ['level', 'message', 'timestamp', 'stack'];

export function isSensitiveFieldName(name: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(name));
}

/**
 * Returns a copy of `value` with sensitive keys replaced, recursing into
 * arrays and plain objects. Error instances pass through untouched.
 */
export function redactValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item));
  }

  if (value === null || typeof value !== 'object' || value instanceof Error) {
    return value;
  }

  const redacted: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(value)) {
    redacted[key] = isSensitiveFieldName(key) ? REDACTED : redactValue(inner);
  }
  return redacted;
}

/**
 * Redacts sensitive metadata. Must run before any output format.
 *
 * @example
 * ```typescript
 * logger.info('Notifier configured', { url: 'http://n/?num=', token: 'abc' });
 * // {"message":"Notifier configured","url":"http://n/?num=","token":"[REDACTED]"}
 * ```
 */
export const redactPII = format((info) => {
  for (const key of Object.keys(info)) {
    if (CORE_FIELDS.includes(key)) {
      continue;
    }
    info[key] = isSensitiveFieldName(key) ? REDACTED : redactValue(info[key]);
  }
  return info;
});

/**
 * Adds the ISO timestamp, expands Error stacks and injects the run context.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true }),
  format((info) => {
    const context = getRunContext();
    if (context) {
      for (const [key, value] of Object.entries(context)) {
        if (info[key] === undefined) {
          info[key] = value;
        }
      }
    }
    return info;
  })()
);

/**
 * Human-readable single-line output.
 *
 * @example
 * ```text
 * [2026-10-19T09:15:02.114+08:00] info: Breach notified job=monitor code=2371 price=45
 * ```
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => {
    const { timestamp, level, message, job, component, code, run_id, ...rest } = info;

    const context: string[] = [];
    if (job) context.push(`job=${String(job)}`);
    if (component) context.push(`component=${String(component)}`);
    if (code) context.push(`code=${String(code)}`);

    for (const [key, value] of Object.entries(rest)) {
      if (CORE_FIELDS.includes(key)) {
        continue;
      }
      context.push(`${key}=${JSON.stringify(value)}`);
    }
    if (run_id) context.push(`run_id=${String(run_id)}`);

    const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
    const line = `[${String(timestamp)}] ${level}: ${String(message)}${contextStr}`;

    return typeof info['stack'] === 'string' ? `${line}\n${info['stack']}` : line;
  })
);
