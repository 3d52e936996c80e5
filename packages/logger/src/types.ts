/**
 * @fileoverview Type definitions for the yieldwatch logger.
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Minimum severity written by a logger.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Options for {@link createLogger}.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: process.env.NODE_ENV === 'production',
 *   filePath: './logs/monitor.log'
 * };
 * ```
 */
export interface LoggerConfig {
  level: LogLevel;

  /**
   * Machine-readable JSON lines instead of colourised text.
   * @default true in production, false otherwise
   */
  json?: boolean;

  /** Also append entries to this file */
  filePath?: string;

  /**
   * Write to stdout/stderr.
   * @default true
   */
  console?: boolean;
}

/**
 * Fields the jobs attach to log entries. Anything else is allowed too.
 */
export interface LogFields {
  /** Job run correlation id, injected from the run context */
  run_id?: string;

  /** 'scan' or 'monitor' */
  job?: string;

  /** Module emitting the entry, usually set on a child logger */
  component?: string;

  /** Four-digit security code */
  code?: string;

  /** Provider symbol, e.g. '2371.TW' */
  symbol?: string;

  duration_ms?: number;

  /** Outcome status of the item or run */
  status?: string;

  [key: string]: unknown;
}

/**
 * Winston's logger, re-exported so packages only depend on this one.
 */
export type Logger = WinstonLogger;
