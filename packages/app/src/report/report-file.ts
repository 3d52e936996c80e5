/**
 * The report on disk.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { MonitoredSecurity } from '@yieldwatch/contracts';
import type { Logger } from '@yieldwatch/logger';
import { parseReport } from './report-parser.js';

/**
 * Where the monitor gets its securities from.
 */
export interface ReportSource {
  /** Parsed rows, or null when there is no report yet */
  load(): Promise<MonitoredSecurity[] | null>;
}

export interface ReportSink {
  write(content: string): Promise<void>;
}

export class ReportFile implements ReportSource, ReportSink {
  constructor(
    readonly path: string,
    private readonly logger: Logger
  ) {}

  async load(): Promise<MonitoredSecurity[] | null> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }
    const securities = parseReport(content);
    this.logger.debug('Report loaded', { path: this.path, rows: securities.length });
    return securities;
  }

  async write(content: string): Promise<void> {
    await mkdir(path.dirname(this.path), { recursive: true });
    await writeFile(this.path, content, 'utf-8');
    this.logger.info('Report written', { path: this.path, bytes: Buffer.byteLength(content, 'utf-8') });
  }
}
