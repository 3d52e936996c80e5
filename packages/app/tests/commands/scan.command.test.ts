/**
 * Tests for the scan command
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { EMPTY_SCAN_COUNTS, fixedClock, type ScanResult } from '@yieldwatch/contracts';
import { ScanCommand } from '../../src/commands/scan.command.js';
import type { ReportSink } from '../../src/report/report-file.js';
import type { ScanRunSummary } from '../../src/scanner/monthly-scanner.js';
import { silentLogger } from '../helpers.js';

const tatung: ScanResult = {
  code: '2371',
  name: 'Tatung',
  market: 'listed',
  currentPrice: 55,
  monthlyLow: 50.5,
  trailingAnnualDividend: 2.5,
  trailingYieldPct: 4.5454,
  regime: 'bullish',
  currentHistogram: 0.1234,
  previousHistogram: -0.05,
};

class MemorySink implements ReportSink {
  readonly written: string[] = [];

  async write(content: string): Promise<void> {
    this.written.push(content);
  }
}

function summary(overrides: Partial<ScanRunSummary> = {}): ScanRunSummary {
  return {
    status: 'completed',
    outcomes: [],
    results: [tatung],
    counts: { ...EMPTY_SCAN_COUNTS, qualified: 1 },
    durationMs: 12,
    ...overrides,
  };
}

describe('ScanCommand', () => {
  let sink: MemorySink;

  beforeEach(() => {
    sink = new MemorySink();
  });

  function command(run: () => Promise<ScanRunSummary>): ScanCommand {
    return new ScanCommand({
      scanner: { run },
      sink,
      reportPath: 'scan_result.txt',
      minYieldPct: 3,
      timezone: 'Asia/Taipei',
      logger: silentLogger,
      clock: fixedClock('2026-10-19T02:00:00Z'),
    });
  }

  it('should write the rendered report', async () => {
    const result = await command(async () => summary()).execute({});

    expect(result.success).toBe(true);
    expect(sink.written).toHaveLength(1);
    expect(result.output).toMatchObject({ status: 'completed', matches: 1, reportPath: 'scan_result.txt' });
    expect(result.output?.report).toBe(sink.written[0]);
    expect(sink.written[0]).toContain('Run time: 2026-10-19 10:00\n');
    expect(sink.written[0]).toContain(
      '\n2371    Tatung      listed     55.00       50.50      2.50    4.5%  bullish    0.1234 /  -0.0500\n'
    );
  });

  it('should write a no-match report when nothing qualified', async () => {
    const result = await command(async () => summary({ results: [], counts: { ...EMPTY_SCAN_COUNTS, no_signal: 4 } })).execute(
      {}
    );

    expect(result.output?.matches).toBe(0);
    expect(sink.written[0]).toContain('\nNo securities matched this month\n');
  });

  it('should render but not write the report in a dry run', async () => {
    const result = await command(async () => summary()).execute({ dryRun: true });

    expect(result.success).toBe(true);
    expect(sink.written).toEqual([]);
    expect(result.output?.reportPath).toBeNull();
    expect(result.output?.report).toContain('Matches: 1');
    expect(result.metadata['dryRun']).toBe(true);
  });

  it('should not write a report for an empty universe', async () => {
    const result = await command(async () => summary({ status: 'empty_universe', results: [] })).execute({});

    expect(result.success).toBe(true);
    expect(result.output).toMatchObject({ status: 'empty_universe', reportPath: null, report: null });
    expect(sink.written).toEqual([]);
  });

  it('should turn a thrown error into a failed result', async () => {
    const result = await command(async () => {
      throw new Error('disk full');
    }).execute({});

    expect(result.success).toBe(false);
    expect(result.output).toBeNull();
    expect(result.error?.message).toBe('disk full');
    expect(result.metadata['errorMessage']).toBe('Error: disk full');
    expect(result.metadata['command']).toBe('scan');
  });
});
