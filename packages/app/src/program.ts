/**
 * Command-line interface definition (commander).
 */

import { Command, InvalidArgumentError } from 'commander';
import { formatCommandError } from './commands/errors.js';
import type { MonitorCommandOutput } from './commands/monitor.command.js';
import type { ScanCommandOutput } from './commands/scan.command.js';
import type { CommandResult } from './commands/types.js';
import { runMonitor, runScan, type MonitorFlags, type ScanFlags } from './start.js';

export const VERSION = '0.1.0';

export interface ProgramHandlers {
  scan(flags: ScanFlags): Promise<CommandResult<ScanCommandOutput>>;
  monitor(flags: MonitorFlags): Promise<CommandResult<MonitorCommandOutput>>;

  /** Receives the process exit code of the finished command */
  exit(code: number): void;

  /** Report and error text for the terminal */
  print(text: string): void;
  printError(text: string): void;
}

const defaultHandlers: ProgramHandlers = {
  scan: (flags) => runScan(flags),
  monitor: (flags) => runMonitor(flags),
  exit: (code) => {
    process.exitCode = code;
  },
  print: (text) => {
    process.stdout.write(text);
  },
  printError: (text) => {
    process.stderr.write(`${text}\n`);
  },
};

/**
 * commander argument parser for `--min-yield`.
 */
export function parsePercent(value: string): number {
  const pct = Number(value);
  if (value.trim() === '' || !Number.isFinite(pct) || pct < 0) {
    throw new InvalidArgumentError('Expected a non-negative number.');
  }
  return pct;
}

async function runCommand<T>(
  handlers: ProgramHandlers,
  run: () => Promise<CommandResult<T>>,
  onSuccess: (output: T | null) => void = () => undefined
): Promise<void> {
  try {
    const result = await run();
    if (result.success) {
      onSuccess(result.output);
      handlers.exit(0);
      return;
    }
    const message = result.metadata['errorMessage'];
    handlers.printError(typeof message === 'string' ? message : formatCommandError(result.error));
    handlers.exit(1);
  } catch (error) {
    // Configuration failures surface before a logger exists.
    handlers.printError(formatCommandError(error));
    handlers.exit(1);
  }
}

export function buildProgram(overrides: Partial<ProgramHandlers> = {}): Command {
  const handlers: ProgramHandlers = { ...defaultHandlers, ...overrides };
  const program = new Command();

  program
    .name('yieldwatch')
    .description('Monthly MACD dividend scan and intraday monthly-low monitor for Taiwan securities')
    .version(VERSION);

  program
    .command('scan')
    .description('Scan listed and OTC securities and write the report')
    .option('--report <path>', 'Report file to write (overrides REPORT_PATH)')
    .option('--min-yield <pct>', 'Minimum trailing dividend yield in percent', parsePercent)
    .option('--dry-run', 'Scan and print the report without writing it', false)
    .option('-v, --verbose', 'Debug logging and stack traces on failure', false)
    .action(async (flags: ScanFlags) => {
      await runCommand(
        handlers,
        () => handlers.scan(flags),
        (output) => {
          if (flags.dryRun && output?.report) {
            handlers.print(output.report);
          }
        }
      );
    });

  program
    .command('monitor')
    .description('Notify securities trading below their monthly low')
    .option('--report <path>', 'Report file to read (overrides REPORT_PATH)')
    .option('--ledger <path>', 'Alert ledger file (overrides ALERT_LEDGER_PATH)')
    .option('--ignore-trading-window', 'Run outside trading hours', false)
    .option('--dry-run', 'Evaluate and log without notifying or writing the ledger', false)
    .option('-v, --verbose', 'Debug logging and stack traces on failure', false)
    .action(async (flags: MonitorFlags) => {
      await runCommand(handlers, () => handlers.monitor(flags));
    });

  return program;
}
