/**
 * Base command class
 *
 * Template method: subclasses implement `executeCommand`; the base class
 * times the run, logs start and end, builds metadata and turns any thrown
 * error into a failed result.
 */

import { isWatchError } from '@yieldwatch/contracts';
import { startTimer, type Logger } from '@yieldwatch/logger';
import { formatCommandError } from './errors.js';
import type { Command, CommandOptions, CommandResult } from './types.js';

export interface CommandExecution<TOutput> {
  output: TOutput;
  metadata?: Record<string, unknown>;
}

export abstract class BaseCommand<TOptions extends CommandOptions, TOutput> implements Command<TOptions, TOutput> {
  abstract readonly name: string;
  abstract readonly description: string;

  constructor(protected readonly logger: Logger) {}

  async execute(options: TOptions): Promise<CommandResult<TOutput>> {
    const timer = startTimer();

    try {
      this.logger.info(`Executing ${this.name} command`, { options });

      const result = await this.executeCommand(options);
      const duration = timer.stop();

      this.logger.info(`${this.name} command completed`, { duration_ms: duration });

      return {
        success: true,
        output: result.output,
        duration,
        metadata: this.buildMetadata(duration, result.metadata),
      };
    } catch (error) {
      return this.handleError(error, timer.stop(), options.verbose ?? false);
    }
  }

  protected abstract executeCommand(options: TOptions): Promise<CommandExecution<TOutput>>;

  protected buildMetadata(duration: number, extra: Record<string, unknown> = {}): Record<string, unknown> {
    return {
      command: this.name,
      duration,
      timestamp: new Date().toISOString(),
      ...extra,
    };
  }

  protected handleError(error: unknown, duration: number, verbose: boolean): CommandResult<TOutput> {
    this.logger.error(`${this.name} command failed`, {
      error: error instanceof Error ? error.message : String(error),
      errorCode: isWatchError(error) ? error.code : undefined,
      stack: error instanceof Error ? error.stack : undefined,
    });

    return {
      success: false,
      output: null,
      error: error instanceof Error ? error : new Error(String(error)),
      duration,
      metadata: {
        ...this.buildMetadata(duration),
        errorMessage: formatCommandError(error, verbose),
      },
    };
  }
}
