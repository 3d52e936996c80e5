/**
 * Command types and interfaces
 */

/**
 * Options every command accepts
 */
export interface CommandOptions {
  dryRun?: boolean;
  verbose?: boolean;
}

/**
 * Command execution result
 */
export interface CommandResult<TOutput = unknown> {
  success: boolean;
  output: TOutput | null;
  error?: Error;
  duration: number;
  metadata: Record<string, unknown>;
}

/**
 * Base command interface
 */
export interface Command<TOptions extends CommandOptions = CommandOptions, TOutput = unknown> {
  readonly name: string;
  readonly description: string;
  execute(options: TOptions): Promise<CommandResult<TOutput>>;
}
