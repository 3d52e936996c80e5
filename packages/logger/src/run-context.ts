/**
 * @fileoverview Run-scoped context propagated through async calls.
 *
 * Each scan or monitor run executes inside {@link withRunContext}; every log
 * entry written during the run then carries the same `run_id`.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export interface RunContext {
  run_id: string;

  /** Job name ('scan' | 'monitor') */
  job?: string;

  [key: string]: unknown;
}

const runContextStorage = new AsyncLocalStorage<RunContext>();

export function generateRunId(): string {
  return randomUUID();
}

export function getRunContext(): RunContext | undefined {
  return runContextStorage.getStore();
}

export function getRunId(): string | undefined {
  return runContextStorage.getStore()?.run_id;
}

/**
 * Executes `fn` with a fresh run context.
 *
 * @example
 * ```typescript
 * await withRunContext(() => scanner.run(), { job: 'scan' });
 * ```
 */
export async function withRunContext<T>(
  fn: () => Promise<T> | T,
  fields: Omit<RunContext, 'run_id'> & { run_id?: string } = {}
): Promise<T> {
  const context: RunContext = {
    ...fields,
    run_id: fields.run_id ?? generateRunId(),
  };

  return runContextStorage.run(context, fn);
}
