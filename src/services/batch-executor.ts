import { err, ok, type Result, type ResultAsync } from 'neverthrow';
import { withDeadline } from '../runtime/command';
import type { BatchError, BatchFailure } from '../types/errors';
import { errorMessage } from '../types/errors';
import { log } from './logger';

export type BatchTask = {
  id: string;
  label?: string;   // shown in messages instead of the id when present
};

export type BatchOperation = (
  id: string,
  signal: AbortSignal,
) => ResultAsync<unknown, { message: string }> | Promise<Result<unknown, { message: string }>>;

export type BatchOptions = {
  timeoutMs: number;
  signal: AbortSignal;
  name?: string;
};

export type BatchSuccess = { succeeded: string[] };

function describe(failures: BatchFailure[], total: number): string {
  const parts = failures.map((f) => `${f.label ?? f.id} (${f.cause})`);
  return `${failures.length} of ${total} failed: ${parts.join(', ')}`;
}

/**
 * Runs `operation` for every task at once and waits for all of them. One
 * failure never cancels the others. The result is Ok only when every task
 * succeeded; otherwise the error lists each failed task with its cause.
 */
export async function runBatch(
  tasks: BatchTask[],
  operation: BatchOperation,
  options: BatchOptions,
): Promise<Result<BatchSuccess, BatchError>> {
  const signal = withDeadline(options.signal, options.timeoutMs);
  const name = options.name ?? 'batch';

  const outcomes = await Promise.all(
    tasks.map(async (task): Promise<{ task: BatchTask; cause: string | null }> => {
      try {
        const result = await operation(task.id, signal);
        return { task, cause: result.isOk() ? null : result.error.message };
      } catch (error) {
        return { task, cause: errorMessage(error) };
      }
    }),
  );

  const failures: BatchFailure[] = [];
  const succeeded: string[] = [];
  for (const { task, cause } of outcomes) {
    if (cause === null) succeeded.push(task.id);
    else failures.push({ id: task.id, cause, ...(task.label ? { label: task.label } : {}) });
  }

  if (failures.length === 0) {
    log.info(`${name} succeeded`, 'batch', { count: tasks.length });
    return ok({ succeeded });
  }

  const message = describe(failures, tasks.length);
  log.warn(`${name} partially failed`, 'batch', { failures, succeeded });
  return err({ kind: 'batch', message, failures, succeeded });
}
