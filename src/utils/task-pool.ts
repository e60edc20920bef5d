/**
 * Bounded Task Pool
 *
 * Runs async tasks with a fixed number of workers. Each task can carry its own
 * timeout. Results land in the slot matching the task's input index, so callers
 * never share mutable state between workers.
 */

import { logger } from './logger';
import { TimeoutError, getErrorMessage } from './errors';

export type TaskOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: Error };

interface TaskPoolConfig {
  name: string;
  concurrency: number;
  taskTimeoutMs?: number;
}

export class TaskPool {
  private name: string;
  private concurrency: number;
  private taskTimeoutMs: number | undefined;
  private completed: number = 0;
  private failed: number = 0;

  constructor(config: TaskPoolConfig) {
    this.name = config.name;
    this.concurrency = Math.max(1, Math.floor(config.concurrency));
    this.taskTimeoutMs = config.taskTimeoutMs;
  }

  /**
   * Run every task, at most `concurrency` at a time.
   * Never rejects: each slot reports its own success or error.
   */
  async runAll<T>(tasks: Array<() => Promise<T>>): Promise<TaskOutcome<T>[]> {
    const results: TaskOutcome<T>[] = new Array(tasks.length);
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < tasks.length) {
        const index = next++;
        const task = tasks[index];
        try {
          const value = await this.runOne(task, `${this.name}#${index}`);
          results[index] = { ok: true, value };
          this.completed++;
        } catch (error: unknown) {
          this.failed++;
          results[index] = {
            ok: false,
            error: error instanceof Error ? error : new Error(getErrorMessage(error)),
          };
        }
      }
    };

    const workerCount = Math.min(this.concurrency, tasks.length);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    logger.debug(`[${this.name}] pool finished`, {
      tasks: tasks.length,
      workers: workerCount,
      failed: results.filter(r => !r.ok).length,
    });

    return results;
  }

  getStats(): { name: string; concurrency: number; completed: number; failed: number } {
    return {
      name: this.name,
      concurrency: this.concurrency,
      completed: this.completed,
      failed: this.failed,
    };
  }

  private runOne<T>(task: () => Promise<T>, label: string): Promise<T> {
    if (this.taskTimeoutMs === undefined) {
      return task();
    }
    return withTimeout(task(), this.taskTimeoutMs, label);
  }
}

/**
 * Race a promise against a timer. The timer is always cleared.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, ms)), ms);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
