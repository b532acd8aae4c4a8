import { logger } from "../config/logger.js";
import { TaskCancelledError, cancelReasonOf } from "./shared/errors.js";

export interface PoolJob<T> {
  readonly priority: number;
  readonly signal: AbortSignal;
  readonly label?: string;
  execute(signal: AbortSignal): Promise<T>;
}

interface QueuedJob {
  readonly priority: number;
  readonly sequence: number;
  readonly start: () => void;
}

/**
 * Fixed number of execution slots fed from a priority queue (lower value
 * first, FIFO within a priority). An aborted job gives its slot back at once,
 * even if the work it started has not settled.
 */
export class WorkerPool {
  private running = 0;
  private sequence = 0;
  private readonly waiting: QueuedJob[] = [];

  constructor(readonly size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Worker pool size must be a positive integer, got ${String(size)}`);
    }
  }

  get active(): number {
    return this.running;
  }

  get queued(): number {
    return this.waiting.length;
  }

  run<T>(job: PoolJob<T>): Promise<T> {
    if (job.signal.aborted) {
      return Promise.reject(new TaskCancelledError(cancelReasonOf(job.signal)));
    }

    return new Promise<T>((resolve, reject) => {
      let settled = false;
      let holdsSlot = false;

      const finish = (): void => {
        job.signal.removeEventListener("abort", onAbort);
        if (holdsSlot) {
          holdsSlot = false;
          this.release();
        }
      };

      const onAbort = (): void => {
        if (settled) return;
        settled = true;
        this.dequeue(entry);
        finish();
        reject(new TaskCancelledError(cancelReasonOf(job.signal)));
      };

      const start = (): void => {
        holdsSlot = true;
        this.running++;
        void executeSafely(job)
          .then(
            (value) => {
              if (settled) return;
              settled = true;
              finish();
              resolve(value);
            },
            (error: unknown) => {
              if (settled) {
                logger.debug(
                  { job: job.label, error: error instanceof Error ? error.message : String(error) },
                  "Cancelled job rejected after its slot was reclaimed",
                );
                return;
              }
              settled = true;
              finish();
              reject(error instanceof Error ? error : new Error(String(error)));
            },
          );
      };

      const entry: QueuedJob = { priority: job.priority, sequence: this.sequence++, start };
      job.signal.addEventListener("abort", onAbort, { once: true });

      if (this.running < this.size) {
        start();
      } else {
        this.enqueue(entry);
      }
    });
  }

  private enqueue(entry: QueuedJob): void {
    const index = this.waiting.findIndex(
      (other) =>
        other.priority > entry.priority ||
        (other.priority === entry.priority && other.sequence > entry.sequence),
    );
    if (index === -1) {
      this.waiting.push(entry);
    } else {
      this.waiting.splice(index, 0, entry);
    }
  }

  private dequeue(entry: QueuedJob): void {
    const index = this.waiting.indexOf(entry);
    if (index !== -1) this.waiting.splice(index, 1);
  }

  private release(): void {
    this.running--;
    const next = this.waiting.shift();
    if (next) next.start();
  }
}

function executeSafely<T>(job: PoolJob<T>): Promise<T> {
  try {
    return job.execute(job.signal);
  } catch (error) {
    return Promise.reject(error instanceof Error ? error : new Error(String(error)));
  }
}
