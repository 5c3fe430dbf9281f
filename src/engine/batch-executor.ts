export type WorkerStatusUpdate<Entry, Result> = {
  workerId: number;
  status: "busy" | "idle";
  entry: Entry;
  index: number;
  result?: Result;
  error?: unknown;
};

export type RunBatchWithWorkersOptions<Entry, Result> = {
  entries: ReadonlyArray<Entry>;
  workerCount: number;
  /** Consulted before each dispatch; running entries are never interrupted. */
  shouldStop: () => boolean;
  execute: (entry: Entry, workerId: number) => Promise<Result>;
  onWorkerStatus?: (update: WorkerStatusUpdate<Entry, Result>) => void;
};

export type BatchOutcome<Result> = {
  results: Result[];
  dispatched: number;
  stopped: boolean;
};

/**
 * Executes entries with bounded concurrency.
 *
 * Results are returned in completion order, not input order. The first error
 * stops further dispatch; the promise rejects with it once in-flight entries
 * have settled.
 */
export const runBatchWithWorkers = async <Entry, Result>(
  options: RunBatchWithWorkersOptions<Entry, Result>
): Promise<BatchOutcome<Result>> => {
  const workerCount = Math.floor(options.workerCount);
  if (!Number.isFinite(workerCount) || workerCount < 1) {
    throw new Error(`workerCount must be >= 1, got ${options.workerCount}`);
  }

  const results: Result[] = [];
  const idleWorkers = Array.from({ length: workerCount }, (_, index) => index + 1);
  let next = 0;
  let inFlight = 0;
  let stopped = false;
  let settled = false;
  let failed = false;
  let firstError: unknown;

  return new Promise((resolve, reject) => {
    const finish = (): void => {
      if (settled || inFlight > 0) {
        return;
      }
      if (failed) {
        settled = true;
        reject(firstError);
        return;
      }
      if (stopped || next >= options.entries.length) {
        settled = true;
        resolve({ results, dispatched: next, stopped });
      }
    };

    const release = (workerId: number): void => {
      inFlight -= 1;
      idleWorkers.push(workerId);
    };

    const launch = (): void => {
      while (!failed && !stopped && next < options.entries.length && idleWorkers.length > 0) {
        if (options.shouldStop()) {
          stopped = true;
          break;
        }
        const index = next;
        const entry = options.entries[index];
        const workerId = idleWorkers.shift() ?? workerCount;
        next += 1;
        inFlight += 1;
        options.onWorkerStatus?.({ workerId, status: "busy", entry, index });

        options
          .execute(entry, workerId)
          .then(
            (result) => {
              results.push(result);
              release(workerId);
              options.onWorkerStatus?.({ workerId, status: "idle", entry, index, result });
            },
            (error: unknown) => {
              release(workerId);
              options.onWorkerStatus?.({ workerId, status: "idle", entry, index, error });
              if (!failed) {
                failed = true;
                firstError = error;
              }
            }
          )
          .then(() => {
            launch();
            finish();
          }, reject);
      }
      finish();
    };

    launch();
  });
};
