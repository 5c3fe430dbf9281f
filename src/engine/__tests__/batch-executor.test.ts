import { setTimeout as delay } from "node:timers/promises";
import { describe, expect, it } from "vitest";

import { runBatchWithWorkers } from "../batch-executor.js";

describe("runBatchWithWorkers", () => {
  it("never runs more entries at once than there are workers", async () => {
    let running = 0;
    let peak = 0;

    const outcome = await runBatchWithWorkers({
      entries: [1, 2, 3, 4, 5, 6],
      workerCount: 2,
      shouldStop: () => false,
      execute: async (entry) => {
        running += 1;
        peak = Math.max(peak, running);
        await delay(2);
        running -= 1;
        return entry * 10;
      }
    });

    expect(peak).toBe(2);
    expect([...outcome.results].sort((a, b) => a - b)).toEqual([10, 20, 30, 40, 50, 60]);
    expect(outcome.dispatched).toBe(6);
    expect(outcome.stopped).toBe(false);
  });

  it("stops dispatching once asked, letting running entries finish", async () => {
    const started: number[] = [];

    const outcome = await runBatchWithWorkers({
      entries: [1, 2, 3, 4, 5],
      workerCount: 1,
      shouldStop: () => started.length >= 3,
      execute: async (entry) => {
        started.push(entry);
        await delay(1);
        return entry;
      }
    });

    expect(started).toEqual([1, 2, 3]);
    expect(outcome).toEqual({ results: [1, 2, 3], dispatched: 3, stopped: true });
  });

  it("rejects with the first error and dispatches nothing after it", async () => {
    const started: number[] = [];

    await expect(
      runBatchWithWorkers({
        entries: [1, 2, 3, 4],
        workerCount: 1,
        shouldStop: () => false,
        execute: async (entry) => {
          started.push(entry);
          if (entry === 2) {
            throw new Error("boom");
          }
          return entry;
        }
      })
    ).rejects.toThrow("boom");
    expect(started).toEqual([1, 2]);
  });

  it("reports busy and idle transitions per worker", async () => {
    const updates: string[] = [];

    await runBatchWithWorkers({
      entries: ["a", "b"],
      workerCount: 1,
      shouldStop: () => false,
      execute: async (entry) => entry.toUpperCase(),
      onWorkerStatus: ({ workerId, status, entry }) => updates.push(`${workerId}:${status}:${entry}`)
    });

    expect(updates).toEqual(["1:busy:a", "1:idle:a", "1:busy:b", "1:idle:b"]);
  });

  it("resolves immediately for an empty batch and rejects a zero worker count", async () => {
    await expect(
      runBatchWithWorkers({ entries: [], workerCount: 3, shouldStop: () => false, execute: async () => 1 })
    ).resolves.toEqual({ results: [], dispatched: 0, stopped: false });

    await expect(
      runBatchWithWorkers({ entries: [1], workerCount: 0, shouldStop: () => false, execute: async () => 1 })
    ).rejects.toThrow("workerCount must be >= 1, got 0");
  });
});
