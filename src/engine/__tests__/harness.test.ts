import { readFileSync } from "node:fs";
import { join } from "node:path";
import { describe, expect, it } from "vitest";

import {
  makeConfig,
  makeTempDir,
  PLANNER_REPLY,
  RESEARCHER_REPLY,
  scriptedService
} from "../../__tests__/helpers.js";
import type { MusweepConfig } from "../../config/types.js";
import { EventBus } from "../../events/event-bus.js";
import type { EventType } from "../../events/types.js";
import { createMockInferenceService } from "../../inference/mock-service.js";
import { loadLedger } from "../../ledger/ledger.js";
import { LEDGER_HEADER } from "../../ledger/csv-format.js";
import { LedgerWriteError } from "../../utils/errors.js";
import { runGridEvaluation } from "../harness.js";

const SMALL_GRID: MusweepConfig["grid"] = {
  alpha: [0.8],
  beta: [0.2, 0.6],
  k: [6],
  tau: [0.5],
  seed: [1],
  adversarial: [false, true],
  shuffle_seed: null
};

const sweepConfig = (dir: string, execution: Partial<MusweepConfig["execution"]> = {}) =>
  makeConfig({
    grid: SMALL_GRID,
    execution: { workers: 1, ...execution },
    output: { ledger_path: join(dir, "results.csv") }
  });

type TranscriptLine = { key: string; conversations: Record<string, unknown> };

const dataLines = (path: string): string[] =>
  readFileSync(path, "utf8")
    .split("\n")
    .slice(1)
    .filter((line) => line.length > 0);

describe("runGridEvaluation", () => {
  it("appends one row per grid point", async () => {
    const config = sweepConfig(makeTempDir());

    const summary = await runGridEvaluation({ config, service: createMockInferenceService() });

    expect(summary).toMatchObject({
      planned: 4,
      alreadyPersisted: 0,
      pending: 4,
      completed: 4,
      failed: 0,
      skipped: 0,
      stopReason: "completed"
    });
    const ledger = await loadLedger(config.output.ledger_path);
    expect(ledger.rows).toHaveLength(4);
    expect(ledger.rows.flatMap((row) => Object.values(row)).some((cell) => cell === null)).toBe(false);
    expect(readFileSync(config.output.ledger_path, "utf8").split("\n")[0]).toBe(LEDGER_HEADER);
  });

  it("emits sweep events in order", async () => {
    const config = makeConfig({
      grid: { ...SMALL_GRID, beta: [0.2], adversarial: [false] },
      execution: { workers: 1 },
      output: { ledger_path: join(makeTempDir(), "results.csv") }
    });
    const bus = new EventBus();
    const seen: EventType[] = [];
    const types: EventType[] = [
      "sweep.started",
      "ledger.loaded",
      "point.dispatched",
      "point.completed",
      "worker.status",
      "sweep.completed",
      "sweep.failed",
      "warning.raised"
    ];
    types.forEach((type) => bus.subscribe(type, () => void seen.push(type)));

    await runGridEvaluation({ config, service: createMockInferenceService(), bus });

    expect(seen).toEqual([
      "sweep.started",
      "ledger.loaded",
      "point.dispatched",
      "worker.status",
      "point.completed",
      "worker.status",
      "sweep.completed"
    ]);
  });

  it("does nothing on a rerun over a complete ledger", async () => {
    const config = sweepConfig(makeTempDir());
    await runGridEvaluation({ config, service: createMockInferenceService() });
    const before = readFileSync(config.output.ledger_path, "utf8");

    const summary = await runGridEvaluation({ config, service: createMockInferenceService() });

    expect(summary).toMatchObject({ alreadyPersisted: 4, pending: 0, completed: 0 });
    expect(readFileSync(config.output.ledger_path, "utf8")).toBe(before);
  });

  it("fills in only the missing rows after an interrupted run", async () => {
    const dir = makeTempDir();
    let clock = 0;
    const bus = new EventBus();
    bus.subscribe("point.completed", () => {
      clock += 6000;
    });
    await runGridEvaluation({
      config: sweepConfig(dir, { time_budget_s: 5 }),
      service: createMockInferenceService(),
      bus,
      now: () => clock
    });
    expect(dataLines(join(dir, "results.csv"))).toHaveLength(1);

    const summary = await runGridEvaluation({
      config: sweepConfig(dir, { workers: 3 }),
      service: createMockInferenceService()
    });

    expect(summary).toMatchObject({ alreadyPersisted: 1, pending: 3, completed: 3 });
    const ledger = await loadLedger(join(dir, "results.csv"));
    expect(ledger.droppedDuplicates).toBe(0);
    expect(ledger.keys.size).toBe(4);
    expect(dataLines(join(dir, "results.csv"))).toHaveLength(4);
  });

  it("counts only rows of the current grid as already persisted", async () => {
    const dir = makeTempDir();
    await runGridEvaluation({ config: sweepConfig(dir), service: createMockInferenceService() });

    const narrowed = makeConfig({
      grid: { ...SMALL_GRID, beta: [0.2] },
      execution: { workers: 1 },
      output: { ledger_path: join(dir, "results.csv") }
    });
    const summary = await runGridEvaluation({ config: narrowed, service: createMockInferenceService() });

    expect(summary).toMatchObject({ planned: 2, alreadyPersisted: 2, pending: 0, completed: 0 });
  });

  it("produces the same rows regardless of worker count", async () => {
    const sequential = sweepConfig(makeTempDir(), { workers: 1 });
    const concurrent = sweepConfig(makeTempDir(), { workers: 4 });

    await runGridEvaluation({ config: sequential, service: createMockInferenceService() });
    await runGridEvaluation({ config: concurrent, service: createMockInferenceService() });

    expect(dataLines(concurrent.output.ledger_path).sort()).toEqual(
      dataLines(sequential.output.ledger_path).sort()
    );
  });

  it("stops dispatching once the time budget is spent", async () => {
    const config = sweepConfig(makeTempDir(), { time_budget_s: 10 });
    const bus = new EventBus();
    let clock = 0;
    bus.subscribe("point.completed", () => {
      clock += 6000;
    });

    const summary = await runGridEvaluation({
      config,
      service: createMockInferenceService(),
      bus,
      now: () => clock
    });

    expect(summary).toMatchObject({ completed: 2, skipped: 2, stopReason: "time_budget_exhausted" });
    expect(dataLines(config.output.ledger_path)).toHaveLength(2);
  });

  it("records failed points with empty metric cells and reruns them on request", async () => {
    const dir = makeTempDir();
    const failing = scriptedService({
      planner: [PLANNER_REPLY],
      researcher: [RESEARCHER_REPLY],
      critic: ["I cannot answer that."]
    });

    const first = await runGridEvaluation({ config: sweepConfig(dir), service: failing });
    expect(first).toMatchObject({ completed: 4, failed: 4 });
    const ledger = await loadLedger(join(dir, "results.csv"));
    expect(ledger.rows.every((row) => row.RoundsToApproval_baseline === null)).toBe(true);
    expect(ledger.rows.every((row) => row.AgreementRate_influence === null)).toBe(true);

    const retried = await runGridEvaluation({
      config: sweepConfig(dir, { retry_failed: true }),
      service: createMockInferenceService()
    });
    expect(retried).toMatchObject({ alreadyPersisted: 0, completed: 4, failed: 0 });
    expect(dataLines(join(dir, "results.csv"))).toHaveLength(4);
  });

  it("fails the sweep when the ledger cannot be written", async () => {
    const config = sweepConfig(makeTempDir());
    const bus = new EventBus();
    const failures: Array<string | undefined> = [];
    bus.subscribe("sweep.failed", (payload) => {
      failures.push(payload.error_code);
    });

    await expect(
      runGridEvaluation({
        config,
        service: createMockInferenceService(),
        bus,
        appendText: async () => {
          throw new Error("read-only file system");
        }
      })
    ).rejects.toBeInstanceOf(LedgerWriteError);
    expect(failures).toEqual(["ledger_write_error"]);
    expect(readFileSync(config.output.ledger_path, "utf8")).toBe(`${LEDGER_HEADER}\n`);
  });

  it("writes no transcript record for a point whose row was not saved", async () => {
    const dir = makeTempDir();
    const config = makeConfig({
      grid: SMALL_GRID,
      execution: { workers: 1 },
      output: { ledger_path: join(dir, "results.csv"), transcripts_path: join(dir, "transcripts.jsonl") }
    });

    await expect(
      runGridEvaluation({
        config,
        service: createMockInferenceService(),
        appendText: async () => {
          throw new Error("read-only file system");
        }
      })
    ).rejects.toBeInstanceOf(LedgerWriteError);
    expect(readFileSync(join(dir, "transcripts.jsonl"), "utf8")).toBe("");
  });

  it("writes one transcript record per completed point", async () => {
    const dir = makeTempDir();
    const config = makeConfig({
      grid: SMALL_GRID,
      execution: { workers: 2 },
      output: { ledger_path: join(dir, "results.csv"), transcripts_path: join(dir, "out", "transcripts.jsonl") }
    });

    await runGridEvaluation({ config, service: createMockInferenceService() });

    const records = readFileSync(join(dir, "out", "transcripts.jsonl"), "utf8")
      .trim()
      .split("\n")
      .map((line): TranscriptLine => JSON.parse(line));
    expect(records.map((record) => record.key).sort()).toEqual([
      "beta=0.2|k=6|tau=0.5|alpha=0.8|seed=1|adv=0",
      "beta=0.2|k=6|tau=0.5|alpha=0.8|seed=1|adv=1",
      "beta=0.6|k=6|tau=0.5|alpha=0.8|seed=1|adv=0",
      "beta=0.6|k=6|tau=0.5|alpha=0.8|seed=1|adv=1"
    ]);
    expect(Object.keys(records[0].conversations)).toEqual(["baseline", "influence"]);
  });
});
