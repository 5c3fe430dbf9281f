import { randomBytes } from "node:crypto";
import { mkdir } from "node:fs/promises";
import { dirname } from "node:path";

import { createJsonlWriter, type JsonlWriter } from "../artifacts/io.js";
import type { ResolvedConfig } from "../config/types.js";
import type { Conversation } from "../core/types.js";
import { EventBus } from "../events/event-bus.js";
import type { SweepStopReason } from "../events/types.js";
import type { InferenceService } from "../inference/service.js";
import { loadLedger, LedgerWriter, type AppendText } from "../ledger/ledger.js";
import { describeError } from "../utils/errors.js";
import { fingerprint } from "../utils/fingerprint.js";
import { runBatchWithWorkers } from "./batch-executor.js";
import { enumerateGrid, gridPointKey } from "./grid.js";
import { createGridPointExecutor, type GridPointOutcome } from "./grid-point-executor.js";

export type GridEvaluationOptions = {
  config: ResolvedConfig;
  service: InferenceService;
  bus?: EventBus;
  /** Milliseconds clock for the time budget; defaults to `Date.now`. */
  now?: () => number;
  /** Replaces the ledger's `appendFile`; used to simulate disk failures. */
  appendText?: AppendText;
};

export type SweepSummary = {
  runId: string;
  ledgerPath: string;
  planned: number;
  alreadyPersisted: number;
  pending: number;
  completed: number;
  failed: number;
  skipped: number;
  stopReason: SweepStopReason;
  elapsedMs: number;
};

type TranscriptRecord = {
  run_id: string;
  key: string;
  point: GridPointOutcome["point"];
  mu: GridPointOutcome["mu"];
  failed: boolean;
  conversations: Record<string, ReturnType<typeof summarizeConversation>>;
};

const summarizeConversation = (conversation: Conversation) => ({
  status: conversation.status,
  termination_reason: conversation.terminationReason,
  approval_round: conversation.approvalRound,
  rounds: conversation.rounds,
  turns: conversation.turns.map((turn) => ({
    role: turn.role,
    round: turn.roundIndex,
    repaired: turn.repaired,
    payload: turn.payload
  })),
  agents: conversation.agents,
  failure: conversation.failure ?? null
});

const pad = (value: number): string => value.toString().padStart(2, "0");

export const createSweepId = (now: Date = new Date()): string => {
  const timestamp = `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}T${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}Z`;
  return `${timestamp}_${randomBytes(3).toString("hex")}`;
};

const toErrorCode = (error: unknown): string | undefined => {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
};

/**
 * Runs every grid point not yet in the ledger and appends one row per point.
 *
 * The ledger is read once up front, so a rerun after an interruption only
 * executes what is missing. The time budget is checked before each dispatch;
 * points already running always finish and are recorded.
 */
export const runGridEvaluation = async (options: GridEvaluationOptions): Promise<SweepSummary> => {
  const { config, service } = options;
  const bus = options.bus ?? new EventBus();
  const now = options.now ?? Date.now;
  const startedAt = now();
  const runId = createSweepId(new Date(startedAt));
  const ledgerPath = config.output.ledger_path;
  let transcripts: JsonlWriter<TranscriptRecord> | null = null;

  try {
    const points = enumerateGrid(config.grid);
    bus.emit({
      type: "sweep.started",
      payload: {
        run_id: runId,
        started_at: new Date(startedAt).toISOString(),
        config,
        grid_sha256: fingerprint(points),
        planned: points.length,
        mode: service.name.startsWith("mock") ? "mock" : "live"
      }
    });

    const ledger = await loadLedger(ledgerPath, { retryFailed: config.execution.retry_failed });
    bus.emit({
      type: "ledger.loaded",
      payload: {
        path: ledgerPath,
        persisted: ledger.rows.length,
        dropped_partial: ledger.droppedPartial,
        dropped_duplicates: ledger.droppedDuplicates,
        dropped_failed: ledger.droppedFailed,
        created: ledger.created
      }
    });
    if (ledger.droppedPartial > 0) {
      bus.emit({
        type: "warning.raised",
        payload: {
          message: `Dropped ${ledger.droppedPartial} incomplete ledger line(s) from ${ledgerPath}`,
          source: "ledger",
          recorded_at: new Date(now()).toISOString()
        }
      });
    }

    const pending = points.filter((point) => !ledger.keys.has(gridPointKey(point)));
    const writer = new LedgerWriter(ledgerPath, options.appendText);
    if (config.output.transcripts_path) {
      await mkdir(dirname(config.output.transcripts_path), { recursive: true });
      transcripts = createJsonlWriter<TranscriptRecord>(config.output.transcripts_path);
    }
    const transcriptWriter = transcripts;

    const budgetMs = config.execution.time_budget_s === null ? null : config.execution.time_budget_s * 1000;
    const shouldStop = (): boolean => budgetMs !== null && now() - startedAt >= budgetMs;

    const executePoint = createGridPointExecutor({
      config,
      service,
      onTurnRepaired: ({ key, condition, turn }) =>
        bus.emit({
          type: "turn.repaired",
          payload: { key, condition, role: turn.role, round: turn.roundIndex }
        })
    });

    let completed = 0;
    let failed = 0;

    const batch = await runBatchWithWorkers({
      entries: pending,
      workerCount: config.execution.workers,
      shouldStop,
      execute: async (point) => {
        const outcome = await executePoint(point);
        await writer.append(outcome.row);
        if (transcriptWriter) {
          await transcriptWriter.append({
            run_id: runId,
            key: outcome.key,
            point: outcome.point,
            mu: outcome.mu,
            failed: outcome.failed,
            conversations: {
              baseline: summarizeConversation(outcome.conversations.baseline),
              influence: summarizeConversation(outcome.conversations.influence)
            }
          });
        }
        completed += 1;
        if (outcome.failed) {
          failed += 1;
        }
        bus.emit({
          type: "point.completed",
          payload: {
            key: outcome.key,
            row: outcome.row,
            failed: outcome.failed,
            failures: outcome.failures,
            completed,
            pending: pending.length,
            elapsed_ms: now() - startedAt
          }
        });
        return outcome;
      },
      onWorkerStatus: ({ workerId, status, entry, index }) => {
        const key = gridPointKey(entry);
        if (status === "busy") {
          bus.emit({
            type: "point.dispatched",
            payload: { key, point: entry, index, pending: pending.length }
          });
        }
        bus.emit({
          type: "worker.status",
          payload: {
            worker_id: workerId,
            status,
            key,
            updated_at: new Date(now()).toISOString()
          }
        });
      }
    });

    await writer.drain();
    if (transcripts) {
      await transcripts.close();
    }

    const elapsedMs = now() - startedAt;
    const summary: SweepSummary = {
      runId,
      ledgerPath,
      planned: points.length,
      alreadyPersisted: points.length - pending.length,
      pending: pending.length,
      completed,
      failed,
      skipped: pending.length - batch.dispatched,
      stopReason: batch.stopped ? "time_budget_exhausted" : "completed",
      elapsedMs
    };

    bus.emit({
      type: "sweep.completed",
      payload: {
        run_id: runId,
        completed_at: new Date(startedAt + elapsedMs).toISOString(),
        stop_reason: summary.stopReason,
        completed,
        failed,
        skipped: summary.skipped,
        elapsed_ms: elapsedMs
      }
    });
    return summary;
  } catch (error) {
    if (transcripts) {
      await transcripts.close().catch((closeError: unknown) => {
        bus.emit({
          type: "warning.raised",
          payload: {
            message: `Failed to close transcripts: ${describeError(closeError)}`,
            source: "transcripts",
            recorded_at: new Date(now()).toISOString()
          }
        });
      });
    }
    bus.emit({
      type: "sweep.failed",
      payload: {
        run_id: runId,
        completed_at: new Date(now()).toISOString(),
        error: describeError(error),
        error_code: toErrorCode(error)
      }
    });
    throw error;
  }
};
