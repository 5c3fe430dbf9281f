import type { ResolvedConfig } from "../config/types.js";
import type { ResultRow } from "../core/types.js";
import type { SweepSummary } from "../engine/harness.js";
import { isFailedRow } from "../metrics/result-row.js";

export type ConditionAverages = {
  rounds: number | null;
  agreement: number | null;
  canonical: number | null;
};

export type ReceiptModel = {
  run_id: string;
  mode: "live" | "mock";
  model: string;
  stop_reason: SweepSummary["stopReason"];
  ledger_path: string;
  transcripts_path: string | null;
  counts: {
    planned: number;
    already_persisted: number;
    completed: number;
    failed: number;
    skipped: number;
    ledger_rows: number;
  };
  elapsed_ms: number;
  baseline: ConditionAverages;
  influence: ConditionAverages;
};

const mean = (values: Array<number | null>): number | null => {
  const present = values.filter((value): value is number => value !== null);
  if (present.length === 0) {
    return null;
  }
  return present.reduce((total, value) => total + value, 0) / present.length;
};

export const buildReceiptModel = (input: {
  summary: SweepSummary;
  config: ResolvedConfig;
  mode: "live" | "mock";
  rows: ReadonlyArray<ResultRow>;
}): ReceiptModel => {
  const { summary, config } = input;
  const rows = input.rows.filter((row) => !isFailedRow(row));

  return {
    run_id: summary.runId,
    mode: input.mode,
    model: input.mode === "mock" ? "mock" : config.inference.model,
    stop_reason: summary.stopReason,
    ledger_path: summary.ledgerPath,
    transcripts_path: config.output.transcripts_path,
    counts: {
      planned: summary.planned,
      already_persisted: summary.alreadyPersisted,
      completed: summary.completed,
      failed: summary.failed,
      skipped: summary.skipped,
      ledger_rows: input.rows.length
    },
    elapsed_ms: summary.elapsedMs,
    baseline: {
      rounds: mean(rows.map((row) => row.RoundsToApproval_baseline)),
      agreement: mean(rows.map((row) => row.AgreementRate_baseline)),
      canonical: mean(rows.map((row) => row.PlannerResearcher_Canonical_baseline))
    },
    influence: {
      rounds: mean(rows.map((row) => row.RoundsToApproval_influence)),
      agreement: mean(rows.map((row) => row.AgreementRate_influence)),
      canonical: mean(rows.map((row) => row.PlannerResearcher_Canonical_influence))
    }
  };
};
