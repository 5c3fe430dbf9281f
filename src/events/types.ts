import type { ResolvedConfig } from "../config/types.js";
import type { GridPoint, ResultRow, Role, TurnFailure } from "../core/types.js";

export type SweepStopReason = "completed" | "time_budget_exhausted";

export type SweepStartedPayload = {
  run_id: string;
  started_at: string;
  config: ResolvedConfig;
  grid_sha256: string;
  planned: number;
  mode: "live" | "mock";
};

export type LedgerLoadedPayload = {
  path: string;
  persisted: number;
  dropped_partial: number;
  dropped_duplicates: number;
  dropped_failed: number;
  created: boolean;
};

export type PointDispatchedPayload = {
  key: string;
  point: GridPoint;
  index: number;
  pending: number;
};

export type PointCompletedPayload = {
  key: string;
  row: ResultRow;
  failed: boolean;
  failures: TurnFailure[];
  completed: number;
  pending: number;
  elapsed_ms: number;
};

export type TurnRepairedPayload = {
  key: string;
  condition: "baseline" | "influence";
  role: Role;
  round: number;
};

export type WorkerStatusPayload = {
  worker_id: number;
  status: "busy" | "idle";
  key: string;
  updated_at: string;
};

export type SweepCompletedPayload = {
  run_id: string;
  completed_at: string;
  stop_reason: SweepStopReason;
  completed: number;
  failed: number;
  skipped: number;
  elapsed_ms: number;
};

export type SweepFailedPayload = {
  run_id: string;
  completed_at: string;
  error: string;
  error_code?: string;
};

export type WarningRaisedPayload = {
  message: string;
  source?: string;
  recorded_at: string;
};

export type Event =
  | { type: "sweep.started"; payload: SweepStartedPayload }
  | { type: "ledger.loaded"; payload: LedgerLoadedPayload }
  | { type: "point.dispatched"; payload: PointDispatchedPayload }
  | { type: "point.completed"; payload: PointCompletedPayload }
  | { type: "turn.repaired"; payload: TurnRepairedPayload }
  | { type: "worker.status"; payload: WorkerStatusPayload }
  | { type: "sweep.completed"; payload: SweepCompletedPayload }
  | { type: "sweep.failed"; payload: SweepFailedPayload }
  | { type: "warning.raised"; payload: WarningRaisedPayload };

export type EventType = Event["type"];

export type EventPayloadMap = {
  [K in EventType]: Extract<Event, { type: K }>["payload"];
};
