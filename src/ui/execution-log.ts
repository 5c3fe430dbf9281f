import { createWriteStream, mkdirSync, type WriteStream } from "node:fs";
import { dirname } from "node:path";
import { finished } from "node:stream/promises";

import type { EventBus } from "../events/event-bus.js";
import type { EventPayloadMap, EventType } from "../events/types.js";

/** Appends a timestamped line per sweep event to a plain-text log file. */
export class ExecutionLogger {
  private stream: WriteStream | null;
  private failure: Error | null = null;
  private unsubs: Array<() => void> = [];
  private readonly clock: () => Date;

  constructor(logPath: string, clock: () => Date = () => new Date()) {
    mkdirSync(dirname(logPath), { recursive: true });
    this.stream = createWriteStream(logPath, { flags: "a" });
    this.stream.on("error", (error) => {
      if (!this.failure) {
        this.failure = error;
      }
    });
    this.clock = clock;
  }

  private append(line: string): void {
    if (this.failure) {
      return;
    }
    this.stream?.write(`${this.clock().toISOString()} ${line}\n`);
  }

  private on<T extends EventType>(
    bus: EventBus,
    type: T,
    format: (payload: EventPayloadMap[T]) => string | null
  ): void {
    this.unsubs.push(
      bus.subscribeSafe(
        type,
        (payload) => {
          const line = format(payload);
          if (line) {
            this.append(line);
          }
        },
        (error) => {
          const message = error instanceof Error ? error.message : String(error);
          this.append(`Execution log subscriber error (${type}): ${message}`);
        }
      )
    );
  }

  attach(bus: EventBus): void {
    this.on(bus, "sweep.started", (payload) => {
      const { grid, execution, inference } = payload.config;
      return [
        `Sweep started: ${payload.run_id} (${payload.mode}, model ${inference.model})`,
        `Grid: ${payload.planned} points | alpha ${grid.alpha.join("/")} | beta ${grid.beta.join("/")} | k ${grid.k.join("/")} | tau ${grid.tau.join("/")} | seeds ${grid.seed.length} | workers ${execution.workers}`
      ].join(" | ");
    });
    this.on(
      bus,
      "ledger.loaded",
      (payload) =>
        `Ledger ${payload.created ? "created" : "loaded"}: ${payload.path} (${payload.persisted} rows, dropped ${payload.dropped_partial} partial, ${payload.dropped_duplicates} duplicate, ${payload.dropped_failed} failed)`
    );
    this.on(bus, "point.completed", (payload) => {
      const status = payload.failed ? "FAILED" : "ok";
      const reasons = payload.failures.map((failure) => `${failure.role}@${failure.roundIndex}: ${failure.reason}`);
      return `Point ${payload.key} ${status}${reasons.length > 0 ? ` (${reasons.join("; ")})` : ""}`;
    });
    this.on(bus, "turn.repaired", (payload) => `Repaired ${payload.role} turn ${payload.round} of ${payload.key} (${payload.condition})`);
    this.on(bus, "warning.raised", (payload) => `Warning${payload.source ? ` [${payload.source}]` : ""}: ${payload.message}`);
    this.on(
      bus,
      "sweep.completed",
      (payload) =>
        `Sweep completed: ${payload.run_id} (${payload.stop_reason}) completed ${payload.completed}, failed ${payload.failed}, skipped ${payload.skipped}, ${payload.elapsed_ms}ms`
    );
    this.on(bus, "sweep.failed", (payload) => `Sweep failed: ${payload.run_id} (${payload.error})`);
  }

  async close(): Promise<void> {
    const stream = this.stream;
    if (!stream) {
      return;
    }
    this.stream = null;
    if (this.failure) {
      throw this.failure;
    }
    stream.end();
    await finished(stream);
    if (this.failure) {
      throw this.failure;
    }
  }

  detach(): void {
    this.unsubs.forEach((unsubscribe) => unsubscribe());
    this.unsubs = [];
  }
}
