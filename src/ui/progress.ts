import type { EventBus } from "../events/event-bus.js";
import { createStdoutFormatter, type Formatter } from "./fmt.js";

export type ConsoleProgressOptions = {
  write?: (line: string) => void;
  formatter?: Formatter;
};

const formatMetric = (value: number | null): string => (value === null ? "-" : String(value));

/** Prints one line per saved grid point. Returns the detach handle. */
export const attachConsoleProgress = (bus: EventBus, options: ConsoleProgressOptions = {}): (() => void) => {
  const write = options.write ?? ((line: string) => process.stdout.write(`${line}\n`));
  const fmt = options.formatter ?? createStdoutFormatter();
  let ledgerPath = "ledger";

  const unsubs = [
    bus.subscribeSafe("ledger.loaded", (payload) => {
      ledgerPath = payload.path;
      if (payload.persisted > 0) {
        write(fmt.statusChip(`resuming with ${payload.persisted} persisted row(s)`, "info"));
      }
    }),
    bus.subscribeSafe("point.completed", (payload) => {
      const { row } = payload;
      const detail = `rounds ${formatMetric(row.RoundsToApproval_baseline)}/${formatMetric(row.RoundsToApproval_influence)} agreement ${formatMetric(row.AgreementRate_baseline)}/${formatMetric(row.AgreementRate_influence)}`;
      const line = `[${payload.completed}/${payload.pending}] saved ${payload.key} -> ${ledgerPath}`;
      write(payload.failed ? fmt.statusChip(line, "warn", "(failed)") : `${line} ${fmt.color("muted", detail)}`);
    }),
    bus.subscribeSafe("sweep.completed", (payload) => {
      if (payload.stop_reason === "time_budget_exhausted") {
        write(fmt.statusChip(`time budget exhausted, ${payload.skipped} point(s) left for the next run`, "warn"));
      }
    })
  ];

  return () => unsubs.forEach((unsubscribe) => unsubscribe());
};
