import type { ConditionAverages, ReceiptModel } from "./receipt-model.js";

const formatAverage = (value: number | null, digits = 3): string =>
  value === null ? "-" : value.toFixed(digits);

const formatStopBanner = (reason: ReceiptModel["stop_reason"]): string =>
  reason === "time_budget_exhausted"
    ? "Stopped: time budget exhausted (rerun to continue)"
    : "Stopped: grid complete";

export const formatConditionLine = (label: string, averages: ConditionAverages): string =>
  `- ${label}: rounds ${formatAverage(averages.rounds, 2)}, agreement ${formatAverage(averages.agreement)}, canonical ${formatAverage(averages.canonical)}`;

export const formatReceiptText = (model: ReceiptModel): string => {
  const lines: string[] = [];

  lines.push(formatStopBanner(model.stop_reason));
  lines.push("");

  lines.push("Summary:");
  lines.push(`- run id: ${model.run_id}`);
  lines.push(`- mode: ${model.mode} (model ${model.model})`);
  lines.push(
    `- points planned/persisted before/completed/failed/skipped: ${model.counts.planned}/${model.counts.already_persisted}/${model.counts.completed}/${model.counts.failed}/${model.counts.skipped}`
  );
  lines.push(`- elapsed: ${(model.elapsed_ms / 1000).toFixed(1)}s`);

  lines.push("");
  lines.push(`Means over ${model.counts.ledger_rows} ledger row(s), failed rows excluded:`);
  lines.push(formatConditionLine("baseline", model.baseline));
  lines.push(formatConditionLine("influence", model.influence));

  lines.push("");
  lines.push("Artifacts:");
  lines.push(`- ${model.ledger_path}`);
  if (model.transcripts_path) {
    lines.push(`- ${model.transcripts_path}`);
  }

  return `${lines.join("\n")}\n`;
};
