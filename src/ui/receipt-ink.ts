import React, { useEffect } from "react";
import { Box, Text, render, useApp } from "ink";

import type { ReceiptModel } from "./receipt-model.js";
import { formatConditionLine } from "./receipt-text.js";

const ReceiptView = ({ model }: { model: ReceiptModel }): React.ReactElement => {
  const { exit } = useApp();

  useEffect(() => {
    exit();
  }, [exit]);

  const status =
    model.stop_reason === "time_budget_exhausted" ? "time budget exhausted" : "grid complete";
  const points = `planned ${model.counts.planned}, persisted before ${model.counts.already_persisted}, completed ${model.counts.completed}, failed ${model.counts.failed}, skipped ${model.counts.skipped}`;

  return React.createElement(
    Box,
    { flexDirection: "column" },
    React.createElement(Text, { bold: true }, `Sweep ${model.run_id}`),
    React.createElement(Text, null, `Status: ${status}`),
    React.createElement(Text, null, `Mode: ${model.mode} (${model.model})`),
    React.createElement(Text, null, `Points: ${points}`),
    React.createElement(Text, { dimColor: true }, `Means over ${model.counts.ledger_rows} row(s):`),
    React.createElement(Text, null, formatConditionLine("baseline", model.baseline)),
    React.createElement(Text, null, formatConditionLine("influence", model.influence)),
    React.createElement(Text, null, `Ledger: ${model.ledger_path}`)
  );
};

export const renderReceiptInk = async (model: ReceiptModel): Promise<void> => {
  const { waitUntilExit } = render(React.createElement(ReceiptView, { model }));
  await waitUntilExit();
};
