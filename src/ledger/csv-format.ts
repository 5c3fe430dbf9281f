import { createObjectCsvStringifier } from "csv-writer";

import { LEDGER_COLUMNS, type LedgerColumn, type ResultRow } from "../core/types.js";

const stringifier = createObjectCsvStringifier({
  header: LEDGER_COLUMNS.map((column) => ({ id: column, title: column }))
});

export const LEDGER_HEADER = LEDGER_COLUMNS.join(",");

export const formatLedgerHeader = (): string => stringifier.getHeaderString() ?? `${LEDGER_HEADER}\n`;

const formatCell = (value: number | boolean | null): string => {
  if (value === null) {
    return "";
  }
  if (typeof value === "boolean") {
    return value ? "1" : "0";
  }
  return String(value);
};

/** One newline-terminated CSV line per row; sentinels become empty cells. */
export const formatLedgerRows = (rows: ReadonlyArray<ResultRow>): string => {
  if (rows.length === 0) {
    return "";
  }
  return stringifier.stringifyRecords(
    rows.map((row) => {
      const record: Record<string, string> = {};
      for (const column of LEDGER_COLUMNS) {
        record[column] = formatCell(row[column]);
      }
      return record;
    })
  );
};

const parseBoolean = (cell: string): boolean | undefined => {
  switch (cell.trim().toLowerCase()) {
    case "1":
    case "true":
      return true;
    case "0":
    case "false":
      return false;
    default:
      return undefined;
  }
};

const parseNumber = (cell: string): number | null | undefined => {
  const trimmed = cell.trim();
  if (trimmed.length === 0) {
    return null;
  }
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : undefined;
};

/** Parses one data line; `null` when the line is not a well-formed row. */
export const parseLedgerLine = (line: string): ResultRow | null => {
  const cells = line.split(",");
  if (cells.length !== LEDGER_COLUMNS.length) {
    return null;
  }

  const numbers = new Map<LedgerColumn, number | null>();
  let adversarial: boolean | undefined;
  for (const [index, column] of LEDGER_COLUMNS.entries()) {
    if (column === "adversarial") {
      adversarial = parseBoolean(cells[index]);
      continue;
    }
    const value = parseNumber(cells[index]);
    if (value === undefined) {
      return null;
    }
    numbers.set(column, value);
  }
  const metric = (column: LedgerColumn): number | null => numbers.get(column) ?? null;

  const beta = metric("beta");
  const k = metric("k");
  const tau = metric("tau");
  const alpha = metric("alpha");
  const seed = metric("seed");
  const muPlanner = metric("mu_planner");
  const muResearcher = metric("mu_researcher");
  const muCritic = metric("mu_critic");
  if (
    adversarial === undefined ||
    beta === null ||
    k === null ||
    tau === null ||
    alpha === null ||
    seed === null ||
    muPlanner === null ||
    muResearcher === null ||
    muCritic === null
  ) {
    return null;
  }

  return {
    beta,
    k,
    tau,
    alpha,
    seed,
    adversarial,
    mu_planner: muPlanner,
    mu_researcher: muResearcher,
    mu_critic: muCritic,
    RoundsToApproval_baseline: metric("RoundsToApproval_baseline"),
    RoundsToApproval_influence: metric("RoundsToApproval_influence"),
    AgreementRate_baseline: metric("AgreementRate_baseline"),
    AgreementRate_influence: metric("AgreementRate_influence"),
    RevisionDepth_between_rounds: metric("RevisionDepth_between_rounds"),
    PlannerResearcher_Canonical_baseline: metric("PlannerResearcher_Canonical_baseline"),
    PlannerResearcher_Canonical_influence: metric("PlannerResearcher_Canonical_influence"),
    Planner_SelfAgreement: metric("Planner_SelfAgreement"),
    Researcher_SelfAgreement: metric("Researcher_SelfAgreement")
  };
};
