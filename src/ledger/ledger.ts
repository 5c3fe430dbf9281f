import { appendFile, mkdir, readFile } from "node:fs/promises";
import { dirname } from "node:path";

import { writeTextAtomic } from "../artifacts/io.js";
import type { ResultRow } from "../core/types.js";
import { gridPointKey } from "../engine/grid.js";
import { isFailedRow } from "../metrics/result-row.js";
import { describeError, LedgerError, LedgerWriteError } from "../utils/errors.js";
import { formatLedgerHeader, formatLedgerRows, LEDGER_HEADER, parseLedgerLine } from "./csv-format.js";

export type LedgerLoadOptions = {
  /** Drop rows of failed grid points so they are run again. */
  retryFailed?: boolean;
};

export type LedgerSnapshot = {
  path: string;
  rows: ResultRow[];
  keys: Set<string>;
  created: boolean;
  droppedPartial: number;
  droppedDuplicates: number;
  droppedFailed: number;
};

const readIfExists = async (path: string): Promise<string | null> => {
  try {
    return await readFile(path, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return null;
    }
    throw new LedgerError(`Cannot read ledger: ${describeError(error)}`, path);
  }
};

/**
 * Reads the rows already persisted at `path`, creating the file with its
 * header when it is missing or empty. Torn or malformed lines and repeated
 * keys are dropped, and the file is rewritten without them.
 */
export const loadLedger = async (path: string, options: LedgerLoadOptions = {}): Promise<LedgerSnapshot> => {
  const raw = await readIfExists(path);
  const snapshot: LedgerSnapshot = {
    path,
    rows: [],
    keys: new Set(),
    created: false,
    droppedPartial: 0,
    droppedDuplicates: 0,
    droppedFailed: 0
  };

  if (raw === null || raw.trim().length === 0) {
    await mkdir(dirname(path), { recursive: true });
    await writeTextAtomic(path, formatLedgerHeader());
    snapshot.created = true;
    return snapshot;
  }

  const lines = raw.split("\n");
  if (lines.length === 1) {
    // a lone header written without its newline
    if (raw.replace(/\r$/, "") !== LEDGER_HEADER) {
      throw new LedgerError(`Ledger header does not match the expected columns: "${raw}"`, path);
    }
    await writeTextAtomic(path, formatLedgerHeader());
    return snapshot;
  }
  // the last element is "" for a newline-terminated file, a torn row otherwise
  const tail = lines.pop() ?? "";
  if (tail.trim().length > 0) {
    snapshot.droppedPartial += 1;
  }

  const header = (lines.shift() ?? "").replace(/\r$/, "");
  if (header !== LEDGER_HEADER) {
    throw new LedgerError(`Ledger header does not match the expected columns: "${header}"`, path);
  }

  for (const line of lines) {
    const trimmed = line.replace(/\r$/, "");
    if (trimmed.length === 0) {
      continue;
    }
    const row = parseLedgerLine(trimmed);
    if (!row) {
      snapshot.droppedPartial += 1;
      continue;
    }
    const key = gridPointKey(row);
    if (snapshot.keys.has(key)) {
      snapshot.droppedDuplicates += 1;
      continue;
    }
    if (options.retryFailed && isFailedRow(row)) {
      snapshot.droppedFailed += 1;
      continue;
    }
    snapshot.keys.add(key);
    snapshot.rows.push(row);
  }

  if (snapshot.droppedPartial + snapshot.droppedDuplicates + snapshot.droppedFailed > 0) {
    await writeTextAtomic(path, `${formatLedgerHeader()}${formatLedgerRows(snapshot.rows)}`);
  }

  return snapshot;
};

export type AppendText = (path: string, data: string) => Promise<void>;

const appendUtf8: AppendText = (path, data) => appendFile(path, data, "utf8");

/**
 * Sole writer of a ledger file. Appends are queued so each row lands in one
 * `appendFile` call; the first failure poisons the writer.
 */
export class LedgerWriter {
  readonly path: string;
  private readonly appendText: AppendText;
  private queue: Promise<void> = Promise.resolve();
  private failure: LedgerWriteError | null = null;
  private written = 0;

  constructor(path: string, appendText: AppendText = appendUtf8) {
    this.path = path;
    this.appendText = appendText;
  }

  get rowsWritten(): number {
    return this.written;
  }

  append(row: ResultRow): Promise<void> {
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    const line = formatLedgerRows([row]);
    const write = this.queue.then(async () => {
      if (this.failure) {
        throw this.failure;
      }
      try {
        await this.appendText(this.path, line);
        this.written += 1;
      } catch (error) {
        this.failure = new LedgerWriteError(
          `Failed to append to ledger ${this.path}: ${describeError(error)}`,
          this.path,
          { cause: error }
        );
        throw this.failure;
      }
    });
    // the caller observes failures through `write`; the queue only orders writes
    this.queue = write.then(
      () => undefined,
      () => undefined
    );
    return write;
  }

  /** Waits for queued appends; rejects if any of them failed. */
  async drain(): Promise<void> {
    await this.queue;
    if (this.failure) {
      throw this.failure;
    }
  }
}
