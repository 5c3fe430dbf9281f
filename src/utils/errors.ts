export class ConfigurationError extends Error {
  readonly code = "configuration_error";
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super(details.length > 0 ? `${message}\n${details.map((line) => `- ${line}`).join("\n")}` : message);
    this.name = "ConfigurationError";
    this.details = details;
  }
}

/** The ledger on disk cannot be read back as a sweep ledger. */
export class LedgerError extends Error {
  readonly code = "ledger_error";
  readonly path: string;

  constructor(message: string, path: string) {
    super(message);
    this.name = "LedgerError";
    this.path = path;
  }
}

export class LedgerWriteError extends Error {
  readonly code = "ledger_write_error";
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LedgerWriteError";
    this.path = path;
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
