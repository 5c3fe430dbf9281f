export type FormatterStream = {
  isTTY?: boolean;
};

export type FormatterOptions = {
  stream?: FormatterStream;
  env?: NodeJS.ProcessEnv;
};

export type StatusLevel = "success" | "warn" | "error" | "info";

const RESET = "\x1b[0m";

const PALETTE = {
  brand: "\x1b[33m",
  success: "\x1b[32m",
  error: "\x1b[31m",
  warn: "\x1b[33m",
  info: "\x1b[36m",
  muted: "\x1b[90m",
  bold: "\x1b[1m"
} as const;

type PaletteKey = keyof typeof PALETTE;

const isTruthyEnv = (value: string | undefined): boolean =>
  typeof value === "string" && value !== "0" && value.trim().length > 0;

const shouldUseColor = (stream: FormatterStream, env: NodeJS.ProcessEnv): boolean => {
  if (isTruthyEnv(env.CLICOLOR_FORCE)) {
    return true;
  }
  if (isTruthyEnv(env.NO_COLOR) || env.CLICOLOR === "0") {
    return false;
  }
  return Boolean(stream.isTTY);
};

const PLAIN_PREFIX: Record<StatusLevel, string> = {
  success: "OK",
  warn: "WARN",
  error: "ERROR",
  info: "INFO"
};

export type Formatter = {
  isTTY: boolean;
  color: (key: PaletteKey, value: string) => string;
  kv: (key: string, value: string, keyWidth?: number) => string;
  statusChip: (label: string, level: StatusLevel, detail?: string) => string;
  warnBlock: (message: string) => string;
  errorBlock: (message: string) => string;
};

export const createFormatter = (options?: FormatterOptions): Formatter => {
  const stream = options?.stream ?? process.stdout;
  const env = options?.env ?? process.env;
  const tty = Boolean(stream.isTTY);
  const colorEnabled = shouldUseColor(stream, env);

  const color = (key: PaletteKey, value: string): string =>
    colorEnabled ? `${PALETTE[key]}${value}${RESET}` : value;

  return {
    isTTY: tty,
    color,
    kv: (key, value, keyWidth = 18) =>
      tty ? `${color("muted", key.padEnd(keyWidth))} ${value}` : `${key}: ${value}`,
    statusChip: (label, level, detail) => {
      const suffix = detail ? ` ${color("muted", detail)}` : "";
      return `${color(level, PLAIN_PREFIX[level])} ${label}${suffix}`;
    },
    warnBlock: (message) => `${color("warn", "warn:")} ${message}`,
    errorBlock: (message) => `${color("error", "error:")} ${message}`
  };
};

export const createStdoutFormatter = (): Formatter =>
  createFormatter({ stream: process.stdout, env: process.env });

export const createStderrFormatter = (): Formatter =>
  createFormatter({ stream: process.stderr, env: process.env });
