import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";

import { DEFAULT_CONFIG_PATH } from "../config/defaults.js";
import { resolveConfig } from "../config/resolve-config.js";
import type { MusweepConfigInput, ResolvedConfig } from "../config/types.js";
import { enumerateGrid } from "../engine/grid.js";
import { runGridEvaluation, type SweepSummary } from "../engine/harness.js";
import { EventBus } from "../events/event-bus.js";
import { createMockInferenceService } from "../inference/mock-service.js";
import { createLiveInferenceService, type InferenceService } from "../inference/service.js";
import { loadLedger } from "../ledger/ledger.js";
import { ExecutionLogger } from "../ui/execution-log.js";
import type { Formatter } from "../ui/fmt.js";
import { attachConsoleProgress } from "../ui/progress.js";
import { buildReceiptModel } from "../ui/receipt-model.js";
import { renderReceiptInk } from "../ui/receipt-ink.js";
import { formatReceiptText } from "../ui/receipt-text.js";
import { ConfigurationError, describeError } from "../utils/errors.js";
import { formatWarning, forwardWarnings } from "../utils/warnings.js";
import { getFlag, getFlagNumber, hasFlag, type ParsedArgs } from "./args.js";

export const TEMPLATE_NAMES = ["default", "quick"] as const;

const templatesDir = join(dirname(fileURLToPath(import.meta.url)), "../../templates");

export type CommandIo = {
  cwd: string;
  env: NodeJS.ProcessEnv;
  fmt: Formatter;
  log: (line: string) => void;
  warn: (line: string) => void;
};

export const runInit = (parsed: ParsedArgs, io: CommandIo): string => {
  const outPath = getFlag(parsed.flags, "--out") ?? DEFAULT_CONFIG_PATH;
  const templateName = getFlag(parsed.flags, "--template") ?? "default";
  if (!TEMPLATE_NAMES.some((name) => name === templateName)) {
    throw new ConfigurationError(`Unknown template "${templateName}" (expected ${TEMPLATE_NAMES.join("|")})`);
  }

  const targetPath = resolve(io.cwd, outPath);
  if (existsSync(targetPath) && !hasFlag(parsed.flags, "--force")) {
    throw new ConfigurationError(`Config already exists at ${targetPath}. Use --force to overwrite.`);
  }

  const template = readFileSync(join(templatesDir, `${templateName}.config.json`), "utf8");
  writeFileSync(targetPath, template, "utf8");

  io.log(io.fmt.statusChip(`Created config: ${targetPath}`, "success"));
  io.log("Next steps:");
  io.log("  1) Set OPENAI_API_KEY (a .env file works)");
  io.log("  2) musweep validate");
  io.log("  3) musweep run (or musweep run --mock to try it offline)");
  return targetPath;
};

export const runValidate = (parsed: ParsedArgs, io: CommandIo): ResolvedConfig => {
  const { config, configPath, warnings } = resolveConfig({
    configPath: parsed.positional[0] ?? getFlag(parsed.flags, "--config"),
    rootDir: io.cwd,
    env: io.env
  });
  warnings.forEach((warning) => io.warn(io.fmt.warnBlock(warning)));

  io.log(io.fmt.statusChip(`Config OK: ${configPath}`, "success"));
  io.log(io.fmt.kv("grid points", String(enumerateGrid(config.grid).length)));
  io.log(io.fmt.kv("model", config.inference.model));
  io.log(io.fmt.kv("rounds", `max ${config.conversation.max_rounds}, threshold ${config.conversation.agreement_threshold}`));
  io.log(io.fmt.kv("workers", String(config.execution.workers)));
  io.log(io.fmt.kv("ledger", config.output.ledger_path));
  return config;
};

const collectRunOverrides = (parsed: ParsedArgs, cwd: string): MusweepConfigInput => {
  const overrides: MusweepConfigInput = {};
  const workers = getFlagNumber(parsed.flags, "--workers");
  const timeBudget = getFlagNumber(parsed.flags, "--time-budget");
  if (workers !== undefined || timeBudget !== undefined || hasFlag(parsed.flags, "--retry-failed")) {
    overrides.execution = {
      ...(workers !== undefined ? { workers } : {}),
      ...(timeBudget !== undefined ? { time_budget_s: timeBudget } : {}),
      ...(hasFlag(parsed.flags, "--retry-failed") ? { retry_failed: true } : {})
    };
  }
  const ledger = getFlag(parsed.flags, "--ledger");
  if (ledger) {
    overrides.output = { ledger_path: resolve(cwd, ledger) };
  }
  return overrides;
};

export type RunCommandOptions = {
  useInk?: boolean;
  service?: InferenceService;
};

export const runSweep = async (
  parsed: ParsedArgs,
  io: CommandIo,
  options: RunCommandOptions = {}
): Promise<SweepSummary> => {
  const mock = hasFlag(parsed.flags, "--mock");
  const quiet = hasFlag(parsed.flags, "--quiet");
  const { config, apiKey, warnings } = resolveConfig({
    configPath: parsed.positional[0] ?? getFlag(parsed.flags, "--config"),
    rootDir: io.cwd,
    env: io.env,
    overrides: collectRunOverrides(parsed, io.cwd),
    requireCredential: !mock && !options.service
  });

  let service = options.service;
  if (!service) {
    if (mock) {
      service = createMockInferenceService({ whitelist: config.protocol.feature_whitelist });
    } else if (apiKey) {
      service = createLiveInferenceService({ config, apiKey });
    } else {
      throw new ConfigurationError(`${config.inference.api_key_env} is not set`);
    }
  }

  const bus = new EventBus();
  const detachers = [
    forwardWarnings(bus, (message, source) => io.warn(io.fmt.warnBlock(formatWarning(message, source))))
  ];
  if (!mock) {
    warnings.forEach((warning) => io.warn(io.fmt.warnBlock(warning)));
  }
  if (!quiet) {
    detachers.push(attachConsoleProgress(bus, { write: io.log, formatter: io.fmt }));
  }
  const logger = config.output.log_path ? new ExecutionLogger(config.output.log_path) : null;
  logger?.attach(bus);

  let summary: SweepSummary;
  try {
    summary = await runGridEvaluation({ config, service, bus });
  } finally {
    detachers.forEach((detach) => detach());
    logger?.detach();
    await logger?.close().catch((error: unknown) => {
      io.warn(io.fmt.warnBlock(`execution log not written: ${describeError(error)}`));
    });
    await bus.flush();
  }

  const ledger = await loadLedger(summary.ledgerPath);
  const model = buildReceiptModel({ summary, config, mode: mock ? "mock" : "live", rows: ledger.rows });
  if (options.useInk) {
    await renderReceiptInk(model);
  } else if (!quiet) {
    io.log(formatReceiptText(model).trimEnd());
  }
  return summary;
};

export const createConsoleIo = (fmt: Formatter): CommandIo => ({
  cwd: process.cwd(),
  env: process.env,
  fmt,
  log: (line) => console.log(line),
  warn: (line) => console.warn(line)
});
