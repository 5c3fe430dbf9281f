import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { describe, expect, it } from "vitest";

import { makeTempDir } from "../../__tests__/helpers.js";
import { createFormatter } from "../../ui/fmt.js";
import { ConfigurationError } from "../../utils/errors.js";
import { getFlagNumber, parseArgs } from "../args.js";
import { runInit, runSweep, runValidate, type CommandIo } from "../commands.js";

const captureIo = (cwd: string, env: NodeJS.ProcessEnv = {}) => {
  const logs: string[] = [];
  const warnings: string[] = [];
  const io: CommandIo = {
    cwd,
    env,
    fmt: createFormatter({ stream: { isTTY: false }, env: {} }),
    log: (line) => logs.push(line),
    warn: (line) => warnings.push(line)
  };
  return { io, logs, warnings };
};

describe("parseArgs", () => {
  it("separates flags, flag values and positionals", () => {
    expect(parseArgs(["--workers", "2", "--mock", "sweep.json", "--quiet"])).toEqual({
      positional: ["sweep.json"],
      flags: { "--workers": "2", "--mock": true, "--quiet": true }
    });
  });

  it("rejects non-numeric values for numeric flags", () => {
    expect(getFlagNumber(parseArgs(["--workers", "3"]).flags, "--workers")).toBe(3);
    expect(getFlagNumber(parseArgs([]).flags, "--workers")).toBeUndefined();
    expect(() => getFlagNumber(parseArgs(["--workers", "many"]).flags, "--workers")).toThrow(
      "--workers expects a number"
    );
    expect(() => getFlagNumber(parseArgs(["--workers"]).flags, "--workers")).toThrow("--workers expects a number");
  });
});

describe("runInit", () => {
  it("writes the chosen template and refuses to overwrite without --force", () => {
    const cwd = makeTempDir();
    const { io, logs } = captureIo(cwd);

    const path = runInit(parseArgs(["--template", "quick"]), io);

    expect(path).toBe(join(cwd, "musweep.config.json"));
    expect(logs[0]).toBe(`OK Created config: ${path}`);
    expect(JSON.parse(readFileSync(path, "utf8"))).toMatchObject({ output: { ledger_path: "quick-results.csv" } });
    expect(() => runInit(parseArgs([]), io)).toThrow(ConfigurationError);
    expect(() => runInit(parseArgs(["--force"]), io)).not.toThrow();
  });

  it("rejects unknown templates", () => {
    const { io } = captureIo(makeTempDir());
    expect(() => runInit(parseArgs(["--template", "huge"]), io)).toThrow(
      'Unknown template "huge" (expected default|quick)'
    );
  });
});

describe("runValidate", () => {
  it("summarizes a valid config", () => {
    const cwd = makeTempDir();
    const { io, logs, warnings } = captureIo(cwd);
    runInit(parseArgs(["--template", "quick"]), io);
    logs.length = 0;

    runValidate(parseArgs([]), io);

    expect(logs).toEqual([
      `OK Config OK: ${join(cwd, "musweep.config.json")}`,
      "grid points: 4",
      "model: gpt-4o",
      "rounds: max 2, threshold 1",
      "workers: 2",
      `ledger: ${join(cwd, "quick-results.csv")}`
    ]);
    expect(warnings).toEqual(["warn: OPENAI_API_KEY is not set; only --mock runs are possible"]);
  });
});

describe("runSweep", () => {
  it("runs a mock sweep and prints progress and a receipt", async () => {
    const cwd = makeTempDir();
    const { io, logs } = captureIo(cwd);
    runInit(parseArgs(["--template", "quick"]), io);
    logs.length = 0;

    const summary = await runSweep(parseArgs(["--mock", "--workers", "1"]), io);

    expect(summary).toMatchObject({ planned: 4, completed: 4, failed: 0, stopReason: "completed" });
    expect(logs[0].startsWith(
      `[1/4] saved beta=0.6|k=6|tau=0.5|alpha=0.8|seed=1|adv=0 -> ${join(cwd, "quick-results.csv")} rounds `
    )).toBe(true);
    expect(logs).toHaveLength(5);
    expect(logs[4].startsWith("Stopped: grid complete\n\nSummary:\n")).toBe(true);
    expect(existsSync(join(cwd, "quick-results.csv"))).toBe(true);
  });

  it("stays silent with --quiet and honours --ledger", async () => {
    const cwd = makeTempDir();
    const { io, logs } = captureIo(cwd);
    runInit(parseArgs(["--template", "quick"]), io);
    logs.length = 0;

    const summary = await runSweep(parseArgs(["--mock", "--quiet", "--ledger", "out.csv"]), io);

    expect(logs).toEqual([]);
    expect(summary.ledgerPath).toBe(join(cwd, "out.csv"));
    expect(readFileSync(join(cwd, "out.csv"), "utf8").trim().split("\n")).toHaveLength(5);
  });

  it("writes the execution log into a directory it creates", async () => {
    const cwd = makeTempDir();
    const { io, warnings } = captureIo(cwd);
    writeFileSync(
      join(cwd, "musweep.config.json"),
      JSON.stringify({
        grid: { alpha: [0.8], beta: [0.6], k: [6], tau: [0.5], seed: [1], adversarial: [false, true] },
        output: { ledger_path: "results.csv", log_path: "logs/sweep.log" }
      })
    );

    const summary = await runSweep(parseArgs(["--mock", "--quiet"]), io);

    expect(summary.completed).toBe(2);
    expect(warnings).toEqual([]);
    const lines = readFileSync(join(cwd, "logs", "sweep.log"), "utf8").trim().split("\n");
    expect(lines[lines.length - 1]).toMatch(
      /Sweep completed: \S+ \(completed\) completed 2, failed 0, skipped 0, \d+ms$/
    );
  });

  it("requires a credential for live runs", async () => {
    const cwd = makeTempDir();
    const { io } = captureIo(cwd);
    runInit(parseArgs([]), io);

    await expect(runSweep(parseArgs([]), io)).rejects.toThrow(
      "OPENAI_API_KEY is not set (add it to the environment or a .env file)"
    );
  });
});
