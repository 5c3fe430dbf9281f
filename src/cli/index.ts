#!/usr/bin/env node
import "dotenv/config";

import { createStderrFormatter, createStdoutFormatter } from "../ui/fmt.js";
import { describeError } from "../utils/errors.js";
import { hasFlag, parseArgs } from "./args.js";
import { createConsoleIo, runInit, runSweep, runValidate } from "./commands.js";
import { getHelpCommand, renderCommandHelp, renderRootHelp } from "./help.js";

const main = async (argv: string[]): Promise<number> => {
  const fmt = createStdoutFormatter();
  const [command, ...rest] = argv;
  const parsed = parseArgs(rest);

  if (!command || command === "--help" || command === "help") {
    process.stdout.write(renderRootHelp(fmt));
    return command ? 0 : 1;
  }

  const help = getHelpCommand(command);
  if (!help) {
    process.stderr.write(createStderrFormatter().errorBlock(`Unknown command: ${command}`) + "\n");
    process.stdout.write(renderRootHelp(fmt));
    return 1;
  }
  if (hasFlag(parsed.flags, "--help")) {
    process.stdout.write(renderCommandHelp(fmt, help));
    return 0;
  }

  const io = createConsoleIo(fmt);
  switch (command) {
    case "init":
      runInit(parsed, io);
      return 0;
    case "validate":
      runValidate(parsed, io);
      return 0;
    case "run":
      await runSweep(parsed, io, {
        useInk: Boolean(process.stdout.isTTY) && !hasFlag(parsed.flags, "--quiet")
      });
      return 0;
    default:
      return 1;
  }
};

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    process.stderr.write(`${createStderrFormatter().errorBlock(describeError(error))}\n`);
    process.exitCode = 1;
  });
