import type { Formatter } from "../ui/fmt.js";

export type HelpCommand = {
  name: string;
  summary: string;
  usage: string;
  flags?: Array<{ name: string; description: string }>;
};

const COMMANDS: HelpCommand[] = [
  {
    name: "init",
    summary: "create a config file from a template",
    usage: "musweep init [--out <path>] [--template default|quick] [--force]",
    flags: [
      { name: "--out <path>", description: "config output path (default: musweep.config.json)" },
      { name: "--template <name>", description: "default|quick" },
      { name: "--force", description: "overwrite an existing config file" }
    ]
  },
  {
    name: "validate",
    summary: "check a config file and print the grid size",
    usage: "musweep validate [config.json]"
  },
  {
    name: "run",
    summary: "run the grid, appending one ledger row per point",
    usage: "musweep run [config.json] [flags]",
    flags: [
      { name: "--mock", description: "use the offline deterministic model" },
      { name: "--workers <N>", description: "override execution.workers" },
      { name: "--time-budget <S>", description: "stop dispatching after S seconds" },
      { name: "--ledger <path>", description: "override output.ledger_path" },
      { name: "--retry-failed", description: "rerun points whose rows carry sentinels" },
      { name: "--quiet", description: "suppress progress output" }
    ]
  }
];

export const getHelpCommand = (name: string): HelpCommand | undefined =>
  COMMANDS.find((command) => command.name === name);

export const renderRootHelp = (fmt: Formatter): string => {
  const lines = [fmt.color("bold", "musweep // mutual-influence grid sweeps"), "", "Commands:"];
  COMMANDS.forEach((command) => {
    lines.push(`  ${fmt.color("brand", command.name.padEnd(10))} ${command.summary}`);
  });
  lines.push("");
  lines.push("Run `musweep <command> --help` for flags.");
  return `${lines.join("\n")}\n`;
};

export const renderCommandHelp = (fmt: Formatter, command: HelpCommand): string => {
  const lines = [fmt.color("bold", `musweep ${command.name}: ${command.summary}`), "", "Usage:", `  ${command.usage}`];
  if (command.flags && command.flags.length > 0) {
    lines.push("");
    lines.push("Flags:");
    command.flags.forEach((flag) => {
      lines.push(`  ${flag.name.padEnd(20)} ${fmt.color("muted", flag.description)}`);
    });
  }
  return `${lines.join("\n")}\n`;
};
