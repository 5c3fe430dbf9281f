export type ParsedArgs = {
  positional: string[];
  flags: Record<string, string | boolean>;
};

const BOOLEAN_FLAGS = new Set(["--mock", "--force", "--quiet", "--retry-failed", "--help"]);

export const parseArgs = (args: string[]): ParsedArgs => {
  const positional: string[] = [];
  const flags: Record<string, string | boolean> = {};
  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (arg.startsWith("--")) {
      const next = args[i + 1];
      if (!BOOLEAN_FLAGS.has(arg) && next !== undefined && !next.startsWith("--")) {
        flags[arg] = next;
        i += 1;
      } else {
        flags[arg] = true;
      }
    } else {
      positional.push(arg);
    }
  }
  return { positional, flags };
};

export const getFlag = (flags: ParsedArgs["flags"], name: string): string | undefined => {
  const value = flags[name];
  return typeof value === "string" ? value : undefined;
};

export const hasFlag = (flags: ParsedArgs["flags"], name: string): boolean => Boolean(flags[name]);

/** Numeric flag value; throws when the flag is present but not a number. */
export const getFlagNumber = (flags: ParsedArgs["flags"], name: string): number | undefined => {
  const value = flags[name];
  if (value === undefined) {
    return undefined;
  }
  const parsed = typeof value === "string" ? Number(value) : Number.NaN;
  if (!Number.isFinite(parsed)) {
    throw new Error(`${name} expects a number`);
  }
  return parsed;
};
