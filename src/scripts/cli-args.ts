import { ConfigError } from "../lib/errors";

export interface CliArgs {
  positional: string[];
  flags: Map<string, string | true>;
}

/** `--name value` pairs, bare `--flag` switches and positional arguments. */
export function parseArgs(argv: string[]): CliArgs {
  const positional: string[] = [];
  const flags = new Map<string, string | true>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith("--")) {
      positional.push(arg);
      continue;
    }
    const name = arg.slice(2);
    const next = argv[i + 1];
    if (next !== undefined && !next.startsWith("--")) {
      flags.set(name, next);
      i++;
    } else {
      flags.set(name, true);
    }
  }

  return { positional, flags };
}

export function stringFlag(args: CliArgs, name: string): string | undefined {
  const value = args.flags.get(name);
  return typeof value === "string" ? value : undefined;
}

export function numberFlag(args: CliArgs, name: string): number | undefined {
  const value = stringFlag(args, name);
  if (value === undefined) return undefined;
  const num = parseInt(value, 10);
  if (isNaN(num)) throw new ConfigError(`--${name} expects a number, got "${value}"`);
  return num;
}

export function booleanFlag(args: CliArgs, name: string): boolean {
  return args.flags.has(name);
}
