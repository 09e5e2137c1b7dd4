// Shared argv handling for the CLIs
import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export interface FlagSpec {
  /** Flags that take a value: `--name value` or `--name=value` */
  values: readonly string[];
  /** Flags that are present or absent */
  switches: readonly string[];
}

export interface ParsedArgs {
  values: Map<string, string>;
  switches: Set<string>;
  help: boolean;
}

/**
 * Parse argv (without node and script path) against a flag list
 *
 * @throws CliUsageError on unknown options, missing values or positional arguments
 */
export function parseArgs(argv: readonly string[], spec: FlagSpec): ParsedArgs {
  const values = new Map<string, string>();
  const switches = new Set<string>();
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--help' || arg === '-h') {
      help = true;
      continue;
    }

    if (!arg.startsWith('--')) {
      throw new CliUsageError(`Unexpected argument: ${arg}`);
    }

    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);

    if (spec.switches.includes(name)) {
      if (eq !== -1) {
        throw new CliUsageError(`Option --${name} does not take a value`);
      }
      switches.add(name);
      continue;
    }

    if (!spec.values.includes(name)) {
      throw new CliUsageError(`Unknown option: --${name}`);
    }

    let value: string | undefined;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else {
      const next = argv[i + 1];
      if (next !== undefined && !next.startsWith('--')) {
        value = next;
        i++;
      }
    }

    if (value === undefined || value === '') {
      throw new CliUsageError(`Option --${name} requires a value`);
    }
    values.set(name, value);
  }

  return { values, switches, help };
}

export function requireValue(args: ParsedArgs, name: string): string {
  const value = args.values.get(name);
  if (value === undefined) {
    throw new CliUsageError(`Missing required option --${name}`);
  }
  return value;
}

/**
 * Parse a non-negative integer option (block numbers, sizes)
 */
export function parseIntegerOption(value: string, name: string): number {
  if (!/^[0-9]+$/.test(value.trim())) {
    throw new CliUsageError(`--${name} must be a non-negative integer, got "${value}"`);
  }
  const parsed = Number(value.trim());
  if (!Number.isSafeInteger(parsed)) {
    throw new CliUsageError(`--${name} is out of range: ${value}`);
  }
  return parsed;
}

/**
 * True when the module at `moduleUrl` is the process entry point
 */
export function isEntryPoint(moduleUrl: string): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(moduleUrl));
  } catch {
    return false;
  }
}
