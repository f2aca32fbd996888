import { InvalidConfigurationError } from '../errors/log-window.error.js';
import type { ConfigOverrides } from '../config.js';

/**
 * Parsed command line arguments
 */
export interface ParsedArgs {
  flags: Set<string>;
  values: Map<string, string>;
  positional: string[];
}

/**
 * Options that take a value, e.g. `--window 2h` or `--window=2h`.
 */
export const VALUE_OPTIONS = ['group', 'window', 'month', 'day', 'pattern', 'region'] as const;

type ValueOption = (typeof VALUE_OPTIONS)[number];

function isValueOption(name: string): name is ValueOption {
  return (VALUE_OPTIONS as readonly string[]).includes(name);
}

export function parseArgs(args: string[]): ParsedArgs {
  const result: ParsedArgs = {
    flags: new Set<string>(),
    values: new Map<string, string>(),
    positional: [],
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg.startsWith('--')) {
      const body = arg.slice(2);
      const eq = body.indexOf('=');
      const name = eq === -1 ? body : body.slice(0, eq);

      if (!isValueOption(name)) {
        result.flags.add(name);
        continue;
      }

      const value = eq === -1 ? args[++i] : body.slice(eq + 1);
      if (value === undefined || (eq === -1 && value.startsWith('--'))) {
        throw new InvalidConfigurationError({ message: `Option --${name} needs a value` });
      }
      result.values.set(name, value);
    } else if (arg.startsWith('-') && arg.length === 2) {
      result.flags.add(arg.slice(1));
    } else {
      result.positional.push(arg);
    }
  }

  return result;
}

export function hasFlag(parsed: ParsedArgs, ...flagNames: string[]): boolean {
  return flagNames.some(name => parsed.flags.has(name));
}

export function getValue(parsed: ParsedArgs, key: ValueOption): string | undefined {
  return parsed.values.get(key);
}

export function toConfigOverrides(parsed: ParsedArgs): ConfigOverrides {
  return {
    logGroupName: getValue(parsed, 'group'),
    relativeWindow: getValue(parsed, 'window'),
    specificMonth: getValue(parsed, 'month'),
    specificDay: getValue(parsed, 'day'),
    filterPattern: getValue(parsed, 'pattern'),
    region: getValue(parsed, 'region'),
  };
}
