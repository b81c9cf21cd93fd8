/**
 * Command line parsing for the headless runner
 */

import type { ParamName, ParamOverrides } from '../core/types.js';
import { isParamName, parseOverrides } from '../config/schema.js';
import { getOverridesAsParams } from '../config/overrides.js';

export interface StudyRequest {
  paramName: ParamName;
  values: Array<number | string>;
}

export interface RunOptions {
  source: string;
  dataDir: string;
  dbPath: string;
  overridesFile: string | null;
  overrides: ParamOverrides;
  study: StudyRequest | null;
  verbose: boolean;
  help: boolean;
}

export class CliArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliArgumentError';
  }
}

export const HELP_TEXT = `
Maritime Resupply Simulation Runner

Usage: npm run simulate -- [options]

Options:
  --source <json|sqlite>       Data source (default: RESUPPLY_DATA_SOURCE or json)
  --data-dir <path>            Directory of JSON input files (default: ./data)
  --db <path>                  SQLite database file (default: resupply.db)
  --set <name=value>           Override a parameter; repeatable
  --overrides-file <path>      Apply a saved overrides file
  --study <name=v1,v2,...>     Run one simulation per value and compare
  --verbose, -v                Show per-step output
  --help, -h                   Show this help

Examples:
  npm run simulate -- --set simulation_duration=168
  npm run simulate -- --source sqlite --db runs.db
  npm run simulate -- --study loading_rate=3000,5000,7000
`;

/**
 * Numbers stay numbers; anything else is kept as text
 */
export function parseValue(raw: string): number | string {
  const trimmed = raw.trim();
  if (trimmed === '') return trimmed;
  const n = Number(trimmed);
  return Number.isNaN(n) ? trimmed : n;
}

function splitAssignment(flag: string, arg: string | undefined): [string, string] {
  if (arg === undefined) {
    throw new CliArgumentError(`${flag} requires a name=value argument`);
  }
  const eq = arg.indexOf('=');
  if (eq <= 0) {
    throw new CliArgumentError(`${flag} expects name=value, got "${arg}"`);
  }
  return [arg.slice(0, eq), arg.slice(eq + 1)];
}

function requireValue(flag: string, arg: string | undefined): string {
  if (arg === undefined || arg.startsWith('--')) {
    throw new CliArgumentError(`${flag} requires a value`);
  }
  return arg;
}

export function parseArgs(
  args: readonly string[],
  defaults: Pick<RunOptions, 'source' | 'dataDir' | 'dbPath'>
): RunOptions {
  const options: RunOptions = {
    ...defaults,
    overridesFile: null,
    overrides: {},
    study: null,
    verbose: false,
    help: false,
  };
  const assignments: Record<string, number | string> = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];

    switch (arg) {
      case '--source':
        options.source = requireValue(arg, next);
        i++;
        break;
      case '--data-dir':
        options.dataDir = requireValue(arg, next);
        i++;
        break;
      case '--db':
        options.dbPath = requireValue(arg, next);
        i++;
        break;
      case '--set': {
        const [name, value] = splitAssignment(arg, next);
        assignments[name] = parseValue(value);
        i++;
        break;
      }
      case '--overrides-file':
        options.overridesFile = requireValue(arg, next);
        i++;
        break;
      case '--study': {
        const [name, list] = splitAssignment(arg, next);
        if (!isParamName(name)) {
          throw new CliArgumentError(`Unknown parameter for --study: ${name}`);
        }
        const values = list.split(',').filter((v) => v.trim() !== '').map(parseValue);
        if (values.length === 0) {
          throw new CliArgumentError('--study needs at least one value');
        }
        options.study = { paramName: name, values };
        i++;
        break;
      }
      case '--verbose':
      case '-v':
        options.verbose = true;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        throw new CliArgumentError(`Unknown option: ${arg}`);
    }
  }

  // Unknown names and mistyped values are rejected here, before any run
  options.overrides = parseOverrides(assignments);
  return options;
}

/**
 * Overrides file first (the flag, else the configured path), then `--set` values on top.
 * A missing file contributes nothing.
 */
export function collectOverrides(options: RunOptions, overridesPath: string): ParamOverrides {
  const fromFile = getOverridesAsParams(options.overridesFile ?? overridesPath);
  return { ...fromFile, ...options.overrides };
}
