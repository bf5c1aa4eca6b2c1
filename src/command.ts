/**
 * Command-line handling behind the string-shroud binary: argument parsing,
 * help text and the command itself. `run` resolves to the exit status
 * instead of exiting, so it can be driven from tests.
 */

import * as fs from 'fs';
import { DEFAULT_CONFIG, ConfigOverrides, ObfuscateOptions, mergeConfig, parseConfigOverrides } from './config';
import { deriveKey } from './keys';
import { defaultOutputPath, obfuscatePath } from './index';

export interface CLIArgs {
  input: string;
  output: string;
  configFile: string | null;
  overrides: ConfigOverrides;
  opts: ObfuscateOptions;
  printKey: boolean;
  help: boolean;
}

/** Bad command line. `run` prints the help text after the message when `showHelp` is set. */
export class UsageError extends Error {
  readonly showHelp: boolean;

  constructor(message: string, showHelp = false) {
    super(message);
    this.name = 'UsageError';
    this.showHelp = showHelp;
  }
}

function parseInteger(flag: string, value: string | undefined): number {
  const n = Number(value);
  if (value === undefined || value.trim() === '' || !Number.isSafeInteger(n) || n < 0) {
    throw new UsageError(`${flag} expects a non-negative integer, got ${value ?? 'nothing'}`);
  }
  return n;
}

function parseList(value: string | undefined): string[] {
  return (value || '').split(',').map(s => s.trim()).filter(s => s !== '');
}

/** Parse the arguments after the program name. */
export function parseArgs(args: string[]): CLIArgs {
  let input = '';
  let output = '';
  let configFile: string | null = null;
  let printKey = false;
  const key: NonNullable<ConfigOverrides['key']> = {};
  const codegen: NonNullable<ConfigOverrides['codegen']> = {};
  const opts: ObfuscateOptions = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '-o' || arg === '--output') {
      output = args[++i] || '';
    } else if (arg === '-c' || arg === '--config') {
      configFile = args[++i] || null;
    } else if (arg === '--seed') {
      key.seed = parseInteger(arg, args[++i]);
    } else if (arg === '--rounds') {
      key.rounds = parseInteger(arg, args[++i]);
    } else if (arg === '--format') {
      const format = args[++i];
      if (format !== 'esm' && format !== 'cjs') throw new UsageError('--format expects esm or cjs');
      codegen.moduleFormat = format;
    } else if (arg === '--runtime') {
      const runtime = args[++i];
      if (!runtime) throw new UsageError('--runtime expects a module specifier');
      codegen.runtimeModule = runtime;
    } else if (arg === '--only') {
      opts.onlyFiles = parseList(args[++i]);
    } else if (arg === '--exclude') {
      opts.excludeFiles = parseList(args[++i]);
    } else if (arg === '--print-key') {
      printKey = true;
    } else if (arg === '-h' || arg === '--help') {
      return { input, output, configFile, overrides: { key, codegen }, opts, printKey, help: true };
    } else if (!arg.startsWith('-') && !input) {
      input = arg;
    } else {
      throw new UsageError(`Unknown option: ${arg}`);
    }
  }

  if (!input && !printKey) {
    throw new UsageError('No input specified.', true);
  }

  if (input && !output) {
    output = defaultOutputPath(input);
  }

  return { input, output, configFile, overrides: { key, codegen }, opts, printKey, help: false };
}

export function helpText(): string {
  return `
string-shroud - encrypt marked string literals at build time

Usage:
  string-shroud <file | directory | archive.zip> [options]

Options:
  -o, --output <path>     Output path (default: <input>.shrouded)
  -c, --config <file>     Path to a JSON config file (merged over defaults)
  --seed <n>              Key derivation seed (default: ${DEFAULT_CONFIG.key.seed})
  --rounds <n>            Key derivation rounds (default: ${DEFAULT_CONFIG.key.rounds})
  --format <esm|cjs>      Module format of the emitted prelude (default: ${DEFAULT_CONFIG.codegen.moduleFormat})
  --runtime <module>      Module the prelude imports from (default: ${DEFAULT_CONFIG.codegen.runtimeModule})
  --only <a,b>            Only rewrite these files or directories
  --exclude <a,b>         Skip these files or directories
  --print-key             Print the derived key and exit
  -h, --help              Show this help

Examples:
  string-shroud src -o build/src --seed 7001
  string-shroud dist/index.js --format cjs
  string-shroud plugin.zip --exclude vendor
  `;
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** Run one command. Resolves to the process exit status. */
export async function run(args: string[]): Promise<number> {
  let parsed: CLIArgs;
  try {
    parsed = parseArgs(args);
  } catch (e) {
    console.error(`Error: ${errorMessage(e)}`);
    if (e instanceof UsageError && e.showHelp) console.log(helpText());
    return 1;
  }

  const { input, output, configFile, overrides, opts, printKey, help } = parsed;
  if (help) {
    console.log(helpText());
    return 0;
  }

  let config = DEFAULT_CONFIG;

  if (configFile) {
    try {
      const customConfig = parseConfigOverrides(JSON.parse(fs.readFileSync(configFile, 'utf-8')));
      config = mergeConfig(config, customConfig);
    } catch (e) {
      console.error(`Error: reading config file: ${errorMessage(e)}`);
      return 1;
    }
  }

  config = mergeConfig(config, overrides);

  if (printKey) {
    console.log(deriveKey(config.key.seed, config.key.rounds));
    return 0;
  }

  if (!fs.existsSync(input)) {
    console.error(`Error: Input not found: ${input}`);
    return 1;
  }

  console.log(`Input:  ${input}`);
  console.log(`Output: ${output}`);
  console.log('');

  const startTime = Date.now();

  try {
    const { reports } = await obfuscatePath(input, output, config, opts);

    const replaced = reports.reduce((sum, r) => sum + r.replaced, 0);
    const skipped = reports.reduce((sum, r) => sum + r.skipped, 0);
    const touched = reports.filter(r => r.replaced > 0).length;
    console.log(`\nLiterals encrypted: ${replaced} in ${touched} file(s)`);
    if (skipped > 0) console.log(`Marker calls left as is: ${skipped}`);

    const elapsed = ((Date.now() - startTime) / 1000).toFixed(2);
    console.log(`\nDone in ${elapsed}s. Output written to: ${output}`);
  } catch (e) {
    console.error(`Error: ${errorMessage(e)}`);
    if (e instanceof Error && e.stack) console.error(e.stack);
    return 1;
  }
  return 0;
}
