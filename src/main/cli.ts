/**
 * Command-line front end: argument parsing, configuration layering
 * (defaults < config file < flags) and exit-code mapping.
 */

import { parseArgs } from 'util';
import type { Configuration, ConfigurationOverrides } from '../utils/outlineExtractor/config';
import { loadConfigurationFile, resolveConfiguration } from '../utils/outlineExtractor/config';
import { ConfigurationError, describeError } from '../utils/outlineExtractor/errors';
import { formatOutlineTree } from '../utils/outlineExtractor/OutlineExtractor';
import type { DocumentExtractor } from './batchRunner';
import { batchExitCode, runBatch } from './batchRunner';

export const DEFAULT_INPUT_DIR = '/app/input';
export const DEFAULT_OUTPUT_DIR = '/app/output';

/** Exit code for invalid configuration or command-line usage */
export const USAGE_EXIT_CODE = 2;

export const USAGE = `Usage: pdf-outline [inputDir] [outputDir] [options]

Extracts the title and H1-H3 outline of every PDF in inputDir
(default ${DEFAULT_INPUT_DIR}) into <name>.json files in outputDir
(default ${DEFAULT_OUTPUT_DIR}).

Options:
  --config <file>      JSON configuration file (snake_case option names)
  --threshold <n>      heading size threshold relative to body text (default 1.1)
  --timeout <ms>       per-document time budget (default 10000)
  --concurrency <n>    documents processed in parallel (default: CPU count)
  --print              print each outline as an indented tree
  -h, --help           show this help`;

export interface CliArguments {
  inputDir: string;
  outputDir: string;
  configFile: string | undefined;
  overrides: ConfigurationOverrides;
  print: boolean;
  help: boolean;
}

function parseNumberFlag(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new ConfigurationError(`--${flag} expects a number, got "${value}"`);
  }
  return parsed;
}

function tokenize(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      options: {
        config: { type: 'string' },
        threshold: { type: 'string' },
        timeout: { type: 'string' },
        concurrency: { type: 'string' },
        print: { type: 'boolean', default: false },
        help: { type: 'boolean', short: 'h', default: false },
      },
    });
  } catch (err) {
    throw new ConfigurationError(describeError(err), { cause: err });
  }
}

/** @throws ConfigurationError for unknown options, extra positionals or non-numeric values */
export function parseCliArguments(argv: readonly string[]): CliArguments {
  const { values, positionals } = tokenize(argv);
  if (positionals.length > 2) {
    throw new ConfigurationError(`Unexpected argument "${positionals[2]}"`);
  }

  return {
    inputDir: positionals[0] ?? DEFAULT_INPUT_DIR,
    outputDir: positionals[1] ?? DEFAULT_OUTPUT_DIR,
    configFile: values.config,
    overrides: {
      headingSizeThreshold: parseNumberFlag('threshold', values.threshold),
      documentTimeoutMs: parseNumberFlag('timeout', values.timeout),
      concurrency: parseNumberFlag('concurrency', values.concurrency),
    },
    print: values.print ?? false,
    help: values.help ?? false,
  };
}

export interface CliDependencies {
  extract?: DocumentExtractor;
}

async function loadConfiguration(args: CliArguments): Promise<Configuration> {
  const fromFile = args.configFile ? await loadConfigurationFile(args.configFile) : {};
  return resolveConfiguration(fromFile, args.overrides);
}

/** Run the whole tool and return the process exit code. */
export async function runCli(argv: readonly string[], deps: CliDependencies = {}): Promise<number> {
  let args: CliArguments;
  let config: Configuration;
  try {
    args = parseCliArguments(argv);
    if (args.help) {
      console.log(USAGE);
      return 0;
    }
    config = await loadConfiguration(args);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      console.error(`[CLI] ${err.message}`);
      console.error(USAGE);
      return USAGE_EXIT_CODE;
    }
    throw err;
  }

  const summary = await runBatch({
    inputDir: args.inputDir,
    outputDir: args.outputDir,
    config,
    extract: deps.extract,
    onDocument: args.print
      ? (file, result) => console.log(`\n${file}\n${formatOutlineTree(result.record)}`)
      : undefined,
  });

  return batchExitCode(summary);
}
