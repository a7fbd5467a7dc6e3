/**
 * CLI argument parsing
 */

import { spawnSync } from 'child_process';
import { createRequire } from 'module';

import {
  DEFAULT_CONFIG,
  type GeneratorConfig,
  type InstallFlags,
  type ParsedArgs,
  type SelectionMode,
  type Verbosity,
} from '../types/generator.js';

const require = createRequire(import.meta.url);
const pkg = require('../../package.json') as { version: string };

const USAGE_HINT = 'Usage: install-script-gen [options] (see --help)';

const VALID_MODES = ['latest', 'all'] as const;

function isValidMode(value: string): value is SelectionMode {
  return VALID_MODES.includes(value as SelectionMode);
}

/** Options that take a value, keyed by every spelling */
const VALUE_OPTIONS: Record<string, string> = {
  '--mode': 'mode',
  '-m': 'mode',
  '--dir': 'dir',
  '-d': 'dir',
  '--out': 'out',
  '-o': 'out',
  '--input': 'input',
  '-i': 'input',
  '--output': 'output',
  '-O': 'output',
  '--helper': 'helper',
  '--log-dir': 'log-dir',
};

const FLAG_TOGGLES: Record<string, keyof InstallFlags> = {
  '--no-needed': 'needed',
  '--no-sudoloop': 'sudoloop',
  '--no-batchinstall': 'batchinstall',
  '--no-asdeps': 'asdeps',
};

const VERBOSITY_OPTIONS: Record<string, Verbosity> = {
  '--quiet': 'quiet',
  '--normal': 'normal',
  '--verbose': 'verbose',
};

/**
 * Print a usage error and exit
 */
function fail(message: string): never {
  console.error(`Error: ${message}`);
  console.error(USAGE_HINT);
  process.exit(1);
}

/**
 * Split --name=value into its parts
 */
function splitInline(arg: string): { name: string; inline: string | null } {
  const eq = arg.indexOf('=');
  if (!arg.startsWith('--') || eq === -1) {
    return { name: arg, inline: null };
  }
  return { name: arg.slice(0, eq), inline: arg.slice(eq + 1) };
}

/**
 * Collect the arguments that sit in option-name position
 * The value after a separate-value option is skipped
 */
function optionNames(args: string[]): Set<string> {
  const names = new Set<string>();
  for (let i = 0; i < args.length; i++) {
    const { name, inline } = splitInline(args[i] ?? '');
    names.add(name);
    if (VALUE_OPTIONS[name] !== undefined && inline === null) {
      i++;
    }
  }
  return names;
}

/**
 * Parse CLI arguments into a generator configuration
 * Exits the process on --help, --version and usage errors
 */
export function parseArgs(args: string[]): ParsedArgs {
  const names = optionNames(args);

  // Help wins over everything else, including bad options
  if (names.has('--help') || names.has('-h')) {
    printUsage({ paging: names.has('--paging') });
    process.exit(0);
  }

  if (names.has('--version') || names.has('-V')) {
    console.log(pkg.version);
    process.exit(0);
  }

  const values = new Map<string, string>();
  const flags: InstallFlags = { ...DEFAULT_CONFIG.flags };
  let force = DEFAULT_CONFIG.force;
  let verbosity = DEFAULT_CONFIG.verbosity;
  let enableLog = DEFAULT_CONFIG.enableLog;

  for (let i = 0; i < args.length; i++) {
    const { name, inline } = splitInline(args[i] ?? '');
    const valueKey = VALUE_OPTIONS[name];
    const toggle = FLAG_TOGGLES[name];
    const level = VERBOSITY_OPTIONS[name];

    if (valueKey !== undefined) {
      const value = inline ?? args[++i];
      if (value === undefined) {
        fail(`${name} requires a value`);
      }
      values.set(valueKey, value);
    } else if (inline !== null) {
      fail(`Unknown option: ${name}`);
    } else if (toggle !== undefined) {
      flags[toggle] = false;
    } else if (level !== undefined) {
      verbosity = level;
    } else if (name === '--force') {
      force = true;
    } else if (name === '--log') {
      enableLog = true;
    } else if (name !== '--paging') {
      fail(`Unknown option: ${name}`);
    }
  }

  const mode = values.get('mode') ?? DEFAULT_CONFIG.mode;
  if (!isValidMode(mode)) {
    fail(`Invalid --mode: ${mode} (expected latest or all)`);
  }

  const helper = values.get('helper') ?? DEFAULT_CONFIG.helper;
  if (!helper.trim()) {
    fail('--helper must not be empty');
  }
  if (helper.startsWith('-')) {
    fail(`--helper must not start with "-": ${helper}`);
  }

  const inputFile = values.get('input') ?? null;
  const outputFile = values.get('output') ?? null;
  if (outputFile !== null && inputFile === null) {
    fail('--output requires --input');
  }

  const config: GeneratorConfig = {
    mode,
    inDir: values.get('dir') ?? DEFAULT_CONFIG.inDir,
    outDir: values.get('out') ?? DEFAULT_CONFIG.outDir,
    inputFile,
    outputFile,
    helper,
    flags,
    force,
    verbosity,
    enableLog,
    logDir: values.get('log-dir') ?? DEFAULT_CONFIG.logDir,
  };

  return { config };
}

export const USAGE_TEXT = `
install-script-gen - create install scripts from AUR helper transcripts

Usage:
  install-script-gen [options]

Options:
  -h, --help              Show help and exit
  --paging                Page help through bat when it is installed
  -V, --version           Show version and exit
  -m, --mode MODE         latest (default) or all
  -d, --dir DIR           Input directory (default: .)
  -o, --out DIR           Output directory (default: same as --dir)
  -i, --input FILE        Explicit input file (skips selection)
  -O, --output FILE       Explicit output file (requires --input)
  --helper CMD            yay (default), paru, or any AUR helper name
  --no-needed             Do not add --needed
  --no-sudoloop           Do not add --sudoloop
  --no-batchinstall       Do not add --batchinstall
  --no-asdeps             Do not add --asdeps
  --force                 Regenerate even if the output script exists
  --quiet                 Errors only
  --normal                Progress per file (default)
  --verbose               Also list extracted packages
  --log                   Write a run log
  --log-dir DIR           Log directory (default: logs)

Selection:
  latest   newest output_N.txt without output_N.sh, else output.txt without result.sh
  all      every output_N.txt without output_N.sh, then output.txt without result.sh
  Existing scripts are looked for in the output directory (--out).

Recognized transcript lines:
  Optional dependencies:   "  pkgname: description..."
  Helper summaries:        "AUR Explicit (N): pkg1, pkg2, ..."
                           "Sync Dependency (N): pkg1, pkg2, ..."
                           (also Make Dependency, Check Dependency)

Examples:
  install-script-gen
  install-script-gen --mode all
  install-script-gen --helper paru --no-asdeps
  install-script-gen --input output_103.txt --output out.sh
`;

/**
 * Print usage information
 * With paging, pipes the text through bat and falls back to plain output
 */
export function printUsage(options: { paging?: boolean } = {}): void {
  if (options.paging) {
    const result = spawnSync('bat', ['--paging=always', '--plain'], {
      input: USAGE_TEXT,
      stdio: ['pipe', 'inherit', 'inherit'],
    });
    if (!result.error) {
      return;
    }
  }
  console.log(USAGE_TEXT);
}
