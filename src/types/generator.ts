/**
 * Generator configuration and job types
 */

import { DEFAULT_HELPER, DEFAULT_LOG_DIR } from '../utils/constants.js';

export type SelectionMode = 'latest' | 'all';

export type Verbosity = 'quiet' | 'normal' | 'verbose';

/**
 * Installer flags that can be toggled off from the command line
 */
export interface InstallFlags {
  needed: boolean;
  sudoloop: boolean;
  batchinstall: boolean;
  asdeps: boolean;
}

/**
 * Resolved generator configuration
 */
export interface GeneratorConfig {
  readonly mode: SelectionMode;
  readonly inDir: string;
  /** Defaults to inDir when null */
  readonly outDir: string | null;
  readonly inputFile: string | null;
  readonly outputFile: string | null;
  readonly helper: string;
  readonly flags: Readonly<InstallFlags>;
  readonly force: boolean;
  readonly verbosity: Verbosity;
  readonly enableLog: boolean;
  readonly logDir: string;
}

export const DEFAULT_FLAGS: Readonly<InstallFlags> = {
  needed: true,
  sudoloop: true,
  batchinstall: true,
  asdeps: true,
};

/**
 * Default generator configuration
 */
export const DEFAULT_CONFIG: GeneratorConfig = {
  mode: 'latest',
  inDir: '.',
  outDir: null,
  inputFile: null,
  outputFile: null,
  helper: DEFAULT_HELPER,
  flags: DEFAULT_FLAGS,
  force: false,
  verbosity: 'normal',
  enableLog: false,
  logDir: DEFAULT_LOG_DIR,
};

/**
 * Parsed CLI arguments
 */
export interface ParsedArgs {
  config: GeneratorConfig;
}

/**
 * One input transcript paired with the script it produces
 */
export interface GenerationJob {
  input: string;
  output: string;
}

export type JobOutcome = 'written' | 'skipped';

export interface JobResult extends GenerationJob {
  outcome: JobOutcome;
  /** Extracted packages, empty when skipped */
  packages: string[];
}

/**
 * Summary of one generator run
 */
export interface RunSummary {
  results: JobResult[];
  written: number;
  skipped: number;
}
