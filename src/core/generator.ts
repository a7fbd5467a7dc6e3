/**
 * Generator driver: validation, selection, extraction, rendering, writing
 */

import type { GeneratorFs } from '../files/fs.js';
import { outputPathFor, selectTranscripts } from '../files/selector.js';
import {
  printGenerator,
  printGeneratorDetail,
} from '../output/colors.js';
import type { Logger } from '../output/logger.js';
import { extractPackages } from '../parsers/transcript.js';
import { renderScript } from '../templates/script.js';
import type {
  GenerationJob,
  GeneratorConfig,
  JobResult,
  RunSummary,
} from '../types/generator.js';
import { formatCount } from '../utils/formatting.js';

export interface GeneratorContext {
  config: GeneratorConfig;
  fs: GeneratorFs;
  logger: Logger;
  /** Clock for the script header */
  now: () => Date;
}

/**
 * Output directory after applying the --dir default
 */
export function resolveOutDir(config: GeneratorConfig): string {
  return config.outDir ?? config.inDir;
}

/**
 * Check directories and the explicit input, creating the output directory
 * Throws on anything that would make the run meaningless
 */
export function prepareRun(config: GeneratorConfig, fs: GeneratorFs): void {
  if (!fs.isDirectory(config.inDir)) {
    throw new Error(`Input directory does not exist: ${config.inDir}`);
  }
  if (config.inputFile !== null && !fs.isFile(config.inputFile)) {
    throw new Error(`Input file does not exist: ${config.inputFile}`);
  }
  fs.ensureDir(resolveOutDir(config));
}

/**
 * Build the job list for this run
 */
export function planJobs(
  config: GeneratorConfig,
  fs: GeneratorFs
): GenerationJob[] {
  const outDir = resolveOutDir(config);

  const inputs =
    config.inputFile !== null
      ? [config.inputFile]
      : selectTranscripts(fs, {
          mode: config.mode,
          inDir: config.inDir,
          outDir,
          force: config.force,
        });

  if (inputs.length === 0) {
    throw new Error(
      `No suitable output_*.txt / output.txt found in ${config.inDir}`
    );
  }

  return inputs.map((input) => ({
    input,
    output: config.outputFile ?? outputPathFor(input, outDir),
  }));
}

/**
 * Generate the script for one job unless its output already exists
 */
export function processJob(
  job: GenerationJob,
  context: GeneratorContext
): JobResult {
  const { config, fs, logger } = context;

  if (!config.force && fs.isFile(job.output)) {
    printGenerator(`Skipping ${job.input}: ${job.output} already exists`);
    logger.logEvent({ event: 'file_skipped', ...job });
    return { ...job, outcome: 'skipped', packages: [] };
  }

  printGenerator(`Processing ${job.input} -> ${job.output}`);

  const packages = extractPackages(fs.readText(job.input));
  const script = renderScript({
    helper: config.helper,
    packages,
    flags: config.flags,
    source: fs.realPath(job.input),
    generatedAt: context.now(),
  });

  fs.writeText(job.output, script);
  fs.makeExecutable(job.output);

  if (packages.length === 0) {
    printGenerator(`No packages to install for ${job.input}`);
  } else {
    printGeneratorDetail(
      `${formatCount(packages.length, 'package')}: ${packages.join(' ')}`
    );
  }
  logger.logEvent({
    event: 'script_written',
    ...job,
    packageCount: packages.length,
  });

  return { ...job, outcome: 'written', packages };
}

/**
 * Run the generator over every selected transcript, in order
 */
export function runGenerator(context: GeneratorContext): RunSummary {
  const { config, fs, logger } = context;

  prepareRun(config, fs);
  const jobs = planJobs(config, fs);

  logger.logEvent({
    event: 'run_start',
    mode: config.inputFile !== null ? 'input' : config.mode,
    jobs: jobs.length,
  });

  const results = jobs.map((job) => processJob(job, context));
  const written = results.filter((r) => r.outcome === 'written').length;
  const skipped = results.length - written;

  logger.logEvent({ event: 'run_complete', written, skipped });

  return { results, written, skipped };
}
