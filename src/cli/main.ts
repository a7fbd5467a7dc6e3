/**
 * Top-level run: parse, generate, report
 */

import { type GeneratorContext, runGenerator } from '../core/generator.js';
import { createNodeFs } from '../files/fs.js';
import {
  configureOutput,
  printError,
  printGenerator,
} from '../output/colors.js';
import { createLogger } from '../output/logger.js';
import { formatCount } from '../utils/formatting.js';
import { parseArgs } from './args.js';

async function generate(argv: string[]): Promise<void> {
  const { config } = parseArgs(argv);

  const logger = createLogger(config.enableLog, config.logDir, 'generate');
  configureOutput(config.verbosity, logger.filePath ? logger.log : null);
  if (logger.filePath) {
    printGenerator(`Log: ${logger.filePath}`);
  }

  const context: GeneratorContext = {
    config,
    fs: createNodeFs(),
    logger,
    now: () => new Date(),
  };

  try {
    const summary = runGenerator(context);
    printGenerator(
      `Done: ${formatCount(summary.written, 'script')} written, ${summary.skipped} skipped`
    );
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.logEvent({ event: 'run_failed', message });
    throw err;
  } finally {
    // The log stream is closed below; later lines go to the console only
    configureOutput(config.verbosity);
    await logger.close();
  }
}

/**
 * Run the generator for the given arguments
 * Any failure prints `Error: <message>` and exits 1
 */
export async function runMain(argv: string[]): Promise<void> {
  try {
    await generate(argv);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    printError(message);
    process.exit(1);
  }
}
