/**
 * Transcript selection and output naming
 */

import * as path from 'path';

import type { SelectionMode } from '../types/generator.js';
import {
  NUMBERED_TRANSCRIPT_PATTERN,
  PLAIN_SCRIPT,
  PLAIN_TRANSCRIPT,
  SCRIPT_EXT,
  TRANSCRIPT_EXT,
} from '../utils/constants.js';
import type { GeneratorFs } from './fs.js';

export interface SelectOptions {
  mode: SelectionMode;
  inDir: string;
  outDir: string;
  force: boolean;
}

/**
 * Script name for a transcript name
 * output.txt -> result.sh, output_<N>.txt -> output_<N>.sh
 */
export function scriptNameFor(transcriptName: string): string {
  if (transcriptName === PLAIN_TRANSCRIPT) {
    return PLAIN_SCRIPT;
  }
  const stem = transcriptName.endsWith(TRANSCRIPT_EXT)
    ? transcriptName.slice(0, -TRANSCRIPT_EXT.length)
    : transcriptName;
  return `${stem}${SCRIPT_EXT}`;
}

/**
 * Default output path for an input transcript
 */
export function outputPathFor(inputPath: string, outDir: string): string {
  return path.join(outDir, scriptNameFor(path.basename(inputPath)));
}

/**
 * Parse N from output_<N>.txt, or null for any other name
 * BigInt keeps numbers past 2^53 distinct
 */
export function transcriptNumber(name: string): bigint | null {
  const match = NUMBERED_TRANSCRIPT_PATTERN.exec(name);
  if (!match?.[1]) {
    return null;
  }
  return BigInt(match[1]);
}

/**
 * Select transcripts to process
 * Returns input paths in processing order; empty when nothing qualifies
 */
export function selectTranscripts(
  fs: GeneratorFs,
  options: SelectOptions
): string[] {
  const { mode, inDir, outDir, force } = options;

  const isPending = (name: string): boolean =>
    fs.isFile(path.join(inDir, name)) &&
    (force || !fs.isFile(path.join(outDir, scriptNameFor(name))));

  const numbered = fs
    .listDir(inDir)
    .filter((name) => transcriptNumber(name) !== null && isPending(name));
  const plainPending = isPending(PLAIN_TRANSCRIPT);

  if (mode === 'all') {
    const names = plainPending ? [...numbered, PLAIN_TRANSCRIPT] : numbered;
    return names.map((name) => path.join(inDir, name));
  }

  let latest: string | null = null;
  let max = -1n;
  for (const name of numbered) {
    const num = transcriptNumber(name) ?? -1n;
    if (num > max) {
      max = num;
      latest = name;
    }
  }

  if (latest === null && plainPending) {
    latest = PLAIN_TRANSCRIPT;
  }

  return latest === null ? [] : [path.join(inDir, latest)];
}
