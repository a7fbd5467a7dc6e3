/**
 * Install script rendering
 */

import type { InstallFlags } from '../types/generator.js';
import { NO_PACKAGES_MESSAGE } from '../utils/constants.js';
import { formatGeneratedAt } from '../utils/formatting.js';

export interface RenderOptions {
  helper: string;
  packages: readonly string[];
  flags: Readonly<InstallFlags>;
  /** Absolute path of the transcript, recorded in the header */
  source: string;
  generatedAt: Date;
}

const SAFE_WORD_REGEX = /^[A-Za-z0-9@%+=:,./_-]+$/;

/**
 * Quote a word for bash
 * Safe words stay bare; everything else is single-quoted
 */
export function shellQuote(word: string): string {
  if (SAFE_WORD_REGEX.test(word)) {
    return word;
  }
  return `'${word.replace(/'/g, `'\\''`)}'`;
}

/**
 * Build the installer command line
 * Flags after the package list are accepted by yay and paru
 */
export function buildInstallCommand(
  helper: string,
  flags: Readonly<InstallFlags>
): string {
  const words = ['exec', shellQuote(helper)];
  if (flags.needed) words.push('--needed');
  words.push('-S', '"${pkgs[@]}"');
  if (flags.sudoloop) words.push('--sudoloop');
  if (flags.batchinstall) words.push('--batchinstall');
  if (flags.asdeps) words.push('--asdeps');
  return words.join(' ');
}

function renderHeader(source: string, generatedAt: Date): string[] {
  const oneLine = source.replace(/\r?\n|\r/g, ' ');
  return [
    '#!/usr/bin/env bash',
    'set -euo pipefail',
    '',
    `# Auto-generated from: ${oneLine}`,
    `# Generated at: ${formatGeneratedAt(generatedAt)}`,
    '',
  ];
}

/**
 * Render a complete install script
 */
export function renderScript(options: RenderOptions): string {
  const { helper, packages, flags, source, generatedAt } = options;
  const lines = renderHeader(source, generatedAt);

  if (packages.length === 0) {
    lines.push(`printf '%s\\n' ${shellQuote(NO_PACKAGES_MESSAGE)}`, 'exit 0');
  } else {
    lines.push(
      'pkgs=(',
      ...packages.map((pkg) => `  ${shellQuote(pkg)}`),
      ')',
      '',
      buildInstallCommand(helper, flags)
    );
  }

  return lines.join('\n') + '\n';
}
