/**
 * ANSI color codes and [GEN] console output
 */

import type { Verbosity } from '../types/generator.js';

export const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  magenta: '\x1b[35m',
} as const;

/**
 * Strip ANSI escape codes from a string
 */
// eslint-disable-next-line no-control-regex -- ANSI escape codes require control characters
const ANSI_REGEX = /\x1b\[[0-9;]*[a-zA-Z]/g;

export function stripAnsi(str: string): string {
  return str.replace(ANSI_REGEX, '');
}

/**
 * Format a timestamp as HH:MM:SS.mmm
 */
export function formatTimestamp(date: Date = new Date()): string {
  const h = date.getHours().toString().padStart(2, '0');
  const m = date.getMinutes().toString().padStart(2, '0');
  const s = date.getSeconds().toString().padStart(2, '0');
  const ms = date.getMilliseconds().toString().padStart(3, '0');
  return `${h}:${m}:${s}.${ms}`;
}

/**
 * Get a timestamped prefix for output lines
 */
export function timestampPrefix(): string {
  return `${colors.dim}${formatTimestamp()}${colors.reset} `;
}

/**
 * Receives every output line, whatever the verbosity (the run log)
 */
export type LogSink = (line: string) => void;

/**
 * Module-level output settings, configured once at startup
 */
let currentVerbosity: Verbosity = 'normal';
let logSink: LogSink | null = null;

export function configureOutput(
  verbosity: Verbosity,
  sink: LogSink | null = null
): void {
  currentVerbosity = verbosity;
  logSink = sink;
}

function tagged(message: string): string {
  return `${timestampPrefix()}${colors.magenta}[GEN]${colors.reset} ${message}`;
}

/**
 * Print a [GEN] progress message with timestamp
 * Suppressed on the console in quiet mode
 */
export function printGenerator(message: string): void {
  const line = tagged(message);
  logSink?.(line);
  if (currentVerbosity === 'quiet') return;
  console.log(line);
}

/**
 * Print a [GEN] detail message, shown only in verbose mode
 */
export function printGeneratorDetail(message: string): void {
  const line = tagged(`${colors.dim}${message}${colors.reset}`);
  logSink?.(line);
  if (currentVerbosity !== 'verbose') return;
  console.log(line);
}

/**
 * Print an error diagnostic to stderr
 * Never suppressed
 */
export function printError(message: string): void {
  const line = `Error: ${message}`;
  logSink?.(line);
  console.error(line);
}
