/**
 * Centralized constants for the generator
 */

// === Defaults ===
/** Installer emitted in generated scripts */
export const DEFAULT_HELPER = 'yay';
/** Directory for run logs when --log is given */
export const DEFAULT_LOG_DIR = 'logs';

// === Transcript and script names ===
/** Unnumbered transcript */
export const PLAIN_TRANSCRIPT = 'output.txt';
/** Script generated from the unnumbered transcript */
export const PLAIN_SCRIPT = 'result.sh';
/** Numbered transcript: output_<N>.txt */
export const NUMBERED_TRANSCRIPT_PATTERN = /^output_(\d+)\.txt$/;
export const TRANSCRIPT_EXT = '.txt';
export const SCRIPT_EXT = '.sh';

// === Rendered script ===
export const NO_PACKAGES_MESSAGE = 'No packages detected in input.';
/** Execute bits added to a written script (chmod +x) */
export const EXECUTABLE_BITS = 0o111;
