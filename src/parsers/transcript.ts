/**
 * Package extraction from helper transcripts
 *
 * Recognizes two line shapes:
 * - optional dependency listings: "  pkgname: description"
 * - helper summary lines: "AUR Explicit (3): pkg1, pkg2, pkg3"
 */

import { isPackageToken } from './tokens.js';

const OPTIONAL_DEP_REGEX = /^\s+\S+:\s/;

const SUMMARY_LINE_REGEX =
  /^(?:AUR|Sync)\s+(?:Explicit|Dependency|Make\s+Dependency|Check\s+Dependency)\s+\(\d+\):\s/;

const TRAILING_PUNCTUATION = new Set([':', ',', ';', '.']);

function splitLines(text: string): string[] {
  return text.split('\n');
}

/**
 * Yield the name before the first colon of each optional-dependency line
 */
export function* extractOptionalDeps(text: string): Generator<string> {
  for (const line of splitLines(text)) {
    if (!OPTIONAL_DEP_REGEX.test(line)) {
      continue;
    }
    const [name = ''] = line.trimStart().split(':', 1);
    yield name;
  }
}

/**
 * Yield each comma-separated item of a summary line
 */
export function* extractSummaryLists(text: string): Generator<string> {
  for (const line of splitLines(text)) {
    if (!SUMMARY_LINE_REGEX.test(line)) {
      continue;
    }
    const list = line.slice(line.indexOf(':') + 1);
    for (const field of list.split(/,\s*/)) {
      const item = field.trim();
      if (item) {
        yield item;
      }
    }
  }
}

/**
 * Turn a raw candidate into a package token
 * Drops one trailing punctuation mark and any repo prefix (extra/foo -> foo)
 * Returns null when the result is not a valid token
 */
export function normalizeCandidate(candidate: string): string | null {
  let token = candidate;

  if (TRAILING_PUNCTUATION.has(token.slice(-1))) {
    token = token.slice(0, -1);
  }

  const slash = token.lastIndexOf('/');
  if (slash !== -1) {
    token = token.slice(slash + 1);
  }

  return isPackageToken(token) ? token : null;
}

/**
 * Normalize candidates and keep the first occurrence of each token
 */
export function dedupePackages(candidates: Iterable<string>): string[] {
  const seen = new Set<string>();
  const packages: string[] = [];

  for (const candidate of candidates) {
    const token = normalizeCandidate(candidate);
    if (token === null || seen.has(token)) {
      continue;
    }
    seen.add(token);
    packages.push(token);
  }

  return packages;
}

function* allCandidates(text: string): Generator<string> {
  yield* extractOptionalDeps(text);
  yield* extractSummaryLists(text);
}

/**
 * Extract the ordered, unique package list from a transcript
 */
export function extractPackages(text: string): string[] {
  return dedupePackages(allCandidates(text));
}
