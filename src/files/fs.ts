/**
 * File system access used by the generator
 * Kept behind an interface so selection and the driver run against fakes in tests
 */

import * as fs from 'fs';
import * as path from 'path';

import { EXECUTABLE_BITS } from '../utils/constants.js';

export interface GeneratorFs {
  isFile(filePath: string): boolean;
  isDirectory(dirPath: string): boolean;
  /** Entry names of a directory, sorted by name */
  listDir(dirPath: string): string[];
  readText(filePath: string): string;
  writeText(filePath: string, content: string): void;
  /** Add execute bits, like chmod +x */
  makeExecutable(filePath: string): void;
  ensureDir(dirPath: string): void;
  /** Absolute, symlink-resolved path; falls back to path.resolve for missing files */
  realPath(filePath: string): string;
}

function statOrNull(target: string): fs.Stats | null {
  return fs.statSync(target, { throwIfNoEntry: false }) ?? null;
}

/**
 * Create the real file system implementation
 */
export function createNodeFs(): GeneratorFs {
  return {
    isFile(filePath: string): boolean {
      return statOrNull(filePath)?.isFile() ?? false;
    },

    isDirectory(dirPath: string): boolean {
      return statOrNull(dirPath)?.isDirectory() ?? false;
    },

    listDir(dirPath: string): string[] {
      return fs.readdirSync(dirPath).sort();
    },

    readText(filePath: string): string {
      return fs.readFileSync(filePath, 'utf-8');
    },

    writeText(filePath: string, content: string): void {
      fs.writeFileSync(filePath, content, 'utf-8');
    },

    makeExecutable(filePath: string): void {
      const { mode } = fs.statSync(filePath);
      fs.chmodSync(filePath, mode | EXECUTABLE_BITS);
    },

    ensureDir(dirPath: string): void {
      fs.mkdirSync(dirPath, { recursive: true });
    },

    realPath(filePath: string): string {
      return statOrNull(filePath) ? fs.realpathSync(filePath) : path.resolve(filePath);
    },
  };
}
