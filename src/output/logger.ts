/**
 * File logging with ANSI stripping
 */

import * as fs from 'fs';
import * as path from 'path';

import { stripAnsi } from './colors.js';

/**
 * Generator event for structured logging
 */
export interface GeneratorEvent {
  type: 'generator';
  event: string;
  timestamp: string;
  [key: string]: unknown;
}

export interface Logger {
  log(msg: string): void;
  logEvent(event: Omit<GeneratorEvent, 'type' | 'timestamp'>): void;
  /** Resolves once buffered lines are flushed */
  close(): Promise<void>;
  filePath: string | null;
}

/**
 * Create a logger that writes to a timestamped log file
 */
export function createLogger(
  enabled: boolean,
  logDir: string,
  runName: string
): Logger {
  if (!enabled) {
    return {
      log: () => undefined,
      logEvent: () => undefined,
      close: () => Promise.resolve(),
      filePath: null,
    };
  }

  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }

  const timestamp = new Date().toISOString().replace(/[:.]/g, '-').slice(0, 19);
  const logFile = path.join(logDir, `${runName}-${timestamp}.log`);
  const logStream = fs.createWriteStream(logFile, { flags: 'a' });

  return {
    log(msg: string): void {
      logStream.write(stripAnsi(msg) + '\n');
    },
    logEvent(eventData: Omit<GeneratorEvent, 'type' | 'timestamp'>): void {
      const fullEvent = {
        type: 'generator' as const,
        timestamp: new Date().toISOString(),
        ...eventData,
      };
      logStream.write(JSON.stringify(fullEvent) + '\n');
    },
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        logStream.once('error', reject);
        logStream.end(() => resolve());
      });
    },
    filePath: logFile,
  };
}
