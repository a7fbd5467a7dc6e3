import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createLogger } from '../../src/output/logger.js';

describe('createLogger', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'install-script-gen-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('returns a no-op logger when disabled', async () => {
    const logger = createLogger(false, path.join(tmpDir, 'logs'), 'generate');

    logger.log('ignored');
    logger.logEvent({ event: 'ignored' });
    await logger.close();

    expect(logger.filePath).toBeNull();
    expect(fs.existsSync(path.join(tmpDir, 'logs'))).toBe(false);
  });

  it('creates the log directory and a timestamped file', async () => {
    const logDir = path.join(tmpDir, 'nested', 'logs');
    const logger = createLogger(true, logDir, 'generate');
    await logger.close();

    expect(logger.filePath).not.toBeNull();
    expect(path.dirname(logger.filePath ?? '')).toBe(logDir);
    expect(path.basename(logger.filePath ?? '')).toMatch(
      /^generate-\d{4}-\d{2}-\d{2}T\d{2}-\d{2}-\d{2}\.log$/
    );
  });

  it('writes stripped lines and JSON events', async () => {
    const logger = createLogger(true, tmpDir, 'generate');

    logger.log('\x1b[35m[GEN]\x1b[0m hello');
    logger.logEvent({ event: 'script_written', packageCount: 2 });
    await logger.close();

    const lines = fs
      .readFileSync(logger.filePath ?? '', 'utf-8')
      .trimEnd()
      .split('\n');
    expect(lines[0]).toBe('[GEN] hello');

    const event = JSON.parse(lines[1] ?? '{}') as Record<string, unknown>;
    expect(event['type']).toBe('generator');
    expect(event['event']).toBe('script_written');
    expect(event['packageCount']).toBe(2);
    expect(typeof event['timestamp']).toBe('string');
  });
});
