import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import {
  afterEach,
  beforeEach,
  describe,
  expect,
  it,
  type MockInstance,
  vi,
} from 'vitest';

import { runMain } from '../../src/cli/main.js';
import { configureOutput } from '../../src/output/colors.js';

describe('runMain', () => {
  let dir: string;
  let exitSpy: MockInstance<typeof process.exit>;
  let errorSpy: MockInstance<typeof console.error>;
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'install-script-gen-main-'));

    // Mock process.exit to throw
    exitSpy = vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${code})`);
    });
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    exitSpy.mockRestore();
    errorSpy.mockRestore();
    logSpy.mockRestore();
    configureOutput('normal');
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('exits 1 when there is nothing to process', async () => {
    await expect(runMain(['--dir', dir])).rejects.toThrow('process.exit(1)');

    expect(errorSpy).toHaveBeenCalledWith(
      `Error: No suitable output_*.txt / output.txt found in ${dir}`
    );
    expect(exitSpy).toHaveBeenCalledWith(1);
  });

  it('exits 1 when the input directory is missing', async () => {
    const missing = path.join(dir, 'missing');

    await expect(runMain(['--dir', missing])).rejects.toThrow(
      'process.exit(1)'
    );

    expect(errorSpy).toHaveBeenCalledWith(
      `Error: Input directory does not exist: ${missing}`
    );
  });

  it('writes the script and does not exit on success', async () => {
    fs.writeFileSync(path.join(dir, 'output_2.txt'), '  foo: a tool\n');

    await runMain(['--dir', dir, '--quiet']);

    expect(exitSpy).not.toHaveBeenCalled();
    expect(errorSpy).not.toHaveBeenCalled();
    expect(fs.existsSync(path.join(dir, 'output_2.sh'))).toBe(true);
  });

  it('records progress lines in the run log', async () => {
    fs.writeFileSync(path.join(dir, 'output_2.txt'), '  foo: a tool\n');
    const logDir = path.join(dir, 'logs');

    await runMain(['--dir', dir, '--quiet', '--log', '--log-dir', logDir]);

    const [logFile] = fs.readdirSync(logDir);
    expect(logFile).toMatch(/^generate-.*\.log$/);
    const lines = fs
      .readFileSync(path.join(logDir, logFile ?? ''), 'utf-8')
      .trimEnd()
      .split('\n');
    expect(
      lines.some((line) =>
        line.endsWith('[GEN] Done: 1 script written, 0 skipped')
      )
    ).toBe(true);
    expect(logSpy).not.toHaveBeenCalled();
  });
});
