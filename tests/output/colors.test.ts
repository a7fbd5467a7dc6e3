import {
  afterEach,
  beforeEach,
  describe,
  expect,
  it,
  type MockInstance,
  vi,
} from 'vitest';
import {
  configureOutput,
  formatTimestamp,
  printError,
  printGenerator,
  printGeneratorDetail,
  stripAnsi,
  timestampPrefix,
} from '../../src/output/colors.js';

describe('stripAnsi', () => {
  it('removes ANSI color codes', () => {
    expect(stripAnsi('\x1b[31mRed Text\x1b[0m')).toBe('Red Text');
  });

  it('returns plain text unchanged', () => {
    expect(stripAnsi('Plain text')).toBe('Plain text');
  });
});

describe('formatTimestamp', () => {
  it('formats local time as HH:MM:SS.mmm', () => {
    const date = new Date(2024, 0, 15, 9, 5, 3, 42);
    expect(formatTimestamp(date)).toBe('09:05:03.042');
  });
});

describe('timestampPrefix', () => {
  it('stripping ANSI leaves just timestamp and space', () => {
    expect(stripAnsi(timestampPrefix())).toMatch(/^\d{2}:\d{2}:\d{2}\.\d{3} $/);
  });
});

describe('console output', () => {
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    configureOutput('normal');
    logSpy.mockRestore();
    errorSpy.mockRestore();
  });

  it('prints progress with a [GEN] tag and timestamp', () => {
    printGenerator('Processing a -> b');

    expect(logSpy).toHaveBeenCalledTimes(1);
    const output = stripAnsi(String(logSpy.mock.calls[0]?.[0]));
    expect(output).toMatch(
      /^\d{2}:\d{2}:\d{2}\.\d{3} \[GEN\] Processing a -> b$/
    );
  });

  it('suppresses progress in quiet mode', () => {
    configureOutput('quiet');
    printGenerator('hidden');

    expect(logSpy).not.toHaveBeenCalled();
  });

  it('prints details only in verbose mode', () => {
    printGeneratorDetail('hidden');
    expect(logSpy).not.toHaveBeenCalled();

    configureOutput('verbose');
    printGeneratorDetail('3 packages: a b c');

    expect(logSpy).toHaveBeenCalledTimes(1);
    const output = stripAnsi(String(logSpy.mock.calls[0]?.[0]));
    expect(output.endsWith('[GEN] 3 packages: a b c')).toBe(true);
  });

  it('sends every line to the log sink, even when quiet', () => {
    const sink = vi.fn();
    configureOutput('quiet', sink);

    printGenerator('Processing a -> b');
    printGeneratorDetail('1 package: a');
    printError('boom');

    expect(logSpy).not.toHaveBeenCalled();
    const lines = sink.mock.calls.map((call) => stripAnsi(String(call[0])));
    expect(lines).toHaveLength(3);
    expect(lines[0]).toMatch(/^\d{2}:\d{2}:\d{2}\.\d{3} \[GEN\] Processing a -> b$/);
    expect(lines[1]).toMatch(/\[GEN\] 1 package: a$/);
    expect(lines[2]).toBe('Error: boom');
  });

  it('prints errors to stderr even in quiet mode', () => {
    configureOutput('quiet');
    printError('boom');

    expect(errorSpy).toHaveBeenCalledWith('Error: boom');
  });
});
