import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, formatEntry, getLogLevel, isLogLevel, setLogLevel } from '../../src/utils/logger.js';

describe('formatEntry', () => {
  const entry = {
    timestamp: '2026-03-04T05:06:07.000Z',
    level: 'warn' as const,
    message: '[fan-out] slow subquery',
    meta: { subquery: 'granite', ms: 1200, tags: ['a'] },
  };

  it('renders a text line with metadata', () => {
    expect(formatEntry(entry, false)).toBe(
      '[05:06:07] WARN  [fan-out] slow subquery (subquery=granite ms=1200 tags=["a"])',
    );
  });

  it('renders JSON in JSON mode', () => {
    expect(JSON.parse(formatEntry(entry, true))).toEqual(entry);
  });
});

describe('createLogger', () => {
  const initialLevel = getLogLevel();

  function captureStderr() {
    return vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  }

  afterEach(() => {
    setLogLevel(initialLevel);
    vi.restoreAllMocks();
  });

  it('prefixes messages and writes to stderr', () => {
    const write = captureStderr();
    setLogLevel('debug');
    createLogger('searxng').info('Retrieved 3 results');

    expect(write).toHaveBeenCalledTimes(1);
    expect(String(write.mock.calls[0][0])).toMatch(/^\[\d{2}:\d{2}:\d{2}\] INFO {2}\[searxng\] Retrieved 3 results\n$/);
  });

  it('drops messages below the current level', () => {
    const write = captureStderr();
    setLogLevel('warn');
    const log = createLogger('test');
    log.info('hidden');
    log.debug('hidden');
    log.error('shown');

    expect(write).toHaveBeenCalledTimes(1);
  });

  it('writes nothing when silent', () => {
    const write = captureStderr();
    setLogLevel('silent');
    createLogger('test').error('hidden');

    expect(write).not.toHaveBeenCalled();
  });

  it('merges bound context into each line', () => {
    const write = captureStderr();
    setLogLevel('info');
    const runLog = createLogger('controller').child({ run: 7 });
    runLog.info('Pipeline finished', { issues: 0 });
    runLog.child({ stage: 'fan_out' }).warn('slow');

    expect(String(write.mock.calls[0][0])).toMatch(/INFO {2}\[controller\] Pipeline finished \(run=7 issues=0\)\n$/);
    expect(String(write.mock.calls[1][0])).toMatch(/WARN {2}\[controller\] slow \(run=7 stage=fan_out\)\n$/);
  });

  it('lets call metadata override bound context', () => {
    const write = captureStderr();
    setLogLevel('info');
    createLogger('test', { run: 1 }).info('msg', { run: 2 });

    expect(String(write.mock.calls[0][0])).toMatch(/\[test\] msg \(run=2\)\n$/);
  });
});

describe('isLogLevel', () => {
  it('accepts known levels only', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('silent')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
