import { describe, it, expect, afterEach, vi } from 'vitest';
import { LogEntry, LogLevel, createLogger, parseLogLevel, resetLogHandler, setLogHandler, setLogLevel } from '../logger';

describe('logger', () => {
  const capture = () => {
    const entries: LogEntry[] = [];
    setLogHandler(entry => entries.push(entry));
    return entries;
  };

  afterEach(() => {
    resetLogHandler();
    setLogLevel(LogLevel.Info);
    vi.restoreAllMocks();
  });

  it('should write one JSON line per entry to stderr by default', () => {
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    createLogger({ component: 'test' }).info('hello', { attempt: 2 });

    expect(stdout).not.toHaveBeenCalled();
    expect(stderr).toHaveBeenCalledTimes(1);
    const line = stderr.mock.calls[0][0];
    expect(typeof line === 'string' && line.endsWith('\n')).toBe(true);
    const parsed: unknown = typeof line === 'string' ? JSON.parse(line) : undefined;
    expect(parsed).toMatchObject({ level: 'info', msg: 'hello', component: 'test', attempt: 2 });
  });

  it('should merge base and call context', () => {
    const entries = capture();

    createLogger({ component: 'test' }).info('hello', { attempt: 2 });

    expect(entries).toHaveLength(1);
    expect(entries[0].level).toBe(LogLevel.Info);
    expect(entries[0].message).toBe('hello');
    expect(entries[0].context).toEqual({ component: 'test', attempt: 2 });
  });

  it('should carry parent context into children', () => {
    const entries = capture();

    createLogger({ component: 'test' }).child({ runId: 'run-1' }).child({ stage: 'jwks' }).warn('slow');

    expect(entries[0].context).toEqual({ component: 'test', runId: 'run-1', stage: 'jwks' });
  });

  it('should suppress entries below the minimum level', () => {
    const entries = capture();
    setLogLevel(LogLevel.Warn);
    const log = createLogger();

    log.debug('one');
    log.info('two');
    log.warn('three');
    log.error('four');

    expect(entries.map(entry => entry.message)).toEqual(['three', 'four']);
  });

  describe('parseLogLevel', () => {
    it('should accept level names in any case', () => {
      expect(parseLogLevel('DEBUG')).toBe(LogLevel.Debug);
      expect(parseLogLevel('error')).toBe(LogLevel.Error);
    });

    it('should reject unknown levels', () => {
      expect(() => parseLogLevel('verbose')).toThrow('Unknown log level "verbose". Expected one of: debug, info, warn, error');
    });
  });
});
