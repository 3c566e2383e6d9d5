// Tests for the centralized logger

import { describe, it, expect, vi, afterEach } from 'vitest';
import { Logger, LogLevel, logger, parseLogLevel } from './logger.js';

function capture(config: ConstructorParameters<typeof Logger>[0] = {}) {
  const lines: Array<[LogLevel, string]> = [];
  const instance = new Logger({ ...config, sink: (level, line) => lines.push([level, line]) });
  return { instance, lines };
}

describe('Logger', () => {
  afterEach(() => {
    Logger.configure({});
    vi.restoreAllMocks();
  });

  it('should drop messages below the configured level', () => {
    const { instance, lines } = capture({ level: LogLevel.WARN });

    instance.debug('debug');
    instance.info('info');
    instance.warn('warn');
    instance.error('error');

    expect(lines).toEqual([
      [LogLevel.WARN, '[result] [WARN] warn'],
      [LogLevel.ERROR, '[result] [ERROR] error']
    ]);
  });

  it('should append context as JSON', () => {
    const { instance, lines } = capture();

    instance.info('merged', { count: 2 });
    instance.info('empty context', {});

    expect(lines.map(([, line]) => line)).toEqual([
      '[result] [INFO] merged {"count":2}',
      '[result] [INFO] empty context'
    ]);
  });

  it('should omit the prefix when none is set', () => {
    const { instance, lines } = capture({ prefix: '' });

    instance.info('plain');

    expect(lines[0][1]).toBe('[INFO] plain');
  });

  it('should include timestamps when enabled', () => {
    const { instance, lines } = capture({ timestamps: true });

    instance.info('stamped');

    expect(lines[0][1]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[result\] \[INFO\] stamped$/);
  });

  it('should log exceptions with name and stack', () => {
    const { instance, lines } = capture();
    const error = new Error('boom');

    instance.exception(error);

    expect(lines[0][1]).toBe(
      `[result] [ERROR] boom ${JSON.stringify({ name: 'Error', stack: error.stack })}`
    );
  });

  it('should print nothing when silent', () => {
    const { instance, lines } = capture({ level: LogLevel.SILENT });

    instance.error('hidden');

    expect(lines).toEqual([]);
  });

  it('should write to the console by default', () => {
    const spy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    new Logger().warn('careful');

    expect(spy).toHaveBeenCalledWith('[result] [WARN] careful');
  });

  it('should reconfigure the shared instance in place', () => {
    const lines: string[] = [];
    Logger.configure({ level: LogLevel.DEBUG, prefix: '[orders]', sink: (_level, line) => lines.push(line) });

    logger.debug('visible');

    expect(Logger.getInstance()).toBe(logger);
    expect(lines).toEqual(['[orders] [DEBUG] visible']);
  });
});

describe('parseLogLevel', () => {
  it('should map level names', () => {
    expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel('silent')).toBe(LogLevel.SILENT);
  });
});
