import { ConsoleLogger } from './consoleLogger';
import type { CacheHit } from '../types/events';

const event: CacheHit = {
  schemaVersion: 1,
  timestamp: '2026-10-19T00:00:00.000Z',
  sessionId: 'session-1',
  type: 'CacheHit',
  payload: { key: 'target-installed' },
};

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('logs and traces events as JSON', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    const logger = new ConsoleLogger();
    logger.log(event);
    expect(logSpy).toHaveBeenCalledWith(JSON.stringify(event));

    logger.trace(event, 'hello');
    expect(logSpy).toHaveBeenCalledWith('hello', JSON.stringify(event));
  });

  it('writes debug/info/warn and handles error branches', () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    const logger = new ConsoleLogger();

    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error(new Error('boom'));
    logger.error(new Error('boom'), 'msg');

    expect(debugSpy).toHaveBeenCalledWith('d');
    expect(infoSpy).toHaveBeenCalledWith('i');
    expect(warnSpy).toHaveBeenCalledWith('w');
    expect(errorSpy).toHaveBeenCalledWith(expect.any(Error));
    expect(errorSpy).toHaveBeenCalledWith('msg', expect.any(Error));
  });

  it('scopes child loggers with prefixes and merges bindings', () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const logger = new ConsoleLogger();
    logger.child({}).info('no-prefix');
    expect(infoSpy).toHaveBeenCalledWith('no-prefix');

    logger.child({ a: 1 }).child({ b: 'x' }).info('hello');
    expect(infoSpy).toHaveBeenCalledWith('[a=1 b=x] hello');

    logger.child({ action: 'build' }).warn('warn');
    expect(warnSpy).toHaveBeenCalledWith('[action=build] warn');
  });
});
