import { SessionLogger } from './sessionLogger';
import type { EventSink, Severity, StateRecovered } from '../types/events';
import type { Logger } from './types';

function memorySink() {
  const records: Array<[Severity, string]> = [];
  const sink: EventSink = {
    write: (severity, text) => {
      records.push([severity, text]);
    },
    close: async () => {},
  };
  return { sink, records };
}

function echoLogger(): Logger {
  const echo: Logger = {
    log: vi.fn(),
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => echo,
  };
  return echo;
}

describe('SessionLogger', () => {
  it('writes every level to the sink with its severity', () => {
    const { sink, records } = memorySink();
    const logger = new SessionLogger(sink);

    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error(new Error('boom'), 'step failed');
    logger.error(new Error('bare'));

    expect(records).toEqual([
      ['DEBUG', 'd'],
      ['INFO', 'i'],
      ['WARN', 'w'],
      ['ERROR', 'step failed: boom'],
      ['ERROR', 'bare'],
    ]);
  });

  it('serializes events under the EVENT tag', () => {
    const { sink, records } = memorySink();
    const event: StateRecovered = {
      schemaVersion: 1,
      timestamp: '2026-10-19T00:00:00.000Z',
      sessionId: 's1',
      type: 'StateRecovered',
      payload: { path: 'metrics.json', reason: 'bad json' },
    };

    new SessionLogger(sink).trace(event, 'recovered');

    expect(records).toEqual([
      ['INFO', 'recovered'],
      ['EVENT', JSON.stringify(event)],
    ]);
  });

  it('echoes debug only when verbose', () => {
    const { sink } = memorySink();
    const echo = echoLogger();

    new SessionLogger(sink, { echo }).debug('quiet');
    expect(echo.debug).not.toHaveBeenCalled();

    new SessionLogger(sink, { echo, verbose: true }).debug('loud');
    expect(echo.debug).toHaveBeenCalledWith('loud');
  });

  it('prefixes messages with child bindings', () => {
    const { sink, records } = memorySink();
    const echo = echoLogger();

    new SessionLogger(sink, { echo }).child({ action: 'check' }).child({ item: 'Clippy' }).info('ok');

    expect(records).toEqual([['INFO', '[action=check item=Clippy] ok']]);
    expect(echo.info).toHaveBeenCalledWith('[action=check item=Clippy] ok');
  });
});
