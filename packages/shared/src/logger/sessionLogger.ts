import type { EventSink, KilnEvent } from '../types/events';
import { formatBindings, type Logger } from './types';

export interface SessionLoggerOptions {
  /** Logger that also receives info/warn/error messages, usually a ConsoleLogger */
  echo?: Logger;
  /** Forward debug messages to the echo logger as well */
  verbose?: boolean;
  bindings?: Record<string, unknown>;
}

/**
 * Logger backed by the session event log. Every message lands in the log file;
 * the echo logger only sees what an operator should read on screen.
 */
export class SessionLogger implements Logger {
  private readonly bindings: Record<string, unknown>;

  constructor(
    private readonly sink: EventSink,
    private readonly options: SessionLoggerOptions = {},
  ) {
    this.bindings = options.bindings ?? {};
  }

  log(event: KilnEvent): void {
    this.sink.write('EVENT', JSON.stringify(event));
  }

  trace(event: KilnEvent, message: string): void {
    this.info(message);
    this.log(event);
  }

  debug(message: string): void {
    const text = formatBindings(this.bindings, message);
    this.sink.write('DEBUG', text);
    if (this.options.verbose) this.options.echo?.debug(text);
  }

  info(message: string): void {
    const text = formatBindings(this.bindings, message);
    this.sink.write('INFO', text);
    this.options.echo?.info(text);
  }

  warn(message: string): void {
    const text = formatBindings(this.bindings, message);
    this.sink.write('WARN', text);
    this.options.echo?.warn(text);
  }

  error(error: Error, message?: string): void {
    const text = formatBindings(this.bindings, message ? `${message}: ${error.message}` : error.message);
    this.sink.write('ERROR', text);
    this.options.echo?.error(error, message ? formatBindings(this.bindings, message) : undefined);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new SessionLogger(this.sink, {
      ...this.options,
      bindings: { ...this.bindings, ...bindings },
    });
  }
}
