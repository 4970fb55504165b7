import type { KilnEvent } from '../types/events';
import { formatBindings, type Logger } from './types';

export class ConsoleLogger implements Logger {
  constructor(private readonly bindings: Record<string, unknown> = {}) {}

  log(event: KilnEvent): void {
    console.log(JSON.stringify(event));
  }

  trace(event: KilnEvent, message: string): void {
    console.log(formatBindings(this.bindings, message), JSON.stringify(event));
  }

  debug(message: string): void {
    console.debug(formatBindings(this.bindings, message));
  }

  info(message: string): void {
    console.info(formatBindings(this.bindings, message));
  }

  warn(message: string): void {
    console.warn(formatBindings(this.bindings, message));
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(formatBindings(this.bindings, message), error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ConsoleLogger({ ...this.bindings, ...bindings });
  }
}
