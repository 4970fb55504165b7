import { ConsoleLogger } from './consoleLogger';
import { SessionLogger } from './sessionLogger';
export type { Logger } from './types';
export type { SessionLoggerOptions } from './sessionLogger';

export { ConsoleLogger, SessionLogger };
