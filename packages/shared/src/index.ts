export const name = '@kiln/shared';

export * from './types/events';
export * from './types/session';
export * from './logger';
export * from './errors';
export * from './config/schema';
export * from './fs/io';
export * from './fs/path';
export * from './fs/hash';
export * from './artifacts/manifest';
export * from './observability/event-log';
export * from './write-queue';
