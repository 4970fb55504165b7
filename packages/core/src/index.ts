export const name = '@kiln/core';

export * from './config/loader';
export * from './cache/result-cache';
export * from './metrics/store';
export * from './health/scorer';
export * from './probe/tool-probe';
export * from './orchestrator/types';
export * from './orchestrator/commands';
export * from './orchestrator/test-results';
export * from './orchestrator/orchestrator';
export * from './bootstrap';
