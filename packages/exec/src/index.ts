export const name = '@kiln/exec';

export * from './classify/types';
export * from './classify/parser';
export * from './classify/classifier';
export * from './runner/runner';
