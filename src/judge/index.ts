export * from './types.js';
export * from './command-judge.js';
