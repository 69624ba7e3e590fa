export * from './types/index.js';
export * from './assertions/index.js';
export * from './judge/index.js';
export * from './config/index.js';
export * from './transcript/index.js';
export * from './runner/index.js';
