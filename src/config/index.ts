export * from './interpolate.js';
export * from './loader.js';
export * from './suite-loader.js';
