export * from './types.js';
export * from './trace.js';
export * from './view.js';
export * from './matchers.js';
export * from './result-matcher.js';
export * from './conversation.js';
export * from './tools.js';
export * from './turn-validators.js';
export * from './conversation-validators.js';
export * from './timing.js';
export * from './text.js';
export * from './workflow.js';
export * from './judge.js';
export * from './registry.js';
export * from './engine.js';
