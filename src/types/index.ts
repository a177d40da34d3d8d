export * from './config.js';
export * from './sync.js';
export * from './memory.js';
