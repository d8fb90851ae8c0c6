export * from './log.js';
export * from './process.js';
export * from './tools.js';
export * from './dir.js';
