export * from './logs.js';
export * from './media.js';
export * from './split.js';
