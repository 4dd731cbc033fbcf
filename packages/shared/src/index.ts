export * from './config.js';
export * from './errors.js';
export * from './redis.js';
export * from './checkpoint-store.js';
