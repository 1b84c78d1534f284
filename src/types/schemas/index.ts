export * from './common.js';
export * from './config.js';
