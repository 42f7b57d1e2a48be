export * from './annotation.js';
export * from './rules.js';
