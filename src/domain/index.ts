export * from './ids.js';
export * from './worker.js';
export * from './study.js';
export * from './runs.js';
