export * from './filter.js';
export * from './domain.js';
export * from './record.js';
export * from './envelope.js';
