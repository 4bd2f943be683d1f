export * from './responses.js';
export * from './data-manager.js';
export * from './inject.js';
