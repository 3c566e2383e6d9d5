// Public API

export * from './result/index.js';
export * from './core/errors.js';
export * from './core/logger.js';
export * from './services/config/index.js';
