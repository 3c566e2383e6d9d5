export * from './specification.js';
export * from './error-message.js';
export * from './validation.js';
export * from './result.js';
export * from './report.js';
