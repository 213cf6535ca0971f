export * from './fileUtils.js';
export * from './validation.js';
export * from './errors.js';
export * from './backoff.js';
