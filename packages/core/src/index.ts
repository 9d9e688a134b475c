export * from './types.js';
export * from './schemas.js';
export * from './errors.js';
export * from './trace.js';
export * from './logger.js';
export { withTimeout } from './utils/timeout.js';
