/**
 * API exports
 */

export * from './gateway';
export * from './render';
export * from './middleware/auth';
export * from './middleware/rate-limiter';
