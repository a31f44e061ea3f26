/**
 * Configuration exports
 */

export * from './configuration-manager';
export * from './env';
