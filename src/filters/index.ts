/**
 * Filter exports
 */

export * from './pre-filter';
