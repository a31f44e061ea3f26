/**
 * Mitigation Engine exports
 */

export * from './engine';
export * from './actions';
export * from './sanitizer';
export * from './explanation';
export * from './taxonomy';
export * from './timeline';
