/**
 * Detector exports
 */

export * from './engine';
export * from './matcher';
export * from './rule';
export * from './rule-table';
