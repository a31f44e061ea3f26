/**
 * Risk Scorer exports
 */

export * from './risk-scorer';
export * from './confidence';
