/**
 * Promptward - prompt injection detection, risk scoring and mitigation
 *
 * Classifies a prompt against known attack categories, scores the risk
 * and returns ALLOW, REWRITE or BLOCK with an explanation.
 */

// Export all types
export * from './types';

// Export errors
export * from './errors';

// Export detector
export * from './detection';

// Export risk scorer
export * from './scoring';

// Export mitigation engine
export * from './mitigation';

// Export filters
export * from './filters';

// Export audit log
export * from './logging';

// Export config
export * from './config';

// Export API gateway
export * from './api';
