/**
 * Promptward Type Definitions
 * Central export for all types
 */

// Common types
export * from './common';

// Detector types
export * from './detection';

// Risk Scorer types
export * from './scoring';

// Mitigation Engine types
export * from './mitigation';

// Filter types
export * from './filter';

// Audit log types
export * from './logging';

// Configuration types
export * from './config';

// API types
export * from './api';
