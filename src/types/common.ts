/**
 * Common types used across Promptward components
 */

/** Validation result for rules and configuration */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

/** Filter status for health checks */
export interface FilterStatus {
  healthy: boolean;
  lastProcessedAt: Date | null;
  averageLatencyMs: number;
  errorRate: number;
  rulesLoaded: number;
}

/** Request metadata attached to every analysis */
export interface RequestMetadata {
  clientIp: string;
  userAgent: string;
}
