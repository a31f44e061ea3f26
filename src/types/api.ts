/**
 * API Gateway types
 */

import {
  MitigationAction,
  MitigationMode,
  AttackTaxonomyEntry,
  DecisionStage,
  FalsePositiveRisk
} from './mitigation';
import { RiskLevel } from './scoring';

/** Error response format */
export interface ErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    retryAfter?: number;
  };
  requestId: string;
  timestamp: Date;
}

/** Success response format */
export interface SuccessResponse<T> {
  success: true;
  data: T;
  requestId: string;
  timestamp: Date;
}

/** API response union type */
export type ApiResponse<T> = SuccessResponse<T> | ErrorResponse;

/** Verdict as rendered on the wire */
export interface AnalysisResponse {
  prompt: string;
  sanitized_prompt: string | null;
  action: MitigationAction;
  risk_score: number;
  risk_level: RiskLevel;
  detected_attacks: string[];
  explanation: string;
  confidence: number;
  risk_breakdown: Record<string, number>;
  attack_taxonomy: AttackTaxonomyEntry[];
  mitigation_mode: MitigationMode;
  decision_timeline: Array<{ step: number; stage: DecisionStage; result: string; status: string }>;
  metrics: {
    detection_confidence: string;
    false_positive_risk: FalsePositiveRisk;
  };
  /** Text the caller may forward downstream; null when blocked */
  forward_prompt: string | null;
  safe_response: string | null;
}

/** Rate limit info */
export interface RateLimitInfo {
  limit: number;
  remaining: number;
  resetAt: Date;
}

/** Authentication result */
export interface AuthResult {
  authenticated: boolean;
  clientId?: string;
  error?: string;
}

/** Health check response */
export interface HealthCheckResponse {
  status: 'healthy' | 'degraded' | 'unhealthy';
  components: {
    preFilter: boolean;
    auditLog: boolean;
    configManager: boolean;
  };
  rulesLoaded: number;
  timestamp: Date;
}
