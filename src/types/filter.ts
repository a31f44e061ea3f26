/**
 * Pre-filter types
 */

import { FilterStatus, RequestMetadata } from './common';
import { MitigationVerdict } from './mitigation';

/** Pre-filter request */
export interface PreFilterRequest {
  requestId: string;
  prompt: string;
  metadata: RequestMetadata;
  timestamp: Date;
}

/** Pre-filter response status */
export type PreFilterStatus = 'PASS' | 'BLOCK';

/** Pre-filter response */
export interface PreFilterResponse {
  requestId: string;
  status: PreFilterStatus;
  /** Text that may be sent downstream: the original for ALLOW, the sanitized one for REWRITE */
  forwardPrompt?: string;
  safeResponse?: string;
  verdict?: MitigationVerdict;
  /** Set when analysis failed and the filter failed closed */
  error?: string;
  processingTimeMs: number;
}

/** Pre-filter interface */
export interface IPreFilter {
  analyze(request: PreFilterRequest): Promise<PreFilterResponse>;
  getStatus(): FilterStatus;
}
