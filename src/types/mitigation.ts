/**
 * Mitigation Engine types
 */

import { AttackCategory, DetectionResult } from './detection';
import { RiskAssessment } from './scoring';

export type MitigationAction = 'ALLOW' | 'REWRITE' | 'BLOCK';

export type MitigationMode = 'PASS_THROUGH' | 'REWRITE' | 'BLOCK';

export type TaxonomySeverity = 'MEDIUM' | 'HIGH' | 'CRITICAL';

/** Industry classification of an attack category */
export interface AttackTaxonomyEntry {
  category: AttackCategory;
  code: string;
  name: string;
  severity: TaxonomySeverity;
  owasp: string;
}

/** Stage of the decision pipeline */
export type DecisionStage = 'RULE_SCAN' | 'RISK_AGGREGATION' | 'FINAL_ACTION';

/** One step of the decision timeline */
export interface DecisionStep {
  readonly step: number;
  readonly stage: DecisionStage;
  readonly result: string;
  readonly status: string;
}

/** Likelihood that a flagged prompt is benign */
export type FalsePositiveRisk = 'NONE' | 'LOW' | 'MEDIUM' | 'HIGH';

export interface VerdictMetrics {
  /** Risk score as a percentage, e.g. "40%" */
  readonly detectionConfidence: string;
  readonly falsePositiveRisk: FalsePositiveRisk;
}

interface VerdictBase {
  readonly prompt: string;
  readonly risk: RiskAssessment;
  readonly detection: DetectionResult;
  readonly detectedAttacks: readonly AttackCategory[];
  readonly attackTaxonomy: readonly AttackTaxonomyEntry[];
  readonly mitigation: { readonly mode: MitigationMode; readonly description: string };
  readonly explanation: string;
  /** In [0, 1] */
  readonly confidence: number;
  readonly timeline: readonly DecisionStep[];
  readonly metrics: VerdictMetrics;
}

/** Rewritten prompts carry their sanitized text */
export interface RewriteVerdict extends VerdictBase {
  readonly action: 'REWRITE';
  readonly sanitizedPrompt: string;
}

export interface PassOrBlockVerdict extends VerdictBase {
  readonly action: 'ALLOW' | 'BLOCK';
  readonly sanitizedPrompt?: undefined;
}

export type MitigationVerdict = RewriteVerdict | PassOrBlockVerdict;

/** Mitigation Engine interface */
export interface IMitigationEngine {
  analyze(prompt: string): MitigationVerdict;
}
