/**
 * Decision timeline and detection metrics attached to every verdict
 */

import {
  DecisionStep,
  DetectionResult,
  FalsePositiveRisk,
  MitigationAction,
  MitigationMode,
  RiskAssessment,
  VerdictMetrics
} from '../types';

/**
 * Rule scan, risk aggregation and final action, in order
 */
export function buildTimeline(
  detection: DetectionResult,
  risk: RiskAssessment,
  action: MitigationAction,
  mode: MitigationMode
): DecisionStep[] {
  const matchCount = risk.contributions.reduce((sum, c) => sum + c.matchCount, 0);
  const categoryCount = detection.detected.length;

  return [
    {
      step: 1,
      stage: 'RULE_SCAN',
      result: `Matches: ${matchCount} in ${categoryCount} ${categoryCount === 1 ? 'category' : 'categories'}`,
      status: matchCount > 0 ? 'match' : 'no match'
    },
    {
      step: 2,
      stage: 'RISK_AGGREGATION',
      result: `Score: ${risk.score}/100`,
      status: risk.level
    },
    {
      step: 3,
      stage: 'FINAL_ACTION',
      result: action,
      status: mode
    }
  ];
}

/**
 * The higher the score, the less likely a flagged prompt is benign.
 * Nothing flagged means nothing can be a false positive.
 */
export function falsePositiveRiskFor(score: number): FalsePositiveRisk {
  if (score === 0) return 'NONE';
  if (score > 80) return 'LOW';
  if (score > 50) return 'MEDIUM';
  return 'HIGH';
}

export function buildMetrics(risk: RiskAssessment): VerdictMetrics {
  return {
    detectionConfidence: `${risk.score}%`,
    falsePositiveRisk: falsePositiveRiskFor(risk.score)
  };
}
