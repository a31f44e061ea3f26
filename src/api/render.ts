/**
 * Wire rendering of verdicts
 */

import { AnalysisResponse } from '../types/api';
import { MitigationVerdict } from '../types';

export function renderVerdict(
  verdict: MitigationVerdict,
  forwarding?: { forwardPrompt?: string; safeResponse?: string }
): AnalysisResponse {
  const breakdown: Record<string, number> = {};
  for (const contribution of verdict.risk.contributions) {
    breakdown[contribution.category] = contribution.points;
  }

  return {
    prompt: verdict.prompt,
    sanitized_prompt: verdict.action === 'REWRITE' ? verdict.sanitizedPrompt : null,
    action: verdict.action,
    risk_score: verdict.risk.score,
    risk_level: verdict.risk.level,
    detected_attacks: [...verdict.detectedAttacks],
    explanation: verdict.explanation,
    confidence: verdict.confidence,
    risk_breakdown: breakdown,
    attack_taxonomy: verdict.attackTaxonomy.map(entry => ({ ...entry })),
    mitigation_mode: verdict.mitigation.mode,
    decision_timeline: verdict.timeline.map(step => ({ ...step })),
    metrics: {
      detection_confidence: verdict.metrics.detectionConfidence,
      false_positive_risk: verdict.metrics.falsePositiveRisk
    },
    forward_prompt: forwarding?.forwardPrompt ?? null,
    safe_response: forwarding?.safeResponse ?? null
  };
}
