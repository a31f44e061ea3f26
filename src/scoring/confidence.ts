/**
 * Confidence of a verdict: the mean of score/100 and the share of the
 * five categories that fired, to two decimals.
 */

import { ATTACK_CATEGORIES, RiskAssessment } from '../types';

const POINTS_PER_CATEGORY = 100 / ATTACK_CATEGORIES.length;

export function calculateConfidence(risk: RiskAssessment): number {
  const coverage = risk.contributions.length * POINTS_PER_CATEGORY;
  // Integer percent arithmetic keeps x.5 cases exact
  const percent = Math.round((risk.score + coverage) / 2);
  return Math.min(Math.max(percent, 0), 100) / 100;
}
