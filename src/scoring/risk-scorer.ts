/**
 * Risk Scorer - weighted aggregation of detections into a 0-100 score
 */

import {
  ATTACK_CATEGORIES,
  AttackCategory,
  CategoryContribution,
  DetectionResult,
  IRiskScorer,
  RiskAssessment,
  RiskLevel
} from '../types';
import { getCategoryWeights, getDefaultRuleTable } from '../detection/rule-table';

export const MAX_RISK_SCORE = 100;

/** Lowest score of each risk level */
export const RISK_LEVEL_FLOORS = {
  MEDIUM: 40,
  HIGH: 70
} as const;

/**
 * Severity multiplier for a category's match count:
 * 1 -> 1.0, 2 -> 1.5, 3 -> 2.0, 4 or more -> 2.5
 */
export function severityMultiplier(matchCount: number): number {
  if (matchCount <= 0) return 0;
  if (matchCount >= 4) return 2.5;
  return 1 + (matchCount - 1) * 0.5;
}

/**
 * Round to the nearest integer, halves upward (22.5 -> 23)
 */
export function roundHalfUp(value: number): number {
  return Math.floor(value + 0.5);
}

/**
 * Map a score to its risk level
 */
export function riskLevelForScore(score: number): RiskLevel {
  if (score >= RISK_LEVEL_FLOORS.HIGH) return 'HIGH';
  if (score >= RISK_LEVEL_FLOORS.MEDIUM) return 'MEDIUM';
  return 'LOW';
}

/**
 * Risk Scorer implementation
 */
export class RiskScorer implements IRiskScorer {
  private readonly weights: Readonly<Record<AttackCategory, number>>;

  constructor(weights?: Readonly<Record<AttackCategory, number>>) {
    this.weights = Object.freeze({ ...(weights ?? getCategoryWeights(getDefaultRuleTable())) });
  }

  /**
   * Score a detection result. The sum is clamped at 100, never scaled.
   */
  assess(detection: DetectionResult): RiskAssessment {
    const contributions: CategoryContribution[] = [];
    const breakdown: Partial<Record<AttackCategory, number>> = {};

    for (const category of ATTACK_CATEGORIES) {
      const matchCount = detection.matches[category].length;
      if (matchCount === 0) continue;

      const baseWeight = this.weights[category];
      const multiplier = severityMultiplier(matchCount);
      const points = roundHalfUp(baseWeight * multiplier);

      contributions.push(Object.freeze({ category, matchCount, baseWeight, multiplier, points }));
      breakdown[category] = points;
    }

    const rawScore = contributions.reduce((sum, c) => sum + c.points, 0);
    const score = Math.min(rawScore, MAX_RISK_SCORE);

    return Object.freeze({
      score,
      rawScore,
      level: riskLevelForScore(score),
      breakdown: Object.freeze(breakdown),
      contributions: Object.freeze(contributions)
    });
  }
}

/**
 * Create a new Risk Scorer instance
 */
export function createRiskScorer(weights?: Readonly<Record<AttackCategory, number>>): RiskScorer {
  return new RiskScorer(weights);
}
