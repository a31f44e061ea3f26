/**
 * Risk Scorer types
 */

import { AttackCategory, DetectionResult } from './detection';

export type RiskLevel = 'LOW' | 'MEDIUM' | 'HIGH';

/** Points one category added to the score */
export interface CategoryContribution {
  category: AttackCategory;
  matchCount: number;
  baseWeight: number;
  multiplier: number;
  points: number;
}

export interface RiskAssessment {
  /** Integer in [0, 100] */
  readonly score: number;
  /** Sum of contributions before the cap */
  readonly rawScore: number;
  readonly level: RiskLevel;
  readonly breakdown: Readonly<Partial<Record<AttackCategory, number>>>;
  readonly contributions: readonly CategoryContribution[];
}

/** Risk Scorer interface */
export interface IRiskScorer {
  assess(detection: DetectionResult): RiskAssessment;
}
