/**
 * Detector - scans a prompt against every category's rule set
 */

import {
  ATTACK_CATEGORIES,
  AttackCategory,
  DetectionResult,
  IDetector,
  RuleMatch,
  RuleTable
} from '../types';
import { applyRules } from './matcher';
import { getDefaultRuleTable } from './rule-table';

/**
 * Rule-based Detector. Holds only the read-only rule table, so one
 * instance can serve any number of concurrent analyses.
 */
export class Detector implements IDetector {
  private readonly ruleTable: RuleTable;

  constructor(ruleTable?: RuleTable) {
    this.ruleTable = ruleTable ?? getDefaultRuleTable();
  }

  /**
   * Detect attack categories in text. Categories are evaluated
   * independently; the same text may fire several of them.
   */
  detect(text: string): DetectionResult {
    const matches: Record<AttackCategory, readonly RuleMatch[]> = {
      INSTRUCTION_OVERRIDE: [],
      ROLE_ESCALATION: [],
      DATA_EXFILTRATION: [],
      JAILBREAK_POLICY_BYPASS: [],
      INDIRECT_INJECTION: []
    };
    const detected: AttackCategory[] = [];

    if (text.length > 0) {
      for (const category of ATTACK_CATEGORIES) {
        const found = applyRules(this.ruleTable.categories[category].rules, text);
        matches[category] = Object.freeze(found.map(m => Object.freeze(m)));
        if (found.length > 0) {
          detected.push(category);
        }
      }
    }

    return Object.freeze({
      matches: Object.freeze(matches),
      detected: Object.freeze(detected)
    });
  }

  /**
   * Get the rule table this detector runs
   */
  getRuleTable(): RuleTable {
    return this.ruleTable;
  }
}

/**
 * Check whether a category fired
 */
export function isDetected(result: DetectionResult, category: AttackCategory): boolean {
  return result.matches[category].length > 0;
}

/**
 * Every match across categories, in canonical category order
 */
export function allMatches(result: DetectionResult): RuleMatch[] {
  return ATTACK_CATEGORIES.flatMap(category => [...result.matches[category]]);
}

/**
 * Create a new Detector instance
 */
export function createDetector(ruleTable?: RuleTable): IDetector {
  return new Detector(ruleTable);
}
