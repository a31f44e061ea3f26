/**
 * Detector types
 */

/** Known attack categories, in canonical order */
export const ATTACK_CATEGORIES = [
  'INSTRUCTION_OVERRIDE',
  'ROLE_ESCALATION',
  'DATA_EXFILTRATION',
  'JAILBREAK_POLICY_BYPASS',
  'INDIRECT_INJECTION'
] as const;

export type AttackCategory = typeof ATTACK_CATEGORIES[number];

/** KEYWORD is a case-insensitive literal, PATTERN a case-insensitive regex */
export type RuleType = 'KEYWORD' | 'PATTERN';

/** Detection rule as authored in the rule table */
export interface AttackRule {
  id: string;
  type: RuleType;
  pattern: string;
  description?: string;
}

/** Rule with its compiled matcher */
export interface CompiledRule extends AttackRule {
  readonly category: AttackCategory;
  readonly regex: RegExp;
}

/** Rules and weight for one category */
export interface CategoryRuleSet {
  readonly category: AttackCategory;
  readonly label: string;
  readonly weight: number;
  readonly rules: readonly CompiledRule[];
}

/** Validated, frozen rule table shared by every analysis */
export interface RuleTable {
  readonly categories: Readonly<Record<AttackCategory, CategoryRuleSet>>;
  readonly ruleCount: number;
}

/** A single rule firing */
export interface RuleMatch {
  ruleId: string;
  category: AttackCategory;
  matchedText: string;
  position: number;
}

/** Result of detection analysis */
export interface DetectionResult {
  /** Every category, with an empty list when it did not fire */
  readonly matches: Readonly<Record<AttackCategory, readonly RuleMatch[]>>;
  /** Categories with at least one match, in canonical order */
  readonly detected: readonly AttackCategory[];
}

/** Detector interface */
export interface IDetector {
  detect(text: string): DetectionResult;
  getRuleTable(): RuleTable;
}
