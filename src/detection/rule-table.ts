/**
 * Rule table loading. The table is validated once, frozen, and shared
 * read-only by every analysis.
 */

import defaultRules from './rules/attack-rules.json';
import { ConfigurationError } from '../errors';
import {
  ATTACK_CATEGORIES,
  AttackCategory,
  AttackRule,
  CategoryRuleSet,
  CompiledRule,
  RuleTable
} from '../types';
import { compileRule, validateRule } from './rule';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isAttackCategory(value: string): value is AttackCategory {
  return ATTACK_CATEGORIES.some(category => category === value);
}

function readRule(raw: unknown, where: string, problems: string[]): AttackRule | null {
  if (!isRecord(raw)) {
    problems.push(`${where}: rule must be an object`);
    return null;
  }

  const { id, type, pattern, description } = raw;
  const rule: Partial<AttackRule> = {
    id: typeof id === 'string' ? id : undefined,
    type: type === 'KEYWORD' || type === 'PATTERN' ? type : undefined,
    pattern: typeof pattern === 'string' ? pattern : undefined,
    description: typeof description === 'string' ? description : undefined
  };

  if (type !== undefined && rule.type === undefined) {
    problems.push(`${where}: invalid rule type ${JSON.stringify(type)}`);
    return null;
  }

  const validation = validateRule(rule);
  if (!validation.valid || !rule.id || !rule.type || !rule.pattern) {
    problems.push(...validation.errors.map(e => `${where}: ${e}`));
    return null;
  }

  return {
    id: rule.id,
    type: rule.type,
    pattern: rule.pattern,
    description: rule.description
  };
}

function readCategory(
  category: AttackCategory,
  raw: unknown,
  seenIds: Set<string>,
  problems: string[]
): CategoryRuleSet | null {
  if (!isRecord(raw)) {
    problems.push(`${category}: missing category`);
    return null;
  }

  const { label, weight, rules } = raw;
  const before = problems.length;

  if (typeof label !== 'string' || label.trim().length === 0) {
    problems.push(`${category}: label is required`);
  }
  if (typeof weight !== 'number' || !Number.isInteger(weight) || weight <= 0) {
    problems.push(`${category}: weight must be a positive integer`);
  }
  if (!Array.isArray(rules) || rules.length === 0) {
    problems.push(`${category}: at least one rule is required`);
  }

  const compiled: CompiledRule[] = [];
  if (Array.isArray(rules)) {
    rules.forEach((entry: unknown, index) => {
      const rule = readRule(entry, `${category}[${index}]`, problems);
      if (!rule) return;
      if (seenIds.has(rule.id)) {
        problems.push(`${category}[${index}]: duplicate rule id ${rule.id}`);
        return;
      }
      seenIds.add(rule.id);
      compiled.push(compileRule(rule, category));
    });
  }

  if (problems.length > before || typeof label !== 'string' || typeof weight !== 'number') {
    return null;
  }

  return Object.freeze({
    category,
    label,
    weight,
    rules: Object.freeze(compiled)
  });
}

/**
 * Validate and compile a rule table.
 * Throws ConfigurationError listing every problem found.
 */
export function compileRuleTable(raw: unknown): RuleTable {
  if (!isRecord(raw) || !isRecord(raw.categories)) {
    throw new ConfigurationError('Invalid rule table', ['categories object is required']);
  }

  const source = raw.categories;
  const problems: string[] = [];

  for (const key of Object.keys(source)) {
    if (!isAttackCategory(key)) {
      problems.push(`unknown category ${key}`);
    }
  }

  const seenIds = new Set<string>();
  const sets: Partial<Record<AttackCategory, CategoryRuleSet>> = {};
  for (const category of ATTACK_CATEGORIES) {
    const set = readCategory(category, source[category], seenIds, problems);
    if (set) {
      sets[category] = set;
    }
  }

  const {
    INSTRUCTION_OVERRIDE,
    ROLE_ESCALATION,
    DATA_EXFILTRATION,
    JAILBREAK_POLICY_BYPASS,
    INDIRECT_INJECTION
  } = sets;

  if (
    problems.length > 0 ||
    !INSTRUCTION_OVERRIDE ||
    !ROLE_ESCALATION ||
    !DATA_EXFILTRATION ||
    !JAILBREAK_POLICY_BYPASS ||
    !INDIRECT_INJECTION
  ) {
    throw new ConfigurationError('Invalid rule table', problems);
  }

  return Object.freeze({
    categories: Object.freeze({
      INSTRUCTION_OVERRIDE,
      ROLE_ESCALATION,
      DATA_EXFILTRATION,
      JAILBREAK_POLICY_BYPASS,
      INDIRECT_INJECTION
    }),
    ruleCount: seenIds.size
  });
}

let defaultTable: RuleTable | null = null;

/**
 * The bundled rule table, compiled on first use
 */
export function getDefaultRuleTable(): RuleTable {
  if (!defaultTable) {
    defaultTable = compileRuleTable(defaultRules);
  }
  return defaultTable;
}

/**
 * Base weight of every category
 */
export function getCategoryWeights(table: RuleTable): Record<AttackCategory, number> {
  const { categories } = table;
  return {
    INSTRUCTION_OVERRIDE: categories.INSTRUCTION_OVERRIDE.weight,
    ROLE_ESCALATION: categories.ROLE_ESCALATION.weight,
    DATA_EXFILTRATION: categories.DATA_EXFILTRATION.weight,
    JAILBREAK_POLICY_BYPASS: categories.JAILBREAK_POLICY_BYPASS.weight,
    INDIRECT_INJECTION: categories.INDIRECT_INJECTION.weight
  };
}
