/**
 * Pattern matching functions for detection rules
 */

import { CompiledRule, RuleMatch } from '../types';

/**
 * Find every non-overlapping occurrence of a rule in text.
 * matchAll works on a copy of the regex, so the shared rule is never mutated.
 */
export function applyRule(rule: CompiledRule, text: string): RuleMatch[] {
  const matches: RuleMatch[] = [];

  for (const match of text.matchAll(rule.regex)) {
    if (match[0].length === 0) continue;
    matches.push({
      ruleId: rule.id,
      category: rule.category,
      matchedText: match[0],
      position: match.index ?? 0
    });
  }

  return matches;
}

/**
 * Apply multiple rules to text and return all matches, rule by rule
 */
export function applyRules(rules: readonly CompiledRule[], text: string): RuleMatch[] {
  const allMatches: RuleMatch[] = [];

  for (const rule of rules) {
    allMatches.push(...applyRule(rule, text));
  }

  return allMatches;
}
