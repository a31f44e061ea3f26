/**
 * Detection rule validation and compilation
 */

import { AttackCategory, AttackRule, CompiledRule, RuleType } from '../types';
import { ValidationResult } from '../types/common';

/** Valid rule types */
const VALID_RULE_TYPES: RuleType[] = ['KEYWORD', 'PATTERN'];

/** Keywords shorter than this tend to fire on ordinary text */
const MIN_KEYWORD_LENGTH = 4;

/**
 * Escape a literal so it can be embedded in a regular expression
 */
export function escapeRegex(literal: string): string {
  return literal.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Validate a regex pattern syntax
 */
export function validateRegexPattern(pattern: string): { valid: boolean; error?: string } {
  try {
    new RegExp(pattern, 'gi');
    return { valid: true };
  } catch (e) {
    return {
      valid: false,
      error: e instanceof Error ? e.message : 'Invalid regex pattern'
    };
  }
}

/**
 * Validate a detection rule
 */
export function validateRule(rule: Partial<AttackRule>): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!rule.id || rule.id.trim().length === 0) {
    errors.push('Rule id is required');
  }

  if (!rule.type) {
    errors.push('Rule type is required');
  } else if (!VALID_RULE_TYPES.includes(rule.type)) {
    errors.push(`Invalid rule type: ${rule.type}. Must be one of: ${VALID_RULE_TYPES.join(', ')}`);
  }

  if (!rule.pattern || rule.pattern.trim().length === 0) {
    errors.push('Rule pattern is required');
  } else if (rule.type === 'PATTERN') {
    const regexValidation = validateRegexPattern(rule.pattern);
    if (!regexValidation.valid) {
      errors.push(`Invalid regex pattern: ${regexValidation.error}`);
    } else if (new RegExp(rule.pattern, 'i').test('')) {
      errors.push('Pattern must not match the empty string');
    }
  }

  if (rule.type === 'KEYWORD' && rule.pattern && rule.pattern.trim().length < MIN_KEYWORD_LENGTH) {
    warnings.push('Very short keyword patterns may cause false positives');
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings
  };
}

/**
 * Compile a validated rule into its case-insensitive matcher
 */
export function compileRule(rule: AttackRule, category: AttackCategory): CompiledRule {
  const source = rule.type === 'KEYWORD' ? escapeRegex(rule.pattern.trim()) : rule.pattern;
  const compiled: CompiledRule = {
    ...rule,
    category,
    regex: new RegExp(source, 'gi')
  };
  return Object.freeze(compiled);
}
