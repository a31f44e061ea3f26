/**
 * Unit tests for rule validation and compilation
 */

import * as fc from 'fast-check';
import { compileRule, escapeRegex, validateRegexPattern, validateRule } from '../../src/detection/rule';

describe('Rule validation', () => {
  it('accepts a well-formed pattern rule', () => {
    const result = validateRule({ id: 'r1', type: 'PATTERN', pattern: '\\bjailbreak\\b' });

    expect(result).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it('requires id, type and pattern', () => {
    const result = validateRule({});

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      'Rule id is required',
      'Rule type is required',
      'Rule pattern is required'
    ]);
  });

  it('rejects a pattern that does not compile', () => {
    const result = validateRule({ id: 'r1', type: 'PATTERN', pattern: '(unclosed' });

    expect(result.valid).toBe(false);
    expect(result.errors[0]).toMatch(/^Invalid regex pattern: /);
  });

  it('warns about very short keywords', () => {
    const result = validateRule({ id: 'r1', type: 'KEYWORD', pattern: 'sys' });

    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual(['Very short keyword patterns may cause false positives']);
  });

  it('reports regex syntax errors', () => {
    expect(validateRegexPattern('[a-z]+').valid).toBe(true);
    expect(validateRegexPattern('[a-z').valid).toBe(false);
  });
});

describe('Rule compilation', () => {
  it('escaped keywords match only themselves', () => {
    fc.assert(
      fc.property(fc.string({ minLength: 1, maxLength: 30 }), (literal) => {
        const regex = new RegExp(`^${escapeRegex(literal)}$`);
        return regex.test(literal);
      }),
      { numRuns: 200 }
    );
  });

  it('compiles keywords as trimmed literals', () => {
    const rule = compileRule({ id: 'k', type: 'KEYWORD', pattern: '  [inst]  ' }, 'INDIRECT_INJECTION');

    expect(rule.regex.source).toBe('\\[inst\\]');
    expect(rule.regex.flags).toBe('gi');
    expect(rule.category).toBe('INDIRECT_INJECTION');
    expect(Object.isFrozen(rule)).toBe(true);
  });

  it('compiles patterns unchanged', () => {
    const rule = compileRule({ id: 'p', type: 'PATTERN', pattern: 'ro+le' }, 'ROLE_ESCALATION');

    expect(rule.regex.source).toBe('ro+le');
  });
});
