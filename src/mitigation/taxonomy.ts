/**
 * Attack taxonomy, mapped to the OWASP Top 10 for LLM applications
 */

import { AttackCategory, AttackTaxonomyEntry } from '../types';

export const ATTACK_TAXONOMY: Readonly<Record<AttackCategory, AttackTaxonomyEntry>> = Object.freeze({
  INSTRUCTION_OVERRIDE: {
    category: 'INSTRUCTION_OVERRIDE',
    code: 'LLM01-IO',
    name: 'Prompt Injection - Instruction Override',
    severity: 'HIGH',
    owasp: 'LLM01 - Prompt Injection'
  },
  ROLE_ESCALATION: {
    category: 'ROLE_ESCALATION',
    code: 'LLM01-RE',
    name: 'Prompt Injection - Role Escalation',
    severity: 'HIGH',
    owasp: 'LLM01 - Prompt Injection'
  },
  DATA_EXFILTRATION: {
    category: 'DATA_EXFILTRATION',
    code: 'LLM06-DE',
    name: 'Sensitive Information Disclosure',
    severity: 'CRITICAL',
    owasp: 'LLM06 - Sensitive Information Disclosure'
  },
  JAILBREAK_POLICY_BYPASS: {
    category: 'JAILBREAK_POLICY_BYPASS',
    code: 'LLM01-JB',
    name: 'Prompt Injection - Jailbreak',
    severity: 'CRITICAL',
    owasp: 'LLM01 - Prompt Injection'
  },
  INDIRECT_INJECTION: {
    category: 'INDIRECT_INJECTION',
    code: 'LLM01-II',
    name: 'Prompt Injection - Indirect',
    severity: 'MEDIUM',
    owasp: 'LLM01 - Prompt Injection'
  }
});

export function taxonomyFor(categories: readonly AttackCategory[]): AttackTaxonomyEntry[] {
  return categories.map(category => ATTACK_TAXONOMY[category]);
}
