/**
 * Explanation text for verdicts. Kept apart from scoring so both can be
 * tested on their own.
 */

import { AttackCategory, MitigationAction, RiskAssessment } from '../types';

const OUTCOMES: Record<MitigationAction, string> = {
  ALLOW: 'Prompt forwarded unchanged.',
  REWRITE: 'Matched phrases were removed before forwarding.',
  BLOCK: 'Prompt rejected and not forwarded.'
};

/**
 * INSTRUCTION_OVERRIDE -> Instruction Override
 */
export function formatCategoryName(category: AttackCategory): string {
  return category
    .split('_')
    .map(word => word.charAt(0) + word.slice(1).toLowerCase())
    .join(' ');
}

export function buildExplanation(
  action: MitigationAction,
  detected: readonly AttackCategory[],
  risk: RiskAssessment
): string {
  const findings = detected.length > 0
    ? `detected ${detected.map(formatCategoryName).join(', ')}`
    : 'no known attack patterns detected';

  return `${action}: ${findings} (risk score ${risk.score}/100, ${risk.level} risk). ${OUTCOMES[action]}`;
}
