/**
 * Score thresholds for mitigation actions
 */

import { MitigationAction, MitigationMode } from '../types';

/** Lowest score of each action; everything below REWRITE is allowed */
export const ACTION_THRESHOLDS = {
  REWRITE: 40,
  BLOCK: 70
} as const;

const MITIGATION_MODES: Record<MitigationAction, { mode: MitigationMode; description: string }> = {
  ALLOW: {
    mode: 'PASS_THROUGH',
    description: 'Prompt is forwarded without modification.'
  },
  REWRITE: {
    mode: 'REWRITE',
    description: 'Matched attack phrases are removed and the remaining text is forwarded.'
  },
  BLOCK: {
    mode: 'BLOCK',
    description: 'Prompt is rejected and never forwarded to the model.'
  }
};

/**
 * Select the action for a risk score
 */
export function selectAction(score: number): MitigationAction {
  if (score >= ACTION_THRESHOLDS.BLOCK) return 'BLOCK';
  if (score >= ACTION_THRESHOLDS.REWRITE) return 'REWRITE';
  return 'ALLOW';
}

/**
 * Mitigation mode and its description for an action
 */
export function mitigationModeFor(action: MitigationAction): { mode: MitigationMode; description: string } {
  return MITIGATION_MODES[action];
}
