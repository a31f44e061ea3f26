/**
 * Mitigation Engine - runs detection and scoring, picks an action and
 * assembles the verdict
 */

import {
  IDetector,
  IMitigationEngine,
  IRiskScorer,
  MitigationVerdict,
  RuleTable
} from '../types';
import { assertPrompt } from '../errors';
import { Detector, allMatches } from '../detection/engine';
import { RiskScorer } from '../scoring/risk-scorer';
import { getCategoryWeights } from '../detection/rule-table';
import { calculateConfidence } from '../scoring/confidence';
import { mitigationModeFor, selectAction } from './actions';
import { buildExplanation } from './explanation';
import { sanitizePrompt } from './sanitizer';
import { taxonomyFor } from './taxonomy';
import { buildMetrics, buildTimeline } from './timeline';

/** Mitigation Engine options */
export interface MitigationEngineOptions {
  /** Rule table for the default detector and scorer */
  ruleTable?: RuleTable;
  detector?: IDetector;
  scorer?: IRiskScorer;
}

/**
 * Mitigation Engine implementation. Stateless apart from its read-only
 * collaborators; every call builds a fresh, frozen verdict.
 */
export class MitigationEngine implements IMitigationEngine {
  private readonly detector: IDetector;
  private readonly scorer: IRiskScorer;

  constructor(options?: MitigationEngineOptions) {
    this.detector = options?.detector ?? new Detector(options?.ruleTable);
    this.scorer = options?.scorer ?? new RiskScorer(getCategoryWeights(this.detector.getRuleTable()));
  }

  /**
   * Analyze a prompt. Throws InvalidInputError only when prompt is not a string.
   */
  analyze(prompt: string): MitigationVerdict {
    assertPrompt(prompt);

    const detection = this.detector.detect(prompt);
    const risk = this.scorer.assess(detection);
    const action = selectAction(risk.score);
    const detectedAttacks = detection.detected;
    const mitigation = mitigationModeFor(action);

    const common = {
      prompt,
      risk,
      detection,
      detectedAttacks,
      attackTaxonomy: Object.freeze(taxonomyFor(detectedAttacks)),
      mitigation: Object.freeze(mitigation),
      explanation: buildExplanation(action, detectedAttacks, risk),
      confidence: calculateConfidence(risk),
      timeline: Object.freeze(buildTimeline(detection, risk, action, mitigation.mode).map(step => Object.freeze(step))),
      metrics: Object.freeze(buildMetrics(risk))
    };

    if (action === 'REWRITE') {
      const sanitized = sanitizePrompt(prompt, allMatches(detection));
      return Object.freeze({ ...common, action, sanitizedPrompt: sanitized.text });
    }

    return Object.freeze({ ...common, action });
  }

  /**
   * Number of rules the detector runs
   */
  getRuleCount(): number {
    return this.detector.getRuleTable().ruleCount;
  }

  getRuleTable(): RuleTable {
    return this.detector.getRuleTable();
  }
}

/**
 * Create a new Mitigation Engine instance
 */
export function createMitigationEngine(options?: MitigationEngineOptions): MitigationEngine {
  return new MitigationEngine(options);
}

let sharedEngine: MitigationEngine | null = null;

/**
 * Analyze a prompt with the bundled rule table
 */
export function analyze(prompt: string): MitigationVerdict {
  if (!sharedEngine) {
    sharedEngine = new MitigationEngine();
  }
  return sharedEngine.analyze(prompt);
}
