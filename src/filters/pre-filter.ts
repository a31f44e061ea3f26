/**
 * Pre-filter component - analyzes prompts before they reach the LLM and
 * decides what, if anything, may be forwarded
 */

import {
  PreFilterRequest,
  PreFilterResponse,
  PreFilterStatus,
  IPreFilter,
  MitigationVerdict
} from '../types';
import { FilterStatus } from '../types/common';
import { MitigationEngine } from '../mitigation/engine';

/** Default message returned in place of a blocked prompt */
export const DEFAULT_BLOCK_MESSAGE =
  'Sorry, your request cannot be processed as it violates our security policies.';

const ERROR_MESSAGE = 'An error occurred while processing your request. Please try again.';

/** Pre-filter options */
export interface PreFilterOptions {
  blockMessage?: string;
}

/**
 * Pre-filter implementation
 */
export class PreFilter implements IPreFilter {
  private engine: MitigationEngine;
  private blockMessage: string;
  private lastProcessedAt: Date | null = null;
  private totalProcessed: number = 0;
  private totalLatencyMs: number = 0;
  private errorCount: number = 0;

  constructor(engine: MitigationEngine, options?: PreFilterOptions) {
    this.engine = engine;
    this.blockMessage = options?.blockMessage ?? DEFAULT_BLOCK_MESSAGE;
  }

  /**
   * Analyze a prompt and decide whether it may be forwarded
   */
  async analyze(request: PreFilterRequest): Promise<PreFilterResponse> {
    const startTime = Date.now();

    try {
      const verdict = this.engine.analyze(request.prompt);
      const processingTimeMs = Date.now() - startTime;
      this.updateMetrics(processingTimeMs, false);

      const status: PreFilterStatus = verdict.action === 'BLOCK' ? 'BLOCK' : 'PASS';

      return {
        requestId: request.requestId,
        status,
        forwardPrompt: forwardPromptFor(verdict),
        safeResponse: status === 'BLOCK' ? this.blockMessage : undefined,
        verdict,
        processingTimeMs
      };
    } catch (error) {
      const processingTimeMs = Date.now() - startTime;
      this.updateMetrics(processingTimeMs, true);

      // Fail closed
      return {
        requestId: request.requestId,
        status: 'BLOCK',
        safeResponse: ERROR_MESSAGE,
        error: error instanceof Error ? error.message : String(error),
        processingTimeMs
      };
    }
  }

  /**
   * Get current filter status
   */
  getStatus(): FilterStatus {
    return {
      healthy: this.errorCount === 0 || (this.errorCount / Math.max(this.totalProcessed, 1)) < 0.1,
      lastProcessedAt: this.lastProcessedAt,
      averageLatencyMs: this.totalProcessed > 0 ? this.totalLatencyMs / this.totalProcessed : 0,
      errorRate: this.totalProcessed > 0 ? this.errorCount / this.totalProcessed : 0,
      rulesLoaded: this.engine.getRuleCount()
    };
  }

  /**
   * Replace the message returned for blocked prompts
   */
  setBlockMessage(message: string): void {
    this.blockMessage = message;
  }

  /**
   * Update internal metrics
   */
  private updateMetrics(latencyMs: number, isError: boolean): void {
    this.lastProcessedAt = new Date();
    this.totalProcessed++;
    this.totalLatencyMs += latencyMs;
    if (isError) {
      this.errorCount++;
    }
  }
}

/**
 * Text the caller may send downstream for a verdict
 */
export function forwardPromptFor(verdict: MitigationVerdict): string | undefined {
  switch (verdict.action) {
    case 'ALLOW':
      return verdict.prompt;
    case 'REWRITE':
      return verdict.sanitizedPrompt;
    case 'BLOCK':
      return undefined;
  }
}

/**
 * Create a new PreFilter instance
 */
export function createPreFilter(engine: MitigationEngine, options?: PreFilterOptions): PreFilter {
  return new PreFilter(engine, options);
}
