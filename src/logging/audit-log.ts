/**
 * Audit Log - records every analysis for later review
 */

import { v4 as uuidv4 } from 'uuid';
import { AuditEntry, AuditFilter, AuditStats, IAuditLog } from '../types/logging';
import { MitigationVerdict } from '../types';

const DEFAULT_MAX_ENTRIES = 10000;
const DEFAULT_QUERY_LIMIT = 100;

/**
 * In-memory Audit Log. Insertion order is kept, so eviction drops the
 * oldest entry first.
 */
export class AuditLog implements IAuditLog {
  private entries: Map<string, AuditEntry> = new Map();
  private maxEntries: number;

  constructor(options?: { maxEntries?: number }) {
    this.maxEntries = options?.maxEntries ?? DEFAULT_MAX_ENTRIES;
  }

  /**
   * Record an analysis
   */
  async record(entry: AuditEntry): Promise<void> {
    const id = entry.id || uuidv4();
    this.entries.set(id, { ...entry, id });
    this.evictOverflow();
  }

  /**
   * Change the retention limit, evicting the oldest entries beyond it
   */
  setMaxEntries(maxEntries: number): void {
    this.maxEntries = maxEntries;
    this.evictOverflow();
  }

  getMaxEntries(): number {
    return this.maxEntries;
  }

  /**
   * Query entries, newest first
   */
  async query(filter: AuditFilter): Promise<AuditEntry[]> {
    const { startDate, endDate, action, category } = filter;
    let results = Array.from(this.entries.values());

    if (startDate) {
      results = results.filter(e => e.timestamp >= startDate);
    }

    if (endDate) {
      results = results.filter(e => e.timestamp <= endDate);
    }

    if (action) {
      results = results.filter(e => e.action === action);
    }

    if (category) {
      results = results.filter(e => e.detectedAttacks.includes(category));
    }

    results.sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());

    const offset = filter.offset ?? 0;
    const limit = filter.limit ?? DEFAULT_QUERY_LIMIT;

    return results.slice(offset, offset + limit);
  }

  /**
   * Count entries per action and per category
   */
  async getStats(since?: Date): Promise<AuditStats> {
    const stats: AuditStats = {
      total: 0,
      byAction: { ALLOW: 0, REWRITE: 0, BLOCK: 0 },
      byCategory: {
        INSTRUCTION_OVERRIDE: 0,
        ROLE_ESCALATION: 0,
        DATA_EXFILTRATION: 0,
        JAILBREAK_POLICY_BYPASS: 0,
        INDIRECT_INJECTION: 0
      }
    };

    for (const entry of this.entries.values()) {
      if (since && entry.timestamp < since) continue;
      stats.total++;
      stats.byAction[entry.action]++;
      for (const category of entry.detectedAttacks) {
        stats.byCategory[category]++;
      }
    }

    return stats;
  }

  /**
   * Get a specific entry by ID
   */
  async getEntry(id: string): Promise<AuditEntry | null> {
    return this.entries.get(id) ?? null;
  }

  /**
   * Get the entry for a request
   */
  async getByRequestId(requestId: string): Promise<AuditEntry | null> {
    for (const entry of this.entries.values()) {
      if (entry.requestId === requestId) {
        return entry;
      }
    }
    return null;
  }

  /**
   * Number of entries held
   */
  size(): number {
    return this.entries.size;
  }

  private evictOverflow(): void {
    while (this.entries.size > this.maxEntries) {
      const oldestKey = this.entries.keys().next().value;
      if (oldestKey === undefined) break;
      this.entries.delete(oldestKey);
    }
  }
}

/**
 * Build an audit entry from a verdict
 */
export function createAuditEntry(params: {
  requestId: string;
  clientIp: string;
  verdict: MitigationVerdict;
  logPrompt: boolean;
  timestamp?: Date;
}): AuditEntry {
  const { verdict } = params;
  return {
    id: uuidv4(),
    requestId: params.requestId,
    timestamp: params.timestamp ?? new Date(),
    clientIp: params.clientIp,
    action: verdict.action,
    riskScore: verdict.risk.score,
    riskLevel: verdict.risk.level,
    detectedAttacks: [...verdict.detectedAttacks],
    promptLength: verdict.prompt.length,
    prompt: params.logPrompt ? verdict.prompt : undefined
  };
}

/**
 * Create a new AuditLog instance
 */
export function createAuditLog(options?: { maxEntries?: number }): AuditLog {
  return new AuditLog(options);
}
