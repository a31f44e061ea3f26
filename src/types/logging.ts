/**
 * Audit log types
 */

import { AttackCategory } from './detection';
import { MitigationAction } from './mitigation';
import { RiskLevel } from './scoring';

/** Audit record for one analysis */
export interface AuditEntry {
  id: string;
  requestId: string;
  timestamp: Date;
  clientIp: string;
  action: MitigationAction;
  riskScore: number;
  riskLevel: RiskLevel;
  detectedAttacks: AttackCategory[];
  promptLength: number;
  /** Only kept when prompt logging is enabled */
  prompt?: string;
}

/** Filter for querying the audit log */
export interface AuditFilter {
  startDate?: Date;
  endDate?: Date;
  action?: MitigationAction;
  category?: AttackCategory;
  limit?: number;
  offset?: number;
}

/** Aggregate counts over the audit log */
export interface AuditStats {
  total: number;
  byAction: Record<MitigationAction, number>;
  byCategory: Record<AttackCategory, number>;
}

/** Audit log interface */
export interface IAuditLog {
  record(entry: AuditEntry): Promise<void>;
  query(filter: AuditFilter): Promise<AuditEntry[]>;
  getStats(since?: Date): Promise<AuditStats>;
}
