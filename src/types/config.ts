/**
 * Configuration Manager types
 */

import { AttackCategory } from './detection';

/** Fixed-window rate limit settings */
export interface RateLimitSettings {
  /** Maximum requests per window */
  maxRequests: number;
  /** Window duration in milliseconds */
  windowMs: number;
}

/** Service configuration */
export interface ServiceConfig {
  enableAuth: boolean;
  apiTokens: string[];
  enableRateLimit: boolean;
  rateLimit: RateLimitSettings;
  logPrompts: boolean;
  blockMessage: string;
  auditMaxEntries: number;
  version: number;
  updatedAt: Date;
  updatedBy: string;
}

/** Settings an administrator may change */
export type ServiceConfigUpdate = Partial<Omit<ServiceConfig, 'version' | 'updatedAt' | 'updatedBy'>>;

/** Configuration change types */
export type ConfigChangeType = 'UPDATE' | 'IMPORT';

/** Configuration change audit record */
export interface ConfigChange {
  id: string;
  timestamp: Date;
  adminId: string;
  changeType: ConfigChangeType;
  previousValue: string;
  newValue: string;
}

/** Read-only view of the rule table in exports */
export interface RuleTableSummary {
  category: AttackCategory;
  weight: number;
  ruleIds: string[];
}

/** Configuration Manager interface */
export interface IConfigurationManager {
  getConfig(): Promise<ServiceConfig>;
  updateConfig(updates: ServiceConfigUpdate, adminId: string): Promise<void>;
  exportConfig(): Promise<string>;
  importConfig(configJson: string, adminId: string): Promise<void>;
  getConfigHistory(): Promise<ConfigChange[]>;
}
