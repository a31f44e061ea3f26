/**
 * Configuration Manager - service settings with an audit trail.
 * Rule and weight tables are fixed at startup and only exported here.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  ServiceConfig,
  ServiceConfigUpdate,
  ConfigChange,
  ConfigChangeType,
  IConfigurationManager,
  RuleTableSummary
} from '../types/config';
import { ValidationResult } from '../types/common';
import { ATTACK_CATEGORIES, RuleTable } from '../types/detection';
import { DEFAULT_BLOCK_MESSAGE } from '../filters/pre-filter';

/** Default service configuration */
export const DEFAULT_CONFIG: Omit<ServiceConfig, 'updatedAt'> = {
  enableAuth: false,
  apiTokens: [],
  enableRateLimit: true,
  rateLimit: {
    maxRequests: 100,
    windowMs: 60000
  },
  logPrompts: false,
  blockMessage: DEFAULT_BLOCK_MESSAGE,
  auditMaxEntries: 10000,
  version: 1,
  updatedBy: 'system'
};

type ConfigListener = (config: ServiceConfig) => void;

/** Configuration as exported and audited: tokens reduced to a count */
export type RedactedServiceConfig = Omit<ServiceConfig, 'apiTokens'> & { apiTokenCount: number };

export function redactConfig(config: ServiceConfig): RedactedServiceConfig {
  const { apiTokens, ...rest } = config;
  return { ...rest, apiTokenCount: apiTokens.length };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

/**
 * Validate configuration updates
 */
export function validateConfigUpdates(updates: Record<string, unknown>): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  const booleanFields = ['enableAuth', 'enableRateLimit', 'logPrompts'] as const;
  for (const field of booleanFields) {
    if (updates[field] !== undefined && typeof updates[field] !== 'boolean') {
      errors.push(`${field} must be a boolean`);
    }
  }

  const { apiTokens, rateLimit, blockMessage, auditMaxEntries } = updates;

  if (apiTokens !== undefined) {
    if (!Array.isArray(apiTokens) || !apiTokens.every(t => typeof t === 'string' && t.length > 0)) {
      errors.push('apiTokens must be an array of non-empty strings');
    }
  }

  if (rateLimit !== undefined) {
    if (!isRecord(rateLimit)) {
      errors.push('rateLimit must be an object');
    } else {
      if (!isPositiveInteger(rateLimit.maxRequests)) {
        errors.push('rateLimit.maxRequests must be a positive integer');
      }
      if (!isPositiveInteger(rateLimit.windowMs)) {
        errors.push('rateLimit.windowMs must be a positive integer');
      }
    }
  }

  if (blockMessage !== undefined) {
    if (typeof blockMessage !== 'string' || blockMessage.trim().length === 0) {
      errors.push('blockMessage must be a non-empty string');
    }
  }

  if (auditMaxEntries !== undefined) {
    if (!isPositiveInteger(auditMaxEntries)) {
      errors.push('auditMaxEntries must be a positive integer');
    } else if (auditMaxEntries > 1000000) {
      warnings.push('auditMaxEntries above 1000000 keeps a large audit log in memory');
    }
  }

  if (updates.enableAuth === true && Array.isArray(apiTokens) && apiTokens.length === 0) {
    warnings.push('enableAuth with no apiTokens rejects every request');
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings
  };
}

/**
 * Pick the recognised settings out of validated input
 */
function toConfigUpdate(source: Record<string, unknown>): ServiceConfigUpdate {
  const update: ServiceConfigUpdate = {};
  const { enableAuth, apiTokens, enableRateLimit, rateLimit, logPrompts, blockMessage, auditMaxEntries } = source;

  if (typeof enableAuth === 'boolean') update.enableAuth = enableAuth;
  if (typeof enableRateLimit === 'boolean') update.enableRateLimit = enableRateLimit;
  if (typeof logPrompts === 'boolean') update.logPrompts = logPrompts;
  if (typeof blockMessage === 'string') update.blockMessage = blockMessage;
  if (isPositiveInteger(auditMaxEntries)) update.auditMaxEntries = auditMaxEntries;
  if (Array.isArray(apiTokens)) {
    update.apiTokens = apiTokens.filter((t): t is string => typeof t === 'string');
  }
  if (isRecord(rateLimit) && isPositiveInteger(rateLimit.maxRequests) && isPositiveInteger(rateLimit.windowMs)) {
    update.rateLimit = { maxRequests: rateLimit.maxRequests, windowMs: rateLimit.windowMs };
  }

  return update;
}

/**
 * Configuration Manager implementation
 */
export class ConfigurationManager implements IConfigurationManager {
  private config: ServiceConfig;
  private history: ConfigChange[] = [];
  private ruleTable?: RuleTable;
  private listeners: ConfigListener[] = [];

  constructor(initialConfig?: ServiceConfigUpdate, ruleTable?: RuleTable) {
    this.config = {
      ...DEFAULT_CONFIG,
      ...initialConfig,
      updatedAt: new Date()
    };
    this.ruleTable = ruleTable;
  }

  /**
   * Get current configuration
   */
  async getConfig(): Promise<ServiceConfig> {
    return this.snapshot();
  }

  /**
   * Current configuration, synchronously
   */
  snapshot(): ServiceConfig {
    return {
      ...this.config,
      apiTokens: [...this.config.apiTokens],
      rateLimit: { ...this.config.rateLimit }
    };
  }

  /**
   * Update configuration with validation and audit logging
   */
  async updateConfig(updates: ServiceConfigUpdate, adminId: string): Promise<void> {
    const validation = validateConfigUpdates({ ...updates });
    if (!validation.valid) {
      throw new Error(`Invalid configuration: ${validation.errors.join(', ')}`);
    }

    this.apply(toConfigUpdate({ ...updates }), adminId, 'UPDATE');
  }

  /**
   * Export configuration and a summary of the rule table as JSON.
   * API tokens are never exported; an import keeps the target's tokens.
   */
  async exportConfig(): Promise<string> {
    const exportData = {
      config: redactConfig(this.config),
      rules: this.summarizeRules(),
      exportedAt: new Date().toISOString(),
      version: '1.0'
    };
    return JSON.stringify(exportData, null, 2);
  }

  /**
   * Import configuration from an exported JSON string.
   * The rule summary in the export is informational and ignored.
   */
  async importConfig(configJson: string, adminId: string): Promise<void> {
    let importData: unknown;

    try {
      importData = JSON.parse(configJson);
    } catch (e) {
      throw new Error('Invalid JSON format', { cause: e });
    }

    if (!isRecord(importData) || !isRecord(importData.config)) {
      throw new Error('Missing config in import data');
    }

    const validation = validateConfigUpdates(importData.config);
    if (!validation.valid) {
      throw new Error(`Invalid imported configuration: ${validation.errors.join(', ')}`);
    }

    this.apply(toConfigUpdate(importData.config), adminId, 'IMPORT');
  }

  /**
   * Get configuration change history
   */
  async getConfigHistory(): Promise<ConfigChange[]> {
    return [...this.history];
  }

  /**
   * Be notified after every change
   */
  onChange(listener: ConfigListener): void {
    this.listeners.push(listener);
  }

  /**
   * Set rule table reference for exports
   */
  setRuleTable(ruleTable: RuleTable): void {
    this.ruleTable = ruleTable;
  }

  private apply(update: ServiceConfigUpdate, adminId: string, changeType: ConfigChangeType): void {
    const previousValue = JSON.stringify(redactConfig(this.config));

    const newConfig: ServiceConfig = {
      ...this.config,
      ...update,
      version: this.config.version + 1,
      updatedAt: new Date(),
      updatedBy: adminId
    };

    this.logConfigChange({
      adminId,
      changeType,
      previousValue,
      newValue: JSON.stringify(redactConfig(newConfig))
    });

    this.config = newConfig;

    for (const listener of this.listeners) {
      listener(this.snapshot());
    }
  }

  private summarizeRules(): RuleTableSummary[] {
    const table = this.ruleTable;
    if (!table) return [];

    return ATTACK_CATEGORIES.map(category => ({
      category,
      weight: table.categories[category].weight,
      ruleIds: table.categories[category].rules.map(r => r.id)
    }));
  }

  /**
   * Log a configuration change
   */
  private logConfigChange(params: {
    adminId: string;
    changeType: ConfigChangeType;
    previousValue: string;
    newValue: string;
  }): void {
    this.history.push({
      id: uuidv4(),
      timestamp: new Date(),
      ...params
    });
  }
}

/**
 * Create a new Configuration Manager instance
 */
export function createConfigurationManager(
  initialConfig?: ServiceConfigUpdate,
  ruleTable?: RuleTable
): ConfigurationManager {
  return new ConfigurationManager(initialConfig, ruleTable);
}
