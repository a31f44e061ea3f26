/**
 * Property-based tests for the Configuration Manager
 */

import * as fc from 'fast-check';
import {
  ConfigurationManager,
  DEFAULT_CONFIG,
  createConfigurationManager,
  validateConfigUpdates
} from '../../src/config/configuration-manager';
import { getDefaultRuleTable } from '../../src/detection/rule-table';
import { ServiceConfig } from '../../src/types';

const rateLimitGen = fc.record({
  maxRequests: fc.integer({ min: 1, max: 10000 }),
  windowMs: fc.integer({ min: 1, max: 3600000 })
});

const validUpdateGen = fc.record(
  {
    enableAuth: fc.boolean(),
    apiTokens: fc.array(fc.string({ minLength: 1, maxLength: 20 }), { maxLength: 3 }),
    enableRateLimit: fc.boolean(),
    rateLimit: rateLimitGen,
    logPrompts: fc.boolean(),
    blockMessage: fc.string({ minLength: 1, maxLength: 60 }).filter(s => s.trim().length > 0),
    auditMaxEntries: fc.integer({ min: 1, max: 100000 })
  },
  { requiredKeys: [] }
);

describe('ConfigurationManager', () => {
  let manager: ConfigurationManager;

  beforeEach(() => {
    manager = createConfigurationManager(undefined, getDefaultRuleTable());
  });

  it('starts from the defaults', async () => {
    const config = await manager.getConfig();

    expect(config).toEqual({ ...DEFAULT_CONFIG, updatedAt: expect.any(Date) });
  });

  it('applies initial settings over the defaults', () => {
    const custom = createConfigurationManager({ logPrompts: true, rateLimit: { maxRequests: 5, windowMs: 1000 } });

    expect(custom.snapshot().logPrompts).toBe(true);
    expect(custom.snapshot().rateLimit).toEqual({ maxRequests: 5, windowMs: 1000 });
    expect(custom.snapshot().enableRateLimit).toBe(true);
  });

  it('returns copies that callers cannot use to mutate the configuration', () => {
    const snapshot = manager.snapshot();
    snapshot.apiTokens.push('test-secret');
    snapshot.rateLimit.maxRequests = 1;

    expect(manager.snapshot().apiTokens).toEqual([]);
    expect(manager.snapshot().rateLimit.maxRequests).toBe(100);
  });

  describe('updateConfig', () => {
    it('applies any valid update, bumps the version and records it', async () => {
      await fc.assert(
        fc.asyncProperty(validUpdateGen, async (updates) => {
          const local = createConfigurationManager();
          await local.updateConfig(updates, 'admin-1');

          const config = await local.getConfig();
          expect(config).toMatchObject(updates);
          expect(config.version).toBe(2);
          expect(config.updatedBy).toBe('admin-1');

          const history = await local.getConfigHistory();
          expect(history).toHaveLength(1);
          expect(history[0].changeType).toBe('UPDATE');
          expect(history[0].adminId).toBe('admin-1');
        }),
        { numRuns: 100 }
      );
    });

    it('rejects invalid values and leaves the configuration unchanged', async () => {
      await expect(
        manager.updateConfig({ rateLimit: { maxRequests: 0, windowMs: 1000 } }, 'admin-1')
      ).rejects.toThrow('Invalid configuration: rateLimit.maxRequests must be a positive integer');
      await expect(manager.updateConfig({ blockMessage: '  ' }, 'admin-1')).rejects.toThrow(
        'Invalid configuration: blockMessage must be a non-empty string'
      );

      expect(manager.snapshot().version).toBe(1);
      expect(await manager.getConfigHistory()).toEqual([]);
    });

    it('notifies listeners with the new configuration', async () => {
      const seen: ServiceConfig[] = [];
      manager.onChange(config => seen.push(config));

      await manager.updateConfig({ enableAuth: true, apiTokens: ['test-secret'] }, 'admin-1');

      expect(seen).toHaveLength(1);
      expect(seen[0].enableAuth).toBe(true);
      expect(seen[0].apiTokens).toEqual(['test-secret']);
    });
  });

  describe('validateConfigUpdates', () => {
    it('reports type errors per field', () => {
      const result = validateConfigUpdates({
        enableAuth: 'yes',
        apiTokens: ['ok', ''],
        rateLimit: 5,
        auditMaxEntries: -1
      });

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([
        'enableAuth must be a boolean',
        'apiTokens must be an array of non-empty strings',
        'rateLimit must be an object',
        'auditMaxEntries must be a positive integer'
      ]);
    });

    it('warns when auth is enabled without tokens', () => {
      const result = validateConfigUpdates({ enableAuth: true, apiTokens: [] });

      expect(result.valid).toBe(true);
      expect(result.warnings).toEqual(['enableAuth with no apiTokens rejects every request']);
    });
  });

  describe('export and import', () => {
    it('exports the configuration with a rule table summary', async () => {
      const exported: unknown = JSON.parse(await manager.exportConfig());

      expect(exported).toMatchObject({
        version: '1.0',
        config: { enableAuth: false, blockMessage: DEFAULT_CONFIG.blockMessage },
        rules: [
          { category: 'INSTRUCTION_OVERRIDE', weight: 15 },
          { category: 'ROLE_ESCALATION', weight: 15 },
          { category: 'DATA_EXFILTRATION', weight: 25 },
          { category: 'JAILBREAK_POLICY_BYPASS', weight: 20 },
          { category: 'INDIRECT_INJECTION', weight: 10 }
        ]
      });
    });

    it('exports no rules when no table is attached', async () => {
      const bare = createConfigurationManager();
      const exported: unknown = JSON.parse(await bare.exportConfig());

      expect(exported).toMatchObject({ rules: [] });
    });

    it('round-trips settings through export and import', async () => {
      await fc.assert(
        fc.asyncProperty(validUpdateGen, async (updates) => {
          const source = createConfigurationManager();
          await source.updateConfig(updates, 'admin-1');

          const target = createConfigurationManager();
          await target.importConfig(await source.exportConfig(), 'admin-2');

          const { version: _v1, updatedAt: _u1, updatedBy: _b1, apiTokens: _t1, ...expected } = source.snapshot();
          const { version: _v2, updatedAt: _u2, updatedBy: _b2, apiTokens, ...actual } = target.snapshot();
          expect(actual).toEqual(expected);
          expect(apiTokens).toEqual([]);

          const history = await target.getConfigHistory();
          expect(history[0].changeType).toBe('IMPORT');
        }),
        { numRuns: 50 }
      );
    });

    it('never writes API tokens to exports or history', async () => {
      await manager.updateConfig({ enableAuth: true, apiTokens: ['test-secret', 'test-secret-2'] }, 'admin-1');

      const exported = await manager.exportConfig();
      expect(exported).not.toContain('test-secret');
      expect(JSON.parse(exported)).toMatchObject({ config: { enableAuth: true, apiTokenCount: 2 } });

      const [change] = await manager.getConfigHistory();
      expect(change.previousValue).not.toContain('test-secret');
      expect(change.newValue).not.toContain('test-secret');
      expect(JSON.parse(change.newValue)).toMatchObject({ apiTokenCount: 2 });
      expect(JSON.parse(change.previousValue)).toMatchObject({ apiTokenCount: 0 });
    });

    it('keeps the target tokens when importing', async () => {
      const target = createConfigurationManager({ apiTokens: ['test-secret'] });
      await target.importConfig(await manager.exportConfig(), 'admin-2');

      expect(target.snapshot().apiTokens).toEqual(['test-secret']);
    });

    it('rejects malformed imports', async () => {
      await expect(manager.importConfig('{not json', 'admin-1')).rejects.toThrow('Invalid JSON format');
      await expect(manager.importConfig('{"rules": []}', 'admin-1')).rejects.toThrow('Missing config in import data');
      await expect(manager.importConfig('{"config": {"logPrompts": "always"}}', 'admin-1')).rejects.toThrow(
        'Invalid imported configuration: logPrompts must be a boolean'
      );
      expect(manager.snapshot().version).toBe(1);
    });
  });
});
