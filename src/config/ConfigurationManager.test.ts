/**
 * Tests for Configuration Manager
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fc from 'fast-check';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ConfigurationManager } from './ConfigurationManager';
import { AuditService } from '../services/AuditService';

describe('ConfigurationManager', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'candle-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function configFile(content: unknown): Promise<string> {
    const path = join(dir, 'app.json');
    await writeFile(path, typeof content === 'string' ? content : JSON.stringify(content));
    return path;
  }

  describe('Configuration Loading and Validation', () => {
    it('should load the default configuration without a file', async () => {
      const config = await new ConfigurationManager(undefined, {}).loadConfiguration();

      expect(config).toEqual(ConfigurationManager.getDefaultConfiguration());
      expect(config.execution).toEqual({ feeLimitOrder: 0.0015, feeMarketOrder: 0.0025 });
    });

    it('should apply file values over defaults and environment over file', async () => {
      const path = await configFile({
        environment: 'staging',
        execution: { feeLimitOrder: 0.001, feeMarketOrder: 0.002 },
        connector: { maxRetries: 5 }
      });

      const config = await new ConfigurationManager(path, { FEE_MARKET_ORDER: '0.004', BOT_STORAGE_DIR: '/tmp/bots' }).loadConfiguration();

      expect(config.environment).toBe('staging');
      expect(config.execution).toEqual({ feeLimitOrder: 0.001, feeMarketOrder: 0.004 });
      expect(config.storage.botStorageDir).toBe('/tmp/bots');
      expect(config.connector.maxRetries).toBe(5);
      expect(config.connector.requestsPerSecond).toBe(10);
    });

    it('should ignore an unknown NODE_ENV', async () => {
      const config = await new ConfigurationManager(undefined, { NODE_ENV: 'test' }).loadConfiguration();
      expect(config.environment).toBe('development');
    });

    it('should reject out-of-range and mistyped values', async () => {
      await expect(new ConfigurationManager(undefined, { FEE_LIMIT_ORDER: '1.5' }).loadConfiguration())
        .rejects.toThrow('Configuration validation failed: execution.feeLimitOrder: Fee rate must be at least 0 and below 1');
      await expect(new ConfigurationManager(undefined, { CONNECTOR_MAX_RETRIES: 'many' }).loadConfiguration())
        .rejects.toThrow('Configuration validation failed: CONNECTOR_MAX_RETRIES: CONNECTOR_MAX_RETRIES must be a number');

      const path = await configFile({ execution: { feeLimitOrder: '0.1' } });
      await expect(new ConfigurationManager(path, {}).loadConfiguration())
        .rejects.toThrow('Configuration validation failed: execution.feeLimitOrder: Expected a number');
    });

    it('should report unreadable files', async () => {
      const path = await configFile('{not json');
      await expect(new ConfigurationManager(path, {}).loadConfiguration()).rejects.toThrow('Failed to load configuration:');
    });

    it('should journal the loaded configuration', async () => {
      const audit = new AuditService();
      await new ConfigurationManager(undefined, {}, audit).loadConfiguration();

      const [event] = audit.exportAuditLog(undefined, undefined, 'CONFIG_LOADED');
      expect(event.details).toEqual({ environment: 'development', source: 'defaults', execution: { feeLimitOrder: 0.0015, feeMarketOrder: 0.0025 } });
    });
  });

  describe('Configuration Sections', () => {
    it('should return copies of sections', () => {
      const manager = new ConfigurationManager(undefined, {});
      const execution = manager.getConfigSection('execution');
      execution.feeLimitOrder = 0.5;

      expect(manager.getConfigSection('execution').feeLimitOrder).toBe(0.0015);
    });

    it('should map connector settings onto connector protection', () => {
      expect(new ConfigurationManager(undefined, {}).getConnectorProtection()).toEqual({
        rateLimiter: { requestsPerSecond: 10 },
        retry: { maxRetries: 3, baseDelay: 1000 },
        circuitBreaker: { failureThreshold: 5, recoveryTimeout: 60000 }
      });
    });
  });

  describe('Property-Based Tests', () => {
    it('should accept every fee rate in [0, 1) and reject the rest', () => {
      const manager = new ConfigurationManager(undefined, {});
      fc.assert(
        fc.property(fc.double({ min: -2, max: 2, noNaN: true }), fee => {
          const config = manager.getConfiguration();
          config.execution.feeMarketOrder = fee;

          const validation = manager.validateConfiguration(config);

          expect(validation.isValid).toBe(fee >= 0 && fee < 1);
          expect(validation.errors.every(e => e.path === 'execution.feeMarketOrder')).toBe(true);
        }),
        { numRuns: 200 }
      );
    });
  });
});
