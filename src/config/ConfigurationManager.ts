/**
 * Configuration Manager for execution, storage and connector settings
 * Precedence: environment variables, then the JSON file, then defaults
 */

import { readFile } from 'fs/promises';
import { AuditService } from '../services/AuditService';
import { ConnectorProtectionConfig } from '../connectors/ExchangeConnector';

export type Environment = 'development' | 'staging' | 'production';

const ENVIRONMENTS: readonly Environment[] = ['development', 'staging', 'production'];

export interface ExecutionConfig {
  feeLimitOrder: number;
  feeMarketOrder: number;
}

export interface StorageConfig {
  botStorageDir: string;
}

export interface ConnectorConfig {
  requestsPerSecond: number;
  maxRetries: number;
  baseDelayMs: number;
  failureThreshold: number;
  recoveryTimeoutMs: number;
}

export interface ApplicationConfig {
  environment: Environment;
  execution: ExecutionConfig;
  storage: StorageConfig;
  connector: ConnectorConfig;
}

export interface ConfigValidationError {
  path: string;
  message: string;
  value?: unknown;
}

export interface ConfigValidationResult {
  isValid: boolean;
  errors: ConfigValidationError[];
}

export interface EnvironmentVariables {
  NODE_ENV?: string;
  FEE_LIMIT_ORDER?: string;
  FEE_MARKET_ORDER?: string;
  BOT_STORAGE_DIR?: string;
  CONNECTOR_REQUESTS_PER_SECOND?: string;
  CONNECTOR_MAX_RETRIES?: string;
  [key: string]: string | undefined;
}

type ConfigOverrides = {
  environment?: Environment;
  execution?: Partial<ExecutionConfig>;
  storage?: Partial<StorageConfig>;
  connector?: Partial<ConnectorConfig>;
};

export class ConfigurationManager {
  private config: ApplicationConfig;
  private readonly configFilePath?: string;
  private readonly env: EnvironmentVariables;
  private readonly auditService?: AuditService;

  constructor(configFilePath?: string, env: EnvironmentVariables = process.env, auditService?: AuditService) {
    this.configFilePath = configFilePath;
    this.env = env;
    this.auditService = auditService;
    this.config = ConfigurationManager.getDefaultConfiguration();
  }

  /**
   * Loads configuration from file and environment variables
   */
  async loadConfiguration(): Promise<ApplicationConfig> {
    const errors: ConfigValidationError[] = [];

    const fileConfig = this.configFilePath ? await this.loadConfigurationFromFile(this.configFilePath, errors) : {};
    const envConfig = this.loadConfigurationFromEnvironment(errors);
    const merged = this.mergeConfigurations(this.mergeConfigurations(ConfigurationManager.getDefaultConfiguration(), fileConfig), envConfig);

    errors.push(...this.validateConfiguration(merged).errors);
    if (errors.length > 0) {
      throw new Error(`Configuration validation failed: ${errors.map(e => `${e.path}: ${e.message}`).join(', ')}`);
    }

    this.config = merged;
    this.auditService?.logEvent('CONFIG_LOADED', {
      environment: merged.environment,
      source: this.configFilePath ?? 'defaults',
      execution: { ...merged.execution }
    });
    return this.getConfiguration();
  }

  getConfiguration(): ApplicationConfig {
    return {
      environment: this.config.environment,
      execution: { ...this.config.execution },
      storage: { ...this.config.storage },
      connector: { ...this.config.connector }
    };
  }

  getConfigSection<T extends Exclude<keyof ApplicationConfig, 'environment'>>(section: T): ApplicationConfig[T] {
    return this.getConfiguration()[section];
  }

  /**
   * Retry, rate limit and circuit breaker settings for exchange connectors
   */
  getConnectorProtection(): ConnectorProtectionConfig {
    const connector = this.config.connector;
    return {
      rateLimiter: { requestsPerSecond: connector.requestsPerSecond },
      retry: { maxRetries: connector.maxRetries, baseDelay: connector.baseDelayMs },
      circuitBreaker: { failureThreshold: connector.failureThreshold, recoveryTimeout: connector.recoveryTimeoutMs }
    };
  }

  validateConfiguration(config: ApplicationConfig): ConfigValidationResult {
    const errors: ConfigValidationError[] = [];

    if (!ENVIRONMENTS.includes(config.environment)) {
      errors.push({ path: 'environment', message: 'Environment must be development, staging, or production', value: config.environment });
    }

    for (const field of ['feeLimitOrder', 'feeMarketOrder'] as const) {
      const fee = config.execution[field];
      if (!Number.isFinite(fee) || fee < 0 || fee >= 1) {
        errors.push({ path: `execution.${field}`, message: 'Fee rate must be at least 0 and below 1', value: fee });
      }
    }

    if (config.storage.botStorageDir.trim().length === 0) {
      errors.push({ path: 'storage.botStorageDir', message: 'Bot storage directory is required', value: config.storage.botStorageDir });
    }

    const connector = config.connector;
    if (!(connector.requestsPerSecond > 0)) {
      errors.push({ path: 'connector.requestsPerSecond', message: 'Requests per second must be positive', value: connector.requestsPerSecond });
    }
    if (!Number.isInteger(connector.maxRetries) || connector.maxRetries < 0) {
      errors.push({ path: 'connector.maxRetries', message: 'Max retries must be a non-negative integer', value: connector.maxRetries });
    }
    if (!(connector.baseDelayMs >= 0)) {
      errors.push({ path: 'connector.baseDelayMs', message: 'Base delay must be non-negative', value: connector.baseDelayMs });
    }
    if (!Number.isInteger(connector.failureThreshold) || connector.failureThreshold < 1) {
      errors.push({ path: 'connector.failureThreshold', message: 'Failure threshold must be at least 1', value: connector.failureThreshold });
    }
    if (!(connector.recoveryTimeoutMs >= 0)) {
      errors.push({ path: 'connector.recoveryTimeoutMs', message: 'Recovery timeout must be non-negative', value: connector.recoveryTimeoutMs });
    }

    return { isValid: errors.length === 0, errors };
  }

  static getDefaultConfiguration(): ApplicationConfig {
    return {
      environment: 'development',
      execution: {
        feeLimitOrder: 0.0015,
        feeMarketOrder: 0.0025
      },
      storage: {
        botStorageDir: './bots'
      },
      connector: {
        requestsPerSecond: 10,
        maxRetries: 3,
        baseDelayMs: 1000,
        failureThreshold: 5,
        recoveryTimeoutMs: 60000
      }
    };
  }

  private loadConfigurationFromEnvironment(errors: ConfigValidationError[]): ConfigOverrides {
    const env = this.env;
    const overrides: ConfigOverrides = {};

    if (env.NODE_ENV) {
      const environment = ENVIRONMENTS.find(candidate => candidate === env.NODE_ENV);
      // unknown values such as 'test' keep the file or default value
      if (environment) {
        overrides.environment = environment;
      }
    }

    const feeLimitOrder = parseNumber(env.FEE_LIMIT_ORDER, 'FEE_LIMIT_ORDER', errors);
    const feeMarketOrder = parseNumber(env.FEE_MARKET_ORDER, 'FEE_MARKET_ORDER', errors);
    overrides.execution = {
      ...(feeLimitOrder !== undefined && { feeLimitOrder }),
      ...(feeMarketOrder !== undefined && { feeMarketOrder })
    };

    if (env.BOT_STORAGE_DIR) {
      overrides.storage = { botStorageDir: env.BOT_STORAGE_DIR };
    }

    const requestsPerSecond = parseNumber(env.CONNECTOR_REQUESTS_PER_SECOND, 'CONNECTOR_REQUESTS_PER_SECOND', errors);
    const maxRetries = parseNumber(env.CONNECTOR_MAX_RETRIES, 'CONNECTOR_MAX_RETRIES', errors);
    overrides.connector = {
      ...(requestsPerSecond !== undefined && { requestsPerSecond }),
      ...(maxRetries !== undefined && { maxRetries })
    };

    return overrides;
  }

  private async loadConfigurationFromFile(path: string, errors: ConfigValidationError[]): Promise<ConfigOverrides> {
    const raw = await readJson(path);

    if (!isRecord(raw)) {
      errors.push({ path: '$', message: 'Configuration file must contain a JSON object' });
      return {};
    }

    const overrides: ConfigOverrides = {};
    const fileEnvironment = raw.environment;
    if (fileEnvironment !== undefined) {
      const environment = ENVIRONMENTS.find(candidate => candidate === fileEnvironment);
      if (environment) {
        overrides.environment = environment;
      } else {
        errors.push({ path: 'environment', message: 'Environment must be development, staging, or production', value: fileEnvironment });
      }
    }

    const execution = readSection(raw, 'execution', errors);
    const feeLimitOrder = numberField(execution, 'execution.feeLimitOrder', errors);
    const feeMarketOrder = numberField(execution, 'execution.feeMarketOrder', errors);
    overrides.execution = {
      ...(feeLimitOrder !== undefined && { feeLimitOrder }),
      ...(feeMarketOrder !== undefined && { feeMarketOrder })
    };

    const storage = readSection(raw, 'storage', errors);
    const botStorageDir = stringField(storage, 'storage.botStorageDir', errors);
    overrides.storage = botStorageDir !== undefined ? { botStorageDir } : {};

    const connector = readSection(raw, 'connector', errors);
    const requestsPerSecond = numberField(connector, 'connector.requestsPerSecond', errors);
    const maxRetries = numberField(connector, 'connector.maxRetries', errors);
    const baseDelayMs = numberField(connector, 'connector.baseDelayMs', errors);
    const failureThreshold = numberField(connector, 'connector.failureThreshold', errors);
    const recoveryTimeoutMs = numberField(connector, 'connector.recoveryTimeoutMs', errors);
    overrides.connector = {
      ...(requestsPerSecond !== undefined && { requestsPerSecond }),
      ...(maxRetries !== undefined && { maxRetries }),
      ...(baseDelayMs !== undefined && { baseDelayMs }),
      ...(failureThreshold !== undefined && { failureThreshold }),
      ...(recoveryTimeoutMs !== undefined && { recoveryTimeoutMs })
    };

    return overrides;
  }

  private mergeConfigurations(base: ApplicationConfig, override: ConfigOverrides): ApplicationConfig {
    return {
      environment: override.environment ?? base.environment,
      execution: { ...base.execution, ...override.execution },
      storage: { ...base.storage, ...override.storage },
      connector: { ...base.connector, ...override.connector }
    };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseNumber(value: string | undefined, name: string, errors: ConfigValidationError[]): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    errors.push({ path: name, message: `${name} must be a number`, value });
    return undefined;
  }
  return parsed;
}

async function readJson(path: string): Promise<unknown> {
  try {
    return JSON.parse(await readFile(path, 'utf8'));
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    throw new Error(`Failed to load configuration: ${errorMessage}`);
  }
}

function readSection(raw: Record<string, unknown>, section: string, errors: ConfigValidationError[]): Record<string, unknown> {
  const value = raw[section];
  if (value === undefined) {
    return {};
  }
  if (!isRecord(value)) {
    errors.push({ path: section, message: 'Section must be an object', value });
    return {};
  }
  return value;
}

function fieldName(path: string): string {
  return path.slice(path.indexOf('.') + 1);
}

function numberField(section: Record<string, unknown>, path: string, errors: ConfigValidationError[]): number | undefined {
  const value = section[fieldName(path)];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'number') {
    errors.push({ path, message: 'Expected a number', value });
    return undefined;
  }
  return value;
}

function stringField(section: Record<string, unknown>, path: string, errors: ConfigValidationError[]): string | undefined {
  const value = section[fieldName(path)];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    errors.push({ path, message: 'Expected a string', value });
    return undefined;
  }
  return value;
}
