/**
 * School SQL Guard - Configuration Loader
 * Loads the application config file, validates it and applies environment overrides
 */

import fs from 'fs';
import path from 'path';

import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import { getEnvBool, getEnvFloat, getEnvInt, getEnvString } from '../utils/helpers.js';
import { logConfig } from '../utils/logger.js';
import { ConfigError, errorMessage, type GuardConfig } from '../utils/types.js';

import { ConfigFileSchema, LoggingConfigSchema, formatValidationErrors, type ConfigFileOutput } from './schema.js';

export const DEFAULT_CONFIG_PATH = './config/school-guard.config.yaml';
export const DEFAULT_POLICY_PATH = './config/policy.yaml';

const NodeEnvSchema = z.enum(['development', 'production', 'test']).catch('development');

// =============================================================================
// Configuration Loader Class
// =============================================================================

export class ConfigLoader {
  private configPath: string;
  private currentConfig: GuardConfig | null = null;

  constructor(configPath?: string) {
    this.configPath = configPath ?? getEnvString('CONFIG_FILE_PATH') ?? DEFAULT_CONFIG_PATH;
  }

  /**
   * Load configuration from file and environment variables
   */
  public async load(): Promise<GuardConfig> {
    const fileConfig = this.readConfigFile();
    const config = this.buildConfig(fileConfig);
    this.currentConfig = config;
    return config;
  }

  /**
   * Get current configuration
   */
  public getConfig(): GuardConfig {
    if (this.currentConfig === null) {
      throw new ConfigError('Configuration not loaded. Call load() first.');
    }
    return this.currentConfig;
  }

  private readConfigFile(): ConfigFileOutput {
    if (!fs.existsSync(this.configPath)) {
      logConfig('No config file found, using defaults and environment variables', {
        path: this.configPath,
      });
      return {};
    }

    let raw: unknown;
    try {
      const content = fs.readFileSync(this.configPath, 'utf-8');
      const extension = path.extname(this.configPath).toLowerCase();

      if (extension === '.yaml' || extension === '.yml') {
        raw = parseYaml(content);
      } else if (extension === '.json') {
        raw = JSON.parse(content);
      } else {
        throw new ConfigError(`Unsupported config file format: ${extension}`);
      }
    } catch (error) {
      if (error instanceof ConfigError) {
        throw error;
      }
      throw new ConfigError(`Failed to read config file ${this.configPath}: ${errorMessage(error)}`);
    }

    // An empty YAML document parses to null
    const parsed = ConfigFileSchema.safeParse(raw ?? {});
    if (!parsed.success) {
      const issues = formatValidationErrors(parsed.error);
      throw new ConfigError(`Invalid config file ${this.configPath}: ${issues.join('; ')}`, issues);
    }

    logConfig('Configuration file loaded', { path: this.configPath });
    return parsed.data;
  }

  /**
   * Build configuration with environment variable overrides
   */
  private buildConfig(fileConfig: ConfigFileOutput): GuardConfig {
    const level = LoggingConfigSchema.shape.level.safeParse(getEnvString('LOG_LEVEL'));
    const format = LoggingConfigSchema.shape.format.safeParse(getEnvString('LOG_FORMAT'));

    return {
      policyFilePath: getEnvString('POLICY_FILE_PATH') ?? fileConfig.policyFile ?? DEFAULT_POLICY_PATH,

      semantic: {
        enabled: getEnvBool('SEMANTIC_EXTRACTOR_ENABLED') ?? fileConfig.semantic?.enabled ?? false,
        apiKey: getEnvString('OPENAI_API_KEY') ?? fileConfig.semantic?.apiKey ?? '',
        model: getEnvString('OPENAI_MODEL') ?? fileConfig.semantic?.model ?? 'gpt-4o-mini',
        baseUrl: getEnvString('OPENAI_BASE_URL') ?? fileConfig.semantic?.baseUrl ?? 'https://api.openai.com/v1',
        timeoutMs: getEnvInt('SEMANTIC_TIMEOUT_MS') ?? fileConfig.semantic?.timeoutMs ?? 10000,
        minConfidence: getEnvFloat('SEMANTIC_MIN_CONFIDENCE') ?? fileConfig.semantic?.minConfidence ?? 0.7,
      },

      postgres: {
        host: getEnvString('POSTGRES_HOST') ?? fileConfig.postgres?.host ?? 'localhost',
        port: getEnvInt('POSTGRES_PORT') ?? fileConfig.postgres?.port ?? 5432,
        database: getEnvString('POSTGRES_DB') ?? fileConfig.postgres?.database ?? 'school',
        user: getEnvString('POSTGRES_USER') ?? fileConfig.postgres?.user ?? 'school_guard',
        password: getEnvString('POSTGRES_PASSWORD') ?? fileConfig.postgres?.password ?? 'dev_password',
        ssl: getEnvBool('POSTGRES_SSL') ?? fileConfig.postgres?.ssl ?? false,
        poolMin: getEnvInt('POSTGRES_POOL_MIN') ?? fileConfig.postgres?.poolMin ?? 1,
        poolMax: getEnvInt('POSTGRES_POOL_MAX') ?? fileConfig.postgres?.poolMax ?? 10,
      },

      audit: {
        maxRecords: getEnvInt('AUDIT_MAX_RECORDS') ?? fileConfig.audit?.maxRecords ?? 10000,
        logEnabled: getEnvBool('AUDIT_LOG_ENABLED') ?? fileConfig.audit?.logEnabled ?? true,
      },

      logging: {
        level: (level.success ? level.data : undefined) ?? fileConfig.logging?.level ?? 'info',
        format: (format.success ? format.data : undefined) ?? fileConfig.logging?.format ?? 'json',
        fileEnabled: getEnvBool('LOG_FILE_ENABLED') ?? fileConfig.logging?.fileEnabled ?? false,
        filePath: getEnvString('LOG_FILE_PATH') ?? fileConfig.logging?.filePath ?? './logs/school-guard.log',
      },

      nodeEnv: NodeEnvSchema.parse(getEnvString('NODE_ENV')),
      configFilePath: this.configPath,
    };
  }
}

export async function loadConfig(configPath?: string): Promise<GuardConfig> {
  return new ConfigLoader(configPath).load();
}

export default ConfigLoader;
