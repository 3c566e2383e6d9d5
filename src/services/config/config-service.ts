/**
 * Configuration Service
 *
 * Loads package settings from <baseDir>/config.yaml. Only logging is configurable;
 * the Result core itself takes no configuration.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'yaml';
import { z } from 'zod';
import { ConfigurationError } from '../../core/errors.js';
import { Logger, LoggerConfig, parseLogLevel } from '../../core/logger.js';

export const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
  prefix: z.string().optional(),
  timestamps: z.boolean().optional()
});

export const ResultConfigSchema = z.object({
  logging: LoggingConfigSchema.optional()
});

export type ResultConfig = z.infer<typeof ResultConfigSchema>;

export type LoggingConfig = Required<z.infer<typeof LoggingConfigSchema>>;

const DEFAULT_LOGGING_CONFIG: LoggingConfig = {
  level: 'info',
  prefix: '[result]',
  timestamps: false
};

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class ConfigService {
  private configPath: string;
  private cachedConfig: ResultConfig | null = null;

  constructor(options: { baseDir?: string } = {}) {
    this.configPath = path.join(options.baseDir || '.result', 'config.yaml');
  }

  /**
   * Load configuration from file, with caching. A missing file means defaults.
   *
   * @throws ConfigurationError when the file is not valid YAML or does not match the schema
   */
  private async loadConfig(): Promise<ResultConfig> {
    if (this.cachedConfig !== null) {
      return this.cachedConfig;
    }

    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        this.cachedConfig = {};
        return this.cachedConfig;
      }
      throw error;
    }

    let raw: unknown;
    try {
      raw = yaml.parse(content);
    } catch (error) {
      throw new ConfigurationError(
        `Cannot parse ${this.configPath}: ${error instanceof Error ? error.message : String(error)}`,
        this.configPath
      );
    }

    const parsed = ResultConfigSchema.safeParse(raw ?? {});
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid configuration in ${this.configPath}`, this.configPath, {
        issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
      });
    }

    this.cachedConfig = parsed.data;
    return this.cachedConfig;
  }

  clearCache(): void {
    this.cachedConfig = null;
  }

  /**
   * Logging settings with defaults filled in
   */
  async getLoggingConfig(): Promise<LoggingConfig> {
    const config = await this.loadConfig();
    const logging = config.logging || {};

    return {
      level: logging.level ?? DEFAULT_LOGGING_CONFIG.level,
      prefix: logging.prefix ?? DEFAULT_LOGGING_CONFIG.prefix,
      timestamps: logging.timestamps ?? DEFAULT_LOGGING_CONFIG.timestamps
    };
  }

  /**
   * Reconfigure the shared logger from the logging settings.
   * `overrides` is applied last, e.g. to route output to a custom sink.
   */
  async applyLogging(overrides: Partial<LoggerConfig> = {}): Promise<void> {
    const logging = await this.getLoggingConfig();
    Logger.configure({
      level: parseLogLevel(logging.level),
      prefix: logging.prefix,
      timestamps: logging.timestamps,
      ...overrides
    });
  }

  async saveConfig(config: ResultConfig): Promise<void> {
    await fs.mkdir(path.dirname(this.configPath), { recursive: true });
    await fs.writeFile(this.configPath, yaml.stringify(config), 'utf-8');
    this.cachedConfig = config;
  }

  async updateConfig(updates: Partial<ResultConfig>): Promise<void> {
    const currentConfig = await this.loadConfig();
    await this.saveConfig({ ...currentConfig, ...updates });
  }
}
