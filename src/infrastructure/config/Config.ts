import * as path from 'path';
import * as os from 'os';
import { ConfigError } from '../../domain/common/Errors';
import { LogLevel } from '../../domain/common/ILogger';

/**
 * CORS configuration options.
 */
export interface CorsConfig {
  enabled: boolean;
  origins: string[];
  credentials: boolean;
}

/**
 * Logging configuration.
 */
export interface LogConfig {
  level: LogLevel;
  format: 'json' | 'pretty';
}

/**
 * Complete configuration options.
 */
export interface ConfigOptions {
  // Server
  port: number;
  host: string;

  // Reference data
  catalogDir: string;

  // Features
  cors: CorsConfig;

  // Operational
  log: LogConfig;

  // Environment
  nodeEnv: 'development' | 'production' | 'test';
}

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];
const LOG_FORMATS: readonly LogConfig['format'][] = ['json', 'pretty'];
const NODE_ENVS: readonly ConfigOptions['nodeEnv'][] = ['development', 'production', 'test'];

/** Catalog files shipped with the package. */
export const DEFAULT_CATALOG_DIR = path.resolve(__dirname, '../../../catalog');

/**
 * Expand ~ to home directory in paths.
 */
function expandPath(p: string): string {
  if (p.startsWith('~')) {
    return path.join(os.homedir(), p.slice(1));
  }
  return p;
}

function oneOf<T extends string>(allowed: readonly T[], value: string | undefined, fallback: T, name: string): T {
  if (value === undefined || value === '') return fallback;
  const match = allowed.find(candidate => candidate === value);
  if (!match) {
    throw new ConfigError(`${name} must be one of: ${allowed.join(', ')}`);
  }
  return match;
}

/**
 * Centralized configuration class.
 * Loads configuration from environment variables with sensible defaults.
 */
export class Config implements Readonly<ConfigOptions> {
  private readonly config: ConfigOptions;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.config = Config.loadFromEnvironment(env);
    this.validate();
  }

  private static loadFromEnvironment(env: NodeJS.ProcessEnv): ConfigOptions {
    const nodeEnv = oneOf(NODE_ENVS, env.NODE_ENV, 'development', 'NODE_ENV');

    return {
      // Server
      port: parseInt(env.PORT || '8000', 10),
      host: env.HOST || '0.0.0.0',

      // Reference data
      catalogDir: env.CATALOG_DIR ? expandPath(env.CATALOG_DIR) : DEFAULT_CATALOG_DIR,

      // CORS
      cors: {
        enabled: env.CORS_ENABLED !== 'false',
        origins: env.CORS_ORIGINS?.split(',').map(s => s.trim()).filter(Boolean) || ['*'],
        credentials: env.CORS_CREDENTIALS === 'true'
      },

      // Operational
      log: {
        level: oneOf(LOG_LEVELS, env.LOG_LEVEL, 'info', 'LOG_LEVEL'),
        // JSON lines by default in production
        format: oneOf(LOG_FORMATS, env.LOG_FORMAT, nodeEnv === 'production' ? 'json' : 'pretty', 'LOG_FORMAT')
      },

      // Environment
      nodeEnv
    };
  }

  /**
   * Validate configuration values.
   * @throws {ConfigError} if configuration is invalid
   */
  validate(): void {
    if (!Number.isInteger(this.config.port) || this.config.port < 0 || this.config.port > 65535) {
      throw new ConfigError('PORT must be between 0 and 65535');
    }

    if (this.config.catalogDir.trim() === '') {
      throw new ConfigError('CATALOG_DIR must not be empty');
    }

    if (this.config.cors.credentials && this.config.cors.origins.includes('*')) {
      throw new ConfigError('CORS_CREDENTIALS requires explicit CORS_ORIGINS');
    }
  }

  // Readonly accessors
  get port(): number { return this.config.port; }
  get host(): string { return this.config.host; }
  get catalogDir(): string { return this.config.catalogDir; }
  get cors(): CorsConfig { return this.config.cors; }
  get log(): LogConfig { return this.config.log; }
  get nodeEnv(): ConfigOptions['nodeEnv'] { return this.config.nodeEnv; }

  /**
   * Create a Config instance from an object (useful for testing).
   * Environment variables are ignored; unset options take their defaults.
   */
  static fromObject(overrides: Partial<ConfigOptions>): Config {
    const config = new Config({});
    Object.assign(config.config, overrides);
    config.validate();
    return config;
  }

  /**
   * Get configuration as plain object.
   */
  toJSON(): ConfigOptions {
    return { ...this.config };
  }

  /**
   * Get a summary string for logging.
   */
  toString(): string {
    return [
      `Config:`,
      `  port: ${this.port}`,
      `  host: ${this.host}`,
      `  catalogDir: ${this.catalogDir}`,
      `  cors.origins: ${this.cors.origins.join(',')}`,
      `  log.level: ${this.log.level}`,
      `  nodeEnv: ${this.nodeEnv}`
    ].join('\n');
  }
}
