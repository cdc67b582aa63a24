/**
 * Reads environment variables and secret files into validated,
 * per-section settings for the registrar, bulk runs and SPF chains.
 */
import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import type { z } from 'zod';
import { logger, setLogLevel } from '../core/Logger.js';
import { ValidationError } from '../core/errors.js';
import {
  appConfigSchema,
  registrarConfigSchema,
  bulkConfigSchema,
  spfConfigSchema,
  type AppConfig,
  type RegistrarConfig,
  type BulkConfig,
  type SpfConfig,
} from './schema.js';

type Env = Record<string, string | undefined>;

const DEFAULT_SECRETS_DIR = '/run/secrets';

function getEnv(env: Env, key: string, defaultValue?: string): string | undefined {
  const value = env[key];
  return value === undefined || value === '' ? defaultValue : value;
}

function getEnvInt(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

// Rates may be fractional, e.g. 0.5 requests per second
function getEnvNumber(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvBool(env: Env, key: string, defaultValue: boolean): boolean {
  const value = env[key];
  if (value === undefined) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * A file named after the lowercased key in the secrets directory wins
 * over the environment variable of the same name
 */
function getSecret(env: Env, key: string, secretsDir: string): string | undefined {
  const secretPath = join(secretsDir, key.toLowerCase());
  if (existsSync(secretPath)) {
    try {
      return readFileSync(secretPath, 'utf-8').trim();
    } catch (error) {
      logger.warn({ key, error }, 'Secret file unreadable, falling back to environment');
    }
  }

  return getEnv(env, key);
}

/**
 * Parse one config section, turning zod issues into a ValidationError
 */
function parseSection<S extends z.ZodTypeAny>(section: string, schema: S, input: unknown): z.infer<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw ValidationError.fromIssues(
      `${section} configuration`,
      result.error.errors.map((issue) => ({
        field: issue.path.join('.') || section,
        message: issue.message,
      }))
    );
  }
  return result.data;
}

export interface ConfigManagerOptions {
  secretsDir?: string;
}

export class ConfigManager {
  private _app: AppConfig;
  private _registrar: RegistrarConfig;
  private _bulk: BulkConfig;
  private _spf: SpfConfig;

  constructor(env: Env = process.env, options: ConfigManagerOptions = {}) {
    const secretsDir = options.secretsDir ?? DEFAULT_SECRETS_DIR;

    this._app = parseSection('app', appConfigSchema, {
      logLevel: getEnv(env, 'LOG_LEVEL', 'info')?.toLowerCase(),
      logPretty: getEnvBool(env, 'LOG_PRETTY', true),
      backupDir: getEnv(env, 'BACKUP_DIR'),
      nameserverPollInterval: getEnvInt(env, 'NS_POLL_INTERVAL', 300000),
    });

    setLogLevel(this._app.logLevel);

    this._registrar = parseSection('registrar', registrarConfigSchema, {
      apiKey: getSecret(env, 'PORKBUN_API_KEY', secretsDir),
      secretApiKey: getSecret(env, 'PORKBUN_SECRET_API_KEY', secretsDir),
      apiUrl: getEnv(env, 'PORKBUN_API_URL'),
      timeoutMs: getEnvInt(env, 'REGISTRAR_TIMEOUT_MS', 15000),
      retryAttempts: getEnvInt(env, 'RETRY_ATTEMPTS', 3),
      backoffBaseMs: getEnvInt(env, 'RETRY_BACKOFF_MS', 500),
      requestsPerSecond: getEnvNumber(env, 'RATE_LIMIT_RPS', 2),
      burst: getEnvInt(env, 'RATE_LIMIT_BURST', 5),
    });

    this._bulk = parseSection('bulk', bulkConfigSchema, {
      maxConcurrentDomains: getEnvInt(env, 'MAX_CONCURRENT_DOMAINS', 5),
      defaultTtl: getEnvInt(env, 'DEFAULT_TTL', 600),
      txtMaxLength: getEnvInt(env, 'TXT_MAX_LENGTH', 2048),
    });

    this._spf = parseSection('spf', spfConfigSchema, {
      chainLength: getEnvInt(env, 'SPF_CHAIN_LENGTH', 4),
      finalDirective: getEnv(env, 'SPF_FINAL_DIRECTIVE'),
      anchorDomain: getEnv(env, 'SPF_ANCHOR_DOMAIN'),
      labelLength: getEnvInt(env, 'SPF_LABEL_LENGTH', 32),
      maxAttemptsPerLabel: getEnvInt(env, 'SPF_MAX_LABEL_ATTEMPTS', 100),
    });

    logger.info(
      {
        logLevel: this._app.logLevel,
        maxConcurrentDomains: this._bulk.maxConcurrentDomains,
        rateLimit: this._registrar.requestsPerSecond,
      },
      'Configuration loaded'
    );
  }

  get app(): Readonly<AppConfig> {
    return this._app;
  }

  get registrar(): Readonly<RegistrarConfig> {
    return this._registrar;
  }

  get bulk(): Readonly<BulkConfig> {
    return this._bulk;
  }

  get spf(): Readonly<SpfConfig> {
    return this._spf;
  }

  /**
   * Terminal SPF directive: SPF_FINAL_DIRECTIVE, else one built from the anchor domain
   */
  get finalDirective(): string | undefined {
    if (this._spf.finalDirective) {
      return this._spf.finalDirective;
    }
    return this._spf.anchorDomain ? `v=spf1 include:_spf.${this._spf.anchorDomain} ~all` : undefined;
  }
}

// Process-wide instance for the CLI
let configInstance: ConfigManager | null = null;

export function getConfig(): ConfigManager {
  if (!configInstance) {
    configInstance = new ConfigManager();
  }
  return configInstance;
}

export function resetConfig(): void {
  configInstance = null;
}
