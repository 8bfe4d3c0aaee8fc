import { z } from 'zod';
import { readFileSync } from 'fs';
import { parse as parseYaml } from 'yaml';

/**
 * Interpolate environment variables in a string
 * Supports ${VAR_NAME} and ${VAR_NAME:-default} syntax
 */
function interpolateEnvVars(value: string): string {
  return value.replace(
    /\$\{([^}:]+)(?::-([^}]*))?\}/g,
    (_match: string, varName: string, defaultValue: string | undefined) => {
      const envValue = process.env[varName];
      if (envValue !== undefined) {
        return envValue;
      }
      if (defaultValue !== undefined) {
        return defaultValue;
      }
      // Return empty string if no value and no default
      return '';
    }
  );
}

/**
 * Recursively process an object and interpolate environment variables in string values
 */
function processEnvVars(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return interpolateEnvVars(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(processEnvVars);
  }
  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = processEnvVars(value);
    }
    return result;
  }
  return obj;
}

/** Placeholder secret for local development; startup warns when it is in use */
export const DEV_HASH_SECRET = 'tokengate-dev-secret-change-me';

export const SECURITY_LEVELS = ['STANDARD', 'MEDIUM', 'HIGH'] as const;
export const SecurityLevelSchema = z.enum(SECURITY_LEVELS);

const CacheSettingsSchema = (ttlSeconds: number, maxEntries: number) =>
  z
    .object({
      enabled: z.boolean().default(true),
      ttl_seconds: z.number().int().positive().default(ttlSeconds),
      max_entries: z.number().int().positive().default(maxEntries),
    })
    .default({});

// PostgreSQL configuration schema
const PostgresConfigSchema = z.object({
  host: z.string().default('localhost'),
  port: z.number().default(5432),
  database: z.string().optional(),
  user: z.string().optional(),
  password: z.string().optional(),
  ssl: z.boolean().default(false),
  ssl_reject_unauthorized: z.boolean().default(true), // Set to false only for self-signed certs
  pool_size: z.number().default(10),
});

export type PostgresConfig = z.infer<typeof PostgresConfigSchema>;

export const ConfigSchema = z.object({
  server: z
    .object({
      listen_port: z.number().int().default(8080),
      host: z.string().default('0.0.0.0'),
      admin_api_key: z.string().default(''),
      cors_origin: z.string().default(''),
      rate_limit_max: z.number().int().positive().default(300),
      rate_limit_window_ms: z.number().int().min(1000).default(60000),
    })
    .default({}),
  storage: z
    .object({
      type: z.enum(['sqlite', 'postgres']).default('sqlite'),
      path: z.string().default('./data/tokengate.db'),
      postgres: PostgresConfigSchema.optional(),
      retry: z
        .object({
          attempts: z.number().int().min(1).max(10).default(3),
          base_delay_ms: z.number().int().nonnegative().default(25),
          max_delay_ms: z.number().int().nonnegative().default(200),
        })
        .default({}),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
      format: z.enum(['json', 'pretty']).default('json'),
    })
    .default({}),
  tokens: z
    .object({
      prefix: z.string().min(1).default('ztg_'),
      hash_secret: z.string().min(16).default(DEV_HASH_SECRET),
      default_ttl_seconds: z.number().int().positive().default(86400),
      max_ttl_seconds: z.number().int().positive().default(90 * 86400),
    })
    .default({}),
  zero_trust: z
    .object({
      fail_safe_mode: z.boolean().default(true),
      timeout_ms: z.number().int().positive().default(5000),
      middleware_budget_ms: z.number().int().positive().default(200),
      parallel_validation: z
        .object({
          enabled: z.boolean().default(true),
        })
        .default({}),
    })
    .default({}),
  cache: z
    .object({
      validation: CacheSettingsSchema(300, 1000),
      tenant: CacheSettingsSchema(600, 100),
      permission: CacheSettingsSchema(180, 500),
    })
    .default({}),
  rate_limits: z
    .object({
      window_seconds: z.number().int().positive().default(3600),
      tiers: z
        .object({
          STANDARD: z.number().int().positive().default(1000),
          MEDIUM: z.number().int().positive().default(5000),
          HIGH: z.number().int().positive().default(10000),
        })
        .default({}),
    })
    .default({}),
  extension: z
    .object({
      enabled: z.boolean().default(true),
      threshold_seconds: z.number().int().positive().default(3600),
      increment_seconds: z.number().int().positive().default(86400),
      max_count: z.number().int().nonnegative().default(5),
      grace_seconds: z.number().int().nonnegative().default(0),
    })
    .default({}),
  risk: z
    .object({
      elevated_threshold: z.number().min(0).max(1).default(0.7),
      trusted_networks: z.array(z.string()).default([]),
      sensitive_endpoints: z.array(z.string()).default([]),
      suspicious_user_agents: z
        .array(z.string())
        .default(['curl', 'wget', 'python-requests', 'sqlmap', 'nikto', 'scanner']),
    })
    .default({}),
  audit: z
    .object({
      queue_capacity: z.number().int().positive().default(1000),
      batch_size: z.number().int().positive().default(100),
      flush_interval_ms: z.number().int().positive().default(1000),
      enqueue_wait_ms: z.number().int().nonnegative().default(5),
      critical_wait_ms: z.number().int().nonnegative().default(50),
    })
    .default({}),
});

type DeepReadonly<T> = T extends (infer U)[]
  ? ReadonlyArray<DeepReadonly<U>>
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

type MutableConfig = z.infer<typeof ConfigSchema>;
export type Config = DeepReadonly<MutableConfig>;
export type SecurityLevel = z.infer<typeof SecurityLevelSchema>;
export type CacheSettings = Config['cache']['validation'];
export type ZeroTrustConfig = Config['zero_trust'];
export type ExtensionConfig = Config['extension'];
export type RiskConfig = Config['risk'];
export type AuditConfig = Config['audit'];
export type RateLimitConfig = Config['rate_limits'];
export type RetryConfig = Config['storage']['retry'];

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Parse a raw (already env-interpolated) object into a frozen configuration value.
 */
export function parseConfig(raw: unknown): Config {
  return deepFreeze(ConfigSchema.parse(raw ?? {}));
}

/**
 * Read the YAML config file and interpolate environment variables.
 * A missing file yields an empty object so that defaults apply.
 */
export function readConfigFile(configPath: string): Record<string, unknown> {
  try {
    const content = readFileSync(configPath, 'utf-8');
    const parsed: unknown = parseYaml(content);
    const processed = processEnvVars(parsed);
    if (processed === null || processed === undefined) {
      return {};
    }
    if (!isPlainObject(processed)) {
      throw new Error(`Configuration file ${configPath} must contain a mapping`);
    }
    return processed;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      // Config file doesn't exist, use defaults
      return {};
    }
    throw error;
  }
}

export function loadConfig(configPath: string): Config {
  return parseConfig(readConfigFile(configPath));
}

function envInt(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  const value = parseInt(raw, 10);
  return isNaN(value) ? undefined : value;
}

function envBool(name: string): boolean | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  return raw === 'true';
}

function envString(name: string): string | undefined {
  const raw = process.env[name];
  return raw === undefined || raw === '' ? undefined : raw;
}

function compact(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Environment overrides, applied on top of the file configuration.
 * Only variables that are actually set produce keys.
 */
export function loadConfigFromEnv(): Record<string, Record<string, unknown>> {
  // Build PostgreSQL config only if any POSTGRES_* env vars are set
  const hasPostgresConfig =
    process.env.POSTGRES_HOST ||
    process.env.POSTGRES_DATABASE ||
    process.env.POSTGRES_USER ||
    process.env.POSTGRES_PASSWORD;

  const postgresConfig = hasPostgresConfig
    ? {
        host: process.env.POSTGRES_HOST || 'localhost',
        port: parseInt(process.env.POSTGRES_PORT || '5432', 10),
        database: process.env.POSTGRES_DATABASE,
        user: process.env.POSTGRES_USER,
        password: process.env.POSTGRES_PASSWORD,
        ssl: process.env.POSTGRES_SSL === 'true',
        ssl_reject_unauthorized: process.env.POSTGRES_SSL_REJECT_UNAUTHORIZED !== 'false', // default true
        pool_size: parseInt(process.env.POSTGRES_POOL_SIZE || '10', 10),
      }
    : undefined;

  const parallelEnabled = envBool('PARALLEL_VALIDATION_ENABLED');

  return {
    server: compact({
      listen_port: envInt('PORT'),
      admin_api_key: envString('ADMIN_API_KEY'),
      cors_origin: envString('CORS_ORIGIN'),
    }),
    storage: compact({
      type: envString('STORAGE_TYPE'),
      path: envString('DATABASE_PATH'),
      postgres: postgresConfig,
    }),
    logging: compact({
      level: envString('LOG_LEVEL'),
      format: envString('LOG_FORMAT'),
    }),
    tokens: compact({
      hash_secret: envString('TOKEN_HASH_SECRET'),
    }),
    zero_trust: compact({
      fail_safe_mode: envBool('FAIL_SAFE_MODE'),
      timeout_ms: envInt('VALIDATION_TIMEOUT_MS'),
      parallel_validation: parallelEnabled === undefined ? undefined : { enabled: parallelEnabled },
    }),
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function mergeDeep(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = result[key];
    result[key] = isPlainObject(current) && isPlainObject(value) ? mergeDeep(current, value) : value;
  }
  return result;
}

/**
 * Load configuration from file, then override with environment variables (env wins).
 * The result is validated and deep-frozen; it is built once at process start.
 */
export function resolveConfig(configPath: string): Config {
  return parseConfig(mergeDeep(readConfigFile(configPath), loadConfigFromEnv()));
}
