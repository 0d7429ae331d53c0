import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import type { AuthConfig, ServerConfig } from './types.js';

/** Values parsed from the command line; each one overrides its environment variable. */
export interface CliOptions {
  account?: string;
  user?: string;
  password?: string;
  privateKeyFile?: string;
  privateKeyPassphrase?: string;
  warehouse?: string;
  database?: string;
  schema?: string;
  role?: string;
  serviceConfigFile?: string;
  auditLogFile?: string;
  logLevel?: string;
}

export const DEFAULT_POOL_MIN = 0;
export const DEFAULT_POOL_MAX = 4;
export const DEFAULT_ACQUIRE_TIMEOUT_MS = 30_000;
export const DEFAULT_IDLE_TIMEOUT_MS = 300_000;
export const DEFAULT_STATEMENT_TIMEOUT_MS = 120_000;
export const DEFAULT_SERVICE_TIMEOUT_MS = 60_000;

const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalText = z.preprocess(blankToUndefined, z.string().trim().optional());

const requiredText = (setting: string) =>
  z.preprocess(blankToUndefined, z.string({ required_error: `${setting} is required` }).trim());

const integerSetting = (fallback: number, min: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(min).optional()).transform(value => value ?? fallback);

const RawConfigSchema = z.object({
  account: requiredText('SNOWFLAKE_ACCOUNT (--account)'),
  user: requiredText('SNOWFLAKE_USER (--user)'),
  password: optionalText,
  privateKeyFile: optionalText,
  privateKeyPassphrase: optionalText,
  warehouse: optionalText,
  database: optionalText,
  schema: optionalText,
  role: optionalText,
  queryTag: optionalText,
  serviceConfigFile: requiredText('SERVICE_CONFIG_FILE (--service-config-file)'),
  auditLogFile: optionalText,
  logLevel: z.preprocess(
    value => (typeof value === 'string' ? blankToUndefined(value.toLowerCase()) : value),
    z.enum(LOG_LEVELS).default('info')
  ),
  poolMin: integerSetting(DEFAULT_POOL_MIN, 0),
  poolMax: integerSetting(DEFAULT_POOL_MAX, 1),
  acquireTimeoutMs: integerSetting(DEFAULT_ACQUIRE_TIMEOUT_MS, 1),
  idleTimeoutMs: integerSetting(DEFAULT_IDLE_TIMEOUT_MS, 0),
  statementTimeoutMs: integerSetting(DEFAULT_STATEMENT_TIMEOUT_MS, 0),
  serviceTimeoutMs: integerSetting(DEFAULT_SERVICE_TIMEOUT_MS, 0),
});

type RawConfig = z.infer<typeof RawConfigSchema>;

/**
 * Merges environment variables and command-line options into the server
 * configuration. Throws ConfigurationError listing every invalid setting.
 */
export function loadServerConfig(options: CliOptions = {}, env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = RawConfigSchema.safeParse({
    account: options.account ?? env.SNOWFLAKE_ACCOUNT,
    user: options.user ?? env.SNOWFLAKE_USER,
    password: options.password ?? env.SNOWFLAKE_PASSWORD,
    privateKeyFile: options.privateKeyFile ?? env.SNOWFLAKE_PRIVATE_KEY_FILE,
    privateKeyPassphrase: options.privateKeyPassphrase ?? env.SNOWFLAKE_PRIVATE_KEY_PASSPHRASE,
    warehouse: options.warehouse ?? env.SNOWFLAKE_WAREHOUSE,
    database: options.database ?? env.SNOWFLAKE_DATABASE,
    schema: options.schema ?? env.SNOWFLAKE_SCHEMA,
    role: options.role ?? env.SNOWFLAKE_ROLE,
    queryTag: env.SNOWFLAKE_QUERY_TAG,
    serviceConfigFile: options.serviceConfigFile ?? env.SERVICE_CONFIG_FILE,
    auditLogFile: options.auditLogFile ?? env.AUDIT_LOG_FILE,
    logLevel: options.logLevel ?? env.LOG_LEVEL,
    poolMin: env.POOL_MIN,
    poolMax: env.POOL_MAX,
    acquireTimeoutMs: env.POOL_ACQUIRE_TIMEOUT_MS,
    idleTimeoutMs: env.POOL_IDLE_TIMEOUT_MS,
    statementTimeoutMs: env.STATEMENT_TIMEOUT_MS,
    serviceTimeoutMs: env.SERVICE_TIMEOUT_MS,
  });

  if (!parsed.success) {
    const issues = parsed.error.errors.map(e => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigurationError(`Invalid server configuration: ${issues.join('; ')}`, { issues });
  }

  const raw = parsed.data;
  if (raw.poolMin > raw.poolMax) {
    throw new ConfigurationError(`POOL_MIN (${raw.poolMin}) must not exceed POOL_MAX (${raw.poolMax})`);
  }

  return {
    connection: {
      account: raw.account,
      user: raw.user,
      auth: resolveAuth(raw),
      defaults: {
        ...(raw.warehouse ? { warehouse: raw.warehouse } : {}),
        ...(raw.database ? { database: raw.database } : {}),
        ...(raw.schema ? { schema: raw.schema } : {}),
        ...(raw.role ? { role: raw.role } : {}),
      },
    },
    pool: {
      min: raw.poolMin,
      max: raw.poolMax,
      acquireTimeoutMs: raw.acquireTimeoutMs,
      idleTimeoutMs: raw.idleTimeoutMs,
    },
    statementTimeoutMs: raw.statementTimeoutMs,
    serviceTimeoutMs: raw.serviceTimeoutMs,
    serviceConfigFile: raw.serviceConfigFile,
    ...(raw.queryTag ? { queryTag: raw.queryTag } : {}),
    ...(raw.auditLogFile ? { auditLogFile: raw.auditLogFile } : {}),
    logLevel: raw.logLevel,
  };
}

function resolveAuth(raw: RawConfig): AuthConfig {
  if (raw.password && raw.privateKeyFile) {
    throw new ConfigurationError(
      'Configure either SNOWFLAKE_PASSWORD or SNOWFLAKE_PRIVATE_KEY_FILE, not both'
    );
  }
  if (raw.privateKeyFile) {
    return {
      method: 'keypair',
      privateKeyFile: raw.privateKeyFile,
      ...(raw.privateKeyPassphrase ? { passphrase: raw.privateKeyPassphrase } : {}),
    };
  }
  if (raw.password) {
    return { method: 'password', password: raw.password };
  }
  throw new ConfigurationError(
    'No credentials configured: set SNOWFLAKE_PASSWORD (--password) or SNOWFLAKE_PRIVATE_KEY_FILE (--private-key-file)'
  );
}
