import { LogLevel } from '@nestjs/common';

export const APP_CONFIG = 'APP_CONFIG';

export interface DatabaseConfig {
  /** URL подключения к Postgres, пароль уже подставлен из DATABASE_KEY */
  url: string;
  host: string;
  ssl: boolean;
  /** Только по явному DATABASE_SSL_ALLOW_UNVERIFIED=true */
  sslAllowUnverified: boolean;
  runMigrations: boolean;
}

export interface AppConfig {
  botToken: string;
  database: DatabaseConfig;
  logLevels: LogLevel[];
}

export type Env = Record<string, string | undefined>;

export class ConfigValidationError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid environment configuration: ${problems.join('; ')}`);
    this.name = 'ConfigValidationError';
  }
}

const REQUIRED_VARIABLES = ['BOT_TOKEN', 'DATABASE_URL', 'DATABASE_KEY'];

const DEFAULT_LOG_LEVELS: LogLevel[] = ['log', 'warn', 'error', 'fatal'];
const DEBUG_LOG_LEVELS: LogLevel[] = [...DEFAULT_LOG_LEVELS, 'debug', 'verbose'];

function readVariable(env: Env, name: string): string | null {
  const value = env[name]?.trim();
  return value ? value : null;
}

function buildConnectionUrl(rawUrl: string, key: string): URL | null {
  try {
    const url = new URL(rawUrl);
    url.password = encodeURIComponent(key);
    return url;
  } catch {
    return null;
  }
}

/**
 * Читает и проверяет переменные окружения.
 * Собирает все проблемы сразу, чтобы в логе было видно весь список.
 */
export function loadAppConfig(env: Env = process.env): AppConfig {
  const problems = REQUIRED_VARIABLES.filter(
    (name) => readVariable(env, name) === null,
  ).map((name) => `${name} is missing`);

  const botToken = readVariable(env, 'BOT_TOKEN');
  const rawUrl = readVariable(env, 'DATABASE_URL');
  const key = readVariable(env, 'DATABASE_KEY');

  const url = rawUrl && key ? buildConnectionUrl(rawUrl, key) : null;
  if (rawUrl && key && !url) {
    problems.push('DATABASE_URL is not a valid URL');
  }

  if (problems.length > 0 || !botToken || !url) {
    throw new ConfigValidationError(problems);
  }

  return {
    botToken,
    database: {
      url: url.toString(),
      host: url.host,
      ssl: readVariable(env, 'DATABASE_SSL') !== 'false',
      sslAllowUnverified:
        readVariable(env, 'DATABASE_SSL_ALLOW_UNVERIFIED') === 'true',
      runMigrations: readVariable(env, 'DATABASE_RUN_MIGRATIONS') === 'true',
    },
    logLevels:
      readVariable(env, 'LOG_LEVEL') === 'debug'
        ? DEBUG_LOG_LEVELS
        : DEFAULT_LOG_LEVELS,
  };
}

/**
 * TLS-опции для pg: сертификат сервера проверяется,
 * если проверку явно не отключили.
 */
export function buildSslOptions(
  database: DatabaseConfig,
): false | { rejectUnauthorized: boolean } {
  if (!database.ssl) {
    return false;
  }

  return { rejectUnauthorized: !database.sslAllowUnverified };
}
