import dotenv from 'dotenv';

dotenv.config();

type Env = Record<string, string | undefined>;

export interface RedisConfig {
  host: string;
  port: number;
  password?: string;
  db: number;
  keyPrefix: string;
}

export interface TablesConfig {
  path: string;
  sheet: string;
}

export interface AppConfig {
  nodeEnv: string;
  host: string;
  port: number;
  logLevel: string;
  redis: RedisConfig;
  tables: TablesConfig;
  cors: {
    allowedOrigins: string[] | '*';
  };
  rateLimit: {
    enabled: boolean;
    windowMs: number;
    maxRequests: number;
  };
}

const readInt = (env: Env, name: string, fallback: number, max = Number.MAX_SAFE_INTEGER): number => {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = raw.trim();
  if (!/^\d+$/.test(value) || Number(value) > max) {
    throw new Error(`Invalid value for ${name}: ${raw}`);
  }
  return Number(value);
};

const readBool = (env: Env, name: string, fallback: boolean): boolean => {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  switch (raw.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      throw new Error(`Invalid value for ${name}: ${raw}`);
  }
};

const readString = (env: Env, name: string, fallback: string): string => {
  const raw = env[name];
  return raw === undefined || raw.trim() === '' ? fallback : raw.trim();
};

const readOrigins = (env: Env): string[] | '*' => {
  const raw = readString(env, 'CORS_ORIGINS', '*');
  if (raw === '*') {
    return '*';
  }
  return raw
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
};

export const loadConfig = (env: Env): AppConfig => {
  // LISTEN_PORT is what the container image sets; PORT is kept for PaaS hosts
  const portVariable = env.LISTEN_PORT !== undefined && env.LISTEN_PORT.trim() !== '' ? 'LISTEN_PORT' : 'PORT';

  return Object.freeze({
    nodeEnv: readString(env, 'NODE_ENV', 'development'),
    host: readString(env, 'LISTEN_HOST', '0.0.0.0'),
    port: readInt(env, portVariable, 8000, 65535),
    logLevel: readString(env, 'LOG_LEVEL', 'info'),
    redis: {
      host: readString(env, 'REDIS_HOST', readString(env, 'redissvc', '127.0.0.1')),
      port: readInt(env, 'REDIS_PORT', 6379, 65535),
      password: env.REDIS_PASSWORD === undefined || env.REDIS_PASSWORD === '' ? undefined : env.REDIS_PASSWORD,
      db: readInt(env, 'REDIS_DB', 0),
      keyPrefix: env.REDIS_KEY_PREFIX ?? 'premium:',
    },
    tables: {
      path: readString(env, 'PREMIUM_TABLES_PATH', './premium_tables.xlsx'),
      sheet: readString(env, 'PREMIUM_TABLES_SHEET', 'matrix'),
    },
    cors: {
      allowedOrigins: readOrigins(env),
    },
    rateLimit: {
      enabled: readBool(env, 'RATE_LIMIT_ENABLED', false),
      windowMs: readInt(env, 'RATE_LIMIT_WINDOW_MS', 60000),
      maxRequests: readInt(env, 'RATE_LIMIT_MAX', 1000),
    },
  });
};

export const config = loadConfig(process.env);
