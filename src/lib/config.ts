import { z } from 'zod';
import { CatalogValidationError } from './errors';
import { DEFAULT_PAGE_SIZE } from './filterState';
import type { LogLevel } from './logger';

export type DatabaseConfig = {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
};

export type CatalogConfig = {
  db: DatabaseConfig;
  pageSize: number;
  cacheTtlSeconds: number;
  logLevel: LogLevel;
};

type Env = Record<string, string | undefined>;

const resolveFromEnv = (env: Env, envKey: string): string | undefined => {
  const raw = env[envKey];
  const value = typeof raw === 'string' ? raw.trim() : '';
  return value || undefined;
};

const resolveConfigValue = (env: Env, envKey: string, fallback: string): string =>
  resolveFromEnv(env, envKey) ?? fallback;

const parseValue = <T>(schema: z.ZodType<T>, envKey: string, value: string): T => {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new CatalogValidationError(envKey, `Invalid ${envKey}: ${value}`, result.error.issues);
  }
  return result.data;
};

const PortSchema = z.coerce.number().int().min(1).max(65535);
const PageSizeSchema = z.coerce.number().int().min(1).max(500);
const TtlSchema = z.coerce.number().int().min(0);
const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const loadCatalogConfig = (env: Env = process.env): CatalogConfig => ({
  db: {
    host: resolveConfigValue(env, 'DB_HOST', 'postgres'),
    port: parseValue(PortSchema, 'DB_PORT', resolveConfigValue(env, 'DB_PORT', '5432')),
    database: resolveConfigValue(env, 'DB_NAME', 'dag_data'),
    user: resolveConfigValue(env, 'DB_USER', 'airflow'),
    password: resolveConfigValue(env, 'DB_PASSWORD', 'airflow'),
  },
  pageSize: parseValue(PageSizeSchema, 'CATALOG_PAGE_SIZE', resolveConfigValue(env, 'CATALOG_PAGE_SIZE', String(DEFAULT_PAGE_SIZE))),
  cacheTtlSeconds: parseValue(TtlSchema, 'CATALOG_CACHE_TTL', resolveConfigValue(env, 'CATALOG_CACHE_TTL', '300')),
  logLevel: parseValue(
    LogLevelSchema,
    'LOG_LEVEL',
    resolveConfigValue(env, 'LOG_LEVEL', 'info').toLowerCase(),
  ),
});
