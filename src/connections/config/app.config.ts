import dotenv from 'dotenv';
import os from 'os';
import path from 'path';

dotenv.config();

type Env = Record<string, string | undefined>;

export interface AppConfig {
  port: number;
  nodeEnv: string;
  catalogPath: string;
  corsOrigins: string[];
  logLevel: string;
  logDir: string;
}

/**
 * Parse CORS origins from environment variable
 * Supports comma or space separated values
 */
const parseCorsOrigins = (value: string | undefined): string[] => {
  if (!value) {
    return [];
  }

  return value
    .split(/[,\s]+/)
    .map(origin => origin.trim())
    .filter(origin => origin.length > 0);
};

export const defaultCatalogPath = (): string =>
  path.join(os.homedir(), '.product-catalog', 'catalog.db');

export const loadAppConfig = (env: Env = process.env): AppConfig => ({
  port: parseInt(env.APP_PORT || env.PORT || '3000', 10),
  nodeEnv: env.NODE_ENV || 'development',
  catalogPath: env.CATALOG_DB_PATH || defaultCatalogPath(),
  corsOrigins: parseCorsOrigins(env.CORS_ORIGINS),
  logLevel: (env.LOG_LEVEL || 'info').toLowerCase(),
  logDir: env.LOG_DIR || path.join(process.cwd(), 'logs'),
});

export const appConfig = loadAppConfig();
