import { resolve } from 'node:path';

const DEFAULT_PORT = 3001;
const DEFAULT_TOP_CATEGORIES = 5;
const DEFAULT_CORS_ORIGIN = 'http://localhost:5173';
const LOG_LEVELS = new Set(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

export interface RuntimeEnv {
  [key: string]: string | undefined;
  NODE_ENV?: string;
  PORT?: string;
  DATA_DIR?: string;
  REPORTS_DIR?: string;
  LOG_LEVEL?: string;
  TOP_CATEGORIES?: string;
  CORS_ORIGIN?: string;
}

export interface AppConfig {
  port: number;
  dataDir: string;
  reportsDir: string;
  logLevel: string;
  topCategories: number;
  corsOrigin: string;
}

function parsePositiveInteger(name: string, raw: string | undefined, fallback: number): number {
  const value = raw?.trim();
  if (!value) return fallback;
  if (!/^\d+$/.test(value) || Number(value) <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}".`);
  }
  return Number(value);
}

export function resolveLogLevel(env: RuntimeEnv = process.env): string {
  const level = env.LOG_LEVEL?.trim().toLowerCase();
  if (!level) {
    return env.NODE_ENV === 'test' ? 'silent' : 'info';
  }
  if (!LOG_LEVELS.has(level)) {
    throw new Error(`LOG_LEVEL must be one of ${[...LOG_LEVELS].join(', ')}, got "${env.LOG_LEVEL}".`);
  }
  return level;
}

export function loadConfig(env: RuntimeEnv = process.env): AppConfig {
  const port = parsePositiveInteger('PORT', env.PORT, DEFAULT_PORT);
  if (port > 65535) {
    throw new Error(`PORT must be at most 65535, got "${env.PORT}".`);
  }

  const dataDir = resolve(env.DATA_DIR?.trim() || './data');
  const reportsDir = env.REPORTS_DIR?.trim() ? resolve(env.REPORTS_DIR.trim()) : resolve(dataDir, 'reports');

  return {
    port,
    dataDir,
    reportsDir,
    logLevel: resolveLogLevel(env),
    topCategories: parsePositiveInteger('TOP_CATEGORIES', env.TOP_CATEGORIES, DEFAULT_TOP_CATEGORIES),
    corsOrigin: env.CORS_ORIGIN?.trim() || DEFAULT_CORS_ORIGIN,
  };
}
