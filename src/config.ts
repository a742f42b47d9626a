/**
 * Runtime configuration, read once from the environment at startup.
 */

import { config } from 'dotenv';
import { ConfigError } from './errors.js';
import { isLogLevel } from './providers/ILogProvider.js';
import type { LogLevel } from './providers/ILogProvider.js';
import { DEFAULT_EVALUATIONS_TABLE } from './repositories/SupabaseEvaluationRepository.js';

export interface AppConfig {
  supabaseUrl: string;
  supabaseKey: string;
  evaluationsTable: string;
  appName: string;
  appVersion: string;
  host: string;
  port: number;
  logLevel: LogLevel;
  maxBodyBytes: number;
}

/**
 * Copy variables from a dotenv file into `env`. Variables already set win;
 * a missing file is not an error.
 */
export function loadEnvFile(path = '.env', env: NodeJS.ProcessEnv = process.env): void {
  const { parsed } = config({ path, processEnv: {} });
  if (!parsed) return;

  for (const [name, value] of Object.entries(parsed)) {
    if (env[name] === undefined) env[name] = value;
  }
}

const REQUIRED = ['SUPABASE_URL', 'SUPABASE_SERVICE_ROLE_KEY'] as const;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const missing = REQUIRED.filter((name) => !env[name]);
  if (missing.length > 0) {
    throw new ConfigError(`Missing required environment variables: ${missing.join(', ')}`);
  }

  const logLevel = env.LOG_LEVEL ?? 'info';
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`LOG_LEVEL must be one of debug, info, warn, error (got "${logLevel}")`);
  }

  return {
    supabaseUrl: env.SUPABASE_URL ?? '',
    supabaseKey: env.SUPABASE_SERVICE_ROLE_KEY ?? '',
    evaluationsTable: env.EVALUATIONS_TABLE || DEFAULT_EVALUATIONS_TABLE,
    appName: env.APP_NAME || 'LLM Evaluation API',
    appVersion: env.APP_VERSION || '1.0.0',
    host: env.HOST || '0.0.0.0',
    port: parseInteger('PORT', env.PORT, 8000, 0, 65535),
    logLevel,
    maxBodyBytes: parseInteger('MAX_BODY_BYTES', env.MAX_BODY_BYTES, 1024 * 1024, 1),
  };
}

function parseInteger(
  name: string,
  raw: string | undefined,
  fallback: number,
  min: number,
  max = Number.MAX_SAFE_INTEGER
): number {
  if (raw === undefined || raw === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigError(`${name} must be an integer between ${min} and ${max} (got "${raw}")`);
  }
  return value;
}
