/**
 * Runtime configuration, read from environment variables.
 */

import { fileURLToPath } from 'node:url';
import { ConfigurationError } from './errors.js';
import { isLogLevel, type LogLevel } from './providers/ILogProvider.js';
import { DEFAULT_WORD_LIMIT } from './scoring/ratings.js';

export type GlossaryBackend = 'file' | 'supabase';

export interface AppConfig {
  glossaryBackend: GlossaryBackend;
  glossariesDir: string;
  /** Explicit source load order; undefined means alphabetical. */
  glossarySources: string[] | undefined;
  thresholdsPath: string;
  wordLimit: number;
  logLevel: LogLevel;
  linguisticServiceUrl: string | undefined;
  linguisticServiceKey: string | undefined;
  supabaseUrl: string | undefined;
  supabaseServiceRoleKey: string | undefined;
}

const DEFAULT_GLOSSARIES_DIR = fileURLToPath(new URL('../data/glossaries', import.meta.url));
const DEFAULT_THRESHOLDS_PATH = fileURLToPath(new URL('../data/pls_thresholds.json', import.meta.url));

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const glossaryBackend = env.GLOSSARY_BACKEND ?? 'file';
  if (glossaryBackend !== 'file' && glossaryBackend !== 'supabase') {
    throw new ConfigurationError(`GLOSSARY_BACKEND must be "file" or "supabase", got "${glossaryBackend}"`);
  }

  const logLevel = env.LOG_LEVEL ?? 'info';
  if (!isLogLevel(logLevel)) {
    throw new ConfigurationError(`LOG_LEVEL must be one of debug, info, warn, error, got "${logLevel}"`);
  }

  const config: AppConfig = {
    glossaryBackend,
    glossariesDir: env.GLOSSARIES_DIR || DEFAULT_GLOSSARIES_DIR,
    glossarySources: parseList(env.GLOSSARY_SOURCES),
    thresholdsPath: env.PLS_THRESHOLDS_PATH || DEFAULT_THRESHOLDS_PATH,
    wordLimit: parseWordLimit(env.PLS_WORD_LIMIT),
    logLevel,
    linguisticServiceUrl: env.LINGUISTIC_SERVICE_URL || undefined,
    linguisticServiceKey: env.LINGUISTIC_SERVICE_KEY || undefined,
    supabaseUrl: env.SUPABASE_URL || undefined,
    supabaseServiceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY || undefined,
  };

  if (config.glossaryBackend === 'supabase' && (!config.supabaseUrl || !config.supabaseServiceRoleKey)) {
    throw new ConfigurationError(
      'Missing required environment variables for the supabase backend: SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY'
    );
  }

  return config;
}

function parseList(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  const items = value.split(',').map((s) => s.trim()).filter(Boolean);
  return items.length > 0 ? items : undefined;
}

function parseWordLimit(value: string | undefined): number {
  if (!value) return DEFAULT_WORD_LIMIT;
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new ConfigurationError(`PLS_WORD_LIMIT must be a positive integer, got "${value}"`);
  }
  return limit;
}
