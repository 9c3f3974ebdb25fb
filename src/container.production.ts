/**
 * Production container: file or Supabase glossary sources, HTTP feature provider.
 * Built once per process; concurrent callers share the same startup.
 */

import { loadConfig, type AppConfig } from './config.js';
import { createContainer, type Container } from './container.js';
import { getSupabaseClient } from './db.js';
import { ConsoleLogProvider } from './providers/ConsoleLogProvider.js';
import { HttpLinguisticFeatureProvider } from './providers/HttpLinguisticFeatureProvider.js';
import { FileGlossarySourceRepository } from './repositories/FileGlossarySourceRepository.js';
import type { IGlossarySourceRepository } from './repositories/IGlossarySourceRepository.js';
import { SupabaseGlossarySourceRepository } from './repositories/SupabaseGlossarySourceRepository.js';
import { loadThresholdTable } from './scoring/thresholds.js';

let cached: Promise<Container> | null = null;

export function getProductionContainer(env: NodeJS.ProcessEnv = process.env): Promise<Container> {
  if (!cached) {
    cached = buildContainer(loadConfig(env)).catch((err: unknown) => {
      cached = null;
      throw err;
    });
  }
  return cached;
}

async function buildContainer(config: AppConfig): Promise<Container> {
  const logProvider = new ConsoleLogProvider({ outputToConsole: true, minLevel: config.logLevel });

  const thresholds = await loadThresholdTable(config.thresholdsPath);
  logProvider.info('Loaded threshold table', { path: config.thresholdsPath, features: thresholds.size });

  const featureProvider = config.linguisticServiceUrl
    ? new HttpLinguisticFeatureProvider({
        url: config.linguisticServiceUrl,
        apiKey: config.linguisticServiceKey,
      })
    : null;
  if (!featureProvider) {
    logProvider.warn('LINGUISTIC_SERVICE_URL not set; linguistic analysis and PLS evaluation are unavailable');
  }

  const container = createContainer({
    glossarySourceRepo: createGlossarySourceRepo(config),
    featureProvider,
    thresholds,
    logProvider,
    wordLimit: config.wordLimit,
  });

  await container.glossaryService.initialize();
  return container;
}

function createGlossarySourceRepo(config: AppConfig): IGlossarySourceRepository {
  if (config.glossaryBackend === 'supabase' && config.supabaseUrl && config.supabaseServiceRoleKey) {
    return new SupabaseGlossarySourceRepository(
      getSupabaseClient(config.supabaseUrl, config.supabaseServiceRoleKey),
      config.glossarySources
    );
  }
  return new FileGlossarySourceRepository(config.glossariesDir, config.glossarySources);
}
