export { createContainer, type Container } from './container.js';
export { getProductionContainer } from './container.production.js';
export { loadConfig, type AppConfig, type GlossaryBackend } from './config.js';
export * from './errors.js';

export { generateAliases } from './glossary/aliases.js';
export { buildPhraseIndex, type IndexBuild, type IndexBuildReport } from './glossary/phrase-index.js';
export { findMatches, findPresentPhrases, orderPhrases } from './glossary/phrase-matcher.js';
export { foldCase } from './glossary/fold-case.js';

export { rateMetric, evaluateWordCount, summarizeRatings, isBestQuartile } from './scoring/ratings.js';
export { loadThresholdTable, parseThresholdTable } from './scoring/thresholds.js';
export { formatEvaluationReport } from './scoring/report.js';
export { RECOMMENDED_FEATURES } from './scoring/features.js';

export { GlossaryService, type GlossaryStatus } from './services/GlossaryService.js';
export { PlsEvaluationService } from './services/PlsEvaluationService.js';

export type { IGlossarySourceRepository } from './repositories/IGlossarySourceRepository.js';
export { FileGlossarySourceRepository } from './repositories/FileGlossarySourceRepository.js';
export { SupabaseGlossarySourceRepository } from './repositories/SupabaseGlossarySourceRepository.js';

export * from './providers/index.js';
export * from './tools/index.js';

export type * from './types/models.js';
export type * from './types/tools.js';
export type * from './types/common.js';
export type { RawGlossaryRecord, GlossaryTermRow, SourceCollectionResult } from './types/database.js';
