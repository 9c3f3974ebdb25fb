/**
 * PLS evaluation service.
 * Rates a text's linguistic features against the threshold table and
 * summarizes how closely the text follows typical plain-language-summary patterns.
 */

import { ServiceUnavailableError } from '../errors.js';
import type { ILinguisticFeatureProvider } from '../providers/ILinguisticFeatureProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import { INFO_FEATURES, RECOMMENDED_FEATURES } from '../scoring/features.js';
import { DEFAULT_WORD_LIMIT, evaluateWordCount, rateMetric, summarizeRatings } from '../scoring/ratings.js';
import { formatEvaluationReport } from '../scoring/report.js';
import type {
  LinguisticFeatures,
  MetricEvaluation,
  PlsEvaluation,
  ThresholdTable,
} from '../types/models.js';

export interface PlsEvaluationOptions {
  wordLimit?: number;
}

export class PlsEvaluationService {
  private readonly wordLimit: number;

  constructor(
    private readonly featureProvider: ILinguisticFeatureProvider | null,
    private readonly thresholds: ThresholdTable,
    private readonly logProvider: ILogProvider,
    options?: PlsEvaluationOptions
  ) {
    this.wordLimit = options?.wordLimit ?? DEFAULT_WORD_LIMIT;
  }

  isAvailable(): boolean {
    return this.featureProvider !== null;
  }

  async analyze(text: string): Promise<LinguisticFeatures> {
    if (!this.featureProvider) {
      throw new ServiceUnavailableError('Linguistic feature provider is not configured');
    }
    return this.featureProvider.analyze(text);
  }

  async evaluate(text: string): Promise<PlsEvaluation> {
    const features = await this.analyze(text);
    return this.evaluateFeatures(features);
  }

  async evaluateAsText(text: string): Promise<string> {
    return formatEvaluationReport(await this.evaluate(text));
  }

  /** Rate whichever recommended features are present and have a threshold entry. */
  evaluateFeatures(features: LinguisticFeatures): PlsEvaluation {
    const words = features.words ?? 0;
    const sentences = features.sentences ?? 0;
    const wordCountStatus = evaluateWordCount(words, this.wordLimit);

    const metrics: Record<string, MetricEvaluation> = {};
    const skipped: string[] = [];

    for (const feature of RECOMMENDED_FEATURES) {
      if (INFO_FEATURES.has(feature)) continue;

      const value = features[feature];
      const thresholds = this.thresholds.get(feature);
      if (value === undefined || !thresholds) {
        skipped.push(feature);
        continue;
      }
      metrics[feature] = rateMetric(value, thresholds);
    }

    if (skipped.length > 0) {
      this.logProvider.debug('Features not rated', { features: skipped });
    }

    return {
      info: {
        words: { value: words, rating: wordCountStatus.status, direction: null, feedback: null },
        sentences: { value: sentences, rating: 'info', direction: null, feedback: null },
      },
      metrics,
      wordCountStatus,
      summary: summarizeRatings(Object.values(metrics)),
    };
  }
}
