/**
 * Percentile rating of linguistic metrics.
 *
 * Each threshold entry holds the corpus percentiles of one feature. For a
 * higher_better feature, `excellent` is the 75th percentile and values at or
 * above it land in the best quartile (P75); for a lower_better feature,
 * `excellent` is the 25th percentile and values at or below it land in P25.
 *
 * Rating takes no feature name: the name only keys the result map that
 * callers build from the evaluations.
 */

import type {
  Direction,
  EvaluationSummary,
  MetricEvaluation,
  OverallAssessment,
  PercentileRating,
  ThresholdEntry,
  WordCountStatus,
} from '../types/models.js';

export const DEFAULT_WORD_LIMIT = 850;

/** Report order, best buckets of both directions first. */
export const PERCENTILE_RATINGS: readonly PercentileRating[] = [
  'P25',
  'P75',
  'P50',
  'P90',
  'P10',
  'BEYOND_P90',
  'BELOW_P10',
];

const BEST_QUARTILE: Record<Direction, PercentileRating> = {
  higher_better: 'P75',
  lower_better: 'P25',
};

export function rateMetric(value: number, thresholds: ThresholdEntry): MetricEvaluation {
  const { direction } = thresholds;
  const rating = direction === 'higher_better'
    ? rateHigherBetter(value, thresholds)
    : rateLowerBetter(value, thresholds);

  return {
    value,
    rating,
    direction,
    feedback: deviationFeedback(value, rating, thresholds),
  };
}

function rateHigherBetter(value: number, t: ThresholdEntry): PercentileRating {
  if (value >= t.excellent) return 'P75';
  if (value >= t.good) return 'P50';
  if (value >= t.acceptable) return 'P25';
  if (value >= t.poor) return 'P10';
  return 'BELOW_P10';
}

function rateLowerBetter(value: number, t: ThresholdEntry): PercentileRating {
  if (value <= t.excellent) return 'P25';
  if (value <= t.good) return 'P50';
  if (value <= t.acceptable) return 'P75';
  if (value <= t.poor) return 'P90';
  return 'BEYOND_P90';
}

/** Only the two outermost buckets get feedback, aimed at the median (`good`). */
function deviationFeedback(
  value: number,
  rating: PercentileRating,
  t: ThresholdEntry
): string | null {
  const target = t.good.toFixed(1);
  const current = value.toFixed(1);

  if (t.direction === 'higher_better' && (rating === 'P10' || rating === 'BELOW_P10')) {
    return `Deviates from typical PLS patterns. Consider increasing from ${current} to >${target} (median)`;
  }
  if (t.direction === 'lower_better' && (rating === 'P90' || rating === 'BEYOND_P90')) {
    return `Deviates from typical PLS patterns. Consider reducing from ${current} to <${target} (median)`;
  }
  return null;
}

export function isBestQuartile(evaluation: Pick<MetricEvaluation, 'rating' | 'direction'>): boolean {
  return evaluation.rating === BEST_QUARTILE[evaluation.direction];
}

export function evaluateWordCount(wordCount: number, limit = DEFAULT_WORD_LIMIT): WordCountStatus {
  const within = wordCount <= limit;
  return {
    wordCount,
    limit,
    status: within ? 'within_limit' : 'over_limit',
    message: `Word count: ${wordCount} ${within ? '✓ WITHIN LIMIT' : '✗ OVER LIMIT'} (≤${limit} words)`,
  };
}

export function summarizeRatings(evaluations: readonly MetricEvaluation[]): EvaluationSummary {
  const counts = emptyRatingRecord();
  let bestQuartileCount = 0;

  for (const evaluation of evaluations) {
    counts[evaluation.rating]++;
    if (isBestQuartile(evaluation)) bestQuartileCount++;
  }

  const totalEvaluated = evaluations.length;
  const medianCount = counts.P50;
  const percentages = emptyRatingRecord();
  if (totalEvaluated > 0) {
    for (const rating of PERCENTILE_RATINGS) {
      percentages[rating] = (counts[rating] / totalEvaluated) * 100;
    }
  }

  const bestQuartileRate = totalEvaluated > 0 ? (bestQuartileCount / totalEvaluated) * 100 : 0;

  return {
    counts,
    percentages,
    totalEvaluated,
    bestQuartileCount,
    medianCount,
    bestQuartileRate,
    overallAssessment: assess(totalEvaluated, bestQuartileCount, medianCount, bestQuartileRate),
  };
}

function assess(
  total: number,
  best: number,
  median: number,
  bestRate: number
): OverallAssessment {
  if (total === 0) return 'NO EVALUATION POSSIBLE';
  if (bestRate >= 60) return 'HIGHLY CONFORMS TO TYPICAL PLS PATTERNS';
  if (best + median >= total * 0.7) return 'GOOD CONFORMITY WITH PLS PATTERNS';
  if (best + median >= total * 0.5) return 'MODERATE CONFORMITY WITH PLS PATTERNS';
  return 'DEVIATES FROM TYPICAL PLS PATTERNS';
}

function emptyRatingRecord(): Record<PercentileRating, number> {
  return { P25: 0, P50: 0, P75: 0, P90: 0, P10: 0, BEYOND_P90: 0, BELOW_P10: 0 };
}
