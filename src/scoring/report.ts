/**
 * Plain-text rendering of a PLS evaluation.
 */

import type { PercentileRating, PlsEvaluation } from '../types/models.js';
import { PERCENTILE_RATINGS } from './ratings.js';

const DEVIATION_LINES: Array<{ rating: PercentileRating; label: string }> = [
  { rating: 'P90', label: 'P90 range:' },
  { rating: 'P10', label: 'P10 range:' },
  { rating: 'BEYOND_P90', label: 'Beyond P90:' },
  { rating: 'BELOW_P10', label: 'Below P10:' },
];

export function formatEvaluationReport(evaluation: PlsEvaluation): string {
  const { summary } = evaluation;
  const lines: string[] = [
    evaluation.wordCountStatus.message,
    `Sentences: ${evaluation.info.sentences.value}`,
    '',
    'METRIC EVALUATION:',
  ];

  for (const rating of PERCENTILE_RATINGS) {
    for (const [feature, metric] of Object.entries(evaluation.metrics)) {
      if (metric.rating !== rating) continue;
      const arrow = metric.direction === 'higher_better' ? '↑' : '↓';
      lines.push(`${feature.padEnd(30)} ${arrow} = ${metric.value.toFixed(2).padStart(8)} → ${rating}`);
    }
  }

  const bestPct = summary.totalEvaluated > 0
    ? (summary.bestQuartileCount / summary.totalEvaluated) * 100
    : 0;

  lines.push(
    '',
    'STATISTICAL CONFORMITY SUMMARY:',
    '',
    'Percentile ranges (proportion of corpus):',
    `  Best quartile (P25/P75): ${countCell(summary.bestQuartileCount)} features (${bestPct.toFixed(1)}%)`,
    `  Median (P50):            ${countCell(summary.counts.P50)} features (${summary.percentages.P50.toFixed(1)}%)`
  );

  for (const { rating, label } of DEVIATION_LINES) {
    if (summary.counts[rating] > 0) {
      lines.push(
        `  ${label.padEnd(24)} ${countCell(summary.counts[rating])} features (${summary.percentages[rating].toFixed(1)}%)`
      );
    }
  }

  lines.push(
    '',
    `Overall Pattern Conformity: ${summary.overallAssessment}`,
    `Best Quartile Rate: ${summary.bestQuartileRate.toFixed(1)}%`,
    ''
  );

  const recommendations = Object.entries(evaluation.metrics)
    .filter(([, metric]) => metric.feedback !== null)
    .map(([feature, metric], i) => `   ${i + 1}. ${feature}: ${metric.feedback}`);

  if (recommendations.length > 0) {
    lines.push(
      'PATTERN DEVIATION ANALYSIS',
      `Features deviating from typical PLS patterns (${recommendations.length} features):`,
      ...recommendations
    );
  } else {
    lines.push('All metrics conform to typical PLS statistical patterns.');
  }

  return lines.join('\n');
}

function countCell(count: number): string {
  return String(count).padStart(3);
}
