/**
 * Domain models: glossary entries, match reports and metric ratings
 * as the application understands them.
 * Decoupled from both the raw source record shapes and tool payloads.
 */

// ── Glossary ──

/** One definition record, tied to the source collection it came from. */
export interface GlossaryEntry {
  readonly mainTerm: string;
  readonly plainAlternative: string;
  readonly source: string;
}

/** Lowercase alias → entries, in load order. */
export type PhraseIndex = ReadonlyMap<string, readonly GlossaryEntry[]>;

export type KnownPhrases = ReadonlySet<string>;

export interface GlossarySnapshot {
  readonly index: PhraseIndex;
  readonly phrases: KnownPhrases;
}

export interface Definition {
  plainAlternative: string;
  source: string;
}

/** Half-open [locationStart, locationEnd) span into the original text. */
export interface MatchSpan {
  aliasFound: string;
  locationStart: number;
  locationEnd: number;
}

export interface FoundTerm {
  mainTerm: string;
  definitions: Definition[];
  matchesInText: MatchSpan[];
}

export interface AnalysisSummary {
  totalUniquePhrasesFound: number;
  textCharacterLength: number;
}

export interface MatchResult {
  analysisSummary: AnalysisSummary;
  foundTerms: FoundTerm[];
}

/** Presence-only report: matched alias → every entry indexed under it. */
export type PresenceResult = Record<string, GlossaryEntry[]>;

// ── Metric ratings ──

export type Direction = 'higher_better' | 'lower_better';

export interface ThresholdEntry {
  readonly excellent: number;
  readonly good: number;
  readonly acceptable: number;
  readonly poor: number;
  readonly direction: Direction;
}

export type ThresholdTable = ReadonlyMap<string, ThresholdEntry>;

export type HigherBetterRating = 'P75' | 'P50' | 'P25' | 'P10' | 'BELOW_P10';
export type LowerBetterRating = 'P25' | 'P50' | 'P75' | 'P90' | 'BEYOND_P90';
export type PercentileRating = HigherBetterRating | LowerBetterRating;

export interface MetricEvaluation {
  value: number;
  rating: PercentileRating;
  direction: Direction;
  feedback: string | null;
}

/** Counted features (`words`, `sentences`) reported alongside the rated metrics. */
export interface InfoMetric {
  value: number;
  rating: 'within_limit' | 'over_limit' | 'info';
  direction: null;
  feedback: null;
}

export type WordCountState = 'within_limit' | 'over_limit';

export interface WordCountStatus {
  wordCount: number;
  limit: number;
  status: WordCountState;
  message: string;
}

export type OverallAssessment =
  | 'HIGHLY CONFORMS TO TYPICAL PLS PATTERNS'
  | 'GOOD CONFORMITY WITH PLS PATTERNS'
  | 'MODERATE CONFORMITY WITH PLS PATTERNS'
  | 'DEVIATES FROM TYPICAL PLS PATTERNS'
  | 'NO EVALUATION POSSIBLE';

export interface EvaluationSummary {
  counts: Record<PercentileRating, number>;
  percentages: Record<PercentileRating, number>;
  totalEvaluated: number;
  /** Features in their direction's best bucket: P75 (higher_better) or P25 (lower_better). */
  bestQuartileCount: number;
  medianCount: number;
  /** Share of evaluated features in their best quartile, 0–100. */
  bestQuartileRate: number;
  overallAssessment: OverallAssessment;
}

export interface PlsEvaluation {
  info: { words: InfoMetric; sentences: InfoMetric };
  metrics: Record<string, MetricEvaluation>;
  wordCountStatus: WordCountStatus;
  summary: EvaluationSummary;
}

/** Flat feature name → numeric value mapping from the linguistic analyzer. */
export type LinguisticFeatures = Record<string, number>;
