/**
 * Features rated against the PLS threshold table, in report order.
 */

export const RECOMMENDED_FEATURES = [
  // Sentence and voice structure
  'words_per_sentence',
  'passive_voice',
  'active_voice',
  'sentences_per_paragraph',
  'pronouns',
  'nominalization',
  'verbs',
  'nouns',
  'numbers',

  // Readability indices
  'flesch_reading_ease',
  'flesch_kincaid_grade',
  'automated_readability_index',
  'coleman_liau_index',
  'gunning_fog_index',
  'lix',
  'rix',
  'smog_index',
  'dale_chall_readability',

  // Vocabulary complexity
  'complex_words_dc',
  'complex_words',
  'long_words',
  'syllables_per_word',
  'polysyllables',

  // Secondary indicators
  'tobeverb',
  'auxverb',
  'subordinating_conjunctions',

  // Counts
  'words',
  'sentences',
  'paragraphs',
] as const;

/** Reported as-is, never rated. */
export const INFO_FEATURES: ReadonlySet<string> = new Set(['words', 'sentences']);
