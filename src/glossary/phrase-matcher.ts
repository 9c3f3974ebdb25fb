/**
 * Glossary phrase matching.
 *
 * Finds every whole-word, case-insensitive occurrence of a known phrase in a
 * text. Longer phrases claim their spans first; a later (shorter) match that
 * overlaps an accepted span is dropped, while its occurrences elsewhere in the
 * text are still eligible. Spans are half-open UTF-16 offsets into the caller's
 * original text, and `aliasFound` is sliced from that text so its casing survives.
 *
 * Phrase order: length descending, then plain code-unit comparison ascending.
 * Two distinct phrases of equal length can only collide on partially overlapping
 * spans (identical spans would mean identical phrases), and the lexicographically
 * smaller one wins that collision.
 */

import { InvariantError } from '../errors.js';
import { foldCase } from './fold-case.js';
import type {
  Definition,
  FoundTerm,
  GlossaryEntry,
  KnownPhrases,
  MatchResult,
  MatchSpan,
  PhraseIndex,
  PresenceResult,
} from '../types/models.js';

// Letters, digits and underscore count as word characters on either side of a match.
const NOT_AFTER_WORD = '(?<![\\p{L}\\p{N}_])';
const NOT_BEFORE_WORD = '(?![\\p{L}\\p{N}_])';

interface Range {
  start: number;
  end: number;
}

export function findMatches(text: string, index: PhraseIndex, phrases: KnownPhrases): MatchResult {
  const folded = foldCase(text);
  const accepted: Range[] = [];
  const found = new Map<string, FoundTerm>();

  for (const phrase of orderPhrases(phrases)) {
    const entries = entriesFor(phrase, index);
    if (!folded.includes(phrase)) continue;

    for (const range of wholeWordOccurrences(folded, phrase)) {
      if (accepted.some((r) => range.start < r.end && range.end > r.start)) continue;

      const span: MatchSpan = {
        aliasFound: text.slice(range.start, range.end),
        locationStart: range.start,
        locationEnd: range.end,
      };

      for (const entry of entries) {
        let term = found.get(entry.mainTerm);
        if (!term) {
          term = { mainTerm: entry.mainTerm, definitions: [], matchesInText: [] };
          found.set(entry.mainTerm, term);
        }
        addDefinition(term.definitions, entry);
        addSpan(term.matchesInText, span);
      }

      accepted.push(range);
    }
  }

  const foundTerms = [...found.values()];
  return {
    analysisSummary: {
      totalUniquePhrasesFound: foundTerms.length,
      textCharacterLength: text.length,
    },
    foundTerms,
  };
}

/**
 * Presence-only variant: which phrases occur, with their entries, no spans.
 * Each matched phrase is blanked out of the working text before shorter phrases
 * are tried, so a phrase inside an already-matched one is not reported from there.
 */
export function findPresentPhrases(
  text: string,
  index: PhraseIndex,
  phrases: KnownPhrases
): PresenceResult {
  let working = foldCase(text);
  const present: PresenceResult = {};

  for (const phrase of orderPhrases(phrases)) {
    const entries = entriesFor(phrase, index);
    if (!working.includes(phrase)) continue;

    const occurrences = [...wholeWordOccurrences(working, phrase)];
    if (occurrences.length === 0) continue;

    present[phrase] = [...entries];
    working = blankOut(working, occurrences);
  }

  return present;
}

/** Phrases in matching priority order. Empty phrases can never form a span and are left out. */
export function orderPhrases(phrases: KnownPhrases): string[] {
  return [...phrases]
    .filter((p) => p.length > 0)
    .sort((a, b) => b.length - a.length || (a < b ? -1 : a > b ? 1 : 0));
}

function* wholeWordOccurrences(haystack: string, phrase: string): Generator<Range> {
  const pattern = new RegExp(`${NOT_AFTER_WORD}${escapeRegex(phrase)}${NOT_BEFORE_WORD}`, 'gu');
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(haystack)) !== null) {
    yield { start: match.index, end: match.index + match[0].length };
  }
}

function entriesFor(phrase: string, index: PhraseIndex): readonly GlossaryEntry[] {
  const entries = index.get(phrase);
  if (!entries || entries.length === 0) {
    throw new InvariantError(`Known phrase "${phrase}" has no entries in the phrase index`, {
      phrase,
    });
  }
  return entries;
}

function addDefinition(definitions: Definition[], entry: GlossaryEntry): void {
  const exists = definitions.some(
    (d) => d.plainAlternative === entry.plainAlternative && d.source === entry.source
  );
  if (!exists) {
    definitions.push({ plainAlternative: entry.plainAlternative, source: entry.source });
  }
}

function addSpan(spans: MatchSpan[], span: MatchSpan): void {
  const exists = spans.some(
    (s) =>
      s.locationStart === span.locationStart &&
      s.locationEnd === span.locationEnd &&
      s.aliasFound === span.aliasFound
  );
  if (!exists) spans.push({ ...span });
}

function blankOut(text: string, ranges: readonly Range[]): string {
  let out = '';
  let cursor = 0;
  for (const { start, end } of ranges) {
    out += text.slice(cursor, start) + ' '.repeat(end - start);
    cursor = end;
  }
  return out + text.slice(cursor);
}

function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
