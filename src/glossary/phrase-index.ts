/**
 * Phrase index construction.
 * Merges named source collections into an alias → entries index and the set of
 * every known alias. Collection order is the caller's; entry lists keep it.
 */

import type { GlossaryEntry, GlossarySnapshot } from '../types/models.js';
import type { RawGlossaryRecord, SourceCollectionResult } from '../types/database.js';
import { generateAliases } from './aliases.js';

export interface FailedSource {
  name: string;
  error: string;
}

export interface IndexBuildReport {
  sourceCount: number;
  entryCount: number;
  phraseCount: number;
  /** Records dropped for not being an object, a blank term or a non-string plain alternative. */
  skippedRecords: number;
  failedSources: FailedSource[];
}

export interface IndexBuild {
  snapshot: GlossarySnapshot;
  report: IndexBuildReport;
}

export function buildPhraseIndex(collections: readonly SourceCollectionResult[]): IndexBuild {
  const index = new Map<string, GlossaryEntry[]>();
  const phrases = new Set<string>();
  const failedSources: FailedSource[] = [];
  let sourceCount = 0;
  let entryCount = 0;
  let skippedRecords = 0;

  for (const collection of collections) {
    if ('error' in collection) {
      failedSources.push({ name: collection.name, error: collection.error });
      continue;
    }
    sourceCount++;

    for (const record of collection.records) {
      const entry = toEntry(record, collection.name);
      if (!entry) {
        skippedRecords++;
        continue;
      }
      entryCount++;

      for (const alias of generateAliases(entry.mainTerm)) {
        const list = index.get(alias);
        if (list) {
          list.push(entry);
        } else {
          index.set(alias, [entry]);
        }
        phrases.add(alias);
      }
    }
  }

  for (const list of index.values()) Object.freeze(list);

  return {
    snapshot: { index, phrases },
    report: {
      sourceCount,
      entryCount,
      phraseCount: phrases.size,
      skippedRecords,
      failedSources,
    },
  };
}

function toEntry(record: unknown, source: string): GlossaryEntry | null {
  if (!isRawRecord(record)) return null;
  const { term, plain_alternative: plainAlternative } = record;
  if (typeof term !== 'string' || term.trim() === '') return null;
  if (typeof plainAlternative !== 'string') return null;

  return Object.freeze({ mainTerm: term, plainAlternative, source });
}

function isRawRecord(value: unknown): value is RawGlossaryRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
