/**
 * Glossary service.
 * Owns the current phrase index snapshot: builds it once from the source
 * repository, serves matches from it, and swaps in a new one on rebuild.
 *
 * A snapshot is never modified after it is published, so concurrent matches
 * need no locking; each call reads the snapshot reference once.
 */

import { ServiceUnavailableError } from '../errors.js';
import { buildPhraseIndex, type IndexBuildReport } from '../glossary/phrase-index.js';
import { findMatches, findPresentPhrases } from '../glossary/phrase-matcher.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { IGlossarySourceRepository } from '../repositories/IGlossarySourceRepository.js';
import type { GlossarySnapshot, MatchResult, PresenceResult } from '../types/models.js';

export type GlossaryStatus =
  | { state: 'uninitialized' }
  | { state: 'ready'; builtAt: string; report: IndexBuildReport }
  | { state: 'unavailable'; reason: string };

interface Published {
  snapshot: GlossarySnapshot;
  builtAt: string;
  report: IndexBuildReport;
}

export class GlossaryService {
  private current: Published | null = null;
  private failure: string | null = null;
  private initializing: Promise<GlossaryStatus> | null = null;
  /** Bumped by rebuild() and reset(); only a build of the current generation publishes. */
  private generation = 0;

  constructor(
    private readonly sourceRepo: IGlossarySourceRepository,
    private readonly logProvider: ILogProvider
  ) {}

  /**
   * Build the index if no build has been attempted yet. Concurrent callers
   * share one build. A failed build leaves the service unavailable; it is not
   * retried until `rebuild()` or `reset()`.
   */
  initialize(): Promise<GlossaryStatus> {
    if (!this.initializing) {
      const generation = this.generation;
      this.initializing = this.build(generation).then(
        () => this.status(),
        (err: unknown) => {
          if (generation === this.generation) {
            this.failure = err instanceof Error ? err.message : String(err);
            this.logProvider.error('Glossary index unavailable', { reason: this.failure });
          }
          return this.status();
        }
      );
    }
    return this.initializing;
  }

  /**
   * Build a fresh index and publish it. On failure the previous index stays in place.
   * Any build started before this one can no longer publish.
   */
  async rebuild(): Promise<GlossaryStatus> {
    this.generation++;
    await this.build(this.generation);
    if (!this.initializing) this.initializing = Promise.resolve(this.status());
    return this.status();
  }

  /** Forget the index and the build-once guard. Builds still in flight are discarded. */
  reset(): void {
    this.generation++;
    this.current = null;
    this.failure = null;
    this.initializing = null;
  }

  isAvailable(): boolean {
    return this.current !== null;
  }

  status(): GlossaryStatus {
    if (this.current) {
      return { state: 'ready', builtAt: this.current.builtAt, report: this.current.report };
    }
    if (this.failure !== null) return { state: 'unavailable', reason: this.failure };
    return { state: 'uninitialized' };
  }

  /** Counts from the published build, or null before one exists. */
  stats(): IndexBuildReport | null {
    return this.current ? this.current.report : null;
  }

  findMatches(text: string): MatchResult {
    const { index, phrases } = this.requireSnapshot();
    return findMatches(text, index, phrases);
  }

  findPresentPhrases(text: string): PresenceResult {
    const { index, phrases } = this.requireSnapshot();
    return findPresentPhrases(text, index, phrases);
  }

  private requireSnapshot(): GlossarySnapshot {
    const published = this.current;
    if (!published) {
      throw new ServiceUnavailableError('Glossary service is not available', {
        reason: this.failure ?? 'index not built',
      });
    }
    return published.snapshot;
  }

  private async build(generation: number): Promise<void> {
    const started = performance.now();
    this.logProvider.info('Building glossary index');

    const collections = await this.sourceRepo.listCollections();
    if (generation !== this.generation) {
      this.logProvider.debug('Discarded superseded glossary build', { generation });
      return;
    }
    const { snapshot, report } = buildPhraseIndex(collections);

    for (const failed of report.failedSources) {
      this.logProvider.warn('Skipped glossary source', { source: failed.name, error: failed.error });
    }
    if (report.skippedRecords > 0) {
      this.logProvider.debug('Skipped malformed glossary records', { count: report.skippedRecords });
    }
    if (collections.length > 0 && report.sourceCount === 0) {
      this.logProvider.error('Every glossary source failed to load; index is empty', {
        failed: report.failedSources.length,
      });
    }

    this.current = { snapshot, builtAt: new Date().toISOString(), report };
    this.failure = null;

    this.logProvider.info('Glossary index ready', {
      phrases: report.phraseCount,
      entries: report.entryCount,
      sources: report.sourceCount,
      durationMs: Math.round(performance.now() - started),
    });
  }
}
