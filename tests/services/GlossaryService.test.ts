import { describe, it, expect, beforeEach } from 'vitest';
import { GlossaryService } from '../../src/services/GlossaryService.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { ServiceUnavailableError } from '../../src/errors.js';
import { MockGlossarySourceRepository } from '../mocks/MockGlossarySourceRepository.js';
import type { IGlossarySourceRepository } from '../../src/repositories/IGlossarySourceRepository.js';
import type { SourceCollectionResult } from '../../src/types/database.js';

/** Each listCollections() call waits until the test settles it by call index. */
class GatedSourceRepository implements IGlossarySourceRepository {
  private readonly pending: Array<{
    resolve: (collections: SourceCollectionResult[]) => void;
    reject: (err: Error) => void;
  }> = [];

  listCollections(): Promise<SourceCollectionResult[]> {
    return new Promise((resolve, reject) => {
      this.pending.push({ resolve, reject });
    });
  }

  release(call: number, term: string): void {
    this.pending[call].resolve([
      { name: 'conditions', records: [{ term, plain_alternative: `${term} meaning` }] },
    ]);
  }

  fail(call: number, err: Error): void {
    this.pending[call].reject(err);
  }
}

describe('GlossaryService', () => {
  let repo: MockGlossarySourceRepository;
  let logger: ConsoleLogProvider;
  let service: GlossaryService;

  beforeEach(() => {
    repo = new MockGlossarySourceRepository();
    repo.add('conditions', [
      { term: 'Hypertension', plain_alternative: 'high blood pressure' },
      { term: 'Pertussis (Whooping Cough)', plain_alternative: 'a bad cough' },
    ]);
    logger = new ConsoleLogProvider();
    service = new GlossaryService(repo, logger);
  });

  // ── initialize ──

  describe('initialize', () => {
    it('should build the index and report it ready', async () => {
      const status = await service.initialize();

      expect(status.state).toBe('ready');
      if (status.state === 'ready') {
        expect(status.report).toEqual({
          sourceCount: 1,
          entryCount: 2,
          phraseCount: 4,
          skippedRecords: 0,
          failedSources: [],
        });
        expect(new Date(status.builtAt).toISOString()).toBe(status.builtAt);
      }
      expect(service.isAvailable()).toBe(true);
    });

    it('should share one build between concurrent callers', async () => {
      const [a, b] = await Promise.all([service.initialize(), service.initialize()]);
      await service.initialize();

      expect(repo.callCount).toBe(1);
      expect(a).toEqual(b);
    });

    it('should enter degraded mode when the sources cannot be listed', async () => {
      repo.failWith = new Error('connection refused');

      const status = await service.initialize();

      expect(status).toEqual({ state: 'unavailable', reason: 'connection refused' });
      expect(service.isAvailable()).toBe(false);
      expect(logger.eventsAt('error')).toEqual([
        expect.objectContaining({
          message: 'Glossary index unavailable',
          fields: { reason: 'connection refused' },
        }),
      ]);
    });

    it('should not retry a failed build', async () => {
      repo.failWith = new Error('connection refused');
      await service.initialize();
      repo.failWith = null;

      const status = await service.initialize();

      expect(status.state).toBe('unavailable');
      expect(repo.callCount).toBe(1);
    });

    it('should warn about a failed source and index the rest', async () => {
      repo.addBroken('trials', 'Cannot read trials.json');

      const status = await service.initialize();

      expect(status.state).toBe('ready');
      expect(logger.eventsAt('warn')).toEqual([
        expect.objectContaining({
          message: 'Skipped glossary source',
          fields: { source: 'trials', error: 'Cannot read trials.json' },
        }),
      ]);
      expect(service.findMatches('Hypertension').foundTerms).toHaveLength(1);
    });

    it('should log an error when every source fails', async () => {
      repo.clear();
      repo.addBroken('conditions', 'Invalid JSON');
      repo.addBroken('trials', 'Cannot read');

      const status = await service.initialize();

      expect(status.state).toBe('ready');
      expect(logger.eventsAt('error').map((e) => e.message)).toEqual([
        'Every glossary source failed to load; index is empty',
      ]);
      expect(service.findMatches('hypertension').foundTerms).toEqual([]);
    });

    it('should note skipped records at debug level', async () => {
      repo.clear();
      repo.add('conditions', [
        { term: '   ', plain_alternative: 'nothing' },
        { term: 'Disease', plain_alternative: 'illness' },
      ]);

      await service.initialize();

      expect(logger.eventsAt('debug')).toEqual([
        expect.objectContaining({ message: 'Skipped malformed glossary records', fields: { count: 1 } }),
      ]);
    });
  });

  // ── matching ──

  describe('findMatches', () => {
    it('should throw ServiceUnavailableError before initialization', () => {
      expect(() => service.findMatches('text')).toThrow(ServiceUnavailableError);
      expect(() => service.findPresentPhrases('text')).toThrow('Glossary service is not available');
    });

    it('should throw ServiceUnavailableError in degraded mode', async () => {
      repo.failWith = new Error('timeout');
      await service.initialize();

      expect(() => service.findMatches('text')).toThrow(ServiceUnavailableError);
    });

    it('should match against the built index', async () => {
      await service.initialize();

      const result = service.findMatches('Whooping cough and hypertension.');

      expect(result.analysisSummary).toEqual({ totalUniquePhrasesFound: 2, textCharacterLength: 32 });
      expect(result.foundTerms.map((t) => t.mainTerm)).toEqual([
        'Pertussis (Whooping Cough)',
        'Hypertension',
      ]);
    });

    it('should report present phrases with their entries', async () => {
      await service.initialize();

      expect(service.findPresentPhrases('A history of HYPERTENSION')).toEqual({
        hypertension: [
          { mainTerm: 'Hypertension', plainAlternative: 'high blood pressure', source: 'conditions' },
        ],
      });
    });
  });

  // ── rebuild / reset ──

  describe('rebuild', () => {
    it('should swap in a new index', async () => {
      await service.initialize();
      repo.add('general', [{ term: 'Trauma', plain_alternative: 'injury' }]);

      const status = await service.rebuild();

      expect(status.state).toBe('ready');
      expect(repo.callCount).toBe(2);
      expect(service.findMatches('trauma').foundTerms).toHaveLength(1);
    });

    it('should keep the previous index when the rebuild fails', async () => {
      await service.initialize();
      repo.failWith = new Error('source offline');

      await expect(service.rebuild()).rejects.toThrow('source offline');

      expect(service.isAvailable()).toBe(true);
      expect(service.findMatches('hypertension').foundTerms).toHaveLength(1);
    });

    it('should recover from degraded mode', async () => {
      repo.failWith = new Error('source offline');
      await service.initialize();
      repo.failWith = null;

      const status = await service.rebuild();

      expect(status.state).toBe('ready');
      expect(service.isAvailable()).toBe(true);
    });
  });

  describe('stats', () => {
    it('should be null until an index is published', async () => {
      expect(service.stats()).toBeNull();

      await service.initialize();

      expect(service.stats()).toMatchObject({ phraseCount: 4, entryCount: 2, sourceCount: 1 });
    });
  });

  describe('superseded builds', () => {
    let gated: GatedSourceRepository;
    let gatedService: GlossaryService;

    beforeEach(() => {
      gated = new GatedSourceRepository();
      gatedService = new GlossaryService(gated, logger);
    });

    it('should not publish an initialize that finishes after reset', async () => {
      const pending = gatedService.initialize();
      gatedService.reset();
      gated.release(0, 'Older');

      expect(await pending).toEqual({ state: 'uninitialized' });
      expect(gatedService.status()).toEqual({ state: 'uninitialized' });
      expect(gatedService.isAvailable()).toBe(false);
    });

    it('should not enter degraded mode for a failure that finishes after reset', async () => {
      const pending = gatedService.initialize();
      gatedService.reset();
      gated.fail(0, new Error('connection refused'));

      await pending;

      expect(gatedService.status()).toEqual({ state: 'uninitialized' });
      expect(logger.eventsAt('error')).toEqual([]);
    });

    it('should keep the rebuilt index when an earlier initialize finishes last', async () => {
      const initializing = gatedService.initialize();
      const rebuilding = gatedService.rebuild();

      gated.release(1, 'Newer');
      await rebuilding;
      gated.release(0, 'Older');
      await initializing;

      const found = gatedService.findMatches('newer older').foundTerms.map((t) => t.mainTerm);
      expect(found).toEqual(['Newer']);
    });
  });

  describe('reset', () => {
    it('should forget the index and allow a fresh initialize', async () => {
      await service.initialize();
      service.reset();

      expect(service.status()).toEqual({ state: 'uninitialized' });
      expect(service.isAvailable()).toBe(false);

      await service.initialize();
      expect(repo.callCount).toBe(2);
    });
  });
});
