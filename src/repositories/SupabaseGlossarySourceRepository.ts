/**
 * Supabase implementation of IGlossarySourceRepository.
 * Reads the `glossary_terms` table; each distinct `source` is one collection.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IGlossarySourceRepository } from './IGlossarySourceRepository.js';
import type { GlossaryTermRow, SourceCollectionResult } from '../types/database.js';

const PAGE_SIZE = 1000;

export class SupabaseGlossarySourceRepository implements IGlossarySourceRepository {
  /**
   * @param order - Source names in load order. Sources not listed are ignored.
   *   Defaults to every source, alphabetically.
   */
  constructor(
    private readonly db: SupabaseClient,
    private readonly order?: readonly string[]
  ) {}

  async listCollections(): Promise<SourceCollectionResult[]> {
    const rows = await this.fetchAll();

    const bySource = new Map<string, GlossaryTermRow[]>();
    for (const row of rows) {
      const list = bySource.get(row.source);
      if (list) {
        list.push(row);
      } else {
        bySource.set(row.source, [row]);
      }
    }

    const names = this.order ?? [...bySource.keys()];
    return names.map((name) => {
      const list = bySource.get(name);
      if (!list) return { name, error: `No rows for source "${name}" in glossary_terms` };
      return {
        name,
        records: list.map((r) => ({ term: r.term, plain_alternative: r.plain_alternative })),
      };
    });
  }

  private async fetchAll(): Promise<GlossaryTermRow[]> {
    const rows: GlossaryTermRow[] = [];

    for (let from = 0; ; from += PAGE_SIZE) {
      const { data, error } = await this.db
        .from('glossary_terms')
        .select('id, source, term, plain_alternative')
        .order('source', { ascending: true })
        .order('id', { ascending: true })
        .range(from, from + PAGE_SIZE - 1);

      if (error) throw new Error(`Failed to load glossary terms: ${error.message}`);

      const page = (data ?? []) as GlossaryTermRow[];
      rows.push(...page);
      if (page.length < PAGE_SIZE) return rows;
    }
  }
}
