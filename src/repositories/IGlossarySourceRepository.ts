/**
 * Glossary source data access interface.
 */

import type { SourceCollectionResult } from '../types/database.js';

export interface IGlossarySourceRepository {
  /**
   * Every source collection, in a fixed load order.
   * A collection that cannot be read comes back as `{ name, error }`
   * instead of failing the whole listing.
   */
  listCollections(): Promise<SourceCollectionResult[]>;
}
