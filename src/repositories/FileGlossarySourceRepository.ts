/**
 * File-backed glossary sources.
 * Each `<name>.json` in the directory holds one collection as a JSON array;
 * `<name>` becomes the source of every entry it contributes.
 */

import { readFile, readdir } from 'node:fs/promises';
import { basename, join } from 'node:path';
import type { SourceCollectionResult } from '../types/database.js';
import type { IGlossarySourceRepository } from './IGlossarySourceRepository.js';

const EXTENSION = '.json';

export class FileGlossarySourceRepository implements IGlossarySourceRepository {
  /**
   * @param order - Collection names in load order. Files not listed are ignored;
   *   listed names without a file come back as errors. Defaults to every file, alphabetically.
   */
  constructor(
    private readonly dir: string,
    private readonly order?: readonly string[]
  ) {}

  async listCollections(): Promise<SourceCollectionResult[]> {
    const names = this.order ?? (await this.discover());
    return Promise.all(names.map((name) => this.readCollection(name)));
  }

  private async discover(): Promise<string[]> {
    const files = await readdir(this.dir);
    return files
      .filter((f) => f.endsWith(EXTENSION))
      .map((f) => basename(f, EXTENSION))
      .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  }

  private async readCollection(name: string): Promise<SourceCollectionResult> {
    const path = join(this.dir, `${name}${EXTENSION}`);

    let raw: string;
    try {
      raw = await readFile(path, 'utf8');
    } catch (err) {
      return { name, error: `Cannot read ${path}: ${err instanceof Error ? err.message : String(err)}` };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      return { name, error: `Invalid JSON in ${path}: ${err instanceof Error ? err.message : String(err)}` };
    }

    if (!Array.isArray(parsed)) {
      return { name, error: `${path} must contain a JSON array of records` };
    }

    return { name, records: parsed };
  }
}
