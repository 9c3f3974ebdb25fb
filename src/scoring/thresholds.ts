/**
 * Threshold table loading and validation.
 * Entries must be monotonic in their direction; anything else is rejected at load.
 */

import { readFile } from 'node:fs/promises';
import { ConfigurationError } from '../errors.js';
import type { Direction, ThresholdEntry, ThresholdTable } from '../types/models.js';

const BOUNDS = ['excellent', 'good', 'acceptable', 'poor'] as const;

export async function loadThresholdTable(path: string): Promise<ThresholdTable> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (err) {
    throw new ConfigurationError(`Cannot read threshold table at ${path}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ConfigurationError(`Threshold table at ${path} is not valid JSON`);
  }

  return parseThresholdTable(parsed);
}

export function parseThresholdTable(raw: unknown): ThresholdTable {
  if (!isRecord(raw)) {
    throw new ConfigurationError('Threshold table must be an object keyed by feature name');
  }

  const table = new Map<string, ThresholdEntry>();
  for (const [feature, value] of Object.entries(raw)) {
    table.set(feature, parseEntry(feature, value));
  }
  return table;
}

function parseEntry(feature: string, value: unknown): ThresholdEntry {
  if (!isRecord(value)) {
    throw new ConfigurationError(`Threshold entry for "${feature}" must be an object`, { feature });
  }

  const direction = value.direction;
  if (!isDirection(direction)) {
    throw new ConfigurationError(
      `Threshold entry for "${feature}" has unknown direction: ${String(direction)}`,
      { feature }
    );
  }

  const bounds: number[] = [];
  for (const key of BOUNDS) {
    const bound = value[key];
    if (typeof bound !== 'number' || !Number.isFinite(bound)) {
      throw new ConfigurationError(`Threshold entry for "${feature}" needs a numeric "${key}"`, {
        feature,
        field: key,
      });
    }
    bounds.push(bound);
  }

  const [excellent, good, acceptable, poor] = bounds;
  const ordered = direction === 'higher_better'
    ? excellent >= good && good >= acceptable && acceptable >= poor
    : excellent <= good && good <= acceptable && acceptable <= poor;

  if (!ordered) {
    throw new ConfigurationError(
      `Threshold entry for "${feature}" is not monotonic for ${direction}`,
      { feature, excellent, good, acceptable, poor }
    );
  }

  return Object.freeze({ excellent, good, acceptable, poor, direction });
}

function isDirection(value: unknown): value is Direction {
  return value === 'higher_better' || value === 'lower_better';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
