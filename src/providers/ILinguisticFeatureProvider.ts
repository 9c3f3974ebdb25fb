/**
 * Linguistic feature provider interface.
 * Wraps the external analyzer that computes counts, POS distributions
 * and readability indices for a text.
 */

import type { LinguisticFeatures } from '../types/models.js';

export interface ILinguisticFeatureProvider {
  /** Flat feature name → value mapping. Features the analyzer lacks are simply absent. */
  analyze(text: string): Promise<LinguisticFeatures>;
}
