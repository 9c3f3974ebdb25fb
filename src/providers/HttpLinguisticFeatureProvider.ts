/**
 * HTTP linguistic feature provider.
 * POSTs text to an external analysis service and keeps the numeric features
 * of its JSON answer. Uses native fetch.
 */

import { UpstreamError } from '../errors.js';
import type { LinguisticFeatures } from '../types/models.js';
import type { ILinguisticFeatureProvider } from './ILinguisticFeatureProvider.js';

const DEFAULT_TIMEOUT_MS = 30_000;

export class HttpLinguisticFeatureProvider implements ILinguisticFeatureProvider {
  private readonly url: string;
  private readonly apiKey: string | undefined;
  private readonly timeoutMs: number;

  constructor(opts: { url: string; apiKey?: string; timeoutMs?: number }) {
    this.url = opts.url;
    this.apiKey = opts.apiKey;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async analyze(text: string): Promise<LinguisticFeatures> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }

    let res: Response;
    try {
      res = await fetch(this.url, {
        method: 'POST',
        headers,
        body: JSON.stringify({ text }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      // Connection failures and the timeout abort land here.
      throw new UpstreamError(`Linguistic service request failed: ${errorMessage(err)}`, {
        cause: errorMessage(err),
      });
    }

    if (!res.ok) {
      const err: unknown = await res.json().catch(() => ({}));
      const detail = isRecord(err) && typeof err.detail === 'string' ? err.detail : 'Unknown error';
      throw new UpstreamError(`Linguistic service error (${res.status}): ${detail}`, {
        status: res.status,
      });
    }

    let payload: unknown;
    try {
      payload = await res.json();
    } catch (err) {
      throw new UpstreamError('Linguistic service returned invalid JSON', {
        cause: errorMessage(err),
      });
    }
    const features = isRecord(payload) && isRecord(payload.features) ? payload.features : payload;
    if (!isRecord(features)) {
      throw new UpstreamError('Linguistic service returned a non-object payload');
    }

    return numericFields(features);
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Drop nested objects, token lists and non-finite numbers. */
function numericFields(source: Record<string, unknown>): LinguisticFeatures {
  const out: LinguisticFeatures = {};
  for (const [key, value] of Object.entries(source)) {
    if (typeof value === 'number' && Number.isFinite(value)) {
      out[key] = value;
    }
  }
  return out;
}
