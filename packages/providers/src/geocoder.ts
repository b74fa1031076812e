/**
 * ReverseGeocoder - locality names from Nominatim
 *
 * Enrichment only: every failure is logged and turned into null so a sync or
 * export never stops on it.
 */

import { z } from 'zod';
import { DEFAULT_SYNC_CONFIG, createLogger } from '@meshwatch/types';
import type { GeoLocation, Logger } from '@meshwatch/types';
import { getJson, parseBody, type FetchFn } from './http.js';

/** Most specific first. */
const LOCALITY_FIELDS = ['neighbourhood', 'suburb', 'village', 'town', 'city', 'municipality'] as const;

const ReverseResponseSchema = z.object({
  address: z.record(z.unknown()).optional(),
});

export interface ReverseGeocoderConfig {
  /** Nominatim base URL */
  baseUrl?: string;
  userAgent?: string;
  timeoutMs?: number;
  fetch?: FetchFn;
  logger?: Logger;
}

export class ReverseGeocoder {
  private readonly baseUrl: string;
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly fetchFn?: FetchFn;
  private readonly log: Logger;

  constructor(config: ReverseGeocoderConfig = {}) {
    this.baseUrl = config.baseUrl ?? DEFAULT_SYNC_CONFIG.nominatimUrl;
    this.userAgent = config.userAgent ?? DEFAULT_SYNC_CONFIG.userAgent;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_SYNC_CONFIG.requestTimeoutMs;
    this.fetchFn = config.fetch;
    this.log = config.logger ?? createLogger('ReverseGeocoder');
  }

  reverseUrl(location: GeoLocation): string {
    const url = new URL('/reverse', this.baseUrl);
    url.searchParams.set('format', 'json');
    url.searchParams.set('lat', String(location.latitude));
    url.searchParams.set('lon', String(location.longitude));
    url.searchParams.set('zoom', '18');
    return url.toString();
  }

  /**
   * Neighbourhood, suburb, village, town, city or municipality, whichever
   * Nominatim knows first. Null when there is no location or no answer.
   */
  async lookupLocality(location: GeoLocation | null): Promise<string | null> {
    if (!location) {
      return null;
    }

    const url = this.reverseUrl(location);
    try {
      const body = await getJson(url, {
        timeoutMs: this.timeoutMs,
        headers: { 'User-Agent': this.userAgent },
        fetch: this.fetchFn,
      });
      const { address } = parseBody(url, ReverseResponseSchema, body);
      return pickLocality(address ?? {});
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.log.warn(`Reverse geocoding ${location.latitude}, ${location.longitude} failed: ${reason}`);
      return null;
    }
  }
}

function pickLocality(address: Record<string, unknown>): string | null {
  for (const field of LOCALITY_FIELDS) {
    const value = address[field];
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
  }
  return null;
}
