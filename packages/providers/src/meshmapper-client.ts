import { MeshMapperResponseSchema, DEFAULT_SYNC_CONFIG, createLogger } from '@meshwatch/types';
import type { Logger, MeshMapperRepeater } from '@meshwatch/types';
import { getJson, parseBody, type FetchFn } from './http.js';

export interface ProviderClientConfig {
  /** Endpoint override */
  url?: string;
  timeoutMs?: number;
  /** Defaults to the global fetch */
  fetch?: FetchFn;
  logger?: Logger;
}

/**
 * MeshMapper repeater directory. Lists repeaters and room servers for one
 * region, without telling them apart.
 */
export class MeshMapperClient {
  readonly url: string;
  private readonly timeoutMs: number;
  private readonly fetchFn?: FetchFn;
  private readonly log: Logger;

  constructor(config: ProviderClientConfig = {}) {
    this.url = config.url ?? DEFAULT_SYNC_CONFIG.meshMapperUrl;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_SYNC_CONFIG.requestTimeoutMs;
    this.fetchFn = config.fetch;
    this.log = config.logger ?? createLogger('MeshMapperClient');
  }

  async fetchRepeaters(): Promise<MeshMapperRepeater[]> {
    this.log.debug(`Fetching repeaters from ${this.url}`);
    const body = await getJson(this.url, { timeoutMs: this.timeoutMs, fetch: this.fetchFn });
    const repeaters = parseBody(this.url, MeshMapperResponseSchema, body);
    this.log.info(`Found ${repeaters.length} repeaters from MeshMapper`);
    return repeaters;
  }
}
