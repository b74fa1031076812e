import { LetsMeshResponseSchema, DEFAULT_SYNC_CONFIG, createLogger } from '@meshwatch/types';
import type { LetsMeshNode, Logger } from '@meshwatch/types';
import { getJson, parseBody, type FetchFn } from './http.js';
import type { ProviderClientConfig } from './meshmapper-client.js';

// The API turns away requests that do not look like a browser.
const BROWSER_HEADERS: Record<string, string> = {
  'User-Agent': 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10.15; rv:147.0) Gecko/20100101 Firefox/147.0',
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.9',
};

/**
 * LetsMesh region node list. Every device role, with first/last seen times
 * and MQTT connectivity.
 */
export class LetsMeshClient {
  readonly url: string;
  private readonly timeoutMs: number;
  private readonly fetchFn?: FetchFn;
  private readonly log: Logger;

  constructor(config: ProviderClientConfig = {}) {
    this.url = config.url ?? DEFAULT_SYNC_CONFIG.letsMeshUrl;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_SYNC_CONFIG.requestTimeoutMs;
    this.fetchFn = config.fetch;
    this.log = config.logger ?? createLogger('LetsMeshClient');
  }

  async fetchNodes(): Promise<LetsMeshNode[]> {
    this.log.debug(`Fetching nodes from ${this.url}`);
    const body = await getJson(this.url, {
      timeoutMs: this.timeoutMs,
      headers: BROWSER_HEADERS,
      fetch: this.fetchFn,
    });
    const { nodes } = parseBody(this.url, LetsMeshResponseSchema, body);
    this.log.info(`Found ${nodes.length} nodes from LetsMesh`);
    return nodes;
  }
}
