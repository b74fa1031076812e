import type { z } from 'zod';
import { ProviderRequestError, ProviderResponseError } from './errors.js';

export type FetchFn = typeof fetch;

export interface GetJsonOptions {
  timeoutMs: number;
  headers?: Record<string, string>;
  /** Defaults to the global fetch */
  fetch?: FetchFn;
}

/**
 * GET a URL and decode the JSON body.
 */
export async function getJson(url: string, options: GetJsonOptions): Promise<unknown> {
  const fetchFn = options.fetch ?? fetch;

  let response: Response;
  try {
    response = await fetchFn(url, {
      method: 'GET',
      headers: options.headers,
      signal: AbortSignal.timeout(options.timeoutMs),
    });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ProviderRequestError(url, `request failed: ${reason}`, undefined, { cause: error });
  }

  if (!response.ok) {
    throw new ProviderRequestError(url, `HTTP ${response.status}`, response.status);
  }

  try {
    return await response.json();
  } catch (error) {
    throw new ProviderResponseError(url, 'body is not JSON', { cause: error });
  }
}

/**
 * Validate a decoded body against a schema.
 */
export function parseBody<S extends z.ZodTypeAny>(url: string, schema: S, body: unknown): z.output<S> {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? issue.path.join('.') : '';
    throw new ProviderResponseError(
      url,
      `unexpected response at [${where}]: ${issue?.message ?? 'unknown'}`,
      { cause: result.error },
    );
  }
  return result.data;
}
