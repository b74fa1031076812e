/**
 * The provider could not be reached or answered with a non-2xx status.
 */
export class ProviderRequestError extends Error {
  override readonly name = 'ProviderRequestError';

  constructor(
    readonly url: string,
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(`${url}: ${message}`, options);
  }
}

/**
 * The provider answered, but the body is not the shape we expect. Unknown
 * device roles land here: they are rejected, never guessed.
 */
export class ProviderResponseError extends Error {
  override readonly name = 'ProviderResponseError';

  constructor(
    readonly url: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${url}: ${message}`, options);
  }
}
