/**
 * Thrown when an existing snapshot file cannot be read back as nodes.
 * There is no fallback for a corrupt snapshot.
 */
export class SnapshotFormatError extends Error {
  override readonly name = 'SnapshotFormatError';

  constructor(
    readonly path: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${path}: ${message}`, options);
  }
}
