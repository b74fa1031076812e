/**
 * SnapshotStore - file-backed snapshot with a write-on-change policy
 *
 * The file always holds the full node list from the last run that saw a
 * change. It is replaced wholesale, never patched. A run whose observations
 * match the file by fingerprint leaves it untouched, stale lastHeard values
 * included.
 *
 * Single writer per path; callers serialize runs.
 */

import { mkdir, open, rename, rm } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import { dirname } from 'node:path';
import { createLogger } from '@meshwatch/types';
import type { Logger, MeshNode } from '@meshwatch/types';
import { decodeSnapshot, encodeSnapshot } from './snapshot-codec.js';
import { hasChanges, reconcile, type ReconcileResult } from './reconcile.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface SnapshotStoreConfig {
  /** Snapshot file location */
  path: string;
  /** Category name used in log lines (e.g. 'repeaters') */
  label?: string;
  logger?: Logger;
}

export interface SyncOutcome {
  path: string;
  result: ReconcileResult;
  /** Whether the file was rewritten */
  written: boolean;
}

// ═══════════════════════════════════════════════════════════════════════════
// IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

export class SnapshotStore {
  readonly path: string;
  private readonly label: string;
  private readonly log: Logger;

  constructor(config: SnapshotStoreConfig) {
    this.path = config.path;
    this.label = config.label ?? 'nodes';
    this.log = config.logger ?? createLogger('SnapshotStore');
  }

  /**
   * Read the persisted snapshot. A missing file is the empty snapshot.
   */
  async load(): Promise<MeshNode[]> {
    let handle: FileHandle;
    try {
      handle = await open(this.path, 'r');
    } catch (error) {
      if (isNotFound(error)) {
        this.log.debug(`No snapshot at ${this.path}, starting empty`);
        return [];
      }
      throw error;
    }

    try {
      const text = await handle.readFile({ encoding: 'utf-8' });
      return decodeSnapshot(text, this.path);
    } finally {
      await handle.close();
    }
  }

  /**
   * Replace the snapshot with `nodes`. Written beside the target and renamed
   * over it once flushed.
   */
  async save(nodes: readonly MeshNode[]): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });

    const tmpPath = `${this.path}.tmp`;
    const handle = await open(tmpPath, 'w');
    try {
      try {
        await handle.writeFile(encodeSnapshot(nodes), { encoding: 'utf-8' });
        await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(tmpPath, this.path);
    } catch (error) {
      await rm(tmpPath, { force: true });
      throw error;
    }
  }

  /**
   * Reconcile `observed` against the stored snapshot and rewrite the file
   * with `observed` when anything was added or went missing.
   */
  async sync(observed: readonly MeshNode[]): Promise<SyncOutcome> {
    const existing = await this.load();
    this.log.info(`Loaded ${existing.length} known ${this.label} from ${this.path}`);

    const result = reconcile(existing, observed);
    this.log.info(
      `Found ${result.added.length} new, ${result.unchanged.length} unchanged and ` +
        `${result.missing.length} missing ${this.label}`,
    );

    if (!hasChanges(result)) {
      this.log.info(`No changes detected, ${this.path} not updated`);
      return { path: this.path, result, written: false };
    }

    await this.save(observed);
    this.log.info(`Wrote ${observed.length} ${this.label} to ${this.path}`);
    return { path: this.path, result, written: true };
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
