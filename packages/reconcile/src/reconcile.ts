/**
 * Reconciliation - classify nodes between two snapshots
 *
 * Nodes are matched by content fingerprint, not by public key. A device whose
 * name, position, type or observer flag changed therefore shows up once as
 * missing (old content) and once as added (new content).
 */

import type { MeshNode } from '@meshwatch/types';
import { fingerprint, type Fingerprint } from './fingerprint.js';

export interface ReconcileResult {
  /** Fingerprints observed now but absent from the existing snapshot */
  added: MeshNode[];
  /** Fingerprints in both; carries the observed version */
  unchanged: MeshNode[];
  /** Fingerprints in the existing snapshot that were not observed */
  missing: MeshNode[];
}

export function reconcile(existing: readonly MeshNode[], observed: readonly MeshNode[]): ReconcileResult {
  // Last write wins: two distinct nodes with identical fingerprints collapse
  // into whichever was inserted last.
  const all = new Map<Fingerprint, MeshNode>();
  const existingPrints = new Set<Fingerprint>();
  const observedPrints = new Set<Fingerprint>();

  for (const node of existing) {
    const print = fingerprint(node);
    existingPrints.add(print);
    all.set(print, node);
  }

  for (const node of observed) {
    const print = fingerprint(node);
    observedPrints.add(print);
    all.set(print, node);
  }

  const added: MeshNode[] = [];
  const unchanged: MeshNode[] = [];
  const missing: MeshNode[] = [];

  for (const [print, node] of all) {
    const inExisting = existingPrints.has(print);
    const inObserved = observedPrints.has(print);
    if (inExisting && inObserved) {
      unchanged.push(node);
    } else if (inObserved) {
      added.push(node);
    } else {
      missing.push(node);
    }
  }

  return { added, unchanged, missing };
}

/**
 * Whether the result calls for rewriting the snapshot.
 */
export function hasChanges(result: ReconcileResult): boolean {
  return result.added.length > 0 || result.missing.length > 0;
}
