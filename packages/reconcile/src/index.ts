export { fingerprint, fingerprintFields } from './fingerprint.js';
export type { Fingerprint } from './fingerprint.js';

export { nodeKey, isSameNode, isContentEqual } from './identity.js';

export { reconcile, hasChanges } from './reconcile.js';
export type { ReconcileResult } from './reconcile.js';

export {
  encodeSnapshot,
  decodeSnapshot,
  toSnapshotRecord,
  fromSnapshotRecord,
} from './snapshot-codec.js';

export { SnapshotStore } from './snapshot-store.js';
export type { SnapshotStoreConfig, SyncOutcome } from './snapshot-store.js';

export { SnapshotFormatError } from './errors.js';
