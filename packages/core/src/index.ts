// ═══════════════════════════════════════════════════════════════════════════
// meshwatch - Unified entry point for MeshCore node sync
// ═══════════════════════════════════════════════════════════════════════════

// Pipeline (primary API)
export { runSync, collectObservations, createNodeSources, findReservedShortIds } from './pipeline.js';
export type { NodeSources, Observations, SyncRunConfig, SyncReport } from './pipeline.js';

// Reconciliation & snapshots
export {
  SnapshotStore,
  SnapshotFormatError,
  reconcile,
  hasChanges,
  fingerprint,
  isSameNode,
  isContentEqual,
  nodeKey,
} from '@meshwatch/reconcile';
export type { ReconcileResult, SnapshotStoreConfig, SyncOutcome } from '@meshwatch/reconcile';

// Providers
export {
  MeshMapperClient,
  LetsMeshClient,
  ReverseGeocoder,
  ProviderRequestError,
  ProviderResponseError,
  buildContactUrl,
  normalizeRepeaters,
  normalizeCompanions,
} from '@meshwatch/providers';
export type { FetchFn, ProviderClientConfig, ReverseGeocoderConfig } from '@meshwatch/providers';

// GPX
export { renderGpx, repeaterWaypoint, nodeWaypoints, DEFAULT_GPX_OPTIONS } from '@meshwatch/gpx';
export type { GpxWaypoint, GpxDocumentOptions } from '@meshwatch/gpx';

// Types & utilities
export {
  NODE_TYPES,
  DEFAULT_SYNC_CONFIG,
  createLogger,
  isReservedShortId,
  nodeTypeLabel,
  resolveSyncConfig,
  shortId,
} from '@meshwatch/types';
export type { Logger, MeshNode, NodeType, SyncConfig, MeshMapperRepeater, LetsMeshNode } from '@meshwatch/types';
