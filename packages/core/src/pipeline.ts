/**
 * Sync pipeline
 *
 * Two stages per run:
 *   1. fetch MeshMapper and LetsMesh concurrently, then normalize (MeshMapper
 *      repeaters are typed from the LetsMesh list, so both must land first)
 *   2. run the snapshot store policy once per category, repeaters then
 *      companions, against independent files
 */

import { createLogger, isReservedShortId, resolveSyncConfig, shortId } from '@meshwatch/types';
import type { LetsMeshNode, Logger, MeshMapperRepeater, MeshNode, SyncConfig } from '@meshwatch/types';
import { LetsMeshClient, MeshMapperClient, normalizeCompanions, normalizeRepeaters } from '@meshwatch/providers';
import type { FetchFn } from '@meshwatch/providers';
import { SnapshotStore, type SyncOutcome } from '@meshwatch/reconcile';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface NodeSources {
  meshMapper: { fetchRepeaters(): Promise<MeshMapperRepeater[]> };
  letsMesh: { fetchNodes(): Promise<LetsMeshNode[]> };
}

export interface Observations {
  repeaters: MeshNode[];
  companions: MeshNode[];
}

export interface SyncRunConfig {
  /** Snapshot file for repeaters and room servers */
  repeatersPath: string;
  /** Snapshot file for companions */
  companionsPath: string;
  /** Provider overrides; HTTP clients built from `config` otherwise */
  sources?: NodeSources;
  config?: Partial<SyncConfig>;
  fetch?: FetchFn;
  logger?: Logger;
}

export interface SyncReport {
  repeaters: SyncOutcome;
  companions: SyncOutcome;
  /** Observed short ids in reserved ranges. Reported, never filtered */
  reservedShortIds: string[];
}

// ═══════════════════════════════════════════════════════════════════════════
// IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * HTTP-backed provider clients.
 */
export function createNodeSources(config: SyncConfig, logger?: Logger, fetch?: FetchFn): NodeSources {
  return {
    meshMapper: new MeshMapperClient({
      url: config.meshMapperUrl,
      timeoutMs: config.requestTimeoutMs,
      fetch,
      logger,
    }),
    letsMesh: new LetsMeshClient({
      url: config.letsMeshUrl,
      timeoutMs: config.requestTimeoutMs,
      fetch,
      logger,
    }),
  };
}

export async function collectObservations(sources: NodeSources): Promise<Observations> {
  const [repeaters, letsMeshNodes] = await Promise.all([
    sources.meshMapper.fetchRepeaters(),
    sources.letsMesh.fetchNodes(),
  ]);

  return {
    repeaters: normalizeRepeaters(repeaters, letsMeshNodes),
    companions: normalizeCompanions(letsMeshNodes),
  };
}

export function findReservedShortIds(nodes: readonly MeshNode[]): string[] {
  return nodes.map((node) => shortId(node.publicKey)).filter(isReservedShortId);
}

export async function runSync(options: SyncRunConfig): Promise<SyncReport> {
  const log = options.logger ?? createLogger('sync');
  const config = resolveSyncConfig(options.config);
  const sources = options.sources ?? createNodeSources(config, options.logger, options.fetch);

  const observed = await collectObservations(sources);
  log.info(`Observed ${observed.repeaters.length} repeaters and ${observed.companions.length} companions`);

  const reservedShortIds = findReservedShortIds([...observed.repeaters, ...observed.companions]);
  if (reservedShortIds.length > 0) {
    log.warn(`${reservedShortIds.length} nodes use reserved ids: ${reservedShortIds.join(', ')}`);
  }

  const repeaters = await new SnapshotStore({
    path: options.repeatersPath,
    label: 'repeaters',
    logger: options.logger,
  }).sync(observed.repeaters);

  const companions = await new SnapshotStore({
    path: options.companionsPath,
    label: 'companions',
    logger: options.logger,
  }).sync(observed.companions);

  return { repeaters, companions, reservedShortIds };
}
