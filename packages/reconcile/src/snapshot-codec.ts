import { SnapshotFileSchema } from '@meshwatch/types';
import type { MeshNode, SnapshotRecord } from '@meshwatch/types';
import { SnapshotFormatError } from './errors.js';

export function toSnapshotRecord(node: MeshNode): SnapshotRecord {
  return {
    public_key: node.publicKey,
    name: node.name,
    latitude: node.location?.latitude ?? null,
    longitude: node.location?.longitude ?? null,
    node_type: node.nodeType,
    is_observer: node.isObserver,
    contact: node.contact,
    created_at: node.createdAt,
    last_heard: node.lastHeard,
  };
}

export function fromSnapshotRecord(record: SnapshotRecord): MeshNode {
  const location =
    record.latitude !== null && record.longitude !== null
      ? { latitude: record.latitude, longitude: record.longitude }
      : null;

  return {
    publicKey: record.public_key,
    name: record.name,
    location,
    nodeType: record.node_type,
    isObserver: record.is_observer,
    contact: record.contact,
    createdAt: record.created_at,
    lastHeard: record.last_heard,
  };
}

/**
 * Serialize nodes as the snapshot file body: a JSON array, two-space indent.
 */
export function encodeSnapshot(nodes: readonly MeshNode[]): string {
  return JSON.stringify(nodes.map(toSnapshotRecord), null, 2);
}

/**
 * Parse a snapshot file body. `path` only labels errors.
 */
export function decodeSnapshot(text: string, path = '<snapshot>'): MeshNode[] {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new SnapshotFormatError(path, 'not valid JSON', { cause: error });
  }

  const parsed = SnapshotFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join('.') : '';
    throw new SnapshotFormatError(path, `invalid node record at [${where}]: ${issue?.message ?? 'unknown'}`, {
      cause: parsed.error,
    });
  }

  return parsed.data.map(fromSnapshotRecord);
}
