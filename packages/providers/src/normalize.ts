/**
 * Source normalizers - provider records to canonical nodes
 *
 * Pure functions, no I/O. The MeshMapper directory carries no device type, so
 * repeater normalization takes a LetsMesh index built from the same run:
 *
 *   fetch both providers → indexLetsMeshNodes → normalizeRepeaters
 */

import { LETSMESH_ROLES, NODE_TYPES } from '@meshwatch/types';
import type {
  LetsMeshNode,
  LetsMeshRole,
  MeshMapperRepeater,
  MeshNode,
  NodeType,
} from '@meshwatch/types';
import { buildContactUrl } from './contact.js';
import { parseIsoTimestamp, parseNumericTimestamp } from './timestamps.js';

// ═══════════════════════════════════════════════════════════════════════════
// ROLE MAPPING
// ═══════════════════════════════════════════════════════════════════════════

export function nodeTypeFromLetsMeshRole(role: LetsMeshRole): NodeType {
  switch (role) {
    case LETSMESH_ROLES.COMPANION:
      return NODE_TYPES.COMPANION;
    case LETSMESH_ROLES.REPEATER:
      return NODE_TYPES.REPEATER;
    case LETSMESH_ROLES.ROOM:
      return NODE_TYPES.ROOM_SERVER;
    default: {
      const unknownRole: never = role;
      throw new Error(`Unknown device role: ${String(unknownRole)}`);
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// LETSMESH INDEX
// ═══════════════════════════════════════════════════════════════════════════

/**
 * LetsMesh nodes keyed by upper-cased public key. The first node seen for a
 * key wins.
 */
export interface LetsMeshIndex {
  readonly byKey: ReadonlyMap<string, LetsMeshNode>;
  readonly nodes: readonly LetsMeshNode[];
}

export function indexLetsMeshNodes(nodes: readonly LetsMeshNode[]): LetsMeshIndex {
  const byKey = new Map<string, LetsMeshNode>();
  for (const node of nodes) {
    const key = node.public_key.toUpperCase();
    if (!byKey.has(key)) {
      byKey.set(key, node);
    }
  }
  return { byKey, nodes };
}

/**
 * The LetsMesh node for a MeshMapper `hex_id`. Exact key match first; the
 * directory sometimes publishes only the leading hex, so fall back to the
 * first LetsMesh key that starts with it.
 */
export function findLetsMeshMatch(index: LetsMeshIndex, hexId: string): LetsMeshNode | undefined {
  const key = hexId.toUpperCase();
  const exact = index.byKey.get(key);
  if (exact) {
    return exact;
  }
  return index.nodes.find((node) => node.public_key.toUpperCase().startsWith(key));
}

// ═══════════════════════════════════════════════════════════════════════════
// MESHMAPPER
// ═══════════════════════════════════════════════════════════════════════════

export function inferRepeaterType(repeater: MeshMapperRepeater, index: LetsMeshIndex): NodeType {
  const match = findLetsMeshMatch(index, repeater.hex_id);
  return match?.device_role === LETSMESH_ROLES.ROOM ? NODE_TYPES.ROOM_SERVER : NODE_TYPES.REPEATER;
}

export function normalizeMeshMapperRepeater(repeater: MeshMapperRepeater, index: LetsMeshIndex): MeshNode {
  return {
    publicKey: repeater.hex_id,
    name: repeater.name,
    location: { latitude: repeater.lat, longitude: repeater.lon },
    nodeType: inferRepeaterType(repeater, index),
    // The directory does not say.
    isObserver: false,
    contact: buildContactUrl(repeater.name, repeater.hex_id),
    createdAt: parseNumericTimestamp(repeater.created_at),
    lastHeard: repeater.last_heard,
  };
}

/**
 * Repeaters and room servers from the MeshMapper directory, typed with the
 * help of the LetsMesh node list.
 */
export function normalizeRepeaters(
  repeaters: readonly MeshMapperRepeater[],
  letsMeshNodes: readonly LetsMeshNode[],
): MeshNode[] {
  const index = indexLetsMeshNodes(letsMeshNodes);
  return repeaters.map((repeater) => normalizeMeshMapperRepeater(repeater, index));
}

// ═══════════════════════════════════════════════════════════════════════════
// LETSMESH
// ═══════════════════════════════════════════════════════════════════════════

export function normalizeLetsMeshNode(node: LetsMeshNode): MeshNode {
  return {
    publicKey: node.public_key,
    name: node.name,
    location: node.location
      ? { latitude: node.location.latitude, longitude: node.location.longitude }
      : null,
    nodeType: nodeTypeFromLetsMeshRole(node.device_role),
    isObserver: !node.is_mqtt_connected,
    contact: buildContactUrl(node.name, node.public_key),
    createdAt: parseIsoTimestamp(node.first_seen),
    lastHeard: parseIsoTimestamp(node.last_seen),
  };
}

/**
 * Companion devices only.
 */
export function normalizeCompanions(nodes: readonly LetsMeshNode[]): MeshNode[] {
  return nodes
    .filter((node) => node.device_role === LETSMESH_ROLES.COMPANION)
    .map(normalizeLetsMeshNode);
}
