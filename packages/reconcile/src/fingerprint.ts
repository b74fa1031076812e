/**
 * Content fingerprints for mesh nodes.
 *
 * Covers only the attributes whose change means something about the device:
 * name, short identifier, node type, position and observer flag. Contact URL
 * and both timestamps move on every observation and are left out.
 */

import { createHash } from 'node:crypto';
import { shortId } from '@meshwatch/types';
import type { MeshNode } from '@meshwatch/types';

export type Fingerprint = string;

/**
 * The ordered tuple the fingerprint is computed over.
 */
export function fingerprintFields(
  node: MeshNode,
): readonly [string, string, number, number | null, number | null, boolean] {
  return [
    node.name,
    shortId(node.publicKey),
    node.nodeType,
    node.location?.latitude ?? null,
    node.location?.longitude ?? null,
    node.isObserver,
  ];
}

/**
 * SHA-256 over the JSON-encoded field tuple, hex encoded.
 */
export function fingerprint(node: MeshNode): Fingerprint {
  return createHash('sha256').update(JSON.stringify(fingerprintFields(node))).digest('hex');
}
