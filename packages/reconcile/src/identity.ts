import type { MeshNode } from '@meshwatch/types';
import { fingerprint } from './fingerprint.js';

/**
 * Cross-source identity key: the public key, upper-cased.
 */
export function nodeKey(node: MeshNode): string {
  return node.publicKey.toUpperCase();
}

/**
 * Two records describe the same device.
 */
export function isSameNode(a: MeshNode, b: MeshNode): boolean {
  return nodeKey(a) === nodeKey(b);
}

/**
 * Two observations carry the same identity-relevant content.
 */
export function isContentEqual(a: MeshNode, b: MeshNode): boolean {
  return fingerprint(a) === fingerprint(b);
}
