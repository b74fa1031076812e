/**
 * GPX 1.1 export for mesh nodes
 *
 * Produces a single-line document of waypoints, one per located node, that
 * Google Earth and most mapping tools import directly.
 */

import { nodeTypeLabel, shortId } from '@meshwatch/types';
import type { MeshMapperRepeater, MeshNode } from '@meshwatch/types';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export const GPX_VERSION = '1.1';

export interface GpxWaypoint {
  latitude: number;
  longitude: number;
  name: string;
  description?: string;
}

export interface GpxDocumentOptions {
  /** Metadata name of the document */
  name: string;
  /** Value of the `creator` attribute */
  creator: string;
}

export const DEFAULT_GPX_OPTIONS: GpxDocumentOptions = {
  name: 'MeshMapper Repeaters',
  creator: 'meshwatch GPX Exporter',
};

// ═══════════════════════════════════════════════════════════════════════════
// RENDERING
// ═══════════════════════════════════════════════════════════════════════════

const XML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
};

export function escapeXml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => XML_ESCAPES[ch] ?? ch);
}

export function renderWaypoint(waypoint: GpxWaypoint): string {
  const desc = waypoint.description !== undefined ? `<desc>${escapeXml(waypoint.description)}</desc>` : '';
  return (
    `<wpt lat="${waypoint.latitude}" lon="${waypoint.longitude}">` +
    `<name>${escapeXml(waypoint.name)}</name>${desc}</wpt>`
  );
}

export function renderGpx(
  waypoints: readonly GpxWaypoint[],
  options: GpxDocumentOptions = DEFAULT_GPX_OPTIONS,
): string {
  const header =
    '<?xml version="1.0" encoding="UTF-8" standalone="no"?>' +
    `<gpx version="${GPX_VERSION}" creator="${escapeXml(options.creator)}">` +
    `<metadata><name>${escapeXml(options.name)}</name></metadata>`;

  return header + waypoints.map(renderWaypoint).join('') + '</gpx>';
}

// ═══════════════════════════════════════════════════════════════════════════
// WAYPOINT BUILDERS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Waypoint for a MeshMapper directory entry. `locality` is appended to the
 * description when known.
 */
export function repeaterWaypoint(repeater: MeshMapperRepeater, locality?: string | null): GpxWaypoint {
  const parts = [`Power: ${repeater.power}`, `Last Heard: ${repeater.last_heard}`];
  if (locality) {
    parts.push(`Area: ${locality}`);
  }
  return {
    latitude: repeater.lat,
    longitude: repeater.lon,
    name: repeater.name,
    description: parts.join(', '),
  };
}

/**
 * Waypoint for a canonical node, or null when the node has no location.
 */
export function nodeWaypoint(node: MeshNode): GpxWaypoint | null {
  if (!node.location) {
    return null;
  }
  return {
    latitude: node.location.latitude,
    longitude: node.location.longitude,
    name: node.name,
    description: `${nodeTypeLabel(node.nodeType)} ${shortId(node.publicKey)}, Last Heard: ${node.lastHeard}`,
  };
}

export function nodeWaypoints(nodes: readonly MeshNode[]): GpxWaypoint[] {
  const waypoints: GpxWaypoint[] = [];
  for (const node of nodes) {
    const waypoint = nodeWaypoint(node);
    if (waypoint) {
      waypoints.push(waypoint);
    }
  }
  return waypoints;
}
