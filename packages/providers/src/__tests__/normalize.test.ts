import { describe, it, expect } from 'vitest';
import { LETSMESH_ROLES, NODE_TYPES } from '@meshwatch/types';
import type { LetsMeshNode, MeshMapperRepeater } from '@meshwatch/types';
import {
  buildContactUrl,
  findLetsMeshMatch,
  indexLetsMeshNodes,
  nodeTypeFromLetsMeshRole,
  normalizeCompanions,
  normalizeLetsMeshNode,
  normalizeRepeaters,
  parseIsoTimestamp,
  parseNumericTimestamp,
} from '../index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

function makeRepeater(overrides: Partial<MeshMapperRepeater> = {}): MeshMapperRepeater {
  return {
    id: '17',
    hex_id: 'AB12',
    name: 'Summit Relay',
    lat: 39.7392,
    lon: -104.9903,
    last_heard: 1771377540,
    created_at: '1760000000',
    enabled: 1,
    power: '1W',
    iata: 'DEN',
    ...overrides,
  };
}

function makeLetsMeshNode(overrides: Partial<LetsMeshNode> = {}): LetsMeshNode {
  return {
    public_key: 'ab12cd34ef56',
    name: 'Summit Relay',
    device_role: LETSMESH_ROLES.REPEATER,
    regions: ['DEN'],
    first_seen: '2026-02-18T01:19:00.379Z',
    last_seen: '2026-02-18T02:00:00.000Z',
    is_mqtt_connected: true,
    location: { latitude: 39.7392, longitude: -104.9903 },
    ...overrides,
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Tests
// ─────────────────────────────────────────────────────────────────────────────

describe('timestamps', () => {
  it('parses ISO 8601 UTC with fractional seconds to Unix seconds', () => {
    expect(parseIsoTimestamp('2026-02-18T01:19:00.379Z')).toBe(1771377540);
  });

  it('floors to the second', () => {
    expect(parseIsoTimestamp('2026-02-18T01:19:00.999Z')).toBe(1771377540);
  });

  it.each([
    'not-a-date',
    '',
    '2026-02-18T01:19:00Z',
    '2026-02-18T01:19:00.379+01:00',
    '2026-02-18',
    '2026-02-30T00:00:00.000Z',
    '2026-02-18T24:00:00.000Z',
    '2026-02-18T01:60:00.000Z',
  ])(
    'normalizes %j to 0',
    (value) => {
      expect(parseIsoTimestamp(value)).toBe(0);
    },
  );

  it('parses numeric strings', () => {
    expect(parseNumericTimestamp('1760000000')).toBe(1760000000);
  });

  it.each(['', '17600.5', '-5', 'abc', ' 1760000000'])('normalizes %j to 0', (value) => {
    expect(parseNumericTimestamp(value)).toBe(0);
  });
});

describe('buildContactUrl', () => {
  it('encodes the name and upper-cases the key', () => {
    expect(buildContactUrl('Summit Relay #2', 'ab12cd')).toBe(
      'meshcore://contact/add?name=Summit%20Relay%20%232&public_key=AB12CD&type=2',
    );
  });
});

describe('nodeTypeFromLetsMeshRole', () => {
  it('maps every role onto a node type', () => {
    expect(nodeTypeFromLetsMeshRole(LETSMESH_ROLES.COMPANION)).toBe(NODE_TYPES.COMPANION);
    expect(nodeTypeFromLetsMeshRole(LETSMESH_ROLES.REPEATER)).toBe(NODE_TYPES.REPEATER);
    expect(nodeTypeFromLetsMeshRole(LETSMESH_ROLES.ROOM)).toBe(NODE_TYPES.ROOM_SERVER);
  });
});

describe('LetsMesh index', () => {
  it('matches full keys case-insensitively', () => {
    const node = makeLetsMeshNode({ public_key: 'ab12cd34ef56' });
    const index = indexLetsMeshNodes([node]);
    expect(findLetsMeshMatch(index, 'AB12CD34EF56')).toBe(node);
  });

  it('falls back to a key prefix match', () => {
    const node = makeLetsMeshNode({ public_key: 'ab12cd34ef56' });
    const index = indexLetsMeshNodes([makeLetsMeshNode({ public_key: 'cd34' }), node]);
    expect(findLetsMeshMatch(index, 'AB12')).toBe(node);
  });

  it('prefers an exact match over an earlier prefix match', () => {
    const prefixed = makeLetsMeshNode({ public_key: 'AB12FF' });
    const exact = makeLetsMeshNode({ public_key: 'ab12' });
    const index = indexLetsMeshNodes([prefixed, exact]);
    expect(findLetsMeshMatch(index, 'AB12')).toBe(exact);
  });

  it('keeps the first node for a duplicated key', () => {
    const first = makeLetsMeshNode({ name: 'First' });
    const second = makeLetsMeshNode({ name: 'Second' });
    const index = indexLetsMeshNodes([first, second]);
    expect(findLetsMeshMatch(index, first.public_key)?.name).toBe('First');
  });

  it('returns undefined without a match', () => {
    expect(findLetsMeshMatch(indexLetsMeshNodes([makeLetsMeshNode()]), 'CD34')).toBeUndefined();
  });
});

describe('normalizeRepeaters', () => {
  it('classifies a repeater as a room server when LetsMesh reports a room', () => {
    const [node] = normalizeRepeaters(
      [makeRepeater({ hex_id: 'AB12' })],
      [makeLetsMeshNode({ public_key: 'AB12CD34EF56', device_role: LETSMESH_ROLES.ROOM })],
    );
    expect(node.nodeType).toBe(NODE_TYPES.ROOM_SERVER);
  });

  it('defaults to repeater when LetsMesh has another role', () => {
    const [node] = normalizeRepeaters(
      [makeRepeater()],
      [makeLetsMeshNode({ device_role: LETSMESH_ROLES.REPEATER })],
    );
    expect(node.nodeType).toBe(NODE_TYPES.REPEATER);
  });

  it('defaults to repeater when LetsMesh does not know the node', () => {
    const [node] = normalizeRepeaters([makeRepeater()], []);
    expect(node.nodeType).toBe(NODE_TYPES.REPEATER);
  });

  it('maps every directory field', () => {
    const [node] = normalizeRepeaters([makeRepeater()], []);
    expect(node).toEqual({
      publicKey: 'AB12',
      name: 'Summit Relay',
      location: { latitude: 39.7392, longitude: -104.9903 },
      nodeType: NODE_TYPES.REPEATER,
      isObserver: false,
      contact: 'meshcore://contact/add?name=Summit%20Relay&public_key=AB12&type=2',
      createdAt: 1760000000,
      lastHeard: 1771377540,
    });
  });

  it('uses 0 for a non-numeric creation time', () => {
    const [node] = normalizeRepeaters([makeRepeater({ created_at: 'unknown' })], []);
    expect(node.createdAt).toBe(0);
  });

  it('keeps directory order and duplicates', () => {
    const nodes = normalizeRepeaters(
      [makeRepeater({ name: 'B' }), makeRepeater({ name: 'A' }), makeRepeater({ name: 'B' })],
      [],
    );
    expect(nodes.map((n) => n.name)).toEqual(['B', 'A', 'B']);
  });
});

describe('normalizeLetsMeshNode', () => {
  it('maps every field', () => {
    expect(normalizeLetsMeshNode(makeLetsMeshNode())).toEqual({
      publicKey: 'ab12cd34ef56',
      name: 'Summit Relay',
      location: { latitude: 39.7392, longitude: -104.9903 },
      nodeType: NODE_TYPES.REPEATER,
      isObserver: false,
      contact: 'meshcore://contact/add?name=Summit%20Relay&public_key=AB12CD34EF56&type=2',
      createdAt: 1771377540,
      lastHeard: 1771380000,
    });
  });

  it('marks nodes without MQTT as observers', () => {
    expect(normalizeLetsMeshNode(makeLetsMeshNode({ is_mqtt_connected: false })).isObserver).toBe(true);
  });

  it('leaves location null when absent', () => {
    expect(normalizeLetsMeshNode(makeLetsMeshNode({ location: undefined })).location).toBeNull();
    expect(normalizeLetsMeshNode(makeLetsMeshNode({ location: null })).location).toBeNull();
  });

  it('swallows malformed timestamps', () => {
    const node = normalizeLetsMeshNode(makeLetsMeshNode({ first_seen: 'not-a-date', last_seen: '' }));
    expect(node.createdAt).toBe(0);
    expect(node.lastHeard).toBe(0);
  });
});

describe('normalizeCompanions', () => {
  it('keeps only companions', () => {
    const nodes = normalizeCompanions([
      makeLetsMeshNode({ public_key: 'C001', device_role: LETSMESH_ROLES.COMPANION }),
      makeLetsMeshNode({ public_key: 'C002', device_role: LETSMESH_ROLES.REPEATER }),
      makeLetsMeshNode({ public_key: 'C003', device_role: LETSMESH_ROLES.ROOM }),
      makeLetsMeshNode({ public_key: 'C004', device_role: LETSMESH_ROLES.COMPANION }),
    ]);
    expect(nodes.map((n) => n.publicKey)).toEqual(['C001', 'C004']);
    expect(nodes.every((n) => n.nodeType === NODE_TYPES.COMPANION)).toBe(true);
  });
});
