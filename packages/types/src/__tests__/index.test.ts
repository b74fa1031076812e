import { describe, it, expect } from 'vitest';
import {
  NODE_TYPES,
  MeshNodeSchema,
  SnapshotRecordSchema,
  MeshMapperRepeaterSchema,
  LetsMeshNodeSchema,
  LetsMeshResponseSchema,
  SyncConfigSchema,
  isReservedShortId,
  nodeTypeLabel,
  resolveSyncConfig,
  shortId,
} from '../index.js';

describe('@meshwatch/types', () => {
  // ─────────────────────────────────────────────────────────────────────
  // SHORT IDENTIFIERS
  // ─────────────────────────────────────────────────────────────────────

  describe('shortId', () => {
    it('takes the first four characters upper-cased by default', () => {
      expect(shortId('ab12cdef0011')).toBe('AB12');
    });

    it('takes two characters when asked', () => {
      expect(shortId('ab12cdef0011', 2)).toBe('AB');
    });

    it('returns the whole key when it is shorter than the length', () => {
      expect(shortId('e7', 4)).toBe('E7');
    });
  });

  describe('isReservedShortId', () => {
    it('flags the 00 prefix', () => {
      expect(isReservedShortId('00AB')).toBe(true);
    });

    it('flags the FF prefix regardless of case', () => {
      expect(isReservedShortId('ff12')).toBe(true);
    });

    it('flags the A block by its first character', () => {
      expect(isReservedShortId('A1')).toBe(true);
      expect(isReservedShortId('a9f0')).toBe(true);
    });

    it('accepts ordinary identifiers', () => {
      expect(isReservedShortId('BCDE')).toBe(false);
      expect(isReservedShortId('0F')).toBe(false);
      expect(isReservedShortId('1A')).toBe(false);
    });
  });

  describe('nodeTypeLabel', () => {
    it('labels every node type', () => {
      expect(nodeTypeLabel(NODE_TYPES.REPEATER)).toBe('Repeater');
      expect(nodeTypeLabel(NODE_TYPES.ROOM_SERVER)).toBe('Room Server');
      expect(nodeTypeLabel(NODE_TYPES.COMPANION)).toBe('Companion');
    });
  });

  // ─────────────────────────────────────────────────────────────────────
  // ZOD SCHEMAS
  // ─────────────────────────────────────────────────────────────────────

  describe('MeshNodeSchema', () => {
    const node = {
      publicKey: 'AB12CD',
      name: 'Summit Relay',
      location: { latitude: 39.74, longitude: -104.99 },
      nodeType: NODE_TYPES.REPEATER,
      isObserver: false,
      contact: null,
      createdAt: 0,
      lastHeard: 1771377540,
    };

    it('validates a node', () => {
      expect(MeshNodeSchema.safeParse(node).success).toBe(true);
    });

    it('rejects an empty public key', () => {
      expect(MeshNodeSchema.safeParse({ ...node, publicKey: '' }).success).toBe(false);
    });

    it('rejects node types outside the closed set', () => {
      expect(MeshNodeSchema.safeParse({ ...node, nodeType: 4 }).success).toBe(false);
      expect(MeshNodeSchema.safeParse({ ...node, nodeType: 0 }).success).toBe(false);
    });
  });

  describe('SnapshotRecordSchema', () => {
    it('defaults absent coordinates to null', () => {
      const result = SnapshotRecordSchema.parse({
        public_key: 'AB12',
        name: 'Ridge',
        node_type: 2,
        is_observer: false,
        contact: null,
        created_at: 0,
        last_heard: 100,
      });
      expect(result.latitude).toBeNull();
      expect(result.longitude).toBeNull();
    });

    it('rejects an unknown node_type', () => {
      const result = SnapshotRecordSchema.safeParse({
        public_key: 'AB12',
        name: 'Ridge',
        latitude: null,
        longitude: null,
        node_type: 7,
        is_observer: false,
        contact: null,
        created_at: 0,
        last_heard: 100,
      });
      expect(result.success).toBe(false);
    });
  });

  describe('MeshMapperRepeaterSchema', () => {
    it('validates a directory record and ignores extra fields', () => {
      const result = MeshMapperRepeaterSchema.safeParse({
        id: '17',
        hex_id: 'AB12',
        name: 'Summit Relay',
        lat: 39.74,
        lon: -104.99,
        last_heard: 1771377540,
        created_at: '1760000000',
        enabled: 1,
        power: '1W',
        iata: 'DEN',
        can_reach: null,
      });
      expect(result.success).toBe(true);
    });

    it('reads numeric strings as numbers', () => {
      const result = MeshMapperRepeaterSchema.parse({
        id: '17',
        hex_id: 'AB12',
        name: 'Summit Relay',
        lat: '39.74',
        lon: '-104.99',
        last_heard: '1771377540',
        created_at: '1760000000',
        enabled: '1',
        power: '1W',
        iata: 'DEN',
      });
      expect([result.lat, result.lon, result.last_heard, result.enabled]).toEqual([39.74, -104.99, 1771377540, 1]);
    });

    it('rejects a coordinate that is not a number', () => {
      const result = MeshMapperRepeaterSchema.safeParse({
        id: '17',
        hex_id: 'AB12',
        name: 'Summit Relay',
        lat: 'north',
        lon: -104.99,
        last_heard: 1771377540,
        created_at: '1760000000',
        enabled: 1,
        power: '1W',
        iata: 'DEN',
      });
      expect(result.success).toBe(false);
    });
  });

  describe('LetsMeshNodeSchema', () => {
    const raw = {
      public_key: 'ab12cdef',
      name: 'Hiker',
      device_role: 1,
      regions: ['DEN'],
      first_seen: '2026-02-18T01:19:00.379Z',
      last_seen: '2026-02-19T01:19:00.379Z',
      is_mqtt_connected: true,
    };

    it('accepts a node without location', () => {
      expect(LetsMeshNodeSchema.safeParse(raw).success).toBe(true);
    });

    it('accepts a null location', () => {
      expect(LetsMeshNodeSchema.safeParse({ ...raw, location: null }).success).toBe(true);
    });

    it('rejects an unknown device role', () => {
      expect(LetsMeshNodeSchema.safeParse({ ...raw, device_role: 4 }).success).toBe(false);
    });

    it('reads 0 and 1 as the MQTT flag', () => {
      expect(LetsMeshNodeSchema.parse({ ...raw, is_mqtt_connected: 0 }).is_mqtt_connected).toBe(false);
      expect(LetsMeshNodeSchema.parse({ ...raw, is_mqtt_connected: 1 }).is_mqtt_connected).toBe(true);
    });

    it('unwraps the nodes envelope', () => {
      const result = LetsMeshResponseSchema.parse({ nodes: [raw] });
      expect(result.nodes).toHaveLength(1);
      expect(result.nodes[0].public_key).toBe('ab12cdef');
    });
  });

  // ─────────────────────────────────────────────────────────────────────
  // CONFIG
  // ─────────────────────────────────────────────────────────────────────

  describe('resolveSyncConfig', () => {
    it('applies defaults', () => {
      const config = resolveSyncConfig();
      expect(config.meshMapperUrl).toBe('https://den.meshmapper.net/repeaters.json');
      expect(config.letsMeshUrl).toBe('https://api.letsmesh.net/api/nodes?region=DEN');
      expect(config.requestTimeoutMs).toBe(10_000);
    });

    it('keeps overrides', () => {
      const config = resolveSyncConfig({ requestTimeoutMs: 2500 });
      expect(config.requestTimeoutMs).toBe(2500);
    });

    it('rejects a malformed URL', () => {
      expect(SyncConfigSchema.safeParse({ letsMeshUrl: 'not a url' }).success).toBe(false);
    });
  });
});
