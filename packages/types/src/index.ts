import { z } from 'zod';
import { consola } from 'consola';

// ═══════════════════════════════════════════════════════════════════════════
// NODE MODEL
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Canonical node types. The integer values are the on-disk `node_type`
 * encoding and must not be renumbered.
 */
export const NODE_TYPES = {
  REPEATER: 1,
  ROOM_SERVER: 2,
  COMPANION: 3,
} as const;

export type NodeType = (typeof NODE_TYPES)[keyof typeof NODE_TYPES];

export const NodeTypeSchema = z.union([
  z.literal(NODE_TYPES.REPEATER),
  z.literal(NODE_TYPES.ROOM_SERVER),
  z.literal(NODE_TYPES.COMPANION),
]);

const NODE_TYPE_LABELS: Record<NodeType, string> = {
  [NODE_TYPES.REPEATER]: 'Repeater',
  [NODE_TYPES.ROOM_SERVER]: 'Room Server',
  [NODE_TYPES.COMPANION]: 'Companion',
};

export function nodeTypeLabel(nodeType: NodeType): string {
  return NODE_TYPE_LABELS[nodeType];
}

export const GeoLocationSchema = z.object({
  latitude: z.number(),
  longitude: z.number(),
});
export type GeoLocation = z.infer<typeof GeoLocationSchema>;

/**
 * A MeshCore device, independent of the provider that reported it.
 */
export const MeshNodeSchema = z.object({
  /** Hex-encoded public key. Cross-source identity, compared upper-cased */
  publicKey: z.string().min(1),
  /** Display label, not part of identity */
  name: z.string(),
  /** Null when the provider has no position for the node */
  location: GeoLocationSchema.nullable(),
  nodeType: NodeTypeSchema,
  /** Device does not relay or connect actively (derived per provider) */
  isObserver: z.boolean(),
  /** meshcore:// contact URL */
  contact: z.string().nullable(),
  /** Unix seconds, 0 when unknown */
  createdAt: z.number().int(),
  /** Unix seconds */
  lastHeard: z.number().int(),
});
export type MeshNode = z.infer<typeof MeshNodeSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// SHORT IDENTIFIERS
// ═══════════════════════════════════════════════════════════════════════════

export type ShortIdLength = 2 | 4;

/**
 * Leading hex characters of a public key, upper-cased.
 * Four characters (two bytes) unless asked otherwise.
 */
export function shortId(publicKey: string, length: ShortIdLength = 4): string {
  return publicKey.slice(0, length).toUpperCase();
}

/** Two-character prefixes the provider networks reserve. */
const RESERVED_BYTE_PREFIXES: readonly string[] = ['00', 'FF'];

/** One-character prefixes held back by the regional mesh for future use. */
const RESERVED_BLOCK_PREFIXES: readonly string[] = ['A'];

/**
 * Whether a short identifier (2 or 4 hex characters) falls in a reserved
 * range and so cannot belong to a usable device.
 */
export function isReservedShortId(id: string): boolean {
  const upper = id.toUpperCase();
  if (RESERVED_BYTE_PREFIXES.includes(upper.slice(0, 2))) {
    return true;
  }
  return RESERVED_BLOCK_PREFIXES.includes(upper.slice(0, 1));
}

// ═══════════════════════════════════════════════════════════════════════════
// SNAPSHOT FILE FORMAT
// ═══════════════════════════════════════════════════════════════════════════

/**
 * One node as persisted in a snapshot file. Field order here is the order
 * written to disk.
 */
export const SnapshotRecordSchema = z.object({
  public_key: z.string().min(1),
  name: z.string(),
  latitude: z.number().nullable().default(null),
  longitude: z.number().nullable().default(null),
  node_type: NodeTypeSchema,
  is_observer: z.boolean().default(false),
  contact: z.string().nullable(),
  created_at: z.number().int(),
  last_heard: z.number().int(),
});
export type SnapshotRecord = z.infer<typeof SnapshotRecordSchema>;

export const SnapshotFileSchema = z.array(SnapshotRecordSchema);

// ═══════════════════════════════════════════════════════════════════════════
// PROVIDER RECORDS (MeshMapper repeater directory)
// ═══════════════════════════════════════════════════════════════════════════

/** A number, or a string holding one */
const NumericSchema = z.union([
  z.number(),
  z
    .string()
    .regex(/^-?\d+(\.\d+)?$/)
    .transform(Number),
]);

/** A boolean, or 0/1 */
const FlagSchema = z.union([
  z.boolean(),
  z.literal(0).transform(() => false),
  z.literal(1).transform(() => true),
]);

export const MeshMapperRepeaterSchema = z.object({
  id: z.string(),
  /** Public key (or its leading hex) as published by the directory */
  hex_id: z.string().min(1),
  name: z.string(),
  lat: NumericSchema,
  lon: NumericSchema,
  /** Unix seconds */
  last_heard: NumericSchema.pipe(z.number().int()),
  /** Unix seconds as a string, not always numeric */
  created_at: z.string(),
  enabled: NumericSchema,
  power: z.string(),
  /** Region airport code */
  iata: z.string(),
});
export type MeshMapperRepeater = z.infer<typeof MeshMapperRepeaterSchema>;

export const MeshMapperResponseSchema = z.array(MeshMapperRepeaterSchema);

// ═══════════════════════════════════════════════════════════════════════════
// PROVIDER RECORDS (LetsMesh region nodes)
// ═══════════════════════════════════════════════════════════════════════════

export const LETSMESH_ROLES = {
  COMPANION: 1,
  REPEATER: 2,
  ROOM: 3,
} as const;

export type LetsMeshRole = (typeof LETSMESH_ROLES)[keyof typeof LETSMESH_ROLES];

export const LetsMeshRoleSchema = z.union([
  z.literal(LETSMESH_ROLES.COMPANION),
  z.literal(LETSMESH_ROLES.REPEATER),
  z.literal(LETSMESH_ROLES.ROOM),
]);

export const LetsMeshNodeSchema = z.object({
  public_key: z.string().min(1),
  name: z.string(),
  device_role: LetsMeshRoleSchema,
  regions: z.array(z.string()),
  /** ISO 8601, e.g. 2026-02-18T01:19:00.379Z */
  first_seen: z.string(),
  last_seen: z.string(),
  is_mqtt_connected: FlagSchema,
  location: GeoLocationSchema.nullish(),
});
export type LetsMeshNode = z.infer<typeof LetsMeshNodeSchema>;

export const LetsMeshResponseSchema = z.object({
  nodes: z.array(LetsMeshNodeSchema),
});

// ═══════════════════════════════════════════════════════════════════════════
// SYNC CONFIG
// ═══════════════════════════════════════════════════════════════════════════

export const SyncConfigSchema = z.object({
  /** MeshMapper repeater directory (repeaters only) */
  meshMapperUrl: z.string().url().default('https://den.meshmapper.net/repeaters.json'),
  /** LetsMesh node list (every device role) */
  letsMeshUrl: z.string().url().default('https://api.letsmesh.net/api/nodes?region=DEN'),
  /** Nominatim base URL for reverse geocoding */
  nominatimUrl: z.string().url().default('https://nominatim.openstreetmap.org'),
  /** Per-request timeout */
  requestTimeoutMs: z.number().int().positive().default(10_000),
  /** User-Agent sent to Nominatim, which requires an identifying one */
  userAgent: z.string().default('meshwatch/0.1.0'),
});
export type SyncConfig = z.infer<typeof SyncConfigSchema>;

/**
 * Fill in defaults and validate overrides.
 */
export function resolveSyncConfig(overrides: Partial<SyncConfig> = {}): SyncConfig {
  return SyncConfigSchema.parse(overrides);
}

export const DEFAULT_SYNC_CONFIG: SyncConfig = resolveSyncConfig();

// ═══════════════════════════════════════════════════════════════════════════
// LOGGER INTERFACE
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Simple logger interface. Consumers can provide their own logger.
 */
export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

/**
 * Create a logger tagged with the component name.
 */
export function createLogger(tag: string): Logger {
  const tagged = consola.withTag(tag);
  return {
    info: (msg, ...args) => tagged.info(msg, ...args),
    warn: (msg, ...args) => tagged.warn(msg, ...args),
    error: (msg, ...args) => tagged.error(msg, ...args),
    debug: (msg, ...args) => tagged.debug(msg, ...args),
  };
}

/**
 * Logger that drops everything.
 */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};
