import { defineCommand } from 'citty';
import { consola } from 'consola';
import {
  NODE_TYPES,
  SnapshotStore,
  findReservedShortIds,
  nodeTypeLabel,
  type MeshNode,
  type NodeType,
} from 'meshwatch';
import { createCliLogger } from '../logger.js';

const ALL_NODE_TYPES: readonly NodeType[] = [NODE_TYPES.REPEATER, NODE_TYPES.ROOM_SERVER, NODE_TYPES.COMPANION];

function describeSnapshot(nodes: readonly MeshNode[]): string {
  const counts = ALL_NODE_TYPES.map((type) => {
    const count = nodes.filter((node) => node.nodeType === type).length;
    return `${count} ${nodeTypeLabel(type)}`;
  });
  const located = nodes.filter((node) => node.location !== null).length;
  return `${nodes.length} nodes (${counts.join(', ')}), ${located} with location`;
}

export const statusCommand = defineCommand({
  meta: {
    name: 'status',
    description: 'Show what the stored snapshots contain',
  },
  args: {
    'repeaters-data-file': {
      type: 'string',
      description: 'Path to the repeater data file',
      required: true,
    },
    'companions-data-file': {
      type: 'string',
      description: 'Path to the companion data file',
      required: true,
    },
  },
  async run({ args }) {
    const logger = createCliLogger();

    consola.info('meshwatch snapshot status');
    consola.info('='.repeat(40));

    const snapshots = [
      { label: 'Repeaters', path: args['repeaters-data-file'] },
      { label: 'Companions', path: args['companions-data-file'] },
    ];

    for (const { label, path } of snapshots) {
      const nodes = await new SnapshotStore({ path, logger }).load();
      if (nodes.length === 0) {
        consola.warn(`${label}: no nodes stored at ${path}`);
        continue;
      }
      consola.success(`${label}: ${describeSnapshot(nodes)}`);

      const reserved = findReservedShortIds(nodes);
      if (reserved.length > 0) {
        consola.warn(`${label}: reserved ids in use: ${reserved.join(', ')}`);
      }
    }
  },
});
