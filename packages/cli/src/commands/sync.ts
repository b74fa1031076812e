import { defineCommand } from 'citty';
import { consola } from 'consola';
import { runSync, type SyncOutcome } from 'meshwatch';
import { createCliLogger, parseTimeout } from '../logger.js';

function summarize(label: string, outcome: SyncOutcome): string {
  const { added, unchanged, missing } = outcome.result;
  const action = outcome.written ? `updated ${outcome.path}` : 'no changes';
  return `${label}: ${added.length} new, ${unchanged.length} unchanged, ${missing.length} missing (${action})`;
}

export const syncCommand = defineCommand({
  meta: {
    name: 'sync',
    description: 'Fetch current nodes and update the repeater and companion snapshots',
  },
  args: {
    'repeaters-data-file': {
      type: 'string',
      description: 'Path to the data file to store repeater information',
      required: true,
    },
    'companions-data-file': {
      type: 'string',
      description: 'Path to the data file to store companion information',
      required: true,
    },
    'meshmapper-url': {
      type: 'string',
      description: 'MeshMapper repeater directory URL',
    },
    'letsmesh-url': {
      type: 'string',
      description: 'LetsMesh node list URL',
    },
    timeout: {
      type: 'string',
      description: 'Request timeout in milliseconds',
    },
  },
  async run({ args }) {
    consola.start('Starting MeshCore node sync');

    const report = await runSync({
      repeatersPath: args['repeaters-data-file'],
      companionsPath: args['companions-data-file'],
      config: {
        meshMapperUrl: args['meshmapper-url'],
        letsMeshUrl: args['letsmesh-url'],
        requestTimeoutMs: parseTimeout(args.timeout),
      },
      logger: createCliLogger(),
    });

    consola.success(summarize('Repeaters', report.repeaters));
    consola.success(summarize('Companions', report.companions));
  },
});
