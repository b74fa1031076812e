import { defineCommand } from 'citty';
import { consola } from 'consola';
import { writeFile } from 'node:fs/promises';
import {
  DEFAULT_GPX_OPTIONS,
  MeshMapperClient,
  ReverseGeocoder,
  renderGpx,
  repeaterWaypoint,
  resolveSyncConfig,
  type GpxWaypoint,
} from 'meshwatch';
import { createCliLogger, parseTimeout } from '../logger.js';

export const gpxCommand = defineCommand({
  meta: {
    name: 'gpx',
    description: 'Export MeshMapper repeaters to a GPX file (e.g. for Google Earth)',
  },
  args: {
    filename: {
      type: 'positional',
      description: 'Output GPX filename (e.g. repeaters.gpx)',
      required: true,
    },
    geocode: {
      type: 'boolean',
      description: 'Add the neighbourhood or town of each repeater to its description',
      default: false,
    },
    'meshmapper-url': {
      type: 'string',
      description: 'MeshMapper repeater directory URL',
    },
    timeout: {
      type: 'string',
      description: 'Request timeout in milliseconds',
    },
  },
  async run({ args }) {
    const logger = createCliLogger();
    const config = resolveSyncConfig({
      meshMapperUrl: args['meshmapper-url'],
      requestTimeoutMs: parseTimeout(args.timeout),
    });

    consola.start('Downloading repeaters...');
    const client = new MeshMapperClient({
      url: config.meshMapperUrl,
      timeoutMs: config.requestTimeoutMs,
      logger,
    });
    const repeaters = await client.fetchRepeaters();

    const waypoints: GpxWaypoint[] = [];
    if (args.geocode) {
      const geocoder = new ReverseGeocoder({
        baseUrl: config.nominatimUrl,
        userAgent: config.userAgent,
        timeoutMs: config.requestTimeoutMs,
        logger,
      });
      for (const repeater of repeaters) {
        const locality = await geocoder.lookupLocality({ latitude: repeater.lat, longitude: repeater.lon });
        waypoints.push(repeaterWaypoint(repeater, locality));
      }
    } else {
      waypoints.push(...repeaters.map((repeater) => repeaterWaypoint(repeater)));
    }

    await writeFile(args.filename, renderGpx(waypoints, DEFAULT_GPX_OPTIONS), 'utf-8');
    consola.success(`Wrote ${waypoints.length} waypoints to ${args.filename}`);
  },
});
