#!/usr/bin/env tsx
import { defineCommand, runMain } from 'citty';
import { syncCommand } from './commands/sync.js';
import { gpxCommand } from './commands/gpx.js';
import { statusCommand } from './commands/status.js';

const main = defineCommand({
  meta: {
    name: 'meshwatch',
    version: '0.1.0',
    description: 'Track MeshCore devices across MeshMapper and LetsMesh',
  },
  subCommands: {
    sync: syncCommand,
    gpx: gpxCommand,
    status: statusCommand,
  },
});

runMain(main);
