export {
  GPX_VERSION,
  DEFAULT_GPX_OPTIONS,
  escapeXml,
  renderWaypoint,
  renderGpx,
  repeaterWaypoint,
  nodeWaypoint,
  nodeWaypoints,
} from './gpx.js';
export type { GpxWaypoint, GpxDocumentOptions } from './gpx.js';
