export { MeshMapperClient } from './meshmapper-client.js';
export type { ProviderClientConfig } from './meshmapper-client.js';
export { LetsMeshClient } from './letsmesh-client.js';

export { ReverseGeocoder } from './geocoder.js';
export type { ReverseGeocoderConfig } from './geocoder.js';

export {
  nodeTypeFromLetsMeshRole,
  indexLetsMeshNodes,
  findLetsMeshMatch,
  inferRepeaterType,
  normalizeMeshMapperRepeater,
  normalizeRepeaters,
  normalizeLetsMeshNode,
  normalizeCompanions,
} from './normalize.js';
export type { LetsMeshIndex } from './normalize.js';

export { parseIsoTimestamp, parseNumericTimestamp } from './timestamps.js';
export { buildContactUrl } from './contact.js';
export { getJson, parseBody } from './http.js';
export type { FetchFn, GetJsonOptions } from './http.js';
export { ProviderRequestError, ProviderResponseError } from './errors.js';
