const NUMERIC = /^\d+$/;

// e.g. 2026-02-18T01:19:00.379Z
const ISO_UTC_FRACTIONAL = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{1,6}Z$/;

/**
 * Unix seconds from a numeric string; 0 when the string is not all digits.
 */
export function parseNumericTimestamp(value: string): number {
  return NUMERIC.test(value) ? Number.parseInt(value, 10) : 0;
}

/**
 * Unix seconds from an ISO 8601 UTC timestamp with fractional seconds.
 * Anything else yields 0.
 */
export function parseIsoTimestamp(value: string): number {
  if (!ISO_UTC_FRACTIONAL.test(value)) {
    return 0;
  }
  const ms = Date.parse(value);
  if (Number.isNaN(ms)) {
    return 0;
  }
  // Date.parse rolls impossible fields over (Feb 30, hour 24)
  if (new Date(ms).toISOString().slice(0, 19) !== value.slice(0, 19)) {
    return 0;
  }
  return Math.floor(ms / 1000);
}
