import { consola } from 'consola';
import type { Logger } from 'meshwatch';

export function createCliLogger(): Logger {
  return {
    info: (msg, ...args) => consola.info(msg, ...args),
    warn: (msg, ...args) => consola.warn(msg, ...args),
    error: (msg, ...args) => consola.error(msg, ...args),
    debug: (msg, ...args) => consola.debug(msg, ...args),
  };
}

const DIGITS = /^\d+$/;

/**
 * Parse an optional numeric flag. Citty hands every value over as a string.
 */
export function parseTimeout(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const ms = DIGITS.test(value) ? Number.parseInt(value, 10) : 0;
  if (ms <= 0) {
    throw new Error(`--timeout must be a positive number of milliseconds, got "${value}"`);
  }
  return ms;
}
