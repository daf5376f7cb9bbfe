/**
 * Output Utilities
 * Exit codes and JSON status output for the CLI
 */

import { ConfigError } from '../services/config.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  /** Missing or invalid configuration, bad usage */
  CONFIG: 1,
  /** Graph or token endpoint failure */
  API: 2,
} as const;

/**
 * Config problems exit 1, everything else (request failures, exhausted retries) exits 2
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigError) {
    return EXIT_CODES.CONFIG;
  }
  return EXIT_CODES.API;
}

export function formatJSON(data: unknown, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}
