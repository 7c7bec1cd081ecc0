/**
 * Global CLI options and their mapping onto client configuration
 *
 * @license Apache-2.0
 */

import {
  AUTH_MODES,
  LEDGER_BACKENDS,
  TRANSPORT_MODES,
  parseChoice,
  parseTimeout,
} from '../../../src/lib/config';
import type { ClientConfig } from '../../../src/lib/config';

export type GlobalOptions = {
  server?: string;
  transport?: string;
  dryRun?: boolean;
  auth?: string;
  cert?: string;
  key?: string;
  ca?: string;
  lfdi?: string;
  timeout?: string;
  ledger?: string;
  ledgerPath?: string;
};

/**
 * Options given on the command line override the environment
 *
 * @throws Error if an option holds a value outside its allowed set
 */
export function toConfigOverrides(options: GlobalOptions): Partial<ClientConfig> {
  return {
    serverUrl: options.server,
    transportMode: options.dryRun ? 'recording' : parseChoice('--transport', options.transport, TRANSPORT_MODES),
    authMode: parseChoice('--auth', options.auth, AUTH_MODES),
    clientCertPath: options.cert,
    clientKeyPath: options.key,
    caCertPath: options.ca,
    aggregatorLfdi: options.lfdi,
    timeoutMs: options.timeout !== undefined ? parseTimeout(options.timeout, '--timeout') : undefined,
    ledgerBackend: parseChoice('--ledger', options.ledger, LEDGER_BACKENDS),
    ledgerPath: options.ledgerPath,
  };
}

/**
 * Parse a positive integer option (page sizes, offsets)
 */
export function parseCount(value: string, name: string, minimum = 1): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < minimum) {
    throw new Error(`Invalid ${name}: "${value}". Expected an integer >= ${minimum}`);
  }
  return parsed;
}
