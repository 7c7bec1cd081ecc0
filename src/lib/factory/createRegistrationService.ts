/**
 * Registration Service Factory
 *
 * Creates and wires RegistrationService and EndDeviceClient from
 * configuration (environment, with optional overrides)
 *
 * @license Apache-2.0
 */

import { RegistrationService } from '../application/RegistrationService';
import { EndDeviceClient } from '../client/EndDeviceClient';
import { getClientConfigFromEnv, mergeClientConfig } from '../config';
import type { ClientConfig } from '../config';
import { normalizeLongIdentifier } from '../identity/deviceIdentity';
import { createRegistrationLedger } from '../ledger/createRegistrationLedger';
import type { RegistrationLedger } from '../ledger/RegistrationLedger';
import type { Logger } from '../logger';
import { createCredentialProvider, createTransport } from '../transport/createTransport';

export interface CreateRegistrationServiceOptions {
  /** Environment to read configuration from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  /** Receives rendered requests in recording mode */
  sink?: (rendered: string) => void;
  /** Use this ledger instead of the configured backend */
  ledger?: RegistrationLedger;
}

/**
 * Resolve configuration: environment first, then overrides
 *
 * @throws Error if https mode has no server URL
 */
export function resolveClientConfig(
  overrides: Partial<ClientConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): ClientConfig {
  const config = mergeClientConfig(getClientConfigFromEnv(env), overrides);
  if (config.transportMode === 'https' && !config.serverUrl) {
    throw new Error('SERVER_URL not set. Required unless TRANSPORT_MODE=recording.');
  }
  return config;
}

/**
 * LFDI of the aggregator: AGGREGATOR_LFDI, or derived from the client certificate
 */
export async function resolveAggregatorLfdi(config: ClientConfig): Promise<string> {
  if (config.aggregatorLfdi) {
    return normalizeLongIdentifier(config.aggregatorLfdi);
  }
  if (config.authMode === 'certificate') {
    return createCredentialProvider(config).getLfdi();
  }
  throw new Error('AGGREGATOR_LFDI not set. Required when AUTH_MODE=local-token.');
}

/**
 * Create the registration service with all dependencies wired
 *
 * Dry run that prints every request:
 * ```typescript
 * const service = createRegistrationService(
 *   { transportMode: 'recording', serverUrl: 'https://utility.test' },
 *   { sink: (request) => console.log(request) }
 * );
 * ```
 */
export function createRegistrationService(
  overrides: Partial<ClientConfig> = {},
  options: CreateRegistrationServiceOptions = {}
): RegistrationService {
  const config = resolveClientConfig(overrides, options.env);

  // 1. Ledger (configured backend unless one is given)
  const ledger = options.ledger ?? createRegistrationLedger(config);

  // 2. Transport
  const transport = createTransport(config, { logger: options.logger, sink: options.sink });

  // 3. Wire everything together
  return new RegistrationService(transport, ledger, {
    timeoutMs: config.timeoutMs,
    logger: options.logger,
  });
}

/**
 * Create an EndDevice client for the configured server and aggregator
 */
export async function createEndDeviceClient(
  overrides: Partial<ClientConfig> = {},
  options: Omit<CreateRegistrationServiceOptions, 'ledger'> = {}
): Promise<EndDeviceClient> {
  const config = resolveClientConfig(overrides, options.env);
  const aggregatorLfdi = await resolveAggregatorLfdi(config);
  const transport = createTransport(config, { logger: options.logger, sink: options.sink });

  return new EndDeviceClient(transport, aggregatorLfdi, {
    timeoutMs: config.timeoutMs,
    logger: options.logger,
  });
}
