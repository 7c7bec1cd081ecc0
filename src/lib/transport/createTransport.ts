/**
 * Transport Factory
 *
 * Selects the transport and credential provider once, from configuration:
 * - TRANSPORT_MODE=https (default): HttpTransport
 * - TRANSPORT_MODE=recording: RecordingTransport, no network I/O
 *
 * @license Apache-2.0
 */

import type { ClientConfig } from '../config';
import type { Logger } from '../logger';
import { ClientCertificateCredentials, LocalTokenCredentials } from './CredentialProvider';
import type { CredentialProvider } from './CredentialProvider';
import { HttpTransport } from './HttpTransport';
import { RecordingTransport } from './RecordingTransport';
import type { Transport } from './Transport';

export type TransportConfig = Pick<
  ClientConfig,
  'serverUrl' | 'transportMode' | 'authMode' | 'clientCertPath' | 'clientKeyPath' | 'caCertPath' | 'aggregatorLfdi' | 'timeoutMs'
>;

export interface CreateTransportOptions {
  logger?: Logger;
  /** Receives rendered requests in recording mode */
  sink?: (rendered: string) => void;
}

/**
 * Create the credential provider for the configured auth mode
 *
 * @throws Error if the mode's required settings are missing
 */
export function createCredentialProvider(config: TransportConfig): CredentialProvider {
  switch (config.authMode) {
    case 'certificate':
      return new ClientCertificateCredentials({
        certPath: config.clientCertPath ?? '',
        keyPath: config.clientKeyPath ?? '',
        caPath: config.caCertPath,
      });

    case 'local-token':
      if (!config.aggregatorLfdi) {
        throw new Error('AGGREGATOR_LFDI is required when AUTH_MODE=local-token');
      }
      return new LocalTokenCredentials(config.aggregatorLfdi);
  }
}

/**
 * Create a transport
 *
 * @example
 * const transport = createTransport(getClientConfigFromEnv());
 */
export function createTransport(config: TransportConfig, options: CreateTransportOptions = {}): Transport {
  switch (config.transportMode) {
    case 'https':
      return new HttpTransport({
        baseUrl: config.serverUrl,
        credentials: createCredentialProvider(config),
        timeoutMs: config.timeoutMs,
        logger: options.logger,
      });

    case 'recording':
      // Certificates are never loaded here; only header-based credentials show up in the output
      return new RecordingTransport({
        baseUrl: config.serverUrl || undefined,
        sink: options.sink,
        credentials:
          config.authMode === 'local-token' && config.aggregatorLfdi
            ? new LocalTokenCredentials(config.aggregatorLfdi)
            : undefined,
      });
  }
}
