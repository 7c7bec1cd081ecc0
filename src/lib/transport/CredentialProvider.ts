/**
 * Credential providers for the authenticated transport
 *
 * - ClientCertificateCredentials: mutual TLS with a client certificate issued
 *   by the utility's certificate authority
 * - LocalTokenCredentials: test servers running in local mode, which accept the
 *   device identity in an X-Token header instead of a certificate
 *
 * @license Apache-2.0
 */

import * as fs from 'fs/promises';
import { TransportError, errorMessage } from '../errors';
import { lfdiFromCertificatePem, lfdiToDecimal, normalizeLongIdentifier } from '../identity/deviceIdentity';

export type CredentialType = 'certificate' | 'local-token';

export interface TlsCredentials {
  cert: Buffer;
  key: Buffer;
  ca?: Buffer;
}

export interface CredentialProvider {
  /**
   * Client certificate material, or undefined when the server does not use mutual TLS
   *
   * @throws TransportError with code CREDENTIALS_ERROR if the material cannot be loaded
   */
  getTlsCredentials(): Promise<TlsCredentials | undefined>;

  /** Headers added to every request */
  getHeaders(): Record<string, string>;

  /** LFDI of the aggregator these credentials identify */
  getLfdi(): Promise<string>;

  getCredentialType(): CredentialType;
}

export interface ClientCertificateConfig {
  certPath: string;
  keyPath: string;
  caPath?: string;
}

async function readCredentialFile(filePath: string, label: string): Promise<Buffer> {
  try {
    return await fs.readFile(filePath);
  } catch (error) {
    throw new TransportError(
      'CREDENTIALS_ERROR',
      `Failed to read ${label} from ${filePath}: ${errorMessage(error)}`,
      error
    );
  }
}

/**
 * Client certificate credentials, read from disk once and reused by every request
 */
export class ClientCertificateCredentials implements CredentialProvider {
  private loaded: Promise<TlsCredentials> | null = null;

  constructor(private config: ClientCertificateConfig) {
    if (!config.certPath || !config.keyPath) {
      throw new TransportError(
        'CREDENTIALS_ERROR',
        'Client certificate and key paths are required. Set CLIENT_CERT_PATH and CLIENT_KEY_PATH.'
      );
    }
  }

  getTlsCredentials(): Promise<TlsCredentials> {
    if (!this.loaded) {
      this.loaded = this.load();
      // A failed load is retried on the next call
      this.loaded.catch(() => {
        this.loaded = null;
      });
    }
    return this.loaded;
  }

  getHeaders(): Record<string, string> {
    return {};
  }

  async getLfdi(): Promise<string> {
    const { cert } = await this.getTlsCredentials();
    try {
      return lfdiFromCertificatePem(cert);
    } catch (error) {
      throw new TransportError('CREDENTIALS_ERROR', `Client certificate is not usable: ${errorMessage(error)}`, error);
    }
  }

  getCredentialType(): CredentialType {
    return 'certificate';
  }

  private async load(): Promise<TlsCredentials> {
    const [cert, key, ca] = await Promise.all([
      readCredentialFile(this.config.certPath, 'client certificate'),
      readCredentialFile(this.config.keyPath, 'client key'),
      this.config.caPath ? readCredentialFile(this.config.caPath, 'CA certificate') : Promise.resolve(undefined),
    ]);
    return { cert, key, ca };
  }
}

/**
 * Local-mode credentials: the decimal LFDI travels in X-Token, and an empty
 * X-Forwarded-Client-Cert header tells the server no proxy certificate applies
 */
export class LocalTokenCredentials implements CredentialProvider {
  private lfdi: string;

  constructor(lfdi: string) {
    this.lfdi = normalizeLongIdentifier(lfdi);
  }

  async getTlsCredentials(): Promise<undefined> {
    return undefined;
  }

  getHeaders(): Record<string, string> {
    return {
      'X-Token': lfdiToDecimal(this.lfdi),
      'X-Forwarded-Client-Cert': '',
    };
  }

  async getLfdi(): Promise<string> {
    return this.lfdi;
  }

  getCredentialType(): CredentialType {
    return 'local-token';
  }
}
