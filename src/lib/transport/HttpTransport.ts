/**
 * HTTP Transport
 *
 * Sends requests to the resource server over HTTPS (or plain HTTP for local
 * test servers). The keep-alive agent is the only state shared between
 * requests; it is created on first use with the client certificate from the
 * CredentialProvider.
 *
 * @license Apache-2.0
 */

import * as http from 'http';
import * as https from 'https';
import { TransportError, errorCode, errorMessage } from '../errors';
import type { TransportErrorCode } from '../errors';
import { defaultLogger } from '../logger';
import type { Logger } from '../logger';
import { XML_CONTENT_TYPE } from '../model/documentCodec';
import type { CredentialProvider } from './CredentialProvider';
import { joinUrl } from './Transport';
import type { Transport, TransportRequest, TransportResponse, TransportType } from './Transport';

export const DEFAULT_TIMEOUT_MS = 10_000;

export interface HttpTransportConfig {
  /** Server root, e.g. https://utility.example.com/api */
  baseUrl: string;
  credentials?: CredentialProvider;
  /** Used when a request carries no timeout of its own */
  timeoutMs?: number;
  maxSockets?: number;
  logger?: Logger;
}

const TLS_ERROR_CODES = new Set([
  'CERT_HAS_EXPIRED',
  'CERT_NOT_YET_VALID',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'ERR_TLS_CERT_ALTNAME_INVALID',
]);

function classifyError(code: string | undefined): TransportErrorCode {
  if (code === 'ETIMEDOUT') return 'TIMEOUT';
  if (code && (TLS_ERROR_CODES.has(code) || /^ERR_(TLS|SSL|OSSL)_/.test(code))) {
    return 'TLS_ERROR';
  }
  return 'NETWORK_ERROR';
}

function toTransportError(error: unknown, target: string): TransportError {
  if (error instanceof TransportError) return error;
  if (typeof error !== 'object' || error === null) {
    return new TransportError('NETWORK_ERROR', `Request to ${target} failed: ${String(error)}`, error);
  }
  const code = errorCode(error);
  const name = 'name' in error && typeof error.name === 'string' ? error.name : 'Error';
  return new TransportError(classifyError(code), `Request to ${target} failed: ${errorMessage(error)}`, {
    cause: code ?? name,
  });
}

function flattenHeaders(headers: http.IncomingHttpHeaders): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    flat[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
  }
  return flat;
}

export class HttpTransport implements Transport {
  private baseUrl: string;
  private secure: boolean;
  private timeoutMs: number;
  private logger: Logger;
  private agent: Promise<http.Agent> | null = null;

  constructor(private config: HttpTransportConfig) {
    if (!config.baseUrl) {
      throw new Error('HttpTransport requires a baseUrl. Set SERVER_URL or pass --server.');
    }
    const protocol = new URL(config.baseUrl).protocol;
    if (protocol !== 'https:' && protocol !== 'http:') {
      throw new Error(`Unsupported protocol "${protocol}" in ${config.baseUrl}`);
    }

    this.baseUrl = config.baseUrl;
    this.secure = protocol === 'https:';
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = config.logger ?? defaultLogger;
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    const url = joinUrl(this.baseUrl, request.path);
    const agent = await this.getAgent();
    const headers: Record<string, string> = {
      ...(this.config.credentials?.getHeaders() ?? {}),
      ...(request.headers ?? {}),
    };
    if (request.body !== undefined) {
      headers['Content-Type'] = XML_CONTENT_TYPE;
      headers['Content-Length'] = String(Buffer.byteLength(request.body, 'utf-8'));
    }

    const response = await this.dispatch(url, request, headers, agent);

    if (response.statusCode > 201) {
      this.logger.warn(`${request.method} ${url} returned status ${response.statusCode}`);
    } else {
      this.logger.info(`${request.method} ${url} returned status ${response.statusCode}`);
    }
    return response;
  }

  getTransportType(): TransportType {
    return 'https';
  }

  async close(): Promise<void> {
    if (!this.agent) return;
    const agent = await this.agent;
    this.agent = null;
    agent.destroy();
  }

  private getAgent(): Promise<http.Agent> {
    if (!this.agent) {
      this.agent = this.createAgent();
      this.agent.catch(() => {
        this.agent = null;
      });
    }
    return this.agent;
  }

  private async createAgent(): Promise<http.Agent> {
    const maxSockets = this.config.maxSockets ?? 10;

    if (!this.secure) {
      return new http.Agent({ keepAlive: true, maxSockets });
    }

    const tls = await this.config.credentials?.getTlsCredentials();
    return new https.Agent({
      keepAlive: true,
      maxSockets,
      cert: tls?.cert,
      key: tls?.key,
      ca: tls?.ca,
    });
  }

  private dispatch(
    url: string,
    request: TransportRequest,
    headers: Record<string, string>,
    agent: http.Agent
  ): Promise<TransportResponse> {
    const timeoutMs = request.timeoutMs ?? this.timeoutMs;
    const target = `${request.method} ${url}`;

    return new Promise<TransportResponse>((resolve, reject) => {
      let settled = false;
      const finish = (outcome: () => void) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        outcome();
      };

      const onResponse = (res: http.IncomingMessage) => {
        const chunks: Buffer[] = [];
        res.on('data', (chunk: Buffer) => chunks.push(chunk));
        res.on('error', (error) => finish(() => reject(toTransportError(error, target))));
        res.on('end', () =>
          finish(() =>
            resolve({
              statusCode: res.statusCode ?? 0,
              headers: flattenHeaders(res.headers),
              body: Buffer.concat(chunks).toString('utf-8'),
            })
          )
        );
      };

      const options = { method: request.method, headers, agent };
      const req = this.secure
        ? https.request(url, options, onResponse)
        : http.request(url, options, onResponse);

      // Deadline for the whole exchange, not just socket inactivity
      const timer = setTimeout(() => {
        req.destroy(new TransportError('TIMEOUT', `${target} timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      req.on('error', (error) => finish(() => reject(toTransportError(error, target))));

      if (request.body !== undefined) {
        req.write(request.body, 'utf-8');
      }
      req.end();
    });
  }
}
