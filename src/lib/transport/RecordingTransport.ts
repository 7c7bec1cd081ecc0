/**
 * Recording Transport
 *
 * Performs no network I/O. Each request is recorded, rendered as a text block
 * (request line, headers, body) for an optional sink, and answered with a
 * synthetic success:
 * - POST: 201 with location `{path}/{n}`, n counting from 1 per collection
 * - PUT: 200
 * - GET: 200 with an empty body
 *
 * Identical request sequences against a fresh (or reset) instance produce
 * identical records and responses, so a run can be diffed against a
 * known-good one. Counters persist across runs on the same instance.
 *
 * @license Apache-2.0
 */

import { XML_CONTENT_TYPE } from '../model/documentCodec';
import type { CredentialProvider } from './CredentialProvider';
import { joinUrl } from './Transport';
import type { Transport, TransportRequest, TransportResponse, TransportType } from './Transport';

export interface RecordedRequest {
  method: TransportRequest['method'];
  url: string;
  headers: Record<string, string>;
  body?: string;
}

/**
 * Override for the synthetic response. Return undefined to keep the default.
 */
export type RecordingResponder = (
  request: TransportRequest,
  defaultResponse: TransportResponse
) => TransportResponse | undefined;

export interface RecordingTransportConfig {
  /** Base URL used when rendering request lines (default: https://localhost) */
  baseUrl?: string;
  /** Receives each rendered request */
  sink?: (rendered: string) => void;
  responder?: RecordingResponder;
  /** Rendered requests carry the headers these credentials would add */
  credentials?: CredentialProvider;
}

const DEFAULT_BASE_URL = 'https://localhost';

export class RecordingTransport implements Transport {
  private baseUrl: string;
  private readonly recorded: RecordedRequest[] = [];
  private readonly counters = new Map<string, number>();

  constructor(private config: RecordingTransportConfig = {}) {
    this.baseUrl = config.baseUrl || DEFAULT_BASE_URL;
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    const record: RecordedRequest = {
      method: request.method,
      url: joinUrl(this.baseUrl, request.path),
      headers: this.headersFor(request),
      body: request.body,
    };
    this.recorded.push(record);
    this.config.sink?.(renderRequest(record));

    const response = this.syntheticResponse(request);
    return this.config.responder?.(request, response) ?? response;
  }

  getTransportType(): TransportType {
    return 'recording';
  }

  async close(): Promise<void> {
    // Nothing pooled
  }

  /**
   * Forget recorded requests and restart every placeholder counter at 1
   */
  reset(): void {
    this.recorded.length = 0;
    this.counters.clear();
  }

  /**
   * Requests seen so far, oldest first
   */
  get requests(): readonly RecordedRequest[] {
    return [...this.recorded];
  }

  private headersFor(request: TransportRequest): Record<string, string> {
    return {
      ...(request.body !== undefined ? { 'Content-Type': XML_CONTENT_TYPE } : {}),
      ...(this.config.credentials?.getHeaders() ?? {}),
      ...(request.headers ?? {}),
    };
  }

  private syntheticResponse(request: TransportRequest): TransportResponse {
    switch (request.method) {
      case 'POST': {
        const collection = request.path.split('?')[0].replace(/\/+$/, '');
        const next = (this.counters.get(collection) ?? 0) + 1;
        this.counters.set(collection, next);
        return { statusCode: 201, headers: { location: `${collection}/${next}` }, body: '' };
      }
      case 'PUT':
        return { statusCode: 200, headers: {}, body: '' };
      case 'GET':
        return { statusCode: 200, headers: {}, body: '' };
    }
  }
}

/**
 * Render a recorded request as a plain-text block
 */
export function renderRequest(record: RecordedRequest): string {
  const lines = [`${record.method} ${record.url}`];
  for (const [name, value] of Object.entries(record.headers)) {
    lines.push(`${name}: ${value}`);
  }
  if (record.body !== undefined) {
    lines.push('', record.body.trimEnd());
  }
  return lines.join('\n');
}
