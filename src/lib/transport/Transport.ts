/**
 * Transport Interface
 *
 * Abstraction over how registration requests reach the resource server.
 * Implementations:
 * - RecordingTransport: renders requests, returns synthetic responses
 * - HttpTransport: authenticated HTTPS with a keep-alive connection pool
 *
 * @license Apache-2.0
 */

export type HttpMethod = 'GET' | 'POST' | 'PUT';

export type TransportType = 'https' | 'recording';

export interface TransportRequest {
  method: HttpMethod;
  /** Server-relative path, including any query string (e.g. "/edev?s=0&l=10") */
  path: string;
  body?: string;
  /** Extra headers for this request only */
  headers?: Record<string, string>;
  /** Per-request timeout; implementations fall back to their own default */
  timeoutMs?: number;
}

export interface TransportResponse {
  statusCode: number;
  /** Header names are lower-case */
  headers: Record<string, string>;
  body: string;
}

export interface Transport {
  /**
   * Send a request and resolve with whatever the server answered.
   * Non-2xx statuses resolve normally; only failures to get a response reject.
   *
   * @throws TransportError
   */
  send(request: TransportRequest): Promise<TransportResponse>;

  getTransportType(): TransportType;

  /**
   * Release pooled connections
   */
  close(): Promise<void>;
}

/**
 * Join a base URL and a server-relative path without doubling slashes
 */
export function joinUrl(baseUrl: string, path: string): string {
  const base = baseUrl.replace(/\/+$/, '');
  return path.startsWith('/') ? `${base}${path}` : `${base}/${path}`;
}

/**
 * Extract the server-assigned id from a location header
 *
 * The location (absolute URL or path) must end in `{collectionPath}/{id}`.
 * Returns undefined when it does not.
 *
 * @example
 * extractResourceId('/edev/4/der/1', '/edev/4/der'); // '1'
 */
export function extractResourceId(location: string | undefined, collectionPath: string): string | undefined {
  if (!location) return undefined;

  let pathname = location.trim();
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(pathname)) {
    if (!URL.canParse(pathname)) return undefined;
    pathname = new URL(pathname).pathname;
  }
  pathname = pathname.split(/[?#]/)[0].replace(/\/+$/, '');

  const lastSlash = pathname.lastIndexOf('/');
  if (lastSlash < 0) return undefined;

  const id = pathname.slice(lastSlash + 1);
  const collection = pathname.slice(0, lastSlash);
  // Leading slash keeps "/xedev" from matching "/edev"
  const expected = `/${collectionPath.replace(/^\/+|\/+$/g, '')}`;

  if (!id || !collection.endsWith(expected)) return undefined;
  return id;
}
