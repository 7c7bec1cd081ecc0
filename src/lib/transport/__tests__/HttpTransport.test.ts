/**
 * Tests for HttpTransport against an in-process HTTP server
 *
 * @license Apache-2.0
 */

import { describe, it, expect, beforeAll, afterAll, afterEach, jest } from '@jest/globals';
import * as http from 'http';
import { HttpTransport } from '../HttpTransport';
import { LocalTokenCredentials } from '../CredentialProvider';
import { TransportError } from '../../errors';

interface ReceivedRequest {
  method?: string;
  url?: string;
  headers: http.IncomingHttpHeaders;
  body: string;
}

function listen(server: http.Server): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address && typeof address === 'object') {
        resolve(address.port);
      } else {
        reject(new Error('Server has no port'));
      }
    });
  });
}

function close(server: http.Server): Promise<void> {
  server.closeAllConnections();
  return new Promise((resolve) => server.close(() => resolve()));
}

describe('HttpTransport', () => {
  const received: ReceivedRequest[] = [];
  let server: http.Server;
  let baseUrl: string;
  let transport: HttpTransport;
  const logger = { info: jest.fn(), warn: jest.fn(), error: jest.fn() };

  beforeAll(async () => {
    server = http.createServer((req, res) => {
      let body = '';
      req.setEncoding('utf-8');
      req.on('data', (chunk: string) => {
        body += chunk;
      });
      req.on('end', () => {
        received.push({ method: req.method, url: req.url, headers: req.headers, body });

        if (req.url === '/slow') {
          return; // never answers
        }
        if (req.method === 'POST' && req.url === '/edev') {
          res.writeHead(201, { Location: '/edev/7' });
          res.end();
          return;
        }
        res.writeHead(404, { 'Content-Type': 'application/xml' });
        res.end('<Error/>');
      });
    });

    const port = await listen(server);
    baseUrl = `http://127.0.0.1:${port}`;
    transport = new HttpTransport({
      baseUrl,
      credentials: new LocalTokenCredentials('0x3E4F45AB3'),
      logger,
    });
  });

  afterEach(() => {
    received.length = 0;
    jest.clearAllMocks();
  });

  afterAll(async () => {
    await transport.close();
    await close(server);
  });

  it('should send the body with local-token headers', async () => {
    const response = await transport.send({ method: 'POST', path: '/edev', body: '<EndDevice/>' });

    expect(response.statusCode).toBe(201);
    expect(response.headers.location).toBe('/edev/7');

    expect(received).toHaveLength(1);
    expect(received[0].method).toBe('POST');
    expect(received[0].body).toBe('<EndDevice/>');
    expect(received[0].headers['content-type']).toBe('application/xml');
    expect(received[0].headers['x-token']).toBe('16726121139');
    expect(received[0].headers['x-forwarded-client-cert']).toBe('');
    expect(logger.info).toHaveBeenCalledWith(`POST ${baseUrl}/edev returned status 201`);
  });

  it('should resolve error statuses unmodified and log a warning', async () => {
    const response = await transport.send({ method: 'GET', path: '/edev/99' });

    expect(response.statusCode).toBe(404);
    expect(response.body).toBe('<Error/>');
    expect(response.headers['content-type']).toBe('application/xml');
    expect(received[0].headers['content-type']).toBeUndefined();
    expect(logger.warn).toHaveBeenCalledWith(`GET ${baseUrl}/edev/99 returned status 404`);
  });

  it('should reject with TIMEOUT when the server does not answer in time', async () => {
    const pending = transport.send({ method: 'PUT', path: '/slow', body: '<DER/>', timeoutMs: 50 });

    await expect(pending).rejects.toBeInstanceOf(TransportError);
    await expect(pending).rejects.toMatchObject({ code: 'TIMEOUT' });
  });

  it('should reject with NETWORK_ERROR when nothing listens', async () => {
    const unused = http.createServer();
    const port = await listen(unused);
    await close(unused);

    const offline = new HttpTransport({ baseUrl: `http://127.0.0.1:${port}`, logger });
    try {
      await expect(offline.send({ method: 'GET', path: '/edev' })).rejects.toMatchObject({
        code: 'NETWORK_ERROR',
        message: `Request to GET http://127.0.0.1:${port}/edev failed: connect ECONNREFUSED 127.0.0.1:${port}`,
        details: { cause: 'ECONNREFUSED' },
      });
    } finally {
      await offline.close();
    }
  });

  it('should refuse unsupported protocols', () => {
    expect(() => new HttpTransport({ baseUrl: 'ftp://server.test' })).toThrow('Unsupported protocol "ftp:"');
  });
});
