/**
 * Tests for EndDeviceClient and EndDevice response parsing
 *
 * @license Apache-2.0
 */

import { describe, it, expect, jest } from '@jest/globals';
import { EndDeviceClient } from '../EndDeviceClient';
import { parseEndDevice, parseEndDeviceList } from '../../model/endDeviceParsing';
import { RecordingTransport } from '../../transport/RecordingTransport';
import type { TransportResponse } from '../../transport/Transport';
import { ProtocolError } from '../../errors';

const AGGREGATOR_LFDI = '3E4F45AB3';
const silentLogger = { info: jest.fn(), warn: jest.fn(), error: jest.fn() };

function endDeviceXml(id: number, lfdi: string): string {
  return (
    `<EndDevice href="/edev/${id}">` +
    '<deviceCategory>262144</deviceCategory>' +
    `<lFDI>${lfdi}</lFDI>` +
    '<changedTime>1700000000</changedTime>' +
    '<enabled>true</enabled>' +
    '</EndDevice>'
  );
}

function ok(body: string): TransportResponse {
  return { statusCode: 200, headers: { 'content-type': 'application/xml' }, body };
}

const PAGES: Record<string, string> = {
  '/edev?s=0&l=2':
    '<EndDeviceList xmlns="urn:ieee:std:2030.5:ns" all="3" results="2">' +
    endDeviceXml(1, AGGREGATOR_LFDI) +
    endDeviceXml(2, '0001111000011F') +
    '</EndDeviceList>',
  '/edev?s=2&l=2':
    '<EndDeviceList all="3" results="1">' + endDeviceXml(3, '41434D452D30303031') + '</EndDeviceList>',
};

function pagedTransport(): RecordingTransport {
  return new RecordingTransport({
    responder: (request, defaultResponse) => {
      const page = PAGES[request.path];
      return page ? ok(page) : defaultResponse;
    },
  });
}

async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

describe('parseEndDeviceList', () => {
  it('should parse a page with a single entry', () => {
    const list = parseEndDeviceList(PAGES['/edev?s=2&l=2']);

    expect(list.all).toBe(3);
    expect(list.results).toBe(1);
    expect(list.endDevices).toEqual([
      {
        deviceCategory: 262144,
        lFDI: '41434D452D30303031',
        sFDI: '175188757308',
        changedTime: 1700000000,
        postRate: 0,
        enabled: true,
        href: '/edev/3',
      },
    ]);
  });

  it('should treat an empty list as zero entries', () => {
    expect(parseEndDeviceList('<EndDeviceList all="0" results="0"/>')).toEqual({
      all: 0,
      results: 0,
      endDevices: [],
    });
  });

  it('should reject non-numeric element values as a protocol error', () => {
    expect(() =>
      parseEndDevice('<EndDevice><deviceCategory>abc</deviceCategory><lFDI>3E4F45AB3</lFDI></EndDevice>')
    ).toThrow('Invalid EndDevice in response: deviceCategory: "abc" is not a number');
  });

  it('should require the lFDI', () => {
    expect(() => parseEndDevice('<EndDevice><deviceCategory>1</deviceCategory></EndDevice>')).toThrow(
      ProtocolError
    );
  });
});

describe('EndDeviceClient', () => {
  describe('getEndDevices', () => {
    it('should request the page with start and limit', async () => {
      const transport = pagedTransport();
      const client = new EndDeviceClient(transport, AGGREGATOR_LFDI, { logger: silentLogger });

      const page = await client.getEndDevices(0, 2);

      expect(transport.requests[0].url).toBe('https://localhost/edev?s=0&l=2');
      expect(page.endDevices.map((d) => d.href)).toEqual(['/edev/1', '/edev/2']);
    });

    it('should reject a negative start', async () => {
      const client = new EndDeviceClient(new RecordingTransport(), AGGREGATOR_LFDI, { logger: silentLogger });
      await expect(client.getEndDevices(-1, 10)).rejects.toThrow('start: must be a non-negative integer (got -1)');
    });

    it('should return an empty page for an empty body', async () => {
      const client = new EndDeviceClient(new RecordingTransport(), AGGREGATOR_LFDI, { logger: silentLogger });
      expect(await client.getEndDevices()).toEqual({ all: 0, results: 0, endDevices: [] });
    });
  });

  describe('iterateEndDevices', () => {
    it('should page through the collection and skip the aggregator', async () => {
      const transport = pagedTransport();
      const client = new EndDeviceClient(transport, '0x3e4f45ab3', { logger: silentLogger });

      const devices = await collect(client.iterateEndDevices({ pageSize: 2 }));

      expect(devices.map((d) => d.lFDI)).toEqual(['0001111000011F', '41434D452D30303031']);
      expect(transport.requests.map((r) => r.url)).toEqual([
        'https://localhost/edev?s=0&l=2',
        'https://localhost/edev?s=2&l=2',
      ]);
    });

    it('should include the aggregator when asked', async () => {
      const client = new EndDeviceClient(pagedTransport(), AGGREGATOR_LFDI, { logger: silentLogger });

      const devices = await collect(client.iterateEndDevices({ pageSize: 2, includeSelf: true }));

      expect(devices.map((d) => d.href)).toEqual(['/edev/1', '/edev/2', '/edev/3']);
    });
  });

  describe('getEndDevice', () => {
    it('should parse the device', async () => {
      const transport = new RecordingTransport({
        responder: (request, defaultResponse) =>
          request.path === '/edev/2' ? ok(endDeviceXml(2, '0001111000011F')) : defaultResponse,
      });
      const client = new EndDeviceClient(transport, AGGREGATOR_LFDI, { logger: silentLogger });

      const device = await client.getEndDevice('2');

      expect(device?.sFDI).toBe('000011184645');
      expect(device?.href).toBe('/edev/2');
    });

    it('should return undefined on 404', async () => {
      const transport = new RecordingTransport({
        responder: () => ({ statusCode: 404, headers: {}, body: '' }),
      });
      const client = new EndDeviceClient(transport, AGGREGATOR_LFDI, { logger: silentLogger });

      expect(await client.getEndDevice('42')).toBeUndefined();
      expect(silentLogger.warn).toHaveBeenCalledWith('No EndDevice found with id 42');
    });

    it('should reject other error statuses', async () => {
      const transport = new RecordingTransport({
        responder: () => ({ statusCode: 500, headers: {}, body: 'boom' }),
      });
      const client = new EndDeviceClient(transport, AGGREGATOR_LFDI, { logger: silentLogger });

      await expect(client.getEndDevice('42')).rejects.toMatchObject({ statusCode: 500, expectedStatus: 200 });
    });
  });

  describe('createSelfDevice', () => {
    it('should register the aggregator as a virtual or mixed DER', async () => {
      const transport = new RecordingTransport();
      const client = new EndDeviceClient(transport, AGGREGATOR_LFDI, { logger: silentLogger });

      const result = await client.createSelfDevice();

      expect(result).toEqual({ endDeviceID: '1', lFDI: '3E4F45AB3', sFDI: '167261211391' });
      expect(transport.requests[0].method).toBe('POST');
      expect(transport.requests[0].body).toContain('  <deviceCategory>262144</deviceCategory>');
    });

    it('should fail when the server does not answer 201', async () => {
      const transport = new RecordingTransport({
        responder: () => ({ statusCode: 409, headers: {}, body: '' }),
      });
      const client = new EndDeviceClient(transport, AGGREGATOR_LFDI, { logger: silentLogger });

      await expect(client.createSelfDevice()).rejects.toThrow('POST /edev returned 409, expected 201');
    });
  });
});
