/**
 * EndDevice queries
 *
 * Read access to the server's EndDevice collection, plus registration of the
 * aggregator's own EndDevice.
 *
 * @license Apache-2.0
 */

import { ProtocolError, ValidationError } from '../errors';
import { normalizeLongIdentifier } from '../identity/deviceIdentity';
import { defaultLogger } from '../logger';
import type { Logger } from '../logger';
import { serializeResource } from '../model/documentCodec';
import { parseEndDevice, parseEndDeviceList } from '../model/endDeviceParsing';
import { buildEndDevice } from '../model/resources';
import { DeviceCategoryType } from '../model/types';
import type { EndDeviceList, RegisteredEndDevice } from '../model/types';
import { extractResourceId } from '../transport/Transport';
import type { Transport } from '../transport/Transport';

export const DEFAULT_PAGE_SIZE = 10;

export interface EndDeviceClientOptions {
  timeoutMs?: number;
  logger?: Logger;
}

export interface IterateOptions {
  /** Include the aggregator's own EndDevice (default: false) */
  includeSelf?: boolean;
  pageSize?: number;
  start?: number;
}

export interface SelfDeviceResult {
  endDeviceID: string;
  lFDI: string;
  sFDI: string;
}

export class EndDeviceClient {
  private aggregatorLfdi: string;
  private timeoutMs?: number;
  private logger: Logger;

  /**
   * @param aggregatorLfdi - LFDI of the aggregator running this client
   */
  constructor(
    private transport: Transport,
    aggregatorLfdi: string,
    options: EndDeviceClientOptions = {}
  ) {
    this.aggregatorLfdi = normalizeLongIdentifier(aggregatorLfdi);
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Fetch one page of the EndDevice collection
   *
   * @param start - Index of the first entry
   * @param limit - Maximum entries to return
   */
  async getEndDevices(start = 0, limit = DEFAULT_PAGE_SIZE): Promise<EndDeviceList> {
    if (!Number.isInteger(start) || start < 0) {
      throw new ValidationError(`must be a non-negative integer (got ${start})`, 'start');
    }
    if (!Number.isInteger(limit) || limit < 1) {
      throw new ValidationError(`must be a positive integer (got ${limit})`, 'limit');
    }

    const response = await this.transport.send({
      method: 'GET',
      path: `/edev?s=${start}&l=${limit}`,
      timeoutMs: this.timeoutMs,
    });

    if (response.statusCode !== 200) {
      throw new ProtocolError(
        `GET /edev returned ${response.statusCode}, expected 200`,
        response.statusCode,
        200,
        response.body
      );
    }
    if (!response.body.trim()) {
      return { all: 0, results: 0, endDevices: [] };
    }
    return parseEndDeviceList(response.body);
  }

  /**
   * Walk the whole collection page by page. The aggregator's own EndDevice is
   * filtered out unless includeSelf is set.
   */
  async *iterateEndDevices(options: IterateOptions = {}): AsyncGenerator<RegisteredEndDevice> {
    const pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    let start = options.start ?? 0;

    for (;;) {
      const page = await this.getEndDevices(start, pageSize);
      if (page.endDevices.length === 0) return;

      for (const endDevice of page.endDevices) {
        if (options.includeSelf || endDevice.lFDI !== this.aggregatorLfdi) {
          yield endDevice;
        }
      }

      // Advance by what was returned, before filtering
      start += page.endDevices.length;
      if (start >= page.all) return;
    }
  }

  /**
   * Fetch one EndDevice
   *
   * @returns the device, or undefined when the server answers 404
   */
  async getEndDevice(endDeviceID: string): Promise<RegisteredEndDevice | undefined> {
    const path = `/edev/${encodeURIComponent(endDeviceID)}`;
    const response = await this.transport.send({ method: 'GET', path, timeoutMs: this.timeoutMs });

    if (response.statusCode === 404) {
      this.logger.warn(`No EndDevice found with id ${endDeviceID}`);
      return undefined;
    }
    if (response.statusCode !== 200) {
      throw new ProtocolError(
        `GET ${path} returned ${response.statusCode}, expected 200`,
        response.statusCode,
        200,
        response.body
      );
    }
    return parseEndDevice(response.body);
  }

  /**
   * Register the aggregator's own EndDevice (category: virtual or mixed DER)
   *
   * @throws ProtocolError unless the server answers 201 with a location under /edev
   */
  async createSelfDevice(): Promise<SelfDeviceResult> {
    const endDevice = buildEndDevice({
      lFDI: this.aggregatorLfdi,
      deviceCategory: DeviceCategoryType.VirtualOrMixedDer,
    });

    const response = await this.transport.send({
      method: 'POST',
      path: '/edev',
      body: serializeResource('EndDevice', endDevice),
      timeoutMs: this.timeoutMs,
    });

    if (response.statusCode !== 201) {
      throw new ProtocolError(
        `POST /edev returned ${response.statusCode}, expected 201`,
        response.statusCode,
        201,
        response.body
      );
    }

    const endDeviceID = extractResourceId(response.headers.location, '/edev');
    if (endDeviceID === undefined) {
      throw new ProtocolError(
        `EndDevice created but location "${response.headers.location ?? '(none)'}" is not under /edev`,
        response.statusCode,
        201,
        response.body
      );
    }

    this.logger.info(`Aggregator EndDevice registered as /edev/${endDeviceID}`);
    return { endDeviceID, lFDI: endDevice.lFDI, sFDI: endDevice.sFDI };
  }

  /**
   * Release the transport
   */
  async close(): Promise<void> {
    await this.transport.close();
  }
}
