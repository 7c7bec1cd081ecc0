/**
 * EndDevice response parsing
 *
 * Decodes EndDevice and EndDeviceList documents returned by the server.
 * Fields the client never sends (links, extensions) are ignored.
 *
 * @license Apache-2.0
 */

import { ProtocolError, ValidationError } from '../errors';
import { deriveShortIdentifier, normalizeLongIdentifier } from '../identity/deviceIdentity';
import { attributeOf, decodeFields, parseDocument } from './documentCodec';
import type { XmlNode, XmlValue } from './documentCodec';
import { RESOURCE_FIELDS } from './fieldTables';
import type { EndDeviceList, RegisteredEndDevice } from './types';

function numberOr(fields: Map<string, unknown>, key: string, fallback: number): number {
  const value = fields.get(key);
  return typeof value === 'number' ? value : fallback;
}

function isNode(value: XmlValue): value is XmlNode {
  return typeof value === 'object' && !Array.isArray(value);
}

function endDeviceFromNode(node: XmlNode): RegisteredEndDevice {
  const fields = decodeFields(RESOURCE_FIELDS.EndDevice, node);

  const rawLfdi = fields.get('lFDI');
  if (typeof rawLfdi !== 'string') {
    throw new ValidationError('is required', 'lFDI');
  }
  const lFDI = normalizeLongIdentifier(rawLfdi);
  const sFDI = fields.get('sFDI');
  const enabled = fields.get('enabled');

  return {
    deviceCategory: numberOr(fields, 'deviceCategory', 0),
    lFDI,
    sFDI: typeof sFDI === 'string' ? sFDI : deriveShortIdentifier(lFDI),
    changedTime: numberOr(fields, 'changedTime', 0),
    postRate: numberOr(fields, 'postRate', 0),
    enabled: typeof enabled === 'boolean' ? enabled : true,
    href: attributeOf(node, 'href'),
  };
}

function invalidResponse(error: unknown, root: string, xml: string): unknown {
  if (error instanceof ValidationError) {
    return new ProtocolError(`Invalid ${root} in response: ${error.message}`, 200, 200, xml);
  }
  return error;
}

/**
 * Parse a single EndDevice document
 *
 * @throws ProtocolError if the document is not a valid EndDevice
 */
export function parseEndDevice(xml: string): RegisteredEndDevice {
  try {
    return endDeviceFromNode(parseDocument(xml, 'EndDevice'));
  } catch (error) {
    throw invalidResponse(error, 'EndDevice', xml);
  }
}

/**
 * Parse an EndDeviceList page
 *
 * `all` is the size of the whole collection, `results` the number of entries
 * on this page.
 *
 * @throws ProtocolError if the document is not a valid EndDeviceList
 */
export function parseEndDeviceList(xml: string): EndDeviceList {
  try {
    const node = parseDocument(xml, 'EndDeviceList');
    const children = node.EndDevice;
    const items: XmlValue[] = children === undefined ? [] : Array.isArray(children) ? children : [children];

    const endDevices = items.map((item) => {
      if (!isNode(item)) {
        throw new ValidationError('must be an element with children', 'EndDevice');
      }
      return endDeviceFromNode(item);
    });

    const results = Number(attributeOf(node, 'results') ?? endDevices.length);
    const all = Number(attributeOf(node, 'all') ?? results);
    if (!Number.isInteger(results) || !Number.isInteger(all)) {
      throw new ValidationError('all/results attributes must be integers', 'EndDeviceList');
    }

    return { all, results, endDevices };
  } catch (error) {
    throw invalidResponse(error, 'EndDeviceList', xml);
  }
}
