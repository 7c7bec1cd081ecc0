/**
 * Table-driven XML codec
 *
 * validateFields, serializeResource and decodeFields walk a resource's
 * FieldTable; there is no per-resource codec code.
 *
 * @license Apache-2.0
 */

import { XMLBuilder, XMLParser } from 'fast-xml-parser';
import { ValidationError, ProtocolError } from '../errors';
import { RESOURCE_FIELDS } from './fieldTables';
import type { FieldTable, ScalarField } from './fieldTables';
import type { ResourceName, ResourceTypes } from './types';

export const XML_CONTENT_TYPE = 'application/xml';

const ATTRIBUTE_PREFIX = '@_';

const builder = new XMLBuilder({
  format: true,
  indentBy: '  ',
  suppressEmptyNode: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
});

/** A parsed XML element: attributes under "@_name", children by element name */
export type XmlNode = { [key: string]: XmlValue };
export type XmlValue = string | XmlNode | XmlValue[];

function fieldsOf(value: object): Map<string, unknown> {
  return new Map<string, unknown>(Object.entries(value));
}

function joinPath(path: string, key: string): string {
  return path ? `${path}.${key}` : key;
}

function isPlainObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateScalar(spec: ScalarField, value: unknown, path: string): void {
  switch (spec.kind) {
    case 'int':
    case 'float': {
      if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new ValidationError('must be a finite number', path);
      }
      if (spec.kind === 'int' && !Number.isInteger(value)) {
        throw new ValidationError('must be an integer', path);
      }
      if (spec.min !== undefined && value < spec.min) {
        throw new ValidationError(`must be >= ${spec.min} (got ${value})`, path);
      }
      if (spec.max !== undefined && value > spec.max) {
        throw new ValidationError(`must be <= ${spec.max} (got ${value})`, path);
      }
      if (spec.codes && !spec.codes.includes(value)) {
        throw new ValidationError(`${value} is not one of ${spec.codes.join(', ')}`, path);
      }
      return;
    }
    case 'boolean':
      if (typeof value !== 'boolean') {
        throw new ValidationError('must be a boolean', path);
      }
      return;
    case 'string':
    case 'hex': {
      if (typeof value !== 'string') {
        throw new ValidationError('must be a string', path);
      }
      if (spec.kind === 'hex' && !/^[0-9A-Fa-f]*$/.test(value)) {
        throw new ValidationError('must be hexadecimal', path);
      }
      if (spec.minLength !== undefined && value.length < spec.minLength) {
        throw new ValidationError(`must be at least ${spec.minLength} characters`, path);
      }
      if (spec.maxLength !== undefined && value.length > spec.maxLength) {
        throw new ValidationError(`must be at most ${spec.maxLength} characters`, path);
      }
      return;
    }
  }
}

/**
 * Validate a value against a field table
 *
 * @throws ValidationError naming the first offending field
 */
export function validateFields(table: FieldTable, value: object, path = ''): void {
  const values = fieldsOf(value);

  for (const key of values.keys()) {
    if (!(key in table)) {
      throw new ValidationError('is not a known field', joinPath(path, key));
    }
  }

  for (const [key, spec] of Object.entries(table)) {
    const fieldPath = joinPath(path, key);
    const fieldValue = values.get(key);

    if (fieldValue === undefined || fieldValue === null) {
      if (spec.required) {
        throw new ValidationError('is required', fieldPath);
      }
      continue;
    }

    if (spec.kind === 'nested') {
      if (!isPlainObject(fieldValue)) {
        throw new ValidationError('must be an object', fieldPath);
      }
      validateFields(spec.fields, fieldValue, fieldPath);
    } else {
      validateScalar(spec, fieldValue, fieldPath);
    }
  }
}

function renderScalar(value: unknown): string {
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  return String(value);
}

/** Ordered element tree for XMLBuilder; absent optional fields are skipped */
function toXmlNode(table: FieldTable, value: object): XmlNode {
  const values = fieldsOf(value);
  const node: XmlNode = {};

  for (const [key, spec] of Object.entries(table)) {
    const fieldValue = values.get(key);
    if (fieldValue === undefined || fieldValue === null) continue;

    if (spec.kind === 'nested' && isPlainObject(fieldValue)) {
      node[key] = toXmlNode(spec.fields, fieldValue);
    } else {
      node[key] = renderScalar(fieldValue);
    }
  }

  return node;
}

/**
 * Render a resource as its XML document
 *
 * Element order follows the field table, so identical values always produce
 * identical bytes.
 */
export function serializeResource<N extends ResourceName>(name: N, value: ResourceTypes[N]): string {
  const table: FieldTable = RESOURCE_FIELDS[name];
  validateFields(table, value);

  const node = toXmlNode(table, value);
  // An empty element (e.g. DER) collapses to <DER/>
  return builder.build({ [name]: Object.keys(node).length > 0 ? node : '' });
}

// Parsing

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  ignoreDeclaration: true,
  removeNSPrefix: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
});

function isXmlNode(value: unknown): value is XmlNode {
  return isPlainObject(value);
}

/**
 * Parse an XML document and return its root element
 *
 * @throws ProtocolError if the document is not XML or the root is not `root`
 */
export function parseDocument(xml: string, root: string): XmlNode {
  let parsed: unknown;
  try {
    parsed = parser.parse(xml, true);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ProtocolError(`Response is not valid XML: ${reason}`, 200, 200, xml);
  }

  const element: unknown = isXmlNode(parsed) ? parsed[root] : undefined;
  if (element === '') return {};
  if (!isXmlNode(element)) {
    throw new ProtocolError(`Expected a <${root}> document`, 200, 200, xml);
  }
  return element;
}

export function attributeOf(node: XmlNode, name: string): string | undefined {
  const value = node[`${ATTRIBUTE_PREFIX}${name}`];
  return typeof value === 'string' ? value : undefined;
}

function decodeScalar(spec: ScalarField, text: string, path: string): string | number | boolean {
  switch (spec.kind) {
    case 'int':
    case 'float': {
      const value = Number(text);
      if (text === '' || !Number.isFinite(value)) {
        throw new ValidationError(`"${text}" is not a number`, path);
      }
      return value;
    }
    case 'boolean':
      if (text === 'true' || text === '1') return true;
      if (text === 'false' || text === '0') return false;
      throw new ValidationError(`"${text}" is not a boolean`, path);
    default:
      return text;
  }
}

/**
 * Convert the text content of a parsed element into typed field values.
 * Elements that the table does not describe (links, extensions) are ignored.
 */
export function decodeFields(table: FieldTable, node: XmlNode, path = ''): Map<string, unknown> {
  const result = new Map<string, unknown>();

  for (const [key, spec] of Object.entries(table)) {
    const raw = node[key];
    if (raw === undefined) continue;
    const fieldPath = joinPath(path, key);

    if (spec.kind === 'nested') {
      if (!isXmlNode(raw)) {
        throw new ValidationError('must be an element with children', fieldPath);
      }
      result.set(key, Object.fromEntries(decodeFields(spec.fields, raw, fieldPath)));
    } else {
      if (typeof raw !== 'string') {
        throw new ValidationError('must be a text element', fieldPath);
      }
      result.set(key, decodeScalar(spec, raw, fieldPath));
    }
  }

  return result;
}
