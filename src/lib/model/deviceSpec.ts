/**
 * Device file parsing
 *
 * Devices to register come from JSON (CLI device files, API payloads). The
 * structure is checked with Ajv against schemas/device-spec.schema.json before
 * any builder sees it; value ranges are left to the field tables.
 *
 * @license Apache-2.0
 */

import Ajv from 'ajv';
import type { ErrorObject } from 'ajv';
import { ValidationError } from '../errors';
import { lfdiFromLocalIdentifier } from '../identity/deviceIdentity';
import type { DeviceSpec } from '../registration/types';
import type { ConnectionPointInput, DERCapabilityInput, DeviceInformationInput } from './resources';
import deviceSpecSchema from './schemas/device-spec.schema.json';

/** One entry of a device file, as written by the operator */
export interface DeviceFileEntry {
  /** Device LFDI (hex); give this or localIdentifier */
  lFDI?: string;
  /** Aggregator-side unique id, turned into an LFDI when no lFDI is given */
  localIdentifier?: string;
  deviceCategory: number;
  changedTime?: number;
  postRate?: number;
  enabled?: boolean;
  deviceInformation: DeviceInformationInput;
  derCapability: DERCapabilityInput;
  connectionPoint: ConnectionPointInput;
}

const ajv = new Ajv({ allErrors: true, strict: false });
const validateEntry = ajv.compile<DeviceFileEntry>(deviceSpecSchema);

function formatAjvError(error: ErrorObject, prefix: string): string {
  const path = `${prefix}${error.instancePath}` || 'root';

  if (error.keyword === 'required' && typeof error.params.missingProperty === 'string') {
    return `${path}: missing required property "${error.params.missingProperty}"`;
  }
  if (error.keyword === 'additionalProperties' && typeof error.params.additionalProperty === 'string') {
    return `${path}: unknown property "${error.params.additionalProperty}"`;
  }
  if (error.keyword === 'oneOf') {
    return `${path}: exactly one of "lFDI" or "localIdentifier" is required`;
  }
  return `${path}: ${error.message ?? 'is invalid'}`;
}

/**
 * Summarize Ajv errors, first 10 only
 */
function formatErrors(errors: ErrorObject[] | null | undefined, prefix: string): string {
  if (!errors || errors.length === 0) return `${prefix || 'root'}: is invalid`;
  // oneOf also reports each failed branch as a "required" error
  const relevant = errors.some((e) => e.keyword === 'oneOf')
    ? errors.filter((e) => !(e.keyword === 'required' && e.schemaPath.startsWith('#/oneOf/')))
    : errors;
  return relevant
    .slice(0, 10)
    .map((e) => formatAjvError(e, prefix))
    .join('; ');
}

function toDeviceSpec(entry: DeviceFileEntry, field: string): DeviceSpec {
  const lFDI = entry.lFDI ?? (entry.localIdentifier !== undefined ? lfdiFromLocalIdentifier(entry.localIdentifier) : '');
  if (!lFDI) {
    throw new ValidationError('an lFDI or localIdentifier is required', field || undefined);
  }

  return {
    lFDI,
    endDevice: {
      deviceCategory: entry.deviceCategory,
      changedTime: entry.changedTime,
      postRate: entry.postRate,
      enabled: entry.enabled,
    },
    deviceInformation: entry.deviceInformation,
    derCapability: entry.derCapability,
    connectionPoint: entry.connectionPoint,
  };
}

/**
 * Validate one untyped entry and turn it into a DeviceSpec
 *
 * @param field - Path prefix for error messages (e.g. "devices/2")
 * @throws ValidationError listing the schema violations
 */
export function parseDeviceSpec(input: unknown, field = ''): DeviceSpec {
  if (!validateEntry(input)) {
    throw new ValidationError(formatErrors(validateEntry.errors, field));
  }
  return toDeviceSpec(input, field);
}

/**
 * Parse a device file: either an array of entries or `{ "devices": [...] }`
 *
 * @throws ValidationError naming the first invalid entry
 */
export function parseDeviceSpecs(input: unknown): DeviceSpec[] {
  const entries = Array.isArray(input)
    ? input
    : typeof input === 'object' && input !== null && 'devices' in input && Array.isArray(input.devices)
      ? input.devices
      : undefined;

  if (!entries) {
    throw new ValidationError('device file must be an array or an object with a "devices" array');
  }

  const specs = entries.map((entry: unknown, index: number) => parseDeviceSpec(entry, `/devices/${index}`));

  const seen = new Set<string>();
  for (const spec of specs) {
    const key = spec.lFDI.toUpperCase().replace(/^0X/, '');
    if (seen.has(key)) {
      throw new ValidationError(`duplicate lFDI ${spec.lFDI}`, 'devices');
    }
    seen.add(key);
  }

  return specs;
}
