/**
 * Field tables for the registration resources
 *
 * One table per resource: XML element name -> kind, required flag and
 * constraints. Property order is element order on the wire. The generic codec
 * in documentCodec.ts validates, serializes and parses from these tables.
 *
 * @license Apache-2.0
 */

import {
  DEVICE_CATEGORY_MASK,
  DER_CONTROL_MASK,
  DERType,
  FUNCTIONS_IMPLEMENTED_MASK,
  PowerSourceType,
  enumCodes,
} from './types';
import type { ResourceName, ResourceTypes, ValueWithMultiplier, GpsLocation } from './types';

export type ScalarKind = 'int' | 'float' | 'string' | 'boolean' | 'hex';

export interface ScalarField {
  kind: ScalarKind;
  required: boolean;
  /** Inclusive numeric bounds */
  min?: number;
  max?: number;
  /** Allowed codes for enumerated integers */
  codes?: readonly number[];
  /** String length bounds (hex: digit count) */
  minLength?: number;
  maxLength?: number;
}

export interface NestedField {
  kind: 'nested';
  required: boolean;
  fields: FieldTable;
}

export type FieldSpec = ScalarField | NestedField;

export type FieldTable = Readonly<Record<string, FieldSpec>>;

/** A table that must describe every property of T, and nothing else */
export type ResourceFieldTable<T> = { readonly [K in keyof Required<T>]: FieldSpec };

const UINT32_MAX = 0xffffffff;
const INT64_SAFE_MAX = Number.MAX_SAFE_INTEGER;
const STRING32 = 32;

const time = (required: boolean): ScalarField => ({ kind: 'int', required, min: 0, max: INT64_SAFE_MAX });
const text = (required: boolean): ScalarField => ({
  kind: 'string',
  required,
  minLength: required ? 1 : 0,
  maxLength: STRING32,
});

const valueWithMultiplier: ResourceFieldTable<ValueWithMultiplier> = {
  multiplier: { kind: 'int', required: true, min: -9, max: 9 },
  value: { kind: 'int', required: true, min: 0, max: 32767 },
};

const rating = (required: boolean): NestedField => ({
  kind: 'nested',
  required,
  fields: valueWithMultiplier,
});

const gpsLocation: ResourceFieldTable<GpsLocation> = {
  lat: { kind: 'float', required: true, min: -90, max: 90 },
  lon: { kind: 'float', required: true, min: -180, max: 180 },
};

const powerSource: ScalarField = {
  kind: 'int',
  required: true,
  codes: enumCodes(PowerSourceType),
};

const lfdi: ScalarField = { kind: 'hex', required: true, minLength: 9, maxLength: 40 };

export const RESOURCE_FIELDS: { readonly [N in ResourceName]: ResourceFieldTable<ResourceTypes[N]> } = {
  EndDevice: {
    deviceCategory: { kind: 'int', required: true, min: 1, max: DEVICE_CATEGORY_MASK },
    lFDI: lfdi,
    sFDI: { kind: 'string', required: true, minLength: 12, maxLength: 12 },
    changedTime: time(true),
    postRate: { kind: 'int', required: true, min: 0, max: UINT32_MAX },
    enabled: { kind: 'boolean', required: true },
  },
  DeviceInformation: {
    functionsImplemented: { kind: 'int', required: false, min: 0, max: FUNCTIONS_IMPLEMENTED_MASK },
    gpsLocation: { kind: 'nested', required: false, fields: gpsLocation },
    lFDI: lfdi,
    mfDate: time(true),
    mfHwVer: text(true),
    mfID: { kind: 'int', required: false, min: 0, max: UINT32_MAX },
    mfInfo: text(false),
    mfModel: text(true),
    mfSerNum: text(true),
    primaryPower: powerSource,
    secondaryPower: powerSource,
    swActTime: time(true),
    swVer: text(true),
  },
  DER: {},
  DERCapability: {
    modesSupported: { kind: 'int', required: true, min: 0, max: DER_CONTROL_MASK },
    rtgMaxA: rating(false),
    rtgMaxAh: rating(false),
    rtgMaxChargeRateVA: rating(false),
    rtgMaxChargeRateW: rating(false),
    rtgMaxDischargeRateVA: rating(false),
    rtgMaxDischargeRateW: rating(false),
    rtgMaxW: rating(true),
    rtgMaxWh: rating(false),
    type: { kind: 'int', required: true, codes: enumCodes(DERType) },
  },
  ConnectionPoint: {
    connectionPointID: text(false),
    meterID: text(true),
  },
};
