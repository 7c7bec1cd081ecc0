/**
 * Resource builders
 *
 * Combine caller-supplied fields with identity-derived fields, apply the
 * defaults the server expects and validate against the field tables. Every
 * builder returns a frozen value or throws ValidationError; none of them
 * touches the network.
 *
 * @license Apache-2.0
 */

import { deriveShortIdentifier, normalizeLongIdentifier } from '../identity/deviceIdentity';
import { validateFields } from './documentCodec';
import { RESOURCE_FIELDS } from './fieldTables';
import { PowerSourceType } from './types';
import type {
  ConnectionPoint,
  DER,
  DERCapability,
  DERType,
  DeviceInformation,
  EndDevice,
  GpsLocation,
  ResourceName,
  ResourceTypes,
  ValueWithMultiplier,
} from './types';

export interface EndDeviceInput {
  /** Long form device identifier (hex, optional 0x prefix) */
  lFDI: string;
  deviceCategory: number;
  changedTime?: number;
  postRate?: number;
  enabled?: boolean;
}

export interface DeviceInformationInput {
  functionsImplemented?: number;
  gpsLocation?: GpsLocation;
  mfDate?: number;
  mfHwVer?: string;
  mfID?: number;
  mfInfo?: string;
  mfModel: string;
  mfSerNum: string;
  primaryPower?: PowerSourceType;
  secondaryPower?: PowerSourceType;
  swActTime?: number;
  swVer?: string;
}

export interface RatingInput {
  value: number;
  /** Power of ten applied to value (default 0) */
  multiplier?: number;
}

export interface DERCapabilityInput {
  modesSupported: number;
  type: DERType;
  rtgMaxW: RatingInput;
  rtgMaxA?: RatingInput;
  rtgMaxAh?: RatingInput;
  rtgMaxChargeRateVA?: RatingInput;
  rtgMaxChargeRateW?: RatingInput;
  rtgMaxDischargeRateVA?: RatingInput;
  rtgMaxDischargeRateW?: RatingInput;
  rtgMaxWh?: RatingInput;
}

export interface ConnectionPointInput {
  connectionPointID?: string;
  meterID: string;
}

const NOT_AVAILABLE = 'NA';

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

function finalize<N extends ResourceName>(name: N, value: ResourceTypes[N]): Readonly<ResourceTypes[N]> {
  validateFields(RESOURCE_FIELDS[name], value);
  return deepFreeze(value);
}

function rating(input: RatingInput): ValueWithMultiplier {
  return { multiplier: input.multiplier ?? 0, value: input.value };
}

function optionalRating(input: RatingInput | undefined): ValueWithMultiplier | undefined {
  return input === undefined ? undefined : rating(input);
}

export function buildEndDevice(input: EndDeviceInput): Readonly<EndDevice> {
  const lFDI = normalizeLongIdentifier(input.lFDI);

  return finalize('EndDevice', {
    deviceCategory: input.deviceCategory,
    lFDI,
    sFDI: deriveShortIdentifier(lFDI),
    changedTime: input.changedTime ?? 0,
    postRate: input.postRate ?? 0,
    enabled: input.enabled ?? true,
  });
}

export function buildDeviceInformation(
  lfdi: string,
  input: DeviceInformationInput
): Readonly<DeviceInformation> {
  const gps = input.gpsLocation;

  return finalize('DeviceInformation', {
    functionsImplemented: input.functionsImplemented,
    gpsLocation: gps ? { lat: gps.lat, lon: gps.lon } : undefined,
    lFDI: normalizeLongIdentifier(lfdi),
    mfDate: input.mfDate ?? 0,
    mfHwVer: input.mfHwVer ?? NOT_AVAILABLE,
    mfID: input.mfID,
    mfInfo: input.mfInfo,
    mfModel: input.mfModel,
    mfSerNum: input.mfSerNum,
    primaryPower: input.primaryPower ?? PowerSourceType.None,
    secondaryPower: input.secondaryPower ?? PowerSourceType.None,
    swActTime: input.swActTime ?? 0,
    swVer: input.swVer ?? NOT_AVAILABLE,
  });
}

export function buildDer(): Readonly<DER> {
  return finalize('DER', {});
}

export function buildDerCapability(input: DERCapabilityInput): Readonly<DERCapability> {
  return finalize('DERCapability', {
    modesSupported: input.modesSupported,
    rtgMaxA: optionalRating(input.rtgMaxA),
    rtgMaxAh: optionalRating(input.rtgMaxAh),
    rtgMaxChargeRateVA: optionalRating(input.rtgMaxChargeRateVA),
    rtgMaxChargeRateW: optionalRating(input.rtgMaxChargeRateW),
    rtgMaxDischargeRateVA: optionalRating(input.rtgMaxDischargeRateVA),
    rtgMaxDischargeRateW: optionalRating(input.rtgMaxDischargeRateW),
    rtgMaxW: rating(input.rtgMaxW),
    rtgMaxWh: optionalRating(input.rtgMaxWh),
    type: input.type,
  });
}

export function buildConnectionPoint(input: ConnectionPointInput): Readonly<ConnectionPoint> {
  return finalize('ConnectionPoint', {
    connectionPointID: input.connectionPointID,
    meterID: input.meterID,
  });
}
