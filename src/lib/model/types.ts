/**
 * Resource types and code tables for end-device registration
 *
 * Bit values follow the IEEE 2030.5 type definitions; only the codes this
 * client sends are listed.
 *
 * @license Apache-2.0
 */

/** EndDevice.deviceCategory bitmap */
export enum DeviceCategoryType {
  ProgrammableCommunicatingThermostat = 1 << 0,
  StripHeaters = 1 << 1,
  BaseboardHeaters = 1 << 2,
  WaterHeater = 1 << 3,
  PoolPump = 1 << 4,
  Sauna = 1 << 5,
  HotTub = 1 << 6,
  SmartAppliance = 1 << 7,
  IrrigationPump = 1 << 8,
  ManagedCommercialAndIndustrialLoads = 1 << 9,
  SimpleMiscLoads = 1 << 10,
  ExteriorLighting = 1 << 11,
  InteriorLighting = 1 << 12,
  LoadControlSwitch = 1 << 13,
  EnergyManagementSystem = 1 << 14,
  SmartEnergyModule = 1 << 15,
  ElectricVehicle = 1 << 16,
  ElectricVehicleSupplyEquipment = 1 << 17,
  VirtualOrMixedDer = 1 << 18,
  ReciprocatingEngine = 1 << 19,
  FuelCell = 1 << 20,
  PhotovoltaicSystem = 1 << 21,
  CombinedHeatAndPower = 1 << 22,
  CombinedPvAndStorage = 1 << 23,
  OtherGenerationSystem = 1 << 24,
  OtherStorageSystem = 1 << 25,
}

export const DEVICE_CATEGORY_MASK = (1 << 26) - 1;

/** DeviceInformation.functionsImplemented bitmap */
export enum FunctionsImplementedType {
  SelfDeviceResource = 1 << 0,
  EndDeviceResource = 1 << 1,
  FunctionSetAssignments = 1 << 2,
  SubscriptionNotification = 1 << 3,
  Response = 1 << 4,
  Time = 1 << 5,
  DeviceInformation = 1 << 6,
  PowerStatus = 1 << 7,
  NetworkStatus = 1 << 8,
  LogEvent = 1 << 9,
  ConfigurationResource = 1 << 10,
  SoftwareDownload = 1 << 11,
  DemandResponseLoadControl = 1 << 12,
  Metering = 1 << 13,
  Pricing = 1 << 14,
  Messaging = 1 << 15,
  Billing = 1 << 16,
  Prepayment = 1 << 17,
  FlowReservation = 1 << 18,
  DerControl = 1 << 19,
}

export const FUNCTIONS_IMPLEMENTED_MASK = (1 << 20) - 1;

/** DERCapability.modesSupported bitmap */
export enum DERControlType {
  ChargeMode = 1 << 0,
  DischargeMode = 1 << 1,
  OpModConnect = 1 << 2,
  OpModEnergize = 1 << 3,
  OpModFixedPFAbsorbW = 1 << 4,
  OpModFixedPFInjectW = 1 << 5,
  OpModFixedVar = 1 << 6,
  OpModFixedW = 1 << 7,
  OpModFreqDroop = 1 << 8,
  OpModFreqWatt = 1 << 9,
  OpModHFRTMayTrip = 1 << 10,
  OpModHFRTMustTrip = 1 << 11,
  OpModHVRTMayTrip = 1 << 12,
  OpModHVRTMomentaryCessation = 1 << 13,
  OpModHVRTMustTrip = 1 << 14,
  OpModLFRTMayTrip = 1 << 15,
  OpModLFRTMustTrip = 1 << 16,
  OpModLVRTMayTrip = 1 << 17,
  OpModLVRTMomentaryCessation = 1 << 18,
  OpModLVRTMustTrip = 1 << 19,
  OpModMaxLimW = 1 << 20,
  OpModTargetVar = 1 << 21,
  OpModTargetW = 1 << 22,
  OpModVoltVar = 1 << 23,
  OpModVoltWatt = 1 << 24,
  OpModWattPF = 1 << 25,
  OpModWattVar = 1 << 26,
}

export const DER_CONTROL_MASK = (1 << 27) - 1;

export enum PowerSourceType {
  None = 0,
  Mains = 1,
  Battery = 2,
  LocalGeneration = 3,
  Emergency = 4,
  Unknown = 5,
}

export enum DERType {
  NotApplicable = 0,
  VirtualOrMixedDer = 1,
  ReciprocatingEngine = 2,
  FuelCell = 3,
  PhotovoltaicSystem = 4,
  CombinedHeatAndPower = 5,
  OtherGenerationSystem = 6,
  OtherStorageSystem = 80,
  ElectricVehicle = 81,
  Evse = 82,
  CombinedPvAndStorage = 83,
}

/**
 * Numeric values of a numeric enum (TypeScript adds reverse name mappings,
 * which are skipped)
 */
export function enumCodes(enumObject: Record<string, string | number>): number[] {
  return Object.values(enumObject).filter((v): v is number => typeof v === 'number');
}

// Resources

export interface EndDevice {
  deviceCategory: number;
  lFDI: string;
  sFDI: string;
  changedTime: number;
  postRate: number;
  enabled: boolean;
}

export interface GpsLocation {
  lat: number;
  lon: number;
}

export interface DeviceInformation {
  functionsImplemented?: number;
  gpsLocation?: GpsLocation;
  lFDI: string;
  /** Date/time of manufacture, seconds since epoch */
  mfDate: number;
  mfHwVer: string;
  /** Manufacturer IANA Private Enterprise Number */
  mfID?: number;
  mfInfo?: string;
  mfModel: string;
  mfSerNum: string;
  primaryPower: PowerSourceType;
  secondaryPower: PowerSourceType;
  /** Activation date/time of the running software, seconds since epoch */
  swActTime: number;
  swVer: string;
}

/** Empty container; the server only needs the POST */
export type DER = Record<string, never>;

/** Rating expressed as value x 10^multiplier */
export interface ValueWithMultiplier {
  multiplier: number;
  value: number;
}

export interface DERCapability {
  modesSupported: number;
  rtgMaxA?: ValueWithMultiplier;
  rtgMaxAh?: ValueWithMultiplier;
  rtgMaxChargeRateVA?: ValueWithMultiplier;
  rtgMaxChargeRateW?: ValueWithMultiplier;
  rtgMaxDischargeRateVA?: ValueWithMultiplier;
  rtgMaxDischargeRateW?: ValueWithMultiplier;
  rtgMaxW: ValueWithMultiplier;
  rtgMaxWh?: ValueWithMultiplier;
  type: DERType;
}

export interface ConnectionPoint {
  connectionPointID?: string;
  /** Meter identifier at the premise (e.g. a NMI) */
  meterID: string;
}

/** EndDevice as returned by the server, with its resource location */
export interface RegisteredEndDevice extends EndDevice {
  href?: string;
}

export interface EndDeviceList {
  all: number;
  results: number;
  endDevices: RegisteredEndDevice[];
}

export interface ResourceTypes {
  EndDevice: EndDevice;
  DeviceInformation: DeviceInformation;
  DER: DER;
  DERCapability: DERCapability;
  ConnectionPoint: ConnectionPoint;
}

export type ResourceName = keyof ResourceTypes;
