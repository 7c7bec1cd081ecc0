/**
 * Registration workflow types
 *
 * @license Apache-2.0
 */

import type { RegistrationError } from '../errors';
import type {
  ConnectionPointInput,
  DERCapabilityInput,
  DeviceInformationInput,
  EndDeviceInput,
} from '../model/resources';

/**
 * Progress of a single registration run. A failure is reported with the stage
 * the run was trying to reach.
 */
export type RegistrationStage =
  | 'NotStarted'
  | 'EndDeviceCreated'
  | 'DeviceInformationSet'
  | 'DERCreated'
  | 'DERCapabilitySet'
  | 'ConnectionPointSet'
  | 'Complete';

export const REGISTRATION_STAGES: readonly RegistrationStage[] = [
  'NotStarted',
  'EndDeviceCreated',
  'DeviceInformationSet',
  'DERCreated',
  'DERCapabilitySet',
  'ConnectionPointSet',
  'Complete',
];

export function isRegistrationStage(value: unknown): value is RegistrationStage {
  return typeof value === 'string' && REGISTRATION_STAGES.some((stage) => stage === value);
}

/**
 * Position of a stage in the sequence (NotStarted = 0)
 */
export function stageIndex(stage: RegistrationStage): number {
  return REGISTRATION_STAGES.indexOf(stage);
}

/**
 * Everything needed to register one device
 */
export interface DeviceSpec {
  /** Long form device identifier (hex) */
  lFDI: string;
  endDevice: Omit<EndDeviceInput, 'lFDI'>;
  deviceInformation: DeviceInformationInput;
  derCapability: DERCapabilityInput;
  connectionPoint: ConnectionPointInput;
}

export interface RegistrationResult {
  endDeviceID: string;
  derID: string;
  lFDI: string;
  sFDI: string;
}

export interface RegisterOptions {
  /** Called after each confirmed step */
  onStage?: (stage: RegistrationStage, lFDI: string) => void;
}

/**
 * Where to pick up a run whose EndDevice already exists on the server
 */
export interface ResumePoint {
  endDeviceID: string;
  /** Required when stage comes after DERCreated */
  derID?: string;
  /** First stage still to run: DeviceInformationSet through ConnectionPointSet */
  stage: RegistrationStage;
}

export interface RegisterDeviceOptions extends RegisterOptions {
  /** Skip the steps a previous run confirmed */
  resume?: ResumePoint;
}

export interface BatchOptions extends RegisterOptions {
  /** Stop at the first failed device (default: true) */
  abortOnError?: boolean;
}

export type BatchOutcome =
  | { lFDI: string; status: 'complete'; result: RegistrationResult }
  | { lFDI: string; status: 'failed'; error: RegistrationError }
  | { lFDI: string; status: 'skipped' };
