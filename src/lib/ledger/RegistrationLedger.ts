/**
 * Registration Ledger Interface
 *
 * Local record of which devices have been registered, with the server ids of
 * what was created. The CLI consults it before a run so that a completed
 * device is not registered twice, and a partially created one is not
 * re-created by accident.
 *
 * @license Apache-2.0
 */

import type { RegistrationError } from '../errors';
import { deriveShortIdentifier, normalizeLongIdentifier } from '../identity/deviceIdentity';
import { isRegistrationStage, stageIndex } from '../registration/types';
import type { RegistrationResult, RegistrationStage, ResumePoint } from '../registration/types';

export type RegistrationStatus = 'complete' | 'failed';

export interface RegistrationRecord {
  /** Normalized LFDI (upper-case hex); the ledger key */
  lFDI: string;
  sFDI: string;
  status: RegistrationStatus;
  endDeviceID?: string;
  derID?: string;
  /** Stage a failed run was trying to reach */
  failedStage?: RegistrationStage;
  error?: string;
  /** ISO 8601 */
  updatedAt: string;
}

/**
 * Storage backend for registration records
 */
export interface RegistrationLedger {
  /**
   * Insert or replace the record for record.lFDI
   */
  record(entry: RegistrationRecord): Promise<void>;

  /**
   * @returns the record, or null if the device was never recorded
   */
  get(lFDI: string): Promise<RegistrationRecord | null>;

  /**
   * All records, ordered by LFDI
   */
  list(): Promise<RegistrationRecord[]>;

  /**
   * Release connections held by the backend
   */
  close(): Promise<void>;
}

/**
 * Whether a new run for this device needs --force
 *
 * A complete record, or a failed one whose EndDevice was already created,
 * would lead to duplicate resources on the server.
 */
export function requiresForce(existing: RegistrationRecord | null): boolean {
  if (!existing) return false;
  return existing.status === 'complete' || existing.endDeviceID !== undefined;
}

/**
 * Where a failed run with a created EndDevice can continue, or null when
 * there is nothing to resume
 */
export function resumePointFromRecord(existing: RegistrationRecord | null): ResumePoint | null {
  if (!existing || existing.status !== 'failed' || !existing.endDeviceID) return null;

  let stage: RegistrationStage = existing.failedStage ?? 'DeviceInformationSet';
  if (stageIndex(stage) < stageIndex('DeviceInformationSet')) {
    stage = 'DeviceInformationSet';
  }
  if (stageIndex(stage) > stageIndex('ConnectionPointSet')) {
    stage = 'ConnectionPointSet';
  }
  if (stageIndex(stage) > stageIndex('DERCreated') && !existing.derID) {
    stage = 'DERCreated';
  }

  return { endDeviceID: existing.endDeviceID, derID: existing.derID, stage };
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * Read a stored record, or null if the value does not have the record shape
 */
export function toRegistrationRecord(value: unknown): RegistrationRecord | null {
  if (typeof value !== 'object' || value === null) return null;
  if (!('lFDI' in value) || typeof value.lFDI !== 'string') return null;
  if (!('sFDI' in value) || typeof value.sFDI !== 'string') return null;
  if (!('status' in value) || (value.status !== 'complete' && value.status !== 'failed')) return null;
  if (!('updatedAt' in value) || typeof value.updatedAt !== 'string') return null;

  const failedStage = 'failedStage' in value && isRegistrationStage(value.failedStage) ? value.failedStage : undefined;

  return {
    lFDI: value.lFDI,
    sFDI: value.sFDI,
    status: value.status,
    endDeviceID: 'endDeviceID' in value ? optionalString(value.endDeviceID) : undefined,
    derID: 'derID' in value ? optionalString(value.derID) : undefined,
    failedStage,
    error: 'error' in value ? optionalString(value.error) : undefined,
    updatedAt: value.updatedAt,
  };
}

export function recordFromResult(result: RegistrationResult, now: Date = new Date()): RegistrationRecord {
  return {
    lFDI: normalizeLongIdentifier(result.lFDI),
    sFDI: result.sFDI,
    status: 'complete',
    endDeviceID: result.endDeviceID,
    derID: result.derID,
    updatedAt: now.toISOString(),
  };
}

/**
 * Record of a failed run, keeping the ids of whatever was created before it stopped
 */
export function recordFromError(lFDI: string, error: RegistrationError, now: Date = new Date()): RegistrationRecord {
  const normalized = normalizeLongIdentifier(lFDI);
  return {
    lFDI: normalized,
    sFDI: deriveShortIdentifier(normalized),
    status: 'failed',
    endDeviceID: error.completed.endDeviceID,
    derID: error.completed.derID,
    failedStage: error.stage,
    error: error.cause.message,
    updatedAt: now.toISOString(),
  };
}
