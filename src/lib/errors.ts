/**
 * Error taxonomy for the registration client
 *
 * - ValidationError: bad input caught before any request is built
 * - ProtocolError: the server answered, but not with the expected outcome
 * - TransportError: the request never produced a response
 * - RegistrationError: a failed registration run, wrapping one of the above
 *
 * @license Apache-2.0
 */

import type { RegistrationStage } from './registration/types';

export class ValidationError extends Error {
  constructor(
    message: string,
    /** Dotted path of the offending field (e.g. "rtgMaxW.value") */
    public field?: string
  ) {
    super(field ? `${field}: ${message}` : message);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class ProtocolError extends Error {
  constructor(
    message: string,
    public statusCode: number,
    public expectedStatus: number,
    public body?: string
  ) {
    super(message);
    this.name = 'ProtocolError';
    Object.setPrototypeOf(this, ProtocolError.prototype);
  }
}

export type TransportErrorCode = 'TIMEOUT' | 'NETWORK_ERROR' | 'TLS_ERROR' | 'CREDENTIALS_ERROR';

export class TransportError extends Error {
  constructor(
    public code: TransportErrorCode,
    message: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'TransportError';
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

export type RegistrationFailure = ValidationError | ProtocolError | TransportError;

/**
 * Server-assigned identifiers that existed when a run halted.
 * These resources stay on the server; nothing is rolled back.
 */
export interface CompletedResources {
  endDeviceID?: string;
  derID?: string;
}

export class RegistrationError extends Error {
  constructor(
    public readonly stage: RegistrationStage,
    public readonly cause: RegistrationFailure,
    public readonly completed: CompletedResources = {}
  ) {
    super(`Registration failed at ${stage}: ${cause.message}`);
    this.name = 'RegistrationError';
    Object.setPrototypeOf(this, RegistrationError.prototype);
  }
}

export function isRegistrationFailure(error: unknown): error is RegistrationFailure {
  return (
    error instanceof ValidationError ||
    error instanceof ProtocolError ||
    error instanceof TransportError
  );
}

/**
 * Message of a thrown value. Errors raised by Node itself may come from
 * another realm (e.g. under a test sandbox), so this checks shape, not class.
 */
export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

/**
 * System error code (ENOENT, ECONNREFUSED, ...) of a thrown value, if any
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
