/**
 * Device identity derivation
 *
 * LFDI (long form device identifier): 160 bits, shown as 40 hex digits.
 * SFDI (short form device identifier): the leading 36 bits of the LFDI as
 * 11 decimal digits, followed by one sum-of-digits check digit.
 *
 * The width of an LFDI is taken from its hex digits, never from its numeric
 * magnitude: "000111100..." keeps its leading zero nibbles.
 *
 * @license Apache-2.0
 */

import { createHash, X509Certificate } from 'crypto';
import { ValidationError, errorMessage } from '../errors';

export const LFDI_BITS = 160;
export const SFDI_BITS = 36;

const LFDI_HEX_DIGITS = LFDI_BITS / 4;
const SFDI_HEX_DIGITS = SFDI_BITS / 4;
const SFDI_DECIMAL_DIGITS = 11;

/**
 * Normalize an LFDI to upper-case hex without a 0x prefix
 *
 * @throws ValidationError if the value is not hex or is wider than 160 bits
 */
export function normalizeLongIdentifier(lfdi: string): string {
  const trimmed = String(lfdi ?? '').trim();
  const hex = trimmed.replace(/^0x/i, '');

  if (!hex) {
    throw new ValidationError('long identifier is empty', 'lFDI');
  }
  if (!/^[0-9a-fA-F]+$/.test(hex)) {
    throw new ValidationError(`"${trimmed}" is not a hexadecimal value`, 'lFDI');
  }
  if (hex.length > LFDI_HEX_DIGITS) {
    throw new ValidationError(
      `long identifier has ${hex.length * 4} bits, maximum is ${LFDI_BITS}`,
      'lFDI'
    );
  }

  return hex.toUpperCase();
}

/**
 * Derive the SFDI from an LFDI
 *
 * @example
 * deriveShortIdentifier('0x3E4F45AB3'); // '167261211391'
 *
 * @throws ValidationError if the LFDI carries fewer than 36 bits
 */
export function deriveShortIdentifier(longIdentifier: string): string {
  const hex = normalizeLongIdentifier(longIdentifier);

  if (hex.length < SFDI_HEX_DIGITS) {
    throw new ValidationError(
      `long identifier has ${hex.length * 4} bits, at least ${SFDI_BITS} are required`,
      'lFDI'
    );
  }

  // 36 bits stay well inside Number.MAX_SAFE_INTEGER
  const truncated = parseInt(hex.slice(0, SFDI_HEX_DIGITS), 16);
  const digits = truncated.toString(10).padStart(SFDI_DECIMAL_DIGITS, '0');

  return digits + sumOfDigitsCheck(digits);
}

/**
 * Check digit that brings the digit sum of the full SFDI to a multiple of 10
 */
export function sumOfDigitsCheck(digits: string): string {
  let sum = 0;
  for (const digit of digits) {
    sum += Number(digit);
  }
  return String((10 - (sum % 10)) % 10);
}

/**
 * True when the last digit of a 12-digit SFDI matches its check digit
 */
export function isValidShortIdentifier(sfdi: string): boolean {
  if (!/^\d{12}$/.test(sfdi)) return false;
  return sumOfDigitsCheck(sfdi.slice(0, -1)) === sfdi.slice(-1);
}

/**
 * Decimal rendering of an LFDI, as used by the X-Token header of local test servers
 */
export function lfdiToDecimal(lfdi: string): string {
  return BigInt(`0x${normalizeLongIdentifier(lfdi)}`).toString(10);
}

/**
 * LFDI of a self-certified device: SHA-256 of the DER encoded certificate,
 * left-truncated to 160 bits
 */
export function lfdiFromCertificateDer(der: Uint8Array): string {
  const fingerprint = createHash('sha256').update(der).digest('hex');
  return fingerprint.slice(0, LFDI_HEX_DIGITS).toUpperCase();
}

export function lfdiFromCertificatePem(pem: string | Buffer): string {
  let certificate: X509Certificate;
  try {
    certificate = new X509Certificate(pem);
  } catch (error) {
    throw new ValidationError(`unable to read certificate: ${errorMessage(error)}`, 'certificate');
  }
  return lfdiFromCertificateDer(certificate.raw);
}

/**
 * LFDI for a device without its own certificate, built from an identifier the
 * aggregator already guarantees to be unique (UTF-8 bytes, hex encoded,
 * truncated to 160 bits)
 */
export function lfdiFromLocalIdentifier(localIdentifier: string): string {
  const hex = Buffer.from(localIdentifier, 'utf-8').toString('hex').toUpperCase();

  if (hex.length < SFDI_HEX_DIGITS) {
    throw new ValidationError(
      `"${localIdentifier}" is too short to carry ${SFDI_BITS} bits`,
      'localIdentifier'
    );
  }

  return hex.slice(0, LFDI_HEX_DIGITS);
}

/**
 * Inverse of lfdiFromLocalIdentifier for identifiers that were not truncated
 */
export function localIdentifierFromLfdi(lfdi: string): string {
  const hex = normalizeLongIdentifier(lfdi);
  if (hex.length % 2 !== 0) {
    throw new ValidationError('long identifier has an odd number of hex digits', 'lFDI');
  }
  return Buffer.from(hex, 'hex').toString('utf-8');
}
