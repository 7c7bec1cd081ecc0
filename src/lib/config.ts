/**
 * Client configuration from environment variables
 *
 * SERVER_URL          resource server root (required for https mode)
 * TRANSPORT_MODE      https (default) | recording
 * AUTH_MODE           certificate (default) | local-token
 * CLIENT_CERT_PATH    PEM client certificate (certificate auth)
 * CLIENT_KEY_PATH     PEM private key (certificate auth)
 * CA_CERT_PATH        PEM CA bundle for the server certificate (optional)
 * AGGREGATOR_LFDI     aggregator LFDI (required for local-token auth)
 * REQUEST_TIMEOUT_MS  per-request timeout (default 10000)
 * LEDGER_BACKEND      file (default) | postgres
 * LEDGER_PATH         ledger file (default ./data/registrations.json)
 * DATABASE_URL        PostgreSQL connection string (postgres ledger)
 *
 * @license Apache-2.0
 */

export type TransportMode = 'https' | 'recording';
export type AuthMode = 'certificate' | 'local-token';
export type LedgerBackend = 'file' | 'postgres';

export interface ClientConfig {
  serverUrl: string;
  transportMode: TransportMode;
  authMode: AuthMode;
  clientCertPath?: string;
  clientKeyPath?: string;
  caCertPath?: string;
  aggregatorLfdi?: string;
  timeoutMs: number;
  ledgerBackend: LedgerBackend;
  ledgerPath: string;
  databaseUrl?: string;
}

export const DEFAULT_LEDGER_PATH = './data/registrations.json';
const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

export const TRANSPORT_MODES: readonly TransportMode[] = ['https', 'recording'];
export const AUTH_MODES: readonly AuthMode[] = ['certificate', 'local-token'];
export const LEDGER_BACKENDS: readonly LedgerBackend[] = ['file', 'postgres'];

/**
 * Match a value against an allowed set, case-insensitively
 *
 * @returns the matching entry, or undefined when the value is empty
 * @throws Error naming the setting when the value is not allowed
 */
export function parseChoice<T extends string>(name: string, value: string | undefined, allowed: readonly T[]): T | undefined {
  const normalized = (value || '').trim().toLowerCase();
  if (!normalized) return undefined;
  const match = allowed.find((candidate) => candidate === normalized);
  if (!match) {
    throw new Error(`Invalid ${name}: "${value}". Expected one of: ${allowed.join(', ')}`);
  }
  return match;
}

function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function parseTimeout(value: string | undefined, name = 'REQUEST_TIMEOUT_MS'): number {
  if (value === undefined || value.trim() === '') return DEFAULT_REQUEST_TIMEOUT_MS;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Invalid ${name}: "${value}". Expected a positive integer (milliseconds)`);
  }
  return parsed;
}

/**
 * Read client configuration from the environment
 *
 * @throws Error if a variable holds a value outside its allowed set
 */
export function getClientConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  return {
    serverUrl: optional(env.SERVER_URL) ?? '',
    transportMode: parseChoice('TRANSPORT_MODE', env.TRANSPORT_MODE, TRANSPORT_MODES) ?? 'https',
    authMode: parseChoice('AUTH_MODE', env.AUTH_MODE, AUTH_MODES) ?? 'certificate',
    clientCertPath: optional(env.CLIENT_CERT_PATH),
    clientKeyPath: optional(env.CLIENT_KEY_PATH),
    caCertPath: optional(env.CA_CERT_PATH),
    aggregatorLfdi: optional(env.AGGREGATOR_LFDI),
    timeoutMs: parseTimeout(env.REQUEST_TIMEOUT_MS),
    ledgerBackend: parseChoice('LEDGER_BACKEND', env.LEDGER_BACKEND, LEDGER_BACKENDS) ?? 'file',
    ledgerPath: optional(env.LEDGER_PATH) ?? DEFAULT_LEDGER_PATH,
    databaseUrl: optional(env.DATABASE_URL),
  };
}

/**
 * Apply command-line overrides on top of environment configuration.
 * Undefined overrides keep the base value.
 */
export function mergeClientConfig(base: ClientConfig, overrides: Partial<ClientConfig> = {}): ClientConfig {
  return {
    serverUrl: overrides.serverUrl ?? base.serverUrl,
    transportMode: overrides.transportMode ?? base.transportMode,
    authMode: overrides.authMode ?? base.authMode,
    clientCertPath: overrides.clientCertPath ?? base.clientCertPath,
    clientKeyPath: overrides.clientKeyPath ?? base.clientKeyPath,
    caCertPath: overrides.caCertPath ?? base.caCertPath,
    aggregatorLfdi: overrides.aggregatorLfdi ?? base.aggregatorLfdi,
    timeoutMs: overrides.timeoutMs ?? base.timeoutMs,
    ledgerBackend: overrides.ledgerBackend ?? base.ledgerBackend,
    ledgerPath: overrides.ledgerPath ?? base.ledgerPath,
    databaseUrl: overrides.databaseUrl ?? base.databaseUrl,
  };
}
