/**
 * Registration Ledger Backend Factory
 *
 * Selects backend based on LEDGER_BACKEND:
 * - 'file' (default): JSON file at LEDGER_PATH
 * - 'postgres': PostgreSQL at DATABASE_URL
 *
 * @license Apache-2.0
 */

import type { ClientConfig } from '../config';
import { FileRegistrationLedger } from './FileRegistrationLedger';
import { PostgresRegistrationLedger } from './PostgresRegistrationLedger';
import type { RegistrationLedger } from './RegistrationLedger';

export type LedgerConfig = Pick<ClientConfig, 'ledgerBackend' | 'ledgerPath' | 'databaseUrl'>;

export function createRegistrationLedger(config: LedgerConfig): RegistrationLedger {
  switch (config.ledgerBackend) {
    case 'file':
      return new FileRegistrationLedger(config.ledgerPath);
    case 'postgres':
      return new PostgresRegistrationLedger(config.databaseUrl);
  }
}
