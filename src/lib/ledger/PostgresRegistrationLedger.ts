/**
 * PostgreSQL registration ledger
 *
 * Shared ledger for several aggregator instances.
 *
 * @license Apache-2.0
 */

import { Pool } from 'pg';
import { normalizeLongIdentifier } from '../identity/deviceIdentity';
import { isRegistrationStage } from '../registration/types';
import type { RegistrationLedger, RegistrationRecord } from './RegistrationLedger';

/**
 * The part of pg.Pool the ledger uses
 */
export interface LedgerDatabase {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
  end(): Promise<void>;
}

const COLUMNS = 'lfdi, sfdi, status, end_device_id, der_id, failed_stage, error, updated_at';

function text(row: object, column: string): string | undefined {
  const value: unknown = Reflect.get(row, column);
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function toRecord(row: unknown): RegistrationRecord {
  if (typeof row !== 'object' || row === null) {
    throw new Error('Unexpected row in registrations table');
  }

  const lFDI = text(row, 'lfdi');
  const sFDI = text(row, 'sfdi');
  const status = text(row, 'status');
  if (!lFDI || !sFDI || (status !== 'complete' && status !== 'failed')) {
    throw new Error(`Malformed row in registrations table: ${JSON.stringify(row)}`);
  }

  const failedStage = text(row, 'failed_stage');
  const updatedAt: unknown = Reflect.get(row, 'updated_at');

  return {
    lFDI,
    sFDI,
    status,
    endDeviceID: text(row, 'end_device_id'),
    derID: text(row, 'der_id'),
    failedStage: isRegistrationStage(failedStage) ? failedStage : undefined,
    error: text(row, 'error'),
    updatedAt: updatedAt instanceof Date ? updatedAt.toISOString() : String(updatedAt),
  };
}

export class PostgresRegistrationLedger implements RegistrationLedger {
  private db: LedgerDatabase;
  private schemaInitPromise: Promise<void> | null = null;

  /**
   * @param database - Connection string, or an existing pool (default: DATABASE_URL)
   */
  constructor(database?: string | LedgerDatabase) {
    if (typeof database === 'object') {
      this.db = database;
      return;
    }

    const dbUrl = database || process.env.DATABASE_URL;
    if (!dbUrl) {
      throw new Error(
        'DATABASE_URL not set. Required for the PostgreSQL ledger backend. ' +
          'Use LEDGER_BACKEND=file for a file-based ledger instead.'
      );
    }

    this.db = new Pool({
      connectionString: dbUrl,
      max: 5,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
    });
  }

  private async ensureSchema(): Promise<void> {
    if (this.schemaInitPromise) return this.schemaInitPromise;

    this.schemaInitPromise = this.db
      .query(
        `
        CREATE TABLE IF NOT EXISTS registrations (
          lfdi TEXT PRIMARY KEY,
          sfdi TEXT NOT NULL,
          status TEXT NOT NULL,
          end_device_id TEXT,
          der_id TEXT,
          failed_stage TEXT,
          error TEXT,
          updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
        );
      `
      )
      .then(
        () => undefined,
        (error: unknown) => {
          // Retry on the next call
          this.schemaInitPromise = null;
          throw error;
        }
      );

    return this.schemaInitPromise;
  }

  async record(entry: RegistrationRecord): Promise<void> {
    await this.ensureSchema();

    await this.db.query(
      `
      INSERT INTO registrations (${COLUMNS})
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
      ON CONFLICT (lfdi)
      DO UPDATE SET
        sfdi = EXCLUDED.sfdi,
        status = EXCLUDED.status,
        end_device_id = EXCLUDED.end_device_id,
        der_id = EXCLUDED.der_id,
        failed_stage = EXCLUDED.failed_stage,
        error = EXCLUDED.error,
        updated_at = EXCLUDED.updated_at
    `,
      [
        normalizeLongIdentifier(entry.lFDI),
        entry.sFDI,
        entry.status,
        entry.endDeviceID || null,
        entry.derID || null,
        entry.failedStage || null,
        entry.error || null,
        new Date(entry.updatedAt),
      ]
    );
  }

  async get(lFDI: string): Promise<RegistrationRecord | null> {
    await this.ensureSchema();
    const result = await this.db.query(`SELECT ${COLUMNS} FROM registrations WHERE lfdi = $1`, [
      normalizeLongIdentifier(lFDI),
    ]);
    return result.rows.length > 0 ? toRecord(result.rows[0]) : null;
  }

  async list(): Promise<RegistrationRecord[]> {
    await this.ensureSchema();
    const result = await this.db.query(`SELECT ${COLUMNS} FROM registrations ORDER BY lfdi`);
    return result.rows.map(toRecord);
  }

  async close(): Promise<void> {
    await this.db.end();
  }
}
