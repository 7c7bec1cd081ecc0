/**
 * File-based registration ledger
 *
 * Suitable for a single operator machine. Use Postgres when several
 * aggregator instances register devices against the same server.
 *
 * @license Apache-2.0
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { normalizeLongIdentifier } from '../identity/deviceIdentity';
import { DEFAULT_LEDGER_PATH } from '../config';
import { errorCode, errorMessage } from '../errors';
import { toRegistrationRecord } from './RegistrationLedger';
import type { RegistrationLedger, RegistrationRecord } from './RegistrationLedger';

interface LedgerData {
  records: RegistrationRecord[];
}

export class FileRegistrationLedger implements RegistrationLedger {
  private dataPath: string;
  private data: LedgerData | null = null;

  constructor(dataPath: string = DEFAULT_LEDGER_PATH) {
    this.dataPath = dataPath;
  }

  private async init(): Promise<LedgerData> {
    if (this.data !== null) return this.data;

    let content: string;
    try {
      await fs.mkdir(path.dirname(this.dataPath), { recursive: true });
      content = await fs.readFile(this.dataPath, 'utf-8');
    } catch (error: unknown) {
      if (errorCode(error) !== 'ENOENT') {
        throw new Error(`Failed to load registration ledger: ${errorMessage(error)}`);
      }
      this.data = { records: [] };
      await this.persist(this.data);
      return this.data;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error: unknown) {
      throw new Error(`Registration ledger ${this.dataPath} is not valid JSON: ${errorMessage(error)}`);
    }

    const stored =
      typeof parsed === 'object' && parsed !== null && 'records' in parsed && Array.isArray(parsed.records)
        ? parsed.records
        : [];
    const records: RegistrationRecord[] = [];
    for (const value of stored) {
      const record = toRegistrationRecord(value);
      if (record) records.push(record);
    }

    this.data = { records };
    return this.data;
  }

  private async persist(data: LedgerData): Promise<void> {
    const tempPath = `${this.dataPath}.tmp`;
    await fs.writeFile(tempPath, JSON.stringify(data, null, 2), 'utf-8');
    await fs.rename(tempPath, this.dataPath);
  }

  async record(entry: RegistrationRecord): Promise<void> {
    const data = await this.init();
    const normalized: RegistrationRecord = { ...entry, lFDI: normalizeLongIdentifier(entry.lFDI) };

    data.records = data.records.filter((r) => r.lFDI !== normalized.lFDI);
    data.records.push(normalized);
    data.records.sort((a, b) => a.lFDI.localeCompare(b.lFDI));

    await this.persist(data);
  }

  async get(lFDI: string): Promise<RegistrationRecord | null> {
    const data = await this.init();
    const key = normalizeLongIdentifier(lFDI);
    return data.records.find((r) => r.lFDI === key) ?? null;
  }

  async list(): Promise<RegistrationRecord[]> {
    const data = await this.init();
    return [...data.records];
  }

  async close(): Promise<void> {
    this.data = null;
  }
}
