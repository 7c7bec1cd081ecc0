/**
 * Registration Application Service
 *
 * Runs device registrations against the ledger:
 * 1. Look the device up in the ledger (skip it unless forced or resumed)
 * 2. Register it (via RegistrationOrchestrator)
 * 3. Record the outcome, including ids of partially created resources
 *
 * @license Apache-2.0
 */

import { RegistrationError, ValidationError, errorMessage } from '../errors';
import { deriveShortIdentifier } from '../identity/deviceIdentity';
import { defaultLogger } from '../logger';
import type { Logger } from '../logger';
import { recordFromError, recordFromResult, requiresForce, resumePointFromRecord } from '../ledger/RegistrationLedger';
import type { RegistrationLedger, RegistrationRecord } from '../ledger/RegistrationLedger';
import { RegistrationOrchestrator } from '../registration/RegistrationOrchestrator';
import type { BatchOptions, BatchOutcome, DeviceSpec, RegistrationResult } from '../registration/types';
import type { Transport } from '../transport/Transport';

/**
 * Outcome of one device. ledgerError is set when the server side went as
 * reported but the ledger could not be updated.
 */
export type DeviceOutcome =
  | (BatchOutcome & { ledgerError?: string })
  | { lFDI: string; status: 'already-registered'; record: RegistrationRecord };

export interface RegisterDevicesOptions extends BatchOptions {
  /** Register even when the ledger shows resources on the server for the device */
  force?: boolean;
  /** Continue partially registered devices from the ledger's ids instead of skipping them */
  resume?: boolean;
}

export interface RegistrationServiceOptions {
  /** Timeout applied to every request */
  timeoutMs?: number;
  logger?: Logger;
  /** Timestamp source for ledger records */
  clock?: () => Date;
}

/**
 * Owns the transport and the ledger; close() releases both
 */
export class RegistrationService {
  private orchestrator: RegistrationOrchestrator;
  private logger: Logger;
  private clock: () => Date;

  constructor(
    private transport: Transport,
    private ledger: RegistrationLedger,
    options: RegistrationServiceOptions = {}
  ) {
    this.logger = options.logger ?? defaultLogger;
    this.clock = options.clock ?? (() => new Date());
    this.orchestrator = new RegistrationOrchestrator(transport, {
      timeoutMs: options.timeoutMs,
      logger: this.logger,
    });
  }

  /**
   * Register devices one after another, consulting and updating the ledger
   *
   * With abortOnError (default), the devices after the first failure are
   * reported as skipped. Devices the ledger already holds are reported as
   * already-registered and do not count as failures. With resume, a device
   * whose last run failed after its EndDevice was created continues from
   * there; resume takes precedence over force for such devices.
   */
  async registerDevices(specs: DeviceSpec[], options: RegisterDevicesOptions = {}): Promise<DeviceOutcome[]> {
    const abortOnError = options.abortOnError ?? true;
    const outcomes: DeviceOutcome[] = [];
    let aborted = false;

    for (const spec of specs) {
      if (aborted) {
        outcomes.push({ lFDI: spec.lFDI, status: 'skipped' });
        continue;
      }

      const existing = await this.findRecord(spec.lFDI);
      const resume = options.resume ? resumePointFromRecord(existing) : null;
      if (existing && !resume && requiresForce(existing) && !options.force) {
        const hint = resumePointFromRecord(existing)
          ? 'use --resume to continue or --force to register again'
          : 'use --force to register again';
        this.logger.warn(
          `[${existing.lFDI}] already in the ledger (${existing.status}, EndDevice ${existing.endDeviceID ?? 'none'}); ${hint}`
        );
        outcomes.push({ lFDI: spec.lFDI, status: 'already-registered', record: existing });
        continue;
      }

      let result: RegistrationResult;
      try {
        result = await this.orchestrator.registerEndDevice(spec, {
          onStage: options.onStage,
          resume: resume ?? undefined,
        });
      } catch (error: unknown) {
        if (!(error instanceof RegistrationError)) throw error;

        this.logger.error(`[${spec.lFDI}] ${error.message}`);
        const ledgerError = hasShortIdentifier(spec.lFDI)
          ? await this.tryRecord(recordFromError(spec.lFDI, error, this.clock()))
          : undefined;
        outcomes.push({ lFDI: spec.lFDI, status: 'failed', error, ledgerError });
        aborted = abortOnError;
        continue;
      }

      const ledgerError = await this.tryRecord(recordFromResult(result, this.clock()));
      outcomes.push({ lFDI: spec.lFDI, status: 'complete', result, ledgerError });
    }

    return outcomes;
  }

  /**
   * Ledger entries, ordered by LFDI
   */
  async listRegistrations(): Promise<RegistrationRecord[]> {
    return this.ledger.list();
  }

  async close(): Promise<void> {
    try {
      await this.transport.close();
    } finally {
      await this.ledger.close();
    }
  }

  private async findRecord(lFDI: string): Promise<RegistrationRecord | null> {
    // An invalid LFDI has no ledger entry; the orchestrator reports it
    if (!hasShortIdentifier(lFDI)) return null;
    return this.ledger.get(lFDI);
  }

  /**
   * Write a ledger record. A failed write does not undo what the server
   * already holds, so it is logged and returned rather than thrown.
   */
  private async tryRecord(entry: RegistrationRecord): Promise<string | undefined> {
    try {
      await this.ledger.record(entry);
      return undefined;
    } catch (error: unknown) {
      const message = errorMessage(error);
      this.logger.error(
        `[${entry.lFDI}] ${entry.status} on the server (EndDevice ${entry.endDeviceID ?? 'none'}), ` +
          `but the ledger was not updated: ${message}`
      );
      return message;
    }
  }
}

/** Whether the LFDI is well formed and long enough to derive an SFDI */
function hasShortIdentifier(lFDI: string): boolean {
  try {
    deriveShortIdentifier(lFDI);
    return true;
  } catch (error: unknown) {
    if (error instanceof ValidationError) return false;
    throw error;
  }
}
