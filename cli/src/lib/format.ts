/**
 * Console formatting for registration results
 *
 * @license Apache-2.0
 */

import type { DeviceOutcome } from '../../../src/lib/application/RegistrationService';
import { resumePointFromRecord } from '../../../src/lib/ledger/RegistrationLedger';
import type { RegistrationRecord } from '../../../src/lib/ledger/RegistrationLedger';
import type { RegisteredEndDevice } from '../../../src/lib/model/types';

export interface OutcomeSummary {
  complete: number;
  failed: number;
  skipped: number;
  alreadyRegistered: number;
}

function ledgerWarning(ledgerError: string | undefined): string {
  return ledgerError ? `\n  warning: ledger not updated: ${ledgerError}` : '';
}

export function formatOutcome(outcome: DeviceOutcome): string {
  switch (outcome.status) {
    case 'complete':
      return (
        `✓ ${outcome.lFDI}  EndDevice /edev/${outcome.result.endDeviceID}` +
        `  DER /edev/${outcome.result.endDeviceID}/der/${outcome.result.derID}  SFDI ${outcome.result.sFDI}` +
        ledgerWarning(outcome.ledgerError)
      );
    case 'failed': {
      const created = outcome.error.completed.endDeviceID
        ? ` (EndDevice /edev/${outcome.error.completed.endDeviceID} was created)`
        : '';
      return `✗ ${outcome.lFDI}  ${outcome.error.message}${created}${ledgerWarning(outcome.ledgerError)}`;
    }
    case 'skipped':
      return `- ${outcome.lFDI}  skipped after an earlier failure`;
    case 'already-registered': {
      const hint = resumePointFromRecord(outcome.record)
        ? 'use --resume to continue or --force to register again'
        : 'use --force to register again';
      return `= ${outcome.lFDI}  already registered (${outcome.record.status}), ${hint}`;
    }
  }
}

export function summarizeOutcomes(outcomes: DeviceOutcome[]): OutcomeSummary {
  const summary: OutcomeSummary = { complete: 0, failed: 0, skipped: 0, alreadyRegistered: 0 };
  for (const outcome of outcomes) {
    switch (outcome.status) {
      case 'complete':
        summary.complete++;
        break;
      case 'failed':
        summary.failed++;
        break;
      case 'skipped':
        summary.skipped++;
        break;
      case 'already-registered':
        summary.alreadyRegistered++;
        break;
    }
  }
  return summary;
}

export function formatSummary(summary: OutcomeSummary): string {
  return (
    `${summary.complete} registered, ${summary.failed} failed, ` +
    `${summary.skipped} skipped, ${summary.alreadyRegistered} already registered`
  );
}

export function formatRecord(record: RegistrationRecord): string {
  const ids = record.endDeviceID
    ? `/edev/${record.endDeviceID}${record.derID ? `/der/${record.derID}` : ''}`
    : '-';
  const failure = record.status === 'failed' ? `  at ${record.failedStage ?? '?'}: ${record.error ?? ''}` : '';
  return `${record.lFDI}  ${record.sFDI}  ${record.status}  ${ids}  ${record.updatedAt}${failure}`;
}

export function formatEndDevice(device: RegisteredEndDevice): string {
  const state = device.enabled ? 'enabled' : 'disabled';
  return `${device.href ?? '-'}  LFDI ${device.lFDI}  SFDI ${device.sFDI}  category ${device.deviceCategory}  ${state}`;
}
