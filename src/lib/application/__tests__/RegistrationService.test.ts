/**
 * Tests for RegistrationService
 *
 * @license Apache-2.0
 */

import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import { RegistrationService } from '../RegistrationService';
import type { RegistrationLedger, RegistrationRecord } from '../../ledger/RegistrationLedger';
import type { DeviceSpec } from '../../registration/types';
import { RecordingTransport } from '../../transport/RecordingTransport';
import { DERType, DeviceCategoryType } from '../../model/types';

const NOW = new Date('2024-05-01T12:00:00.000Z');

class MemoryLedger implements RegistrationLedger {
  readonly records = new Map<string, RegistrationRecord>();
  closed = false;

  async record(entry: RegistrationRecord): Promise<void> {
    this.records.set(entry.lFDI, entry);
  }

  async get(lFDI: string): Promise<RegistrationRecord | null> {
    return this.records.get(lFDI.toUpperCase()) ?? null;
  }

  async list(): Promise<RegistrationRecord[]> {
    return [...this.records.values()].sort((a, b) => a.lFDI.localeCompare(b.lFDI));
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

function deviceSpec(lFDI: string): DeviceSpec {
  return {
    lFDI,
    endDevice: { deviceCategory: DeviceCategoryType.CombinedPvAndStorage },
    deviceInformation: { mfModel: 'Model-X', mfSerNum: 'SN-0001' },
    derCapability: { modesSupported: 3, type: DERType.CombinedPvAndStorage, rtgMaxW: { value: 5000 } },
    connectionPoint: { meterID: 'MTR-0001' },
  };
}

const completeRecord: RegistrationRecord = {
  lFDI: '3E4F45AB3',
  sFDI: '167261211391',
  status: 'complete',
  endDeviceID: '7',
  derID: '3',
  updatedAt: '2024-04-01T00:00:00.000Z',
};

describe('RegistrationService', () => {
  let logger: { info: jest.Mock; warn: jest.Mock; error: jest.Mock };
  let ledger: MemoryLedger;

  beforeEach(() => {
    logger = { info: jest.fn(), warn: jest.fn(), error: jest.fn() };
    ledger = new MemoryLedger();
  });

  function serviceFor(transport: RecordingTransport): RegistrationService {
    return new RegistrationService(transport, ledger, { logger, clock: () => NOW });
  }

  it('should register devices and record them', async () => {
    const transport = new RecordingTransport();
    const service = serviceFor(transport);

    const outcomes = await service.registerDevices([deviceSpec('3E4F45AB3'), deviceSpec('0001111000011F')]);

    expect(outcomes.map((o) => o.status)).toEqual(['complete', 'complete']);
    expect(await service.listRegistrations()).toEqual([
      {
        lFDI: '0001111000011F',
        sFDI: '000011184645',
        status: 'complete',
        endDeviceID: '2',
        derID: '1',
        updatedAt: '2024-05-01T12:00:00.000Z',
      },
      {
        lFDI: '3E4F45AB3',
        sFDI: '167261211391',
        status: 'complete',
        endDeviceID: '1',
        derID: '1',
        updatedAt: '2024-05-01T12:00:00.000Z',
      },
    ]);
  });

  it('should not register a device the ledger holds as complete', async () => {
    await ledger.record(completeRecord);
    const transport = new RecordingTransport();

    const outcomes = await serviceFor(transport).registerDevices([deviceSpec('3e4f45ab3')]);

    expect(outcomes).toEqual([{ lFDI: '3e4f45ab3', status: 'already-registered', record: completeRecord }]);
    expect(transport.requests).toHaveLength(0);
    expect(logger.warn).toHaveBeenCalledWith(
      '[3E4F45AB3] already in the ledger (complete, EndDevice 7); use --force to register again'
    );
  });

  it('should register again when forced', async () => {
    await ledger.record(completeRecord);
    const transport = new RecordingTransport();

    const outcomes = await serviceFor(transport).registerDevices([deviceSpec('3E4F45AB3')], { force: true });

    expect(outcomes[0].status).toBe('complete');
    expect(transport.requests).toHaveLength(5);
    expect(ledger.records.get('3E4F45AB3')?.endDeviceID).toBe('1');
  });

  it('should retry a device that failed before anything was created', async () => {
    await ledger.record({
      lFDI: '3E4F45AB3',
      sFDI: '167261211391',
      status: 'failed',
      failedStage: 'EndDeviceCreated',
      error: 'connect ECONNREFUSED',
      updatedAt: '2024-04-01T00:00:00.000Z',
    });
    const transport = new RecordingTransport();

    const outcomes = await serviceFor(transport).registerDevices([deviceSpec('3E4F45AB3')]);

    expect(outcomes[0].status).toBe('complete');
  });

  it('should record a partial registration and skip the rest', async () => {
    const transport = new RecordingTransport({
      responder: (request, defaultResponse) =>
        request.path === '/edev/1/der' ? { statusCode: 500, headers: {}, body: '' } : defaultResponse,
    });

    const outcomes = await serviceFor(transport).registerDevices([
      deviceSpec('3E4F45AB3'),
      deviceSpec('0001111000011F'),
    ]);

    expect(outcomes.map((o) => o.status)).toEqual(['failed', 'skipped']);
    expect(ledger.records.get('3E4F45AB3')).toEqual({
      lFDI: '3E4F45AB3',
      sFDI: '167261211391',
      status: 'failed',
      endDeviceID: '1',
      derID: undefined,
      failedStage: 'DERCreated',
      error: 'POST /edev/1/der returned 500, expected 201',
      updatedAt: '2024-05-01T12:00:00.000Z',
    });
    expect(ledger.records.has('0001111000011F')).toBe(false);
    expect(logger.error).toHaveBeenCalledWith(
      '[3E4F45AB3] Registration failed at DERCreated: POST /edev/1/der returned 500, expected 201'
    );
  });

  it('should report an invalid LFDI without touching the ledger', async () => {
    const transport = new RecordingTransport();

    const outcomes = await serviceFor(transport).registerDevices([deviceSpec('XYZ')], { abortOnError: false });

    expect(outcomes[0].status).toBe('failed');
    expect(ledger.records.size).toBe(0);
    expect(transport.requests).toHaveLength(0);
  });

  it('should keep going after an LFDI too short for an SFDI', async () => {
    const transport = new RecordingTransport();

    const outcomes = await serviceFor(transport).registerDevices([deviceSpec('ABC'), deviceSpec('3E4F45AB3')], {
      abortOnError: false,
    });

    expect(outcomes.map((o) => o.status)).toEqual(['failed', 'complete']);
    expect([...ledger.records.keys()]).toEqual(['3E4F45AB3']);
    expect(transport.requests).toHaveLength(5);
  });

  it('should report a complete registration when the ledger cannot be written', async () => {
    jest.spyOn(ledger, 'record').mockRejectedValue(new Error('disk full'));
    const transport = new RecordingTransport();

    const outcomes = await serviceFor(transport).registerDevices([
      deviceSpec('3E4F45AB3'),
      deviceSpec('0001111000011F'),
    ]);

    expect(outcomes[0]).toEqual({
      lFDI: '3E4F45AB3',
      status: 'complete',
      result: { endDeviceID: '1', derID: '1', lFDI: '3E4F45AB3', sFDI: '167261211391' },
      ledgerError: 'disk full',
    });
    expect(outcomes[1].status).toBe('complete');
    expect(logger.error).toHaveBeenCalledWith(
      '[3E4F45AB3] complete on the server (EndDevice 1), but the ledger was not updated: disk full'
    );
  });

  describe('resume', () => {
    const partial: RegistrationRecord = {
      lFDI: '3E4F45AB3',
      sFDI: '167261211391',
      status: 'failed',
      endDeviceID: '4',
      failedStage: 'DERCreated',
      error: 'POST /edev/4/der returned 500, expected 201',
      updatedAt: '2024-04-01T00:00:00.000Z',
    };

    it('should skip a partial registration and suggest --resume', async () => {
      await ledger.record(partial);
      const transport = new RecordingTransport();

      const outcomes = await serviceFor(transport).registerDevices([deviceSpec('3E4F45AB3')]);

      expect(outcomes[0].status).toBe('already-registered');
      expect(transport.requests).toHaveLength(0);
      expect(logger.warn).toHaveBeenCalledWith(
        '[3E4F45AB3] already in the ledger (failed, EndDevice 4); use --resume to continue or --force to register again'
      );
    });

    it('should continue after a failed DERCreated without posting a new EndDevice', async () => {
      await ledger.record(partial);
      const transport = new RecordingTransport();

      const outcomes = await serviceFor(transport).registerDevices([deviceSpec('3E4F45AB3')], { resume: true });

      expect(outcomes[0].status).toBe('complete');
      expect(transport.requests.map((r) => `${r.method} ${r.url}`)).toEqual([
        'POST https://localhost/edev/4/der',
        'PUT https://localhost/edev/4/der/1/dercap',
        'PUT https://localhost/edev/4/cp',
      ]);
      expect(ledger.records.get('3E4F45AB3')).toEqual({
        lFDI: '3E4F45AB3',
        sFDI: '167261211391',
        status: 'complete',
        endDeviceID: '4',
        derID: '1',
        updatedAt: '2024-05-01T12:00:00.000Z',
      });
    });

    it('should continue after a failed ConnectionPointSet with the recorded DER', async () => {
      await ledger.record({ ...partial, derID: '2', failedStage: 'ConnectionPointSet' });
      const transport = new RecordingTransport();

      const outcomes = await serviceFor(transport).registerDevices([deviceSpec('3E4F45AB3')], { resume: true });

      expect(outcomes[0].status === 'complete' && outcomes[0].result.derID).toBe('2');
      expect(transport.requests.map((r) => `${r.method} ${r.url}`)).toEqual(['PUT https://localhost/edev/4/cp']);
    });

    it('should register from scratch when there is nothing to resume', async () => {
      const transport = new RecordingTransport();

      const outcomes = await serviceFor(transport).registerDevices([deviceSpec('3E4F45AB3')], { resume: true });

      expect(outcomes[0].status).toBe('complete');
      expect(transport.requests).toHaveLength(5);
    });

    it('should not resume a complete registration', async () => {
      await ledger.record(completeRecord);
      const transport = new RecordingTransport();

      const outcomes = await serviceFor(transport).registerDevices([deviceSpec('3E4F45AB3')], { resume: true });

      expect(outcomes[0].status).toBe('already-registered');
      expect(transport.requests).toHaveLength(0);
    });
  });

  it('should close the transport and the ledger', async () => {
    const transport = new RecordingTransport();
    const close = jest.spyOn(transport, 'close');

    await serviceFor(transport).close();

    expect(close).toHaveBeenCalledTimes(1);
    expect(ledger.closed).toBe(true);
  });
});
