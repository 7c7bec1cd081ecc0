/**
 * Tests for device file parsing
 *
 * @license Apache-2.0
 */

import { describe, it, expect } from '@jest/globals';
import { parseDeviceSpec, parseDeviceSpecs } from '../deviceSpec';
import { ValidationError } from '../../errors';

function entry(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    lFDI: '3E4F45AB3',
    deviceCategory: 8388608,
    deviceInformation: { mfModel: 'Model-X', mfSerNum: 'SN-0001' },
    derCapability: { modesSupported: 3, type: 83, rtgMaxW: { value: 5000, multiplier: 0 } },
    connectionPoint: { meterID: 'MTR-0001' },
    ...overrides,
  };
}

describe('parseDeviceSpec', () => {
  it('should split end device fields from the nested resources', () => {
    const spec = parseDeviceSpec(entry({ postRate: 300 }));

    expect(spec).toEqual({
      lFDI: '3E4F45AB3',
      endDevice: { deviceCategory: 8388608, changedTime: undefined, postRate: 300, enabled: undefined },
      deviceInformation: { mfModel: 'Model-X', mfSerNum: 'SN-0001' },
      derCapability: { modesSupported: 3, type: 83, rtgMaxW: { value: 5000, multiplier: 0 } },
      connectionPoint: { meterID: 'MTR-0001' },
    });
  });

  it('should derive the LFDI from a local identifier', () => {
    const spec = parseDeviceSpec(entry({ lFDI: undefined, localIdentifier: 'ACME-0001' }));
    expect(spec.lFDI).toBe('41434D452D30303031');
  });

  it('should require exactly one of lFDI and localIdentifier', () => {
    expect(() => parseDeviceSpec(entry({ lFDI: undefined }))).toThrow(
      'root: exactly one of "lFDI" or "localIdentifier" is required'
    );
    expect(() => parseDeviceSpec(entry({ localIdentifier: 'ACME-0001' }))).toThrow(
      'root: exactly one of "lFDI" or "localIdentifier" is required'
    );
  });

  it('should report missing nested properties with their path', () => {
    expect(() =>
      parseDeviceSpec(entry({ connectionPoint: {} }), '/devices/0')
    ).toThrow('/devices/0/connectionPoint: missing required property "meterID"');
  });

  it('should reject unknown properties', () => {
    expect(() => parseDeviceSpec(entry({ deviceCatgory: 1 }))).toThrow('root: unknown property "deviceCatgory"');
  });

  it('should reject wrong types', () => {
    expect(() => parseDeviceSpec(entry({ deviceCategory: '8388608' }))).toThrow(ValidationError);
  });
});

describe('parseDeviceSpecs', () => {
  it('should accept an array or a devices object', () => {
    expect(parseDeviceSpecs([entry()])).toHaveLength(1);
    expect(parseDeviceSpecs({ devices: [entry(), entry({ lFDI: '0001111000011F' })] })).toHaveLength(2);
  });

  it('should name the failing entry', () => {
    expect(() => parseDeviceSpecs({ devices: [entry(), entry({ derCapability: { modesSupported: 1 } })] })).toThrow(
      '/devices/1/derCapability: missing required property "type"'
    );
  });

  it('should reject duplicate identifiers', () => {
    expect(() => parseDeviceSpecs([entry(), entry({ lFDI: '0x3e4f45ab3' })])).toThrow(
      'devices: duplicate lFDI 0x3e4f45ab3'
    );
  });

  it('should reject other shapes', () => {
    expect(() => parseDeviceSpecs({ items: [] })).toThrow('device file must be an array');
  });
});
