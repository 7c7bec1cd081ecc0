/**
 * Device file loading
 *
 * @license Apache-2.0
 */

import * as fs from 'fs';
import { parseDeviceSpecs } from '../../../src/lib/model/deviceSpec';
import type { DeviceSpec } from '../../../src/lib/registration/types';

/**
 * Read and validate a JSON device file
 *
 * @throws Error if the file cannot be read or is not valid JSON
 * @throws ValidationError if an entry does not match the device schema
 */
export function loadDeviceFile(filePath: string): DeviceSpec[] {
  const raw = fs.readFileSync(filePath, 'utf-8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Device file ${filePath} is not valid JSON: ${message}`);
  }

  return parseDeviceSpecs(parsed);
}
