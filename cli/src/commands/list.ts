/**
 * List command - Page through the EndDevices registered on the server
 *
 * @license Apache-2.0
 */

import { Command } from 'commander';
import * as fs from 'fs';
import type { EndDeviceClient } from '../../../src/lib/client/EndDeviceClient';
import { DEFAULT_PAGE_SIZE } from '../../../src/lib/client/EndDeviceClient';
import { createEndDeviceClient } from '../../../src/lib/factory/createRegistrationService';
import type { RegisteredEndDevice } from '../../../src/lib/model/types';
import { formatEndDevice } from '../lib/format';
import { parseCount, toConfigOverrides } from '../lib/options';
import type { GlobalOptions } from '../lib/options';
import { reportError } from '../lib/report';

interface ListCommandOptions {
  all?: boolean;
  pageSize: string;
  start: string;
  output?: string;
}

export function listCommand(program: Command) {
  program
    .command('list')
    .description('List EndDevices registered on the server')
    .option('--all', "Include the aggregator's own EndDevice")
    .option('--page-size <number>', 'Entries requested per page', String(DEFAULT_PAGE_SIZE))
    .option('--start <number>', 'Index of the first entry', '0')
    .option('-o, --output <file>', 'Output JSON file with results')
    .action(async (options: ListCommandOptions) => {
      let client: EndDeviceClient | null = null;

      try {
        const pageSize = parseCount(options.pageSize, '--page-size');
        const start = parseCount(options.start, '--start', 0);

        client = await createEndDeviceClient(toConfigOverrides(program.opts<GlobalOptions>()));

        const devices: RegisteredEndDevice[] = [];
        for await (const device of client.iterateEndDevices({ includeSelf: options.all, pageSize, start })) {
          devices.push(device);
          console.log(formatEndDevice(device));
        }

        if (devices.length === 0) {
          console.log('No EndDevices found');
        } else {
          console.log(`\n${devices.length} EndDevice(s)`);
        }

        if (options.output) {
          fs.writeFileSync(
            options.output,
            JSON.stringify({ total: devices.length, endDevices: devices, timestamp: new Date().toISOString() }, null, 2)
          );
          console.log(`\nResults saved to: ${options.output}`);
        }
      } catch (error: unknown) {
        reportError(error);
      } finally {
        if (client) {
          await client.close();
        }
      }
    });
}
