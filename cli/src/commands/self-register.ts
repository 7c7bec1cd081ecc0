/**
 * Self-register command - Register the aggregator's own EndDevice
 *
 * @license Apache-2.0
 */

import { Command } from 'commander';
import type { EndDeviceClient } from '../../../src/lib/client/EndDeviceClient';
import { createEndDeviceClient } from '../../../src/lib/factory/createRegistrationService';
import { toConfigOverrides } from '../lib/options';
import type { GlobalOptions } from '../lib/options';
import { printRequest, reportError } from '../lib/report';

export function selfRegisterCommand(program: Command) {
  program
    .command('self-register')
    .description("Register the aggregator's own EndDevice (virtual or mixed DER)")
    .action(async () => {
      let client: EndDeviceClient | null = null;

      try {
        client = await createEndDeviceClient(toConfigOverrides(program.opts<GlobalOptions>()), {
          sink: printRequest,
        });

        const result = await client.createSelfDevice();

        console.log('Aggregator registered\n');
        console.log(`EndDevice: /edev/${result.endDeviceID}`);
        console.log(`LFDI: ${result.lFDI}`);
        console.log(`SFDI: ${result.sFDI}`);
      } catch (error: unknown) {
        reportError(error);
      } finally {
        if (client) {
          await client.close();
        }
      }
    });
}
