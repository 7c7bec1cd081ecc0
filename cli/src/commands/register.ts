/**
 * Register command - Register the devices of a device file
 *
 * @license Apache-2.0
 */

import { Command } from 'commander';
import type { RegistrationService } from '../../../src/lib/application/RegistrationService';
import { createRegistrationService } from '../../../src/lib/factory/createRegistrationService';
import { loadDeviceFile } from '../lib/deviceFile';
import { formatOutcome, formatSummary, summarizeOutcomes } from '../lib/format';
import { toConfigOverrides } from '../lib/options';
import type { GlobalOptions } from '../lib/options';
import { printRequest, reportError } from '../lib/report';

interface RegisterCommandOptions {
  force?: boolean;
  resume?: boolean;
  continueOnError?: boolean;
}

export function registerCommand(program: Command) {
  program
    .command('register')
    .description('Register the devices listed in a JSON device file')
    .argument('<deviceFile>', 'JSON file: an array of devices or { "devices": [...] }')
    .option('--force', 'Register devices the ledger already shows on the server')
    .option('--resume', 'Continue devices whose last run failed after the EndDevice was created')
    .option('--continue-on-error', 'Keep registering after a device fails')
    .action(async (deviceFile: string, options: RegisterCommandOptions) => {
      let service: RegistrationService | null = null;

      try {
        // 1. Validate the whole file before anything is sent
        const specs = loadDeviceFile(deviceFile);
        console.log(`Loaded ${specs.length} device(s) from ${deviceFile}\n`);

        // 2. Wire transport, orchestrator and ledger
        const overrides = toConfigOverrides(program.opts<GlobalOptions>());
        service = createRegistrationService(overrides, { sink: printRequest });

        // 3. Register
        const outcomes = await service.registerDevices(specs, {
          force: options.force,
          resume: options.resume,
          abortOnError: !options.continueOnError,
        });

        console.log('');
        for (const outcome of outcomes) {
          console.log(formatOutcome(outcome));
        }

        const summary = summarizeOutcomes(outcomes);
        console.log(`\n${formatSummary(summary)}`);
        if (summary.failed > 0) {
          process.exitCode = 1;
        }
      } catch (error: unknown) {
        reportError(error);
      } finally {
        if (service) {
          await service.close();
        }
      }
    });
}
