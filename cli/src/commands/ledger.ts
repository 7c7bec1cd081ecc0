/**
 * Ledger command - Show what the local registration ledger holds
 *
 * @license Apache-2.0
 */

import { Command } from 'commander';
import { getClientConfigFromEnv, mergeClientConfig } from '../../../src/lib/config';
import { createRegistrationLedger } from '../../../src/lib/ledger/createRegistrationLedger';
import type { RegistrationLedger } from '../../../src/lib/ledger/RegistrationLedger';
import { formatRecord } from '../lib/format';
import { toConfigOverrides } from '../lib/options';
import type { GlobalOptions } from '../lib/options';
import { reportError } from '../lib/report';

interface LedgerCommandOptions {
  failed?: boolean;
  json?: boolean;
}

export function ledgerCommand(program: Command) {
  program
    .command('ledger')
    .description('Show registrations recorded in the local ledger')
    .option('--failed', 'Only show failed registrations')
    .option('--json', 'Output records as JSON')
    .action(async (options: LedgerCommandOptions) => {
      let ledger: RegistrationLedger | null = null;

      try {
        const config = mergeClientConfig(getClientConfigFromEnv(), toConfigOverrides(program.opts<GlobalOptions>()));
        ledger = createRegistrationLedger(config);

        const records = (await ledger.list()).filter((r) => !options.failed || r.status === 'failed');

        if (options.json) {
          console.log(JSON.stringify(records, null, 2));
        } else if (records.length === 0) {
          console.log('No registrations recorded');
        } else {
          records.forEach((record) => console.log(formatRecord(record)));
        }
      } catch (error: unknown) {
        reportError(error);
      } finally {
        if (ledger) {
          await ledger.close();
        }
      }
    });
}
