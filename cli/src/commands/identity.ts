/**
 * Identity commands - Derive device identifiers without contacting the server
 *
 * @license Apache-2.0
 */

import { Command } from 'commander';
import * as fs from 'fs';
import {
  deriveShortIdentifier,
  isValidShortIdentifier,
  lfdiFromCertificatePem,
  lfdiFromLocalIdentifier,
  lfdiToDecimal,
  localIdentifierFromLfdi,
  normalizeLongIdentifier,
} from '../../../src/lib/identity/deviceIdentity';
import { reportError } from '../lib/report';

interface LfdiCommandOptions {
  fromCert?: string;
  fromLocalId?: string;
  decode?: string;
}

export function sfdiCommand(program: Command) {
  program
    .command('sfdi')
    .description('Derive the short form device identifier of an LFDI')
    .argument('<lfdi>', 'Long form device identifier (hex)')
    .action((lfdi: string) => {
      try {
        const normalized = normalizeLongIdentifier(lfdi);
        console.log(`LFDI: ${normalized}`);
        console.log(`SFDI: ${deriveShortIdentifier(normalized)}`);
        console.log(`Decimal: ${lfdiToDecimal(normalized)}`);
      } catch (error: unknown) {
        reportError(error);
      }
    });

  program
    .command('check-sfdi')
    .description('Check the checksum digit of an SFDI')
    .argument('<sfdi>', 'Short form device identifier (decimal)')
    .action((sfdi: string) => {
      if (isValidShortIdentifier(sfdi)) {
        console.log(`${sfdi} is valid`);
      } else {
        console.error(`${sfdi} is not a valid SFDI`);
        process.exitCode = 1;
      }
    });
}

export function lfdiCommand(program: Command) {
  program
    .command('lfdi')
    .description('Derive an LFDI from a device certificate or a local identifier')
    .option('--from-cert <file>', 'PEM certificate of a self-certified device')
    .option('--from-local-id <id>', 'Aggregator-side unique identifier')
    .option('--decode <lfdi>', 'Recover the local identifier an LFDI was built from')
    .action((options: LfdiCommandOptions) => {
      try {
        const given = [options.fromCert, options.fromLocalId, options.decode].filter((v) => v !== undefined);
        if (given.length !== 1) {
          throw new Error('Give exactly one of --from-cert, --from-local-id or --decode');
        }

        if (options.decode !== undefined) {
          console.log(`Local identifier: ${localIdentifierFromLfdi(options.decode)}`);
          return;
        }

        const lfdi =
          options.fromCert !== undefined
            ? lfdiFromCertificatePem(fs.readFileSync(options.fromCert))
            : lfdiFromLocalIdentifier(options.fromLocalId ?? '');

        console.log(`LFDI: ${lfdi}`);
        console.log(`SFDI: ${deriveShortIdentifier(lfdi)}`);
      } catch (error: unknown) {
        reportError(error);
      }
    });
}
