#!/usr/bin/env node

/**
 * EndDevice registration CLI
 *
 * Registers an aggregator's devices with a smart-grid resource server
 * (EndDevice, DeviceInformation, DER, DERCapability, ConnectionPoint)
 *
 * @license Apache-2.0
 */

import { Command } from 'commander';
import * as dotenv from 'dotenv';
import * as path from 'path';
import { getClientConfigFromEnv, mergeClientConfig } from '../../src/lib/config';
import { ledgerCommand } from './commands/ledger';
import { lfdiCommand, sfdiCommand } from './commands/identity';
import { listCommand } from './commands/list';
import { registerCommand } from './commands/register';
import { selfRegisterCommand } from './commands/self-register';
import { toConfigOverrides } from './lib/options';
import type { GlobalOptions } from './lib/options';
import { reportError } from './lib/report';

// Load environment variables
// Project root first (when run from the sources), then the working directory
const projectRoot = path.resolve(__dirname, '../..');
dotenv.config({ path: path.join(projectRoot, '.env.local') });
dotenv.config({ path: path.join(projectRoot, '.env') });
dotenv.config({ path: path.join(process.cwd(), '.env') });

const program = new Command();

program
  .name('edev-registrar')
  .description('Register end devices with a smart-grid resource server on behalf of an aggregator')
  .version('0.1.0');

// Connection options (global); each overrides its environment variable
program
  .option('-s, --server <url>', 'Resource server URL (SERVER_URL)')
  .option('--transport <mode>', 'https or recording (TRANSPORT_MODE)')
  .option('--dry-run', 'Print requests instead of sending them (same as --transport recording)')
  .option('--auth <mode>', 'certificate or local-token (AUTH_MODE)')
  .option('--cert <file>', 'PEM client certificate (CLIENT_CERT_PATH)')
  .option('--key <file>', 'PEM private key (CLIENT_KEY_PATH)')
  .option('--ca <file>', 'PEM CA bundle for the server certificate (CA_CERT_PATH)')
  .option('--lfdi <hex>', 'Aggregator LFDI (AGGREGATOR_LFDI)')
  .option('--timeout <ms>', 'Per-request timeout in milliseconds (REQUEST_TIMEOUT_MS)')
  .option('--ledger <backend>', 'file or postgres (LEDGER_BACKEND)')
  .option('--ledger-path <file>', 'Ledger file for the file backend (LEDGER_PATH)');

// Registration
registerCommand(program);
selfRegisterCommand(program);

// Queries
listCommand(program);
ledgerCommand(program);

// Identity
sfdiCommand(program);
lfdiCommand(program);

// Info command
program
  .command('info')
  .description('Show the effective configuration')
  .action(() => {
    try {
      const config = mergeClientConfig(getClientConfigFromEnv(), toConfigOverrides(program.opts<GlobalOptions>()));

      console.log('EndDevice Registrar Configuration:');
      console.log(`  Server: ${config.serverUrl || '(not set)'}`);
      console.log(`  Transport: ${config.transportMode}`);
      console.log(`  Auth: ${config.authMode}`);
      if (config.authMode === 'certificate') {
        console.log(`  Client certificate: ${config.clientCertPath ?? '(not set)'}`);
        console.log(`  Client key: ${config.clientKeyPath ?? '(not set)'}`);
        console.log(`  CA bundle: ${config.caCertPath ?? '(system default)'}`);
      }
      console.log(`  Aggregator LFDI: ${config.aggregatorLfdi ?? '(from certificate)'}`);
      console.log(`  Request timeout: ${config.timeoutMs} ms`);
      console.log(
        `  Ledger: ${config.ledgerBackend}${config.ledgerBackend === 'file' ? ` (${config.ledgerPath})` : ''}`
      );
    } catch (error: unknown) {
      reportError(error);
    }
  });

program.parseAsync(process.argv).catch(reportError);

// Show help if no command
if (!process.argv.slice(2).length) {
  program.outputHelp();
}
