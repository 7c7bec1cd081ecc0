/**
 * Error reporting for CLI commands
 *
 * @license Apache-2.0
 */

import { RegistrationError } from '../../../src/lib/errors';

/**
 * Print an error and mark the process as failed. The exit code is set rather
 * than exiting, so that open transports and ledgers are closed first.
 */
export function reportError(error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`\nError: ${message}`);

  if (error instanceof RegistrationError && error.completed.endDeviceID) {
    console.error(`EndDevice /edev/${error.completed.endDeviceID} was created before the failure`);
  }
  if (error instanceof Error && error.stack && process.env.DEBUG) {
    console.error('\nStack trace:', error.stack);
  }
  process.exitCode = 1;
}

/**
 * Sink for recording mode: print each request as it would be sent
 */
export function printRequest(rendered: string): void {
  console.log(`${rendered}\n`);
}
