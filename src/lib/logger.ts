/**
 * Logger accepted by services and transports
 *
 * Any console-compatible object works; defaults to the global console.
 *
 * @license Apache-2.0
 */

export type Logger = Pick<Console, 'info' | 'warn' | 'error'>;

export const defaultLogger: Logger = console;
