/**
 * Debug logging for certkeeper
 *
 * Output is off unless the DEBUG environment variable selects a namespace:
 *
 * DEBUG=certkeeper:*            - everything
 * DEBUG=certkeeper:acme         - ACME protocol steps
 * DEBUG=certkeeper:http         - raw HTTP traffic
 * DEBUG=certkeeper:challenge    - DNS record publication and cleanup
 * DEBUG=certkeeper:lifecycle    - issue / renew workflow
 */

import debug from 'debug';

const root = debug('certkeeper');

export const debugHttp = root.extend('http');
export const debugAcme = root.extend('acme');
export const debugNonce = root.extend('nonce');
export const debugRetry = root.extend('retry');
export const debugChallenge = root.extend('challenge');
export const debugLifecycle = root.extend('lifecycle');
export const debugConfig = root.extend('config');
export const debugCredentials = root.extend('credentials');

const debugWarn = root.extend('warn');

export type WarnLogger = (message: string) => void;

let logger: WarnLogger | undefined;

/** Install a sink that receives every warning in addition to the debug stream. */
export function setLogger(fn: WarnLogger | undefined): void {
  logger = fn;
}

export function logWarn(message: string, ...args: unknown[]): void {
  const warnMessage = `WARN: ${message}`;

  if (logger) {
    logger(warnMessage);
  }

  debugWarn(warnMessage, ...args);
}
