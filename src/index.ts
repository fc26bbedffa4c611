/**
 * certkeeper: TLS certificate lifecycle over ACME with DNS-01 validation
 */

export * from './lib/index.js';
