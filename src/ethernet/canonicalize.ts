import type { UncheckedEthernetConfig } from '../types/interface.js';

/**
 * With auto-negotiation on, explicit speed and duplex mean nothing; drop them.
 * Mutates `config` and returns it. Idempotent.
 */
export function canonicalize(config: UncheckedEthernetConfig): UncheckedEthernetConfig {
  if (config.autoNegotiation === true) {
    delete config.speed;
    delete config.duplex;
  }
  return config;
}
