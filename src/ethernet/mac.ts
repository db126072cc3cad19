import type { EthernetConfig } from '../types/interface.js';

export const MAC_ADDRESS_PATTERN = /^([0-9a-fA-F]{2}:){3,31}[0-9a-fA-F]{2}$/;

/**
 * Upper-case every VF MAC so snapshots compare regardless of input case
 */
export function normalizeVfMacs(config: EthernetConfig): EthernetConfig {
  for (const vf of config.sriov?.vfs ?? []) {
    if (vf.macAddress) {
      vf.macAddress = vf.macAddress.toUpperCase();
    }
  }
  return config;
}
