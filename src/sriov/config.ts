import type { EthernetConfig, VfDescriptor } from '../types/interface.js';

// PCI SR-IOV caps TotalVFs at a 16-bit value
export const MAX_TOTAL_VFS = 65535;

export function isSriov(config: EthernetConfig): boolean {
  return config.sriov !== undefined;
}

/**
 * Declared VF count; an unset count means zero VFs
 */
export function sriovTotalVfs(config: EthernetConfig): number {
  return config.sriov?.totalVfs ?? 0;
}

export function sriovVfs(config: EthernetConfig): VfDescriptor[] {
  return config.sriov?.vfs ?? [];
}
