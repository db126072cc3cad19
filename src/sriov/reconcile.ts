/**
 * Reconciling the VF descriptor list against a changed VF count
 */

import type { EthernetConfig, VfDescriptor } from '../types/interface.js';
import { sriovTotalVfs } from './config.js';
import { vfNames } from './naming.js';

/**
 * Drop trailing descriptors until the list fits the declared count.
 * Returns the dropped descriptors in list order.
 */
export function trimVfDescriptors(config: EthernetConfig): VfDescriptor[] {
  const vfs = config.sriov?.vfs;
  if (!vfs) {
    return [];
  }

  const total = sriovTotalVfs(config);
  const removed: VfDescriptor[] = [];
  while (vfs.length > total) {
    const vf = vfs.pop();
    if (vf) {
      removed.unshift(vf);
    }
  }
  return removed;
}

/**
 * VF interfaces that disappear when the count goes from `oldTotalVfs` down to
 * `newTotalVfs`
 */
export function deletedVfNames(pfName: string, oldTotalVfs: number, newTotalVfs: number): string[] {
  return vfNames(pfName, newTotalVfs, oldTotalVfs);
}

export function totalVfsMatchesList(totalVfs: number, vfs: readonly VfDescriptor[]): boolean {
  return totalVfs === vfs.length;
}
