/**
 * One SR-IOV reconciliation pass for a physical function.
 *
 * Merges the current PF into the desired one, validates the result, trims
 * the VF descriptor list to the declared count, synthesizes the VF entities
 * and, when the count shrank, lists the VF interfaces that go away.
 */

import { ethernetBehavior } from '../ethernet/interface.js';
import { validateEthernet } from '../ethernet/validate.js';
import { ValidationError } from '../errors/index.js';
import { cloneInterface } from '../interfaces/base.js';
import type { Logger } from '../logger/index.js';
import type { EthernetConfig, EthernetInterface } from '../types/interface.js';
import { MAX_TOTAL_VFS, sriovTotalVfs, sriovVfs } from './config.js';
import { generateVfs } from './generator.js';
import { deletedVfNames, totalVfsMatchesList, trimVfDescriptors } from './reconcile.js';

export interface SriovReconciliation {
  /** Desired PF after merge, canonicalization and trimming */
  pf: EthernetInterface;
  generatedVfs: EthernetInterface[];
  deletedVfNames: string[];
  /** Whether the declared VF list covered every declared VF before trimming */
  vfListComplete: boolean;
  trimmedCount: number;
}

export type PlanLogger = Pick<Logger, 'debug' | 'info'>;

/**
 * Hold the VF count to the PCI limit
 */
function validateVfCount(config: EthernetConfig): void {
  const totalVfs = sriovTotalVfs(config);
  if (totalVfs > MAX_TOTAL_VFS) {
    throw new ValidationError('totalVfs', `must be at most ${MAX_TOTAL_VFS}, got ${totalVfs}`, {
      path: 'ethernet.sr-iov.total-vfs',
    });
  }
}

export function planSriovReconciliation(
  desired: EthernetInterface,
  current?: EthernetInterface,
  logger?: PlanLogger
): SriovReconciliation {
  // The observed count decides which VF names get deleted
  if (current) {
    validateEthernet(current.config);
    validateVfCount(current.config);
  }

  const pf = cloneInterface(desired);
  if (current) {
    ethernetBehavior.merge(pf, current);
  }

  ethernetBehavior.validateAndClean(pf);
  validateVfCount(pf.config);

  const totalVfs = sriovTotalVfs(pf.config);
  const vfListComplete = totalVfsMatchesList(totalVfs, sriovVfs(pf.config));
  const trimmed = trimVfDescriptors(pf.config);
  if (trimmed.length > 0) {
    logger?.info('Dropped VF entries beyond total-vfs', {
      interface: pf.name,
      totalVfs,
      dropped: trimmed.map((vf) => vf.id),
    });
  }

  const generatedVfs = generateVfs(pf);

  const oldTotalVfs = current ? sriovTotalVfs(current.config) : 0;
  const deleted = deletedVfNames(pf.name, oldTotalVfs, totalVfs);
  if (deleted.length > 0) {
    logger?.info('VF count decreased', {
      interface: pf.name,
      from: oldTotalVfs,
      to: totalVfs,
      deleted,
    });
  }

  logger?.debug('Planned SR-IOV reconciliation', {
    interface: pf.name,
    totalVfs,
    generated: generatedVfs.length,
    vfListComplete,
  });

  return {
    pf,
    generatedVfs,
    deletedVfNames: deleted,
    vfListComplete,
    trimmedCount: trimmed.length,
  };
}
