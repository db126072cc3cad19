import { cloneInterface, type InterfaceSnapshot } from '../interfaces/base.js';
import { toDocument } from '../interfaces/document.js';
import type { EthernetInterface } from '../types/interface.js';
import { canonicalize } from './canonicalize.js';
import { normalizeVfMacs } from './mac.js';

/**
 * Snapshot of `entity` to compare against the live state after apply.
 *
 * Works on a copy. A generated VF has no `state` in its snapshot: the kernel
 * decides whether it comes up while its PF is changing the VF count, so its
 * state cannot be predicted. Missing keys are not compared.
 */
export function stateForVerify(
  entity: EthernetInterface,
  serialize: (entity: EthernetInterface) => InterfaceSnapshot = toDocument
): InterfaceSnapshot {
  const copy = cloneInterface(entity);
  normalizeVfMacs(copy.config);
  canonicalize(copy.config);

  const snapshot = serialize(copy);
  if (copy.origin === 'generated') {
    delete snapshot.state;
  }
  return snapshot;
}
