/**
 * Ethernet interface behavior: the base capability set plus link
 * canonicalization, Ethernet/SR-IOV validation and the VF-aware
 * verification snapshot.
 */

import {
  createBaseBehavior,
  inherit,
  type InterfaceBehavior,
} from '../interfaces/base.js';
import { toDocument } from '../interfaces/document.js';
import type { EthernetConfig, EthernetInterface, InterfaceState } from '../types/interface.js';
import { canonicalize } from './canonicalize.js';
import { validateEthernet } from './validate.js';
import { stateForVerify } from './verify.js';

/**
 * Unset link fields come from `other`. A declared VF list replaces the
 * current one wholesale; it is never merged per VF.
 */
export function mergeEthernetConfig(self: EthernetConfig, other: EthernetConfig): void {
  inherit(self, other, 'autoNegotiation');
  inherit(self, other, 'speed');
  inherit(self, other, 'duplex');

  if (other.sriov) {
    if (!self.sriov) {
      self.sriov = structuredClone(other.sriov);
    } else {
      inherit(self.sriov, other.sriov, 'totalVfs');
      inherit(self.sriov, other.sriov, 'vfs');
    }
  }
}

const base = createBaseBehavior<EthernetConfig>({
  mergeConfig: mergeEthernetConfig,
  toSnapshot: toDocument,
});

export const ethernetBehavior: InterfaceBehavior<EthernetConfig> = {
  merge(self, other) {
    base.merge(self, other);
    canonicalize(self.config);
  },

  validateAndClean(self) {
    canonicalize(self.config);
    validateEthernet(self.config);
    base.validateAndClean(self);
  },

  stateForVerify(self) {
    return stateForVerify(self, base.stateForVerify);
  },
};

export interface EthernetInterfaceOptions {
  state?: InterfaceState;
  extra?: Record<string, unknown>;
}

export function createEthernetInterface(
  name: string,
  config: EthernetConfig = {},
  options: EthernetInterfaceOptions = {}
): EthernetInterface {
  return {
    name,
    type: 'ethernet',
    state: options.state ?? 'up',
    config,
    origin: 'declared',
    extra: options.extra ?? {},
  };
}
