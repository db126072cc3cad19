/**
 * Ethernet and SR-IOV field validation.
 *
 * Checks run in a fixed order and the first failure is thrown; nothing after
 * it is looked at. Callers rely on that order to report a single, stable
 * error per document.
 */

import { ValidationError } from '../errors/index.js';
import {
  DUPLEX_VALUES,
  type EthernetConfig,
  type UncheckedEthernetConfig,
  type UncheckedVfDescriptor,
} from '../types/interface.js';
import { validateBoolean, validateInteger, validateString } from '../validators/fields.js';
import { MAC_ADDRESS_PATTERN } from './mac.js';

function atPath(path: string, check: () => void): void {
  try {
    check();
  } catch (error) {
    if (error instanceof ValidationError) {
      throw error.at(path);
    }
    throw error;
  }
}

function validateVf(vf: UncheckedVfDescriptor, path: string): void {
  atPath(`${path}.id`, () => validateInteger(vf.id, 'id', 0));
  atPath(`${path}.mac-address`, () =>
    validateString(vf.macAddress, 'macAddress', { pattern: MAC_ADDRESS_PATTERN })
  );
  atPath(`${path}.spoof-check`, () => validateBoolean(vf.spoofCheck, 'spoofCheck'));
  atPath(`${path}.trust`, () => validateBoolean(vf.trust, 'trust'));
  atPath(`${path}.max-tx-rate`, () => validateInteger(vf.maxTxRate, 'maxTxRate', 0));
  atPath(`${path}.min-tx-rate`, () => validateInteger(vf.minTxRate, 'minTxRate', 0));
}

/**
 * Throws the first ValidationError found in `config`; once it returns, every
 * field set on `config` has its checked type
 */
export function validateEthernet(config: UncheckedEthernetConfig): asserts config is EthernetConfig {
  atPath('ethernet.auto-negotiation', () =>
    validateBoolean(config.autoNegotiation, 'autoNegotiation')
  );
  atPath('ethernet.duplex', () =>
    validateString(config.duplex, 'duplex', { allowed: DUPLEX_VALUES })
  );
  atPath('ethernet.speed', () => validateInteger(config.speed, 'speed', 0));
  atPath('ethernet.sr-iov.total-vfs', () =>
    validateInteger(config.sriov?.totalVfs, 'totalVfs', 0)
  );

  (config.sriov?.vfs ?? []).forEach((vf, index) => {
    validateVf(vf, `ethernet.sr-iov.vfs[${index}]`);
  });
}
