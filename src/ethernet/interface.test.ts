/**
 * Unit tests for the ethernet capability set
 */

import { describe, it, expect } from '@jest/globals';
import { createPf, createVf } from '../__tests__/utils.js';
import { ValidationError } from '../errors/index.js';
import { createEthernetInterface, ethernetBehavior, mergeEthernetConfig } from './interface.js';

describe('mergeEthernetConfig', () => {
  it('should take unset link fields from the other config', () => {
    const self = { autoNegotiation: false };
    mergeEthernetConfig(self, { speed: 1000, duplex: 'full', autoNegotiation: true });

    expect(self).toEqual({ autoNegotiation: false, speed: 1000, duplex: 'full' });
  });

  it('should keep a declared VF list as a whole', () => {
    const self = { sriov: { vfs: [createVf(0, { trust: true })] } };
    mergeEthernetConfig(self, { sriov: { totalVfs: 4, vfs: [createVf(0), createVf(1), createVf(2)] } });

    expect(self).toEqual({ sriov: { totalVfs: 4, vfs: [{ id: 0, trust: true }] } });
  });

  it('should copy the SR-IOV subtree when only the other side has one', () => {
    const other = { sriov: { totalVfs: 2, vfs: [createVf(0)] } };
    const self = {};
    mergeEthernetConfig(self, other);

    expect(self).toEqual({ sriov: { totalVfs: 2, vfs: [{ id: 0 }] } });
    other.sriov.vfs.push(createVf(1));
    expect(self).toEqual({ sriov: { totalVfs: 2, vfs: [{ id: 0 }] } });
  });
});

describe('ethernetBehavior', () => {
  describe('merge', () => {
    it('should canonicalize after merging', () => {
      const desired = createEthernetInterface('eth0', { autoNegotiation: true });
      const current = createEthernetInterface('eth0', { autoNegotiation: false, speed: 1000, duplex: 'full' });

      ethernetBehavior.merge(desired, current);

      expect(desired.config).toEqual({ autoNegotiation: true });
    });

    it('should bring in speed and duplex when auto-negotiation is off', () => {
      const desired = createEthernetInterface('eth0', { autoNegotiation: false });
      const current = createEthernetInterface('eth0', { autoNegotiation: true, speed: 100, duplex: 'half' });

      ethernetBehavior.merge(desired, current);

      expect(desired.config).toEqual({ autoNegotiation: false, speed: 100, duplex: 'half' });
    });

    it('should keep the desired state, origin and extra keys', () => {
      const desired = createEthernetInterface('eth0', {}, { state: 'down', extra: { mtu: 9000 } });
      const current = createEthernetInterface('eth0', {}, { extra: { mtu: 1500, description: 'uplink' } });

      ethernetBehavior.merge(desired, current);

      expect(desired.state).toBe('down');
      expect(desired.origin).toBe('declared');
      expect(desired.extra).toEqual({ mtu: 9000, description: 'uplink' });
    });

    it('should refuse to merge different interfaces', () => {
      const desired = createEthernetInterface('eth0');
      const current = createEthernetInterface('eth1');

      expect(() => ethernetBehavior.merge(desired, current)).toThrow(ValidationError);
    });
  });

  describe('validateAndClean', () => {
    it('should run the ethernet checks', () => {
      const pf = createPf('eth0', 1, [createVf(0, { macAddress: 'zz:11:22:33:44:55' })]);

      expect(() => ethernetBehavior.validateAndClean(pf)).toThrow('Invalid macAddress');
    });

    it('should canonicalize before checking', () => {
      const entity = createEthernetInterface('eth0', { autoNegotiation: true, speed: 1000, duplex: 'diagonal' });

      expect(() => ethernetBehavior.validateAndClean(entity)).not.toThrow();
      expect(entity.config).toEqual({ autoNegotiation: true });
    });

    it('should run the base checks after the ethernet ones', () => {
      const entity = createEthernetInterface('', { duplex: 'diagonal' });

      expect(() => ethernetBehavior.validateAndClean(entity)).toThrow('Invalid duplex');
      entity.config = {};
      expect(() => ethernetBehavior.validateAndClean(entity)).toThrow('Invalid name: must not be empty');
    });
  });

  describe('stateForVerify', () => {
    it('should include extra document keys', () => {
      const entity = createEthernetInterface('eth0', { speed: 1000 }, { extra: { mtu: 9000 } });

      expect(ethernetBehavior.stateForVerify(entity)).toEqual({
        name: 'eth0',
        type: 'ethernet',
        state: 'up',
        mtu: 9000,
        ethernet: { speed: 1000 },
      });
    });
  });
});
