/**
 * Unit tests for the interface document codec
 */

import { describe, it, expect } from '@jest/globals';
import { ValidationError } from '../errors/index.js';
import { parseInterface, toDocument } from './document.js';

function parseError(doc: unknown): ValidationError {
  try {
    parseInterface(doc);
  } catch (error) {
    if (error instanceof ValidationError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected parsing to fail');
}

const PF_DOCUMENT = {
  name: 'ens2f0np0',
  type: 'ethernet',
  state: 'up',
  ethernet: {
    'auto-negotiation': false,
    speed: 25000,
    duplex: 'full',
    'sr-iov': {
      'total-vfs': 2,
      vfs: [
        {
          id: 0,
          'mac-address': 'aa:bb:cc:dd:ee:01',
          'spoof-check': true,
          trust: false,
          'max-tx-rate': 1000,
          'min-tx-rate': 10,
        },
        { id: 1 },
      ],
    },
  },
};

describe('parseInterface', () => {
  it('should map document keys onto the model', () => {
    const entity = parseInterface(PF_DOCUMENT);

    expect(entity).toEqual({
      name: 'ens2f0np0',
      type: 'ethernet',
      state: 'up',
      origin: 'declared',
      extra: {},
      config: {
        autoNegotiation: false,
        speed: 25000,
        duplex: 'full',
        sriov: {
          totalVfs: 2,
          vfs: [
            {
              id: 0,
              macAddress: 'aa:bb:cc:dd:ee:01',
              spoofCheck: true,
              trust: false,
              maxTxRate: 1000,
              minTxRate: 10,
            },
            { id: 1 },
          ],
        },
      },
    });
  });

  it('should default the state to up', () => {
    expect(parseInterface({ name: 'eth0', type: 'ethernet' }).state).toBe('up');
  });

  it('should keep unknown top-level keys as extra', () => {
    const entity = parseInterface({ name: 'eth0', type: 'ethernet', mtu: 9000, description: 'uplink' });

    expect(entity.extra).toEqual({ mtu: 9000, description: 'uplink' });
  });

  it('should tag the origin it is given', () => {
    expect(parseInterface({ name: 'eth0v0', type: 'ethernet' }, 'generated').origin).toBe('generated');
  });

  it('should canonicalize the configuration', () => {
    const entity = parseInterface({
      name: 'eth0',
      type: 'ethernet',
      ethernet: { 'auto-negotiation': true, speed: 1000, duplex: 'full' },
    });

    expect(entity.config).toEqual({ autoNegotiation: true });
  });

  it('should treat null values as unset', () => {
    const entity = parseInterface({
      name: 'eth0',
      type: 'ethernet',
      ethernet: { speed: null, 'sr-iov': { 'total-vfs': 1, vfs: [{ id: 0, trust: null }] } },
    });

    expect(entity.config).toEqual({ sriov: { totalVfs: 1, vfs: [{ id: 0 }] } });
    expect('speed' in entity.config).toBe(false);
  });

  it('should accept a VF without an id', () => {
    const entity = parseInterface({
      name: 'eth0',
      type: 'ethernet',
      ethernet: { 'sr-iov': { 'total-vfs': 1, vfs: [{ trust: true }] } },
    });

    expect(entity.config.sriov?.vfs).toEqual([{ trust: true }]);
  });

  describe('errors', () => {
    it('should name the model field of a mistyped value', () => {
      const error = parseError({
        name: 'eth0',
        type: 'ethernet',
        ethernet: { 'auto-negotiation': 'yes' },
      });

      expect(error.field).toBe('autoNegotiation');
      expect(error.path).toBe('ethernet.auto-negotiation');
    });

    it('should locate errors inside the VF list', () => {
      const error = parseError({
        name: 'eth0',
        type: 'ethernet',
        ethernet: { 'sr-iov': { vfs: [{ id: 0 }, { id: 1, 'spoof-check': 'on' }] } },
      });

      expect(error.field).toBe('spoofCheck');
      expect(error.path).toBe('ethernet.sr-iov.vfs[1].spoof-check');
    });

    it('should report the first field in check order, whatever its kind of error', () => {
      const error = parseError({
        name: 'eth0',
        type: 'ethernet',
        ethernet: { speed: 'fast', duplex: 'diagonal' },
      });

      expect(error.field).toBe('duplex');
      expect(error.path).toBe('ethernet.duplex');
    });

    it('should not check what auto-negotiation drops', () => {
      expect(() =>
        parseInterface({
          name: 'eth0',
          type: 'ethernet',
          ethernet: { 'auto-negotiation': true, duplex: 'diagonal', speed: 'fast' },
        })
      ).not.toThrow();
    });

    it('should name the subtree of a structural error', () => {
      const error = parseError({ name: 'eth0', type: 'ethernet', ethernet: { 'sr-iov': 'on' } });

      expect(error.field).toBe('sriov');
      expect(error.path).toBe('ethernet.sr-iov');
    });

    it('should reject other interface types', () => {
      expect(parseError({ name: 'bond0', type: 'bond' }).field).toBe('type');
    });

    it('should reject documents that are not objects', () => {
      const error = parseError(null);

      expect(error.field).toBe('interface');
      expect(error.path).toBeUndefined();
    });
  });
});

describe('toDocument', () => {
  it('should emit what was parsed', () => {
    expect(toDocument(parseInterface(PF_DOCUMENT))).toEqual(PF_DOCUMENT);
  });

  it('should never emit the origin tag', () => {
    const doc = toDocument(parseInterface({ name: 'eth0v1', type: 'ethernet' }, 'generated'));

    expect(doc).toEqual({ name: 'eth0v1', type: 'ethernet', state: 'up' });
  });

  it('should omit an empty ethernet subtree', () => {
    const doc = toDocument(parseInterface({ name: 'eth0', type: 'ethernet', ethernet: {} }));

    expect(doc).toEqual({ name: 'eth0', type: 'ethernet', state: 'up' });
  });
});
