import type { EthernetInterface } from '../types/interface.js';
import { sriovTotalVfs } from './config.js';
import { vfName } from './naming.js';

/**
 * Synthesize one ethernet entity per declared VF slot of `pf`.
 *
 * VFs start out down. The result is tagged `generated` and must never be
 * written back into the PF or the document; it is rebuilt on every pass.
 */
export function generateVfs(pf: EthernetInterface): EthernetInterface[] {
  const vfs: EthernetInterface[] = [];
  const total = sriovTotalVfs(pf.config);

  for (let index = 0; index < total; index++) {
    vfs.push({
      name: vfName(pf.name, index),
      type: 'ethernet',
      state: 'down',
      config: {},
      origin: 'generated',
      extra: {},
    });
  }

  return vfs;
}
