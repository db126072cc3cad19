/**
 * Test fixtures
 */

import type { EthernetConfig, EthernetInterface, VfDescriptor } from '../types/interface.js';
import type { ToolCallResponse } from '../types/tools.js';

export function createVf(id: number, overrides?: Partial<VfDescriptor>): VfDescriptor {
  return { id, ...overrides };
}

export function createPf(
  name: string,
  totalVfs: number,
  vfs?: VfDescriptor[],
  overrides?: Partial<EthernetInterface>
): EthernetInterface {
  const config: EthernetConfig = { sriov: { totalVfs } };
  if (vfs && config.sriov) {
    config.sriov.vfs = vfs;
  }
  return {
    name,
    type: 'ethernet',
    state: 'up',
    config,
    origin: 'declared',
    extra: {},
    ...overrides,
  };
}

/**
 * Parse the JSON text of a tool response
 */
export function parseToolText(response: ToolCallResponse): unknown {
  const [item] = response.content;
  if (!item || item.type !== 'text') {
    throw new Error('Expected a text tool response');
  }
  return JSON.parse(item.text);
}
