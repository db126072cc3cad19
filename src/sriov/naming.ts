/**
 * VF interface naming.
 *
 * systemd's net-naming-scheme gives an SR-IOV VF the name of its PF followed
 * by `v<index>`. Broadcom BCM57416 (bnxt_en) breaks this: the PF carries an
 * `n` for multi-port PCI devices and a `p<port>` phys_port_name, so the PF
 * `ens2f0np0` owns VFs `ens2f0v0`, `ens2f0v1`, ... The `np<port>` suffix is
 * cut off before the VF suffix is appended.
 *
 * Any PF name containing `np` exactly once is treated this way, whatever the
 * reason it contains `np`.
 */

const MULTIPORT_PCI_DEVICE_PREFIX = 'n';
const BNXT_PHYS_PORT_PREFIX = 'p';

export const MULTIPORT_MARKER = MULTIPORT_PCI_DEVICE_PREFIX + BNXT_PHYS_PORT_PREFIX;

export function vfNameBase(pfName: string): string {
  const parts = pfName.split(MULTIPORT_MARKER);
  if (parts.length === 2 && parts[0] !== undefined) {
    return parts[0];
  }
  return pfName;
}

export function vfName(pfName: string, index: number): string {
  return `${vfNameBase(pfName)}v${index}`;
}

/**
 * Names of VFs `from` (inclusive) through `to` (exclusive), ascending
 */
export function vfNames(pfName: string, from: number, to: number): string[] {
  const names: string[] = [];
  for (let index = from; index < to; index++) {
    names.push(vfName(pfName, index));
  }
  return names;
}
