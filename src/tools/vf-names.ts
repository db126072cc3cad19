import { vfNameBase, vfNames } from '../sriov/naming.js';
import type { DeriveVfNamesArgs } from '../types/tools.js';

export interface VfNamesReport {
  pfName: string;
  base: string;
  names: string[];
}

/**
 * derive_vf_names: VF interface names of a PF for `[fromIndex, totalVfs)`
 */
export function deriveVfNames(args: DeriveVfNamesArgs): VfNamesReport {
  return {
    pfName: args.pfName,
    base: vfNameBase(args.pfName),
    names: vfNames(args.pfName, args.fromIndex, args.totalVfs),
  };
}
