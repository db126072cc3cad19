/**
 * plan_sriov_reconciliation: preview one SR-IOV pass for a PF
 */

import { parseInterface, toDocument, type InterfaceDocument } from '../interfaces/document.js';
import { planSriovReconciliation, type PlanLogger } from '../sriov/plan.js';
import type { PlanSriovReconciliationArgs } from '../types/tools.js';

export interface SriovPlanReport {
  pf: InterfaceDocument;
  generatedVfs: InterfaceDocument[];
  deletedVfNames: string[];
  vfListComplete: boolean;
  trimmedCount: number;
}

export function planSriov(args: PlanSriovReconciliationArgs, logger?: PlanLogger): SriovPlanReport {
  const desired = parseInterface(args.desired);
  const current = args.current ? parseInterface(args.current) : undefined;

  const plan = planSriovReconciliation(desired, current, logger);

  return {
    pf: toDocument(plan.pf),
    generatedVfs: plan.generatedVfs.map(toDocument),
    deletedVfNames: plan.deletedVfNames,
    vfListComplete: plan.vfListComplete,
    trimmedCount: plan.trimmedCount,
  };
}
