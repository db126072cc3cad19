/**
 * Ethernet / SR-IOV interface state: canonicalization, validation, VF
 * reconciliation and verification snapshots
 */

export * from './types/interface.js';
export {
  NetStateError,
  ValidationError,
  ConfigurationError,
  ToolError,
  ErrorCode,
  ErrorSeverity,
  type ErrorContext,
  type ErrorDetails,
} from './errors/index.js';
export { validateBoolean, validateInteger, validateString, type StringConstraint } from './validators/fields.js';
export {
  createBaseBehavior,
  cloneInterface,
  fillMissing,
  inherit,
  type ConfigCodec,
  type InterfaceBehavior,
  type InterfaceSnapshot,
} from './interfaces/base.js';
export {
  parseInterface,
  toDocument,
  ethernetToDocument,
  InterfaceDocumentSchema,
  type InterfaceDocument,
  type EthernetDocument,
  type SriovDocument,
  type VfDocument,
} from './interfaces/document.js';
export { canonicalize } from './ethernet/canonicalize.js';
export { validateEthernet } from './ethernet/validate.js';
export { normalizeVfMacs, MAC_ADDRESS_PATTERN } from './ethernet/mac.js';
export { stateForVerify } from './ethernet/verify.js';
export {
  ethernetBehavior,
  mergeEthernetConfig,
  createEthernetInterface,
  type EthernetInterfaceOptions,
} from './ethernet/interface.js';
export { isSriov, sriovTotalVfs, sriovVfs, MAX_TOTAL_VFS } from './sriov/config.js';
export { vfName, vfNameBase, vfNames, MULTIPORT_MARKER } from './sriov/naming.js';
export { generateVfs } from './sriov/generator.js';
export { trimVfDescriptors, deletedVfNames, totalVfsMatchesList } from './sriov/reconcile.js';
export { planSriovReconciliation, type SriovReconciliation, type PlanLogger } from './sriov/plan.js';
