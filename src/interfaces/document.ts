/**
 * Interface document codec.
 *
 * Documents use the kebab-case keys of the desired-state format; the model
 * uses typed camelCase fields. The zod schemas here only check the
 * *structure* of a document: which keys hold objects and lists. Leaf values
 * are left unknown and go through canonicalization and then the ordered
 * checks of validateEthernet, so the first failing field in that order is
 * the one reported.
 */

import { z, type ZodIssue } from 'zod';
import { canonicalize } from '../ethernet/canonicalize.js';
import { validateEthernet } from '../ethernet/validate.js';
import { ValidationError } from '../errors/index.js';
import type {
  EthernetConfig,
  EthernetInterface,
  InterfaceOrigin,
  UncheckedEthernetConfig,
  UncheckedVfDescriptor,
  VfDescriptor,
} from '../types/interface.js';

export const InterfaceStateSchema = z.enum(['up', 'down', 'absent']);

export const VfDocumentSchema = z.object({
  id: z.unknown(),
  'mac-address': z.unknown(),
  'spoof-check': z.unknown(),
  trust: z.unknown(),
  'max-tx-rate': z.unknown(),
  'min-tx-rate': z.unknown(),
});

export const SriovDocumentSchema = z.object({
  'total-vfs': z.unknown(),
  vfs: z.array(VfDocumentSchema).optional(),
});

export const EthernetDocumentSchema = z.object({
  'auto-negotiation': z.unknown(),
  duplex: z.unknown(),
  speed: z.unknown(),
  'sr-iov': SriovDocumentSchema.optional(),
});

export const InterfaceDocumentSchema = z
  .object({
    name: z.string(),
    type: z.literal('ethernet'),
    state: InterfaceStateSchema.default('up'),
    ethernet: EthernetDocumentSchema.optional(),
  })
  .passthrough();

export type VfDocument = z.input<typeof VfDocumentSchema>;
export type SriovDocument = z.input<typeof SriovDocumentSchema>;
export type EthernetDocument = z.input<typeof EthernetDocumentSchema>;
export type InterfaceDocument = z.input<typeof InterfaceDocumentSchema>;

const FIELD_NAMES: Record<string, string> = {
  'auto-negotiation': 'autoNegotiation',
  'sr-iov': 'sriov',
  'total-vfs': 'totalVfs',
  'mac-address': 'macAddress',
  'spoof-check': 'spoofCheck',
  'max-tx-rate': 'maxTxRate',
  'min-tx-rate': 'minTxRate',
};

function formatPath(path: ReadonlyArray<string | number>): string {
  return path.reduce<string>((acc, segment) => {
    if (typeof segment === 'number') {
      return `${acc}[${segment}]`;
    }
    return acc ? `${acc}.${segment}` : segment;
  }, '');
}

/**
 * Turn the first zod issue into the ValidationError the rest of the core
 * raises, naming the model field rather than the document key
 */
export function issueToValidationError(issue: ZodIssue): ValidationError {
  const key = [...issue.path].reverse().find((segment): segment is string => typeof segment === 'string');
  const field = key === undefined ? 'interface' : FIELD_NAMES[key] ?? key;
  const path = formatPath(issue.path);
  return new ValidationError(field, issue.message, path ? { path } : undefined);
}

// null counts as unset, the same as a missing key
function isSet(value: unknown): boolean {
  return value !== undefined && value !== null;
}

function vfFromDocument(doc: z.output<typeof VfDocumentSchema>): UncheckedVfDescriptor {
  const vf: UncheckedVfDescriptor = {};
  if (isSet(doc.id)) vf.id = doc.id;
  if (isSet(doc['mac-address'])) vf.macAddress = doc['mac-address'];
  if (isSet(doc['spoof-check'])) vf.spoofCheck = doc['spoof-check'];
  if (isSet(doc.trust)) vf.trust = doc.trust;
  if (isSet(doc['max-tx-rate'])) vf.maxTxRate = doc['max-tx-rate'];
  if (isSet(doc['min-tx-rate'])) vf.minTxRate = doc['min-tx-rate'];
  return vf;
}

function ethernetFromDocument(doc: z.output<typeof EthernetDocumentSchema> | undefined): UncheckedEthernetConfig {
  const config: UncheckedEthernetConfig = {};
  if (!doc) {
    return config;
  }

  if (isSet(doc['auto-negotiation'])) config.autoNegotiation = doc['auto-negotiation'];
  if (isSet(doc.speed)) config.speed = doc.speed;
  if (isSet(doc.duplex)) config.duplex = doc.duplex;

  const sriovDoc = doc['sr-iov'];
  if (sriovDoc) {
    config.sriov = {};
    if (isSet(sriovDoc['total-vfs'])) config.sriov.totalVfs = sriovDoc['total-vfs'];
    if (sriovDoc.vfs !== undefined) config.sriov.vfs = sriovDoc.vfs.map(vfFromDocument);
  }

  return config;
}

/**
 * Parse one interface document into an ethernet entity. The configuration is
 * canonicalized and then checked field by field.
 * Throws ValidationError for the first structural or field error.
 */
export function parseInterface(doc: unknown, origin: InterfaceOrigin = 'declared'): EthernetInterface {
  const result = InterfaceDocumentSchema.safeParse(doc);
  if (!result.success) {
    const [issue] = result.error.issues;
    throw issue ? issueToValidationError(issue) : new ValidationError('interface', 'invalid document');
  }

  const { name, type, state, ethernet, ...extra } = result.data;

  const config = ethernetFromDocument(ethernet);
  canonicalize(config);
  validateEthernet(config);

  return {
    name,
    type,
    state,
    config,
    origin,
    extra,
  };
}

function vfToDocument(vf: VfDescriptor): VfDocument {
  const doc: VfDocument = {};
  if (vf.id !== undefined) doc.id = vf.id;
  if (vf.macAddress !== undefined) doc['mac-address'] = vf.macAddress;
  if (vf.spoofCheck !== undefined) doc['spoof-check'] = vf.spoofCheck;
  if (vf.trust !== undefined) doc.trust = vf.trust;
  if (vf.maxTxRate !== undefined) doc['max-tx-rate'] = vf.maxTxRate;
  if (vf.minTxRate !== undefined) doc['min-tx-rate'] = vf.minTxRate;
  return doc;
}

/**
 * The `ethernet` subtree of a document, or undefined when nothing is set
 */
export function ethernetToDocument(config: EthernetConfig): EthernetDocument | undefined {
  const doc: EthernetDocument = {};
  if (config.autoNegotiation !== undefined) doc['auto-negotiation'] = config.autoNegotiation;
  if (config.speed !== undefined) doc.speed = config.speed;
  if (config.duplex !== undefined) doc.duplex = config.duplex;

  if (config.sriov) {
    const sriov: SriovDocument = {};
    if (config.sriov.totalVfs !== undefined) sriov['total-vfs'] = config.sriov.totalVfs;
    if (config.sriov.vfs !== undefined) sriov.vfs = config.sriov.vfs.map(vfToDocument);
    doc['sr-iov'] = sriov;
  }

  return Object.keys(doc).length > 0 ? doc : undefined;
}

/**
 * Emit an entity as a document. The origin tag is never written.
 */
export function toDocument(entity: EthernetInterface): InterfaceDocument {
  const doc: InterfaceDocument = {
    name: entity.name,
    type: entity.type,
    state: entity.state,
  };
  Object.assign(doc, structuredClone(entity.extra));

  const ethernet = ethernetToDocument(entity.config);
  if (ethernet) {
    doc.ethernet = ethernet;
  }
  return doc;
}
