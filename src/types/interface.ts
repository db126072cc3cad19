/**
 * Interface state model
 */

export type InterfaceType = 'ethernet';

export type InterfaceState = 'up' | 'down' | 'absent';

export const INTERFACE_STATES: readonly InterfaceState[] = ['up', 'down', 'absent'];

/**
 * Whether an entity came from the user's document or was synthesized while
 * reconciling a PF. Lives beside the configuration, never inside it.
 */
export type InterfaceOrigin = 'declared' | 'generated';

export type Duplex = 'full' | 'half';

export const DUPLEX_VALUES: readonly Duplex[] = ['full', 'half'];

export interface VfDescriptor {
  id?: number;
  macAddress?: string;
  spoofCheck?: boolean;
  trust?: boolean;
  maxTxRate?: number; // Mbps
  minTxRate?: number; // Mbps
}

export interface SriovConfig {
  totalVfs?: number;
  vfs?: VfDescriptor[];
}

export interface EthernetConfig {
  autoNegotiation?: boolean;
  speed?: number; // Mbps
  // Kept as a plain string so an out-of-range value survives until validation
  duplex?: string;
  sriov?: SriovConfig;
}

/**
 * Configuration as read from a document, before any field has been checked.
 * `validateEthernet` narrows it to EthernetConfig.
 */
export interface UncheckedEthernetConfig {
  autoNegotiation?: unknown;
  speed?: unknown;
  duplex?: unknown;
  sriov?: {
    totalVfs?: unknown;
    vfs?: UncheckedVfDescriptor[];
  };
}

export interface UncheckedVfDescriptor {
  id?: unknown;
  macAddress?: unknown;
  spoofCheck?: unknown;
  trust?: unknown;
  maxTxRate?: unknown;
  minTxRate?: unknown;
}

export interface InterfaceEntity<C> {
  name: string;
  type: InterfaceType;
  state: InterfaceState;
  config: C;
  origin: InterfaceOrigin;
  /** Document keys this core does not interpret, carried verbatim */
  extra: Record<string, unknown>;
}

export type EthernetInterface = InterfaceEntity<EthernetConfig>;
