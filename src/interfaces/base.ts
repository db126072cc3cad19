/**
 * Behavior shared by every interface type.
 *
 * An interface type is a capability set over its entity: how to merge a
 * current entity into a desired one, how to validate and clean it before an
 * edit, and what snapshot to compare after apply. Specific types build their
 * set by wrapping the base one rather than subclassing it.
 */

import { ValidationError } from '../errors/index.js';
import { INTERFACE_STATES, type InterfaceEntity, type InterfaceState } from '../types/interface.js';
import { validateString } from '../validators/fields.js';

/**
 * Comparable form of an entity, keyed the way documents are
 */
export interface InterfaceSnapshot {
  name: string;
  type: string;
  state?: InterfaceState;
  [key: string]: unknown;
}

export interface InterfaceBehavior<C> {
  /** Fill what `self` leaves unset from `other`. Mutates `self`. */
  merge(self: InterfaceEntity<C>, other: InterfaceEntity<C>): void;
  /** Throw the first ValidationError, then normalize `self` for an edit */
  validateAndClean(self: InterfaceEntity<C>): void;
  stateForVerify(self: InterfaceEntity<C>): InterfaceSnapshot;
}

export interface ConfigCodec<C> {
  mergeConfig(self: C, other: C): void;
  toSnapshot(entity: InterfaceEntity<C>): InterfaceSnapshot;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Copy every key missing from `target` out of `source`, recursing into plain
 * objects. Arrays and scalars already on `target` win.
 */
export function fillMissing(target: Record<string, unknown>, source: Record<string, unknown>): void {
  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) continue;

    const targetValue = target[key];
    if (targetValue === undefined) {
      target[key] = structuredClone(sourceValue);
    } else if (isPlainObject(targetValue) && isPlainObject(sourceValue)) {
      fillMissing(targetValue, sourceValue);
    }
  }
}

/**
 * Take `other[key]` when `self` leaves it unset
 */
export function inherit<T, K extends keyof T>(self: T, other: T, key: K): void {
  if (self[key] === undefined && other[key] !== undefined) {
    self[key] = structuredClone(other[key]);
  }
}

export function cloneInterface<C>(entity: InterfaceEntity<C>): InterfaceEntity<C> {
  return structuredClone(entity);
}

export function createBaseBehavior<C>(codec: ConfigCodec<C>): InterfaceBehavior<C> {
  return {
    merge(self, other) {
      if (self.name !== other.name || self.type !== other.type) {
        throw new ValidationError(
          'name',
          `cannot merge ${other.type} interface ${other.name} into ${self.type} interface ${self.name}`
        );
      }
      // The origin tag and the administrative state of `self` are kept as they are
      fillMissing(self.extra, other.extra);
      codec.mergeConfig(self.config, other.config);
    },

    validateAndClean(self) {
      if (self.name.length === 0) {
        throw new ValidationError('name', 'must not be empty');
      }
      validateString(self.state, 'state', { allowed: INTERFACE_STATES });
    },

    stateForVerify(self) {
      return codec.toSnapshot(cloneInterface(self));
    },
  };
}
