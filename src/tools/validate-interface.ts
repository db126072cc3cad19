/**
 * validate_ethernet_interface: run the pre-edit checks on one document.
 * The document is canonicalized before it is checked, as it is when a plan
 * merges it with the current state.
 */

import { ethernetBehavior } from '../ethernet/interface.js';
import { ValidationError } from '../errors/index.js';
import { parseInterface, toDocument, type InterfaceDocument } from '../interfaces/document.js';
import type { ValidateEthernetInterfaceArgs } from '../types/tools.js';

export type InterfaceValidationReport =
  | { valid: true; interface: InterfaceDocument }
  | { valid: false; field: string; reason: string; path?: string };

export function validateEthernetInterface(args: ValidateEthernetInterfaceArgs): InterfaceValidationReport {
  try {
    const entity = parseInterface(args.interface);
    ethernetBehavior.validateAndClean(entity);
    return { valid: true, interface: toDocument(entity) };
  } catch (error) {
    if (error instanceof ValidationError) {
      return { valid: false, field: error.field, reason: error.reason, path: error.path };
    }
    throw error;
  }
}
