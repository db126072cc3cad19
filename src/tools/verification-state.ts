import { ethernetBehavior } from '../ethernet/interface.js';
import type { InterfaceSnapshot } from '../interfaces/base.js';
import { parseInterface } from '../interfaces/document.js';
import type { GetVerificationStateArgs } from '../types/tools.js';

/**
 * get_verification_state: the snapshot the verifier compares after apply
 */
export function getVerificationState(args: GetVerificationStateArgs): InterfaceSnapshot {
  const entity = parseInterface(args.interface, args.generated ? 'generated' : 'declared');
  return ethernetBehavior.stateForVerify(entity);
}
