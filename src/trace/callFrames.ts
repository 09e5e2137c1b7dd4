import type { CallFrame } from '../rpc/types.js';
import { addressesEqual } from '../utils/Address.js';

/**
 * True when the frame or any nested frame calls `target`
 */
export function frameCallsAddress(frame: CallFrame, target: string): boolean {
  const stack: CallFrame[] = [frame];
  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) break;
    if (addressesEqual(current.to, target)) {
      return true;
    }
    if (current.calls) {
      stack.push(...current.calls);
    }
  }
  return false;
}
