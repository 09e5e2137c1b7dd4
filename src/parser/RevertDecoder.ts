// RevertDecoder: Maps revert payloads to human-readable reasons
// Used for executor failures and traced re-replays

import { AbiCoder, dataSlice, isHexString } from 'ethers';

export const ERROR_STRING_SELECTOR = '0x08c379a0';
export const PANIC_SELECTOR = '0x4e487b71';

// Solidity compiler panic codes
const PANIC_REASONS: Record<number, string> = {
  0x00: 'generic compiler panic',
  0x01: 'assertion failed',
  0x11: 'arithmetic overflow or underflow',
  0x12: 'division or modulo by zero',
  0x21: 'invalid enum value',
  0x22: 'invalid storage byte array encoding',
  0x31: 'pop on empty array',
  0x32: 'array out-of-bounds access',
  0x41: 'out of memory',
  0x51: 'call to zero-initialized internal function',
};

export interface DecodedRevert {
  kind: 'error' | 'panic' | 'custom' | 'empty';
  selector: string | null;
  reason: string;
  panicCode?: bigint;
}

const abiCoder = AbiCoder.defaultAbiCoder();

/**
 * RevertDecoder turns raw revert data into the reason strings used in
 * validation outcomes and logs.
 */
export class RevertDecoder {
  static decode(revertData: string): DecodedRevert {
    // Normalize to lowercase and ensure 0x prefix
    const lower = revertData.trim().toLowerCase();
    const data = lower.startsWith('0x') ? lower : `0x${lower}`;

    if (!isHexString(data) || data.length < 10) {
      return { kind: 'empty', selector: null, reason: 'Unknown error' };
    }

    const selector = data.slice(0, 10);

    if (selector === ERROR_STRING_SELECTOR) {
      const reason = this.decodeErrorString(data);
      if (reason !== null) {
        return { kind: 'error', selector, reason };
      }
    }

    if (selector === PANIC_SELECTOR) {
      const code = this.decodePanicCode(data);
      if (code !== null) {
        return { kind: 'panic', selector, reason: this.formatPanicCode(code), panicCode: code };
      }
    }

    return { kind: 'custom', selector, reason: `Custom error: ${selector}` };
  }

  static formatPanicCode(code: bigint): string {
    const description = code <= BigInt(Number.MAX_SAFE_INTEGER) ? PANIC_REASONS[Number(code)] : undefined;
    return description ? `Panic: ${description}` : `Panic: unknown code 0x${code.toString(16)}`;
  }

  private static decodeErrorString(data: string): string | null {
    try {
      const [reason] = abiCoder.decode(['string'], dataSlice(data, 4));
      return typeof reason === 'string' ? reason : null;
    } catch {
      return null;
    }
  }

  private static decodePanicCode(data: string): bigint | null {
    try {
      const [code] = abiCoder.decode(['uint256'], dataSlice(data, 4));
      return typeof code === 'bigint' ? code : null;
    } catch {
      return null;
    }
  }
}

/**
 * Revert data to reason string
 */
export function decodeRevertReason(revertData: string): string {
  return RevertDecoder.decode(revertData).reason;
}
