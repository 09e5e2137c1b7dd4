import type { CallFrame } from '../rpc/types.js';
import { parseOptionalUint } from '../utils/bigint.js';
import { decodeRevertReason } from '../parser/RevertDecoder.js';

const SELECTOR_LENGTH = 10;

/**
 * Render a call tree as indented lines, one per frame:
 *
 *   CALL 0xabc… -> 0xdef… [0x12345678] value=0 gasUsed=21000
 *     STATICCALL 0xdef… -> 0x123… [0x70a08231] gasUsed=2600
 *     REVERTED: Panic: assertion failed
 */
export function renderCallTrace(frame: CallFrame, depth = 0): string[] {
  const indent = '  '.repeat(depth);
  const selector = frame.input && frame.input.length >= SELECTOR_LENGTH
    ? ` [${frame.input.slice(0, SELECTOR_LENGTH)}]`
    : '';
  const value = frame.value ? ` value=${parseOptionalUint(frame.value).toString()}` : '';
  const gasUsed = frame.gasUsed ? ` gasUsed=${parseOptionalUint(frame.gasUsed).toString()}` : '';

  const lines = [`${indent}${frame.type} ${frame.from} -> ${frame.to ?? '(create)'}${selector}${value}${gasUsed}`];

  for (const child of frame.calls ?? []) {
    lines.push(...renderCallTrace(child, depth + 1));
  }

  if (frame.error) {
    const reason = frame.revertReason
      ?? (frame.output && frame.output !== '0x' ? decodeRevertReason(frame.output) : frame.error);
    lines.push(`${indent}  REVERTED: ${reason}`);
  }
  return lines;
}
