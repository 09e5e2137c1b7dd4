/**
 * Numeric parsing for RPC quantities and wire-format fields.
 *
 * RPC nodes emit `0x`-prefixed quantities; the pipe-delimited wire format
 * carries plain decimal. Both go through parseUint.
 */

const HEX_PATTERN = /^0x[0-9a-f]*$/i;
const DECIMAL_PATTERN = /^[0-9]+$/;

/**
 * Parse an unsigned integer from a hex (`0x`/`0X`-prefixed, base-16) or
 * all-digit (base-10) string. Empty strings and a bare `0x` parse to 0.
 *
 * @throws Error for anything else
 */
export function parseUint(value: string): bigint {
  const trimmed = value.trim();
  if (trimmed === '' || trimmed === '0x' || trimmed === '0X') {
    return 0n;
  }
  if (HEX_PATTERN.test(trimmed)) {
    return BigInt(trimmed);
  }
  if (DECIMAL_PATTERN.test(trimmed)) {
    return BigInt(trimmed);
  }
  throw new Error(`Invalid unsigned integer: "${value}"`);
}

/**
 * Parse a quantity that must fit a JS number (block numbers, indexes)
 */
export function parseSafeNumber(value: string): number {
  const parsed = parseUint(value);
  if (parsed > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new Error(`Value exceeds safe integer range: "${value}"`);
  }
  return Number(parsed);
}

/**
 * Optional RPC quantity: absent/null maps to 0
 */
export function parseOptionalUint(value: string | null | undefined): bigint {
  return value == null ? 0n : parseUint(value);
}

export const minBigInt = (a: bigint, b: bigint): bigint => (a < b ? a : b);
