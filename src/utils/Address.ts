/**
 * Address normalization utilities for consistent address handling
 * across fetcher filters, trace searches and wire-format parsing.
 *
 * RPC nodes return addresses in mixed casing (lowercase from most nodes,
 * checksummed from some tracers), so every comparison goes through here.
 */

import { getAddress, isAddress, ZeroAddress } from 'ethers';

/**
 * Normalize an Ethereum address to lowercase
 * @param address - The address to normalize
 * @returns Lowercase address, or the input unchanged when empty
 */
export function normalizeAddress(address: string): string {
  if (!address) return address;
  return address.toLowerCase();
}

/**
 * Check if two addresses are equal (case-insensitive)
 * @returns true if addresses are equal; false when either side is empty
 */
export function addressesEqual(addr1: string | null | undefined, addr2: string | null | undefined): boolean {
  if (!addr1 || !addr2) return false;
  return normalizeAddress(addr1) === normalizeAddress(addr2);
}

/**
 * Parse an address string into its checksummed form.
 *
 * Casing of the input is ignored, so a string with a broken checksum still
 * parses. An empty string maps to the zero address (contract creation).
 *
 * @throws Error if the string is not a 20-byte hex address
 */
export function parseAddress(value: string): string {
  const trimmed = value.trim();
  if (trimmed === '') {
    return ZeroAddress;
  }

  const lower = trimmed.toLowerCase();
  if (!isAddress(lower)) {
    throw new Error(`Invalid address: "${value}"`);
  }
  return getAddress(lower);
}

/**
 * True when the string is a syntactically valid address, ignoring checksum casing
 */
export function isValidAddress(value: string): boolean {
  return isAddress(value.trim().toLowerCase());
}
