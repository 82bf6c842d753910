import { z } from 'zod';

const AddressListSchema = z.array(z.string());

/**
 * Check for a 20-byte hex address, with or without the 0x prefix
 */
export function isValidEthereumAddress(address: string): boolean {
  const hex = address.trim().replace(/^0x/, '');
  return /^[0-9a-fA-F]{40}$/.test(hex);
}

/**
 * Lower-case and trim an address for comparisons, adding a missing 0x prefix
 */
export function normalizeAddress(address: string): string {
  const lower = address.trim().toLowerCase();
  return /^[0-9a-f]{40}$/.test(lower) ? `0x${lower}` : lower;
}

/**
 * Shorten an address for log output: 0x1234...abcd
 */
export function shortAddress(address: string): string {
  if (address.length <= 12) return address;
  return `${address.slice(0, 6)}...${address.slice(-4)}`;
}

/**
 * Parse the tracked-address list.
 * Accepts a JSON array (`["0xabc...", "0xdef..."]`) or a comma-separated list.
 * Addresses are lower-cased; an invalid entry throws.
 */
export function parseUserAddresses(input: string): string[] {
  const trimmed = input.trim();
  let raw: string[];

  if (trimmed.startsWith('[') && trimmed.endsWith(']')) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch {
      throw new Error('Invalid JSON format for USER_ADDRESSES');
    }
    const result = AddressListSchema.safeParse(parsed);
    if (!result.success) {
      throw new Error('Invalid JSON format for USER_ADDRESSES');
    }
    raw = result.data;
  } else {
    raw = trimmed.split(',');
  }

  const addresses = raw.map(normalizeAddress).filter((a) => a.length > 0);
  for (const address of addresses) {
    if (!isValidEthereumAddress(address)) {
      throw new Error(`Invalid Ethereum address in USER_ADDRESSES: ${address}`);
    }
  }
  return addresses;
}
