import { decodeCashAddress } from '@bitauth/libauth';

export interface SupportedChain {
  id: string;
  name: string;
  /** Human description of a token address on this chain, used in prompts. */
  tokenLabel: string;
  normalizeAddress(address: string): string | null;
  normalizeTokenAddress(tokenAddress: string): string | null;
}

const CASHADDR_PREFIX = 'bitcoincash:';

/**
 * Validate a CashAddr and return it prefixed and lower-cased, or null.
 */
export function normalizeCashAddress(address: string): string | null {
  const trimmed = address.trim().toLowerCase();
  if (!trimmed) return null;

  const withPrefix = trimmed.includes(':') ? trimmed : `${CASHADDR_PREFIX}${trimmed}`;
  if (!withPrefix.startsWith(CASHADDR_PREFIX)) return null;

  // decodeCashAddress returns an error string on failure
  const decoded = decodeCashAddress(withPrefix);
  if (typeof decoded === 'string') return null;
  return withPrefix;
}

export function isValidCategoryId(category: string): boolean {
  return /^[a-fA-F0-9]{64}$/.test(category);
}

export const bitcoinCash: SupportedChain = {
  id: 'bitcoincash',
  name: 'Bitcoin Cash',
  tokenLabel: 'CashToken category ID (64 hex characters)',
  normalizeAddress: normalizeCashAddress,
  normalizeTokenAddress(tokenAddress) {
    const trimmed = tokenAddress.trim();
    return isValidCategoryId(trimmed) ? trimmed.toLowerCase() : null;
  },
};

const chains = new Map<string, SupportedChain>([[bitcoinCash.id, bitcoinCash]]);

export function requireChain(chainId: string): SupportedChain {
  const chain = chains.get(chainId);
  if (!chain) {
    throw new Error(`Unsupported chain: ${chainId}`);
  }
  return chain;
}

export function shortAddress(address: string): string {
  const bare = address.replace(CASHADDR_PREFIX, '');
  return bare.length > 16 ? `${bare.slice(0, 8)}...${bare.slice(-6)}` : bare;
}
