/**
 * BCMR (Bitcoin Cash Metadata Registry) integration
 *
 * Fetches token metadata from Paytaca's BCMR indexer API.
 * Caches results in SQLite to minimize API calls.
 */

import { z } from 'zod';
import { ChainError, errorMessage } from '../errors.js';
import type { Store, TokenMetadata } from '../storage/types.js';

const CACHE_TTL_MS = 24 * 60 * 60 * 1000;

const paytacaTokenSchema = z.object({
  name: z.string().nullish(),
  symbol: z.string().nullish(),
  // NFT categories report their own shape; only fungible decimals matter here
  token: z.object({ decimals: z.number().int().min(0).nullish() }).nullish(),
  decimals: z.number().int().min(0).nullish(),
});

export class TokenMetadataService {
  constructor(
    private readonly store: Store,
    private readonly apiUrl: string,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Fetch token metadata, using cache if available and fresh.
   * Returns null if metadata not found or the registry cannot be reached.
   */
  async fetchTokenMetadata(category: string, forceRefresh: boolean = false): Promise<TokenMetadata | null> {
    try {
      return await this.resolve(category, forceRefresh);
    } catch (error) {
      console.error(`[bcmr] ${errorMessage(error)}`);
      return null;
    }
  }

  /**
   * Decimals for a fungible token; 0 only when the registry confirms it has
   * no entry. Throws a transient ChainError when the registry is unreachable
   * and nothing is cached.
   */
  async getDecimals(category: string): Promise<number> {
    const metadata = await this.resolve(category);
    return metadata?.decimals ?? 0;
  }

  async getFormattedTokenName(category: string): Promise<string> {
    const metadata = await this.fetchTokenMetadata(category);
    return formatTokenName(category, metadata);
  }

  private async resolve(category: string, forceRefresh: boolean = false): Promise<TokenMetadata | null> {
    const cached = this.store.getTokenMetadata(category);
    if (!forceRefresh && cached && this.now() - cached.fetchedAt < CACHE_TTL_MS) {
      return knownOrNull(cached);
    }

    let response: Response;
    try {
      response = await fetch(`${this.apiUrl}/${category}/`);
    } catch (error) {
      return staleOrThrow(category, cached, `fetch error: ${errorMessage(error)}`, error);
    }

    if (!response.ok) {
      if (response.status === 404) {
        // Token not in registry - cache as "no metadata" to avoid repeated lookups
        this.store.upsertTokenMetadata({ category, name: null, symbol: null, decimals: null, fetchedAt: this.now() });
        return null;
      }
      return staleOrThrow(category, cached, `API error: ${response.status} ${response.statusText}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      return staleOrThrow(category, cached, 'unreadable response', error);
    }

    const parsed = paytacaTokenSchema.safeParse(body);
    if (!parsed.success) {
      return staleOrThrow(category, cached, 'unexpected response');
    }

    const metadata: TokenMetadata = {
      category,
      name: parsed.data.name ?? null,
      symbol: parsed.data.symbol ?? null,
      decimals: parsed.data.decimals ?? parsed.data.token?.decimals ?? null,
      fetchedAt: this.now(),
    };
    this.store.upsertTokenMetadata(metadata);
    return metadata;
  }
}

function knownOrNull(metadata: TokenMetadata): TokenMetadata | null {
  return metadata.name === null && metadata.decimals === null ? null : metadata;
}

// A stale entry beats no entry; with neither, the lookup has to be retried
function staleOrThrow(
  category: string,
  cached: TokenMetadata | undefined,
  reason: string,
  cause?: unknown
): TokenMetadata | null {
  console.error(`[bcmr] ${reason} for ${category}`);
  if (cached) return knownOrNull(cached);
  throw new ChainError('Transient', `token metadata unavailable for ${category}: ${reason}`, cause);
}

/**
 * Format a token for display, with fallback if no metadata.
 *
 * Examples:
 *   With metadata: "CashCats (CATS)"
 *   Without metadata: "0123456789ab...cdef"
 */
export function formatTokenName(category: string, metadata: TokenMetadata | null): string {
  if (metadata?.name) {
    if (metadata.symbol) {
      return `${metadata.name} (${metadata.symbol})`;
    }
    return metadata.name;
  }
  return `${category.slice(0, 12)}...${category.slice(-4)}`;
}
