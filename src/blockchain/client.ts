export interface TokenBalance {
  /** Balance in base units. */
  amount: bigint;
  decimals: number;
}

/**
 * Read-only view of one chain. Implementations throw ChainError:
 * RateLimited and Transient are retryable, NotFound is permanent.
 */
export interface ChainClient {
  getBalance(chainId: string, tokenAddress: string, address: string): Promise<TokenBalance>;

  /**
   * Whether `from` sent at least `minAmount` base units of the token to `to`
   * in a transaction seen at or after `sinceTimestamp` (epoch ms).
   */
  findTransfer(
    chainId: string,
    tokenAddress: string,
    from: string,
    to: string,
    minAmount: bigint,
    sinceTimestamp: number
  ): Promise<boolean>;
}
