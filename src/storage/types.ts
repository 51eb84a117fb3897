// All timestamps are epoch milliseconds.

export interface GroupConfig {
  groupId: number; // Telegram chat ID
  chainId: string;
  tokenAddress: string; // CashToken category ID (hex)
  minBalance: string; // decimal string, compared exactly
  verifierAddress: string;
  updatedAt: number;
}

export interface VerificationLink {
  token: string;
  groupId: number;
  createdAt: number;
}

export interface UserRecord {
  groupId: number;
  userId: number;
  address: string;
  verified: boolean;
  lastVerifiedAt: number;
  verificationTxConfirmed: boolean;
}

export interface PendingWhitelistRequest {
  groupId: number;
  groupName: string;
  requestingAdminId: number;
  requestingAdminName: string;
  requestedAt: number;
}

export interface RejectedGroup {
  groupId: number;
  rejectionCount: number;
  groupName: string;
  lastAdminId: number;
  lastAdminName: string;
  firstRejectedAt: number;
  lastRejectedAt: number;
  blocked: boolean;
}

export interface TokenMetadata {
  category: string;
  name: string | null;
  symbol: string | null;
  decimals: number | null;
  fetchedAt: number;
}

/**
 * Durable state. Every method is synchronous and atomic on its own;
 * `transaction` groups several calls.
 */
export interface Store {
  // Group configs
  getGroupConfig(groupId: number): GroupConfig | undefined;
  upsertGroupConfig(config: GroupConfig): void;
  listGroupConfigs(): GroupConfig[];

  // Verification links
  addVerificationLink(link: VerificationLink): void;
  getVerificationLink(token: string): VerificationLink | undefined;
  getLatestVerificationLink(groupId: number): VerificationLink | undefined;

  // User records
  getUserRecord(groupId: number, userId: number): UserRecord | undefined;
  upsertUserRecord(record: UserRecord): void;
  deleteUserRecord(groupId: number, userId: number): void;
  listUserRecords(groupId: number, verifiedOnly?: boolean): UserRecord[];
  findVerifiedUserByAddress(groupId: number, address: string): UserRecord | undefined;

  // Whitelist
  isWhitelisted(groupId: number): boolean;
  setWhitelisted(groupId: number, whitelisted: boolean): void;
  listWhitelistedGroups(): number[];

  // Pending whitelist requests
  getPendingRequest(groupId: number): PendingWhitelistRequest | undefined;
  upsertPendingRequest(request: PendingWhitelistRequest): void;
  deletePendingRequest(groupId: number): void;
  listPendingRequests(): PendingWhitelistRequest[];

  // Rejections
  getRejectedGroup(groupId: number): RejectedGroup | undefined;
  upsertRejectedGroup(record: RejectedGroup): void;
  listRejectedGroups(): RejectedGroup[];

  // Token metadata cache
  getTokenMetadata(category: string): TokenMetadata | undefined;
  upsertTokenMetadata(metadata: TokenMetadata): void;

  transaction<T>(fn: () => T): T;
}
