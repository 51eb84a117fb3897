import type { Database as DatabaseType } from 'better-sqlite3';
import type {
  GroupConfig,
  VerificationLink,
  UserRecord,
  PendingWhitelistRequest,
  RejectedGroup,
  TokenMetadata,
  Store,
} from './types.js';

interface GroupConfigRow {
  group_id: number;
  chain_id: string;
  token_address: string;
  min_balance: string;
  verifier_address: string;
  updated_at: number;
}

interface VerificationLinkRow {
  token: string;
  group_id: number;
  created_at: number;
}

interface UserRecordRow {
  group_id: number;
  user_id: number;
  address: string;
  verified: number;
  last_verified_at: number;
  verification_tx_confirmed: number;
}

interface PendingRow {
  group_id: number;
  group_name: string;
  requesting_admin_id: number;
  requesting_admin_name: string;
  requested_at: number;
}

interface RejectedRow {
  group_id: number;
  rejection_count: number;
  group_name: string;
  last_admin_id: number;
  last_admin_name: string;
  first_rejected_at: number;
  last_rejected_at: number;
  blocked: number;
}

interface TokenMetadataRow {
  category: string;
  name: string | null;
  symbol: string | null;
  decimals: number | null;
  fetched_at: number;
}

const toGroupConfig = (row: GroupConfigRow): GroupConfig => ({
  groupId: row.group_id,
  chainId: row.chain_id,
  tokenAddress: row.token_address,
  minBalance: row.min_balance,
  verifierAddress: row.verifier_address,
  updatedAt: row.updated_at,
});

const toLink = (row: VerificationLinkRow): VerificationLink => ({
  token: row.token,
  groupId: row.group_id,
  createdAt: row.created_at,
});

const toUserRecord = (row: UserRecordRow): UserRecord => ({
  groupId: row.group_id,
  userId: row.user_id,
  address: row.address,
  verified: row.verified === 1,
  lastVerifiedAt: row.last_verified_at,
  verificationTxConfirmed: row.verification_tx_confirmed === 1,
});

const toPending = (row: PendingRow): PendingWhitelistRequest => ({
  groupId: row.group_id,
  groupName: row.group_name,
  requestingAdminId: row.requesting_admin_id,
  requestingAdminName: row.requesting_admin_name,
  requestedAt: row.requested_at,
});

const toRejected = (row: RejectedRow): RejectedGroup => ({
  groupId: row.group_id,
  rejectionCount: row.rejection_count,
  groupName: row.group_name,
  lastAdminId: row.last_admin_id,
  lastAdminName: row.last_admin_name,
  firstRejectedAt: row.first_rejected_at,
  lastRejectedAt: row.last_rejected_at,
  blocked: row.blocked === 1,
});

export class SqliteStore implements Store {
  constructor(private readonly db: DatabaseType) {}

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  // ============ Group configs ============

  getGroupConfig(groupId: number): GroupConfig | undefined {
    const row = this.db
      .prepare<[number], GroupConfigRow>('SELECT * FROM group_configs WHERE group_id = ?')
      .get(groupId);
    return row ? toGroupConfig(row) : undefined;
  }

  upsertGroupConfig(config: GroupConfig): void {
    this.db.prepare(`
      INSERT INTO group_configs (group_id, chain_id, token_address, min_balance, verifier_address, updated_at)
      VALUES (?, ?, ?, ?, ?, ?)
      ON CONFLICT(group_id) DO UPDATE SET
        chain_id = excluded.chain_id,
        token_address = excluded.token_address,
        min_balance = excluded.min_balance,
        verifier_address = excluded.verifier_address,
        updated_at = excluded.updated_at
    `).run(
      config.groupId,
      config.chainId,
      config.tokenAddress,
      config.minBalance,
      config.verifierAddress,
      config.updatedAt
    );
  }

  listGroupConfigs(): GroupConfig[] {
    return this.db
      .prepare<[], GroupConfigRow>('SELECT * FROM group_configs ORDER BY group_id')
      .all()
      .map(toGroupConfig);
  }

  // ============ Verification links ============

  addVerificationLink(link: VerificationLink): void {
    this.db.prepare('INSERT INTO verification_links (token, group_id, created_at) VALUES (?, ?, ?)')
      .run(link.token, link.groupId, link.createdAt);
  }

  getVerificationLink(token: string): VerificationLink | undefined {
    const row = this.db
      .prepare<[string], VerificationLinkRow>('SELECT * FROM verification_links WHERE token = ?')
      .get(token);
    return row ? toLink(row) : undefined;
  }

  getLatestVerificationLink(groupId: number): VerificationLink | undefined {
    const row = this.db
      .prepare<[number], VerificationLinkRow>(`
        SELECT * FROM verification_links WHERE group_id = ?
        ORDER BY created_at DESC, rowid DESC LIMIT 1
      `)
      .get(groupId);
    return row ? toLink(row) : undefined;
  }

  // ============ User records ============

  getUserRecord(groupId: number, userId: number): UserRecord | undefined {
    const row = this.db
      .prepare<[number, number], UserRecordRow>('SELECT * FROM user_records WHERE group_id = ? AND user_id = ?')
      .get(groupId, userId);
    return row ? toUserRecord(row) : undefined;
  }

  upsertUserRecord(record: UserRecord): void {
    this.db.prepare(`
      INSERT INTO user_records (group_id, user_id, address, verified, last_verified_at, verification_tx_confirmed)
      VALUES (?, ?, ?, ?, ?, ?)
      ON CONFLICT(group_id, user_id) DO UPDATE SET
        address = excluded.address,
        verified = excluded.verified,
        last_verified_at = excluded.last_verified_at,
        verification_tx_confirmed = excluded.verification_tx_confirmed
    `).run(
      record.groupId,
      record.userId,
      record.address,
      record.verified ? 1 : 0,
      record.lastVerifiedAt,
      record.verificationTxConfirmed ? 1 : 0
    );
  }

  deleteUserRecord(groupId: number, userId: number): void {
    this.db.prepare('DELETE FROM user_records WHERE group_id = ? AND user_id = ?').run(groupId, userId);
  }

  listUserRecords(groupId: number, verifiedOnly: boolean = false): UserRecord[] {
    const sql = verifiedOnly
      ? 'SELECT * FROM user_records WHERE group_id = ? AND verified = 1 ORDER BY user_id'
      : 'SELECT * FROM user_records WHERE group_id = ? ORDER BY user_id';
    return this.db.prepare<[number], UserRecordRow>(sql).all(groupId).map(toUserRecord);
  }

  findVerifiedUserByAddress(groupId: number, address: string): UserRecord | undefined {
    const row = this.db
      .prepare<[number, string], UserRecordRow>(`
        SELECT * FROM user_records WHERE group_id = ? AND address = ? AND verified = 1 LIMIT 1
      `)
      .get(groupId, address);
    return row ? toUserRecord(row) : undefined;
  }

  // ============ Whitelist ============

  isWhitelisted(groupId: number): boolean {
    const row = this.db
      .prepare<[number], { whitelisted: number }>('SELECT whitelisted FROM whitelist WHERE group_id = ?')
      .get(groupId);
    return row?.whitelisted === 1;
  }

  setWhitelisted(groupId: number, whitelisted: boolean): void {
    this.db.prepare(`
      INSERT INTO whitelist (group_id, whitelisted) VALUES (?, ?)
      ON CONFLICT(group_id) DO UPDATE SET whitelisted = excluded.whitelisted
    `).run(groupId, whitelisted ? 1 : 0);
  }

  listWhitelistedGroups(): number[] {
    return this.db
      .prepare<[], { group_id: number }>('SELECT group_id FROM whitelist WHERE whitelisted = 1 ORDER BY group_id')
      .all()
      .map(row => row.group_id);
  }

  // ============ Pending whitelist requests ============

  getPendingRequest(groupId: number): PendingWhitelistRequest | undefined {
    const row = this.db
      .prepare<[number], PendingRow>('SELECT * FROM pending_whitelist WHERE group_id = ?')
      .get(groupId);
    return row ? toPending(row) : undefined;
  }

  upsertPendingRequest(request: PendingWhitelistRequest): void {
    this.db.prepare(`
      INSERT INTO pending_whitelist (group_id, group_name, requesting_admin_id, requesting_admin_name, requested_at)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT(group_id) DO UPDATE SET
        group_name = excluded.group_name,
        requesting_admin_id = excluded.requesting_admin_id,
        requesting_admin_name = excluded.requesting_admin_name,
        requested_at = excluded.requested_at
    `).run(
      request.groupId,
      request.groupName,
      request.requestingAdminId,
      request.requestingAdminName,
      request.requestedAt
    );
  }

  deletePendingRequest(groupId: number): void {
    this.db.prepare('DELETE FROM pending_whitelist WHERE group_id = ?').run(groupId);
  }

  listPendingRequests(): PendingWhitelistRequest[] {
    return this.db
      .prepare<[], PendingRow>('SELECT * FROM pending_whitelist ORDER BY requested_at')
      .all()
      .map(toPending);
  }

  // ============ Rejections ============

  getRejectedGroup(groupId: number): RejectedGroup | undefined {
    const row = this.db
      .prepare<[number], RejectedRow>('SELECT * FROM rejected_groups WHERE group_id = ?')
      .get(groupId);
    return row ? toRejected(row) : undefined;
  }

  upsertRejectedGroup(record: RejectedGroup): void {
    this.db.prepare(`
      INSERT INTO rejected_groups (
        group_id, rejection_count, group_name, last_admin_id, last_admin_name,
        first_rejected_at, last_rejected_at, blocked
      )
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(group_id) DO UPDATE SET
        rejection_count = excluded.rejection_count,
        group_name = excluded.group_name,
        last_admin_id = excluded.last_admin_id,
        last_admin_name = excluded.last_admin_name,
        last_rejected_at = excluded.last_rejected_at,
        blocked = MAX(rejected_groups.blocked, excluded.blocked)
    `).run(
      record.groupId,
      record.rejectionCount,
      record.groupName,
      record.lastAdminId,
      record.lastAdminName,
      record.firstRejectedAt,
      record.lastRejectedAt,
      record.blocked ? 1 : 0
    );
  }

  listRejectedGroups(): RejectedGroup[] {
    return this.db
      .prepare<[], RejectedRow>('SELECT * FROM rejected_groups ORDER BY last_rejected_at DESC')
      .all()
      .map(toRejected);
  }

  // ============ Token metadata ============

  getTokenMetadata(category: string): TokenMetadata | undefined {
    const row = this.db
      .prepare<[string], TokenMetadataRow>('SELECT * FROM token_metadata WHERE category = ?')
      .get(category);
    if (!row) return undefined;
    return {
      category: row.category,
      name: row.name,
      symbol: row.symbol,
      decimals: row.decimals,
      fetchedAt: row.fetched_at,
    };
  }

  upsertTokenMetadata(metadata: TokenMetadata): void {
    this.db.prepare(`
      INSERT INTO token_metadata (category, name, symbol, decimals, fetched_at)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT(category) DO UPDATE SET
        name = excluded.name,
        symbol = excluded.symbol,
        decimals = excluded.decimals,
        fetched_at = excluded.fetched_at
    `).run(metadata.category, metadata.name, metadata.symbol, metadata.decimals, metadata.fetchedAt);
  }
}
