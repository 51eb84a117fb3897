import type { ChainClient, TokenBalance } from '../../src/blockchain/client.js';
import type { RetryOptions } from '../../src/blockchain/retry.js';
import { ChainError } from '../../src/errors.js';
import { createServices, type ServiceSettings } from '../../src/services.js';
import { openDatabase } from '../../src/storage/db.js';
import { SqliteStore } from '../../src/storage/queries.js';
import type { InviteHandle, MessagingGateway, Outbound } from '../../src/verification/messaging.js';

// Valid CashAddr test vectors
export const ALICE = 'bitcoincash:qpm2qsznhks23z7629mms6s4cwef74vcwvy22gdx6a';
export const BOB = 'bitcoincash:qr95sy3j9xwd2ap32xkykttr4cvcu7as4y0qverfuy';
export const VERIFIER = 'bitcoincash:qqq3728yw0y47sqn6l2na30mcw6zm78dzqre909m2r';
export const CATEGORY = 'ab'.repeat(32);

export const GROUP = -1001;
export const OWNER = 7;
export const USER = 42;
export const OTHER_USER = 99;

export const FAST_RETRY: RetryOptions = { attempts: 3, baseDelayMs: 0, maxDelayMs: 0 };

export interface Transfer {
  from: string;
  to: string;
  amount: bigint;
  at: number;
}

export class FakeChainClient implements ChainClient {
  readonly balances = new Map<string, bigint>();
  readonly transfers: Transfer[] = [];
  /** Thrown, one per call, before any result is returned. */
  readonly balanceErrors: Error[] = [];
  readonly transferErrors: Error[] = [];
  /** Addresses whose balance lookup always fails. */
  readonly failing = new Set<string>();
  decimals = 0;
  balanceCalls = 0;
  transferCalls = 0;
  beforeBalance?: () => Promise<void>;

  async getBalance(_chainId: string, _tokenAddress: string, address: string): Promise<TokenBalance> {
    this.balanceCalls++;
    if (this.beforeBalance) await this.beforeBalance();
    const error = this.balanceErrors.shift();
    if (error) throw error;
    if (this.failing.has(address)) throw new ChainError('Transient', `lookup failed for ${address}`);
    return { amount: this.balances.get(address) ?? 0n, decimals: this.decimals };
  }

  async findTransfer(
    _chainId: string,
    _tokenAddress: string,
    from: string,
    to: string,
    minAmount: bigint,
    sinceTimestamp: number
  ): Promise<boolean> {
    this.transferCalls++;
    const error = this.transferErrors.shift();
    if (error) throw error;
    return this.transfers.some(
      t => t.from === from && t.to === to && t.amount >= minAmount && t.at >= sinceTimestamp
    );
  }
}

export const textOf = (content: Outbound): string => (typeof content === 'string' ? content : content.text);

export class FakeGateway implements MessagingGateway {
  readonly dms: { userId: number; content: Outbound }[] = [];
  readonly groupMessages: { groupId: number; content: Outbound }[] = [];
  readonly inviteRequests: { groupId: number; name: string; expiresAt: number }[] = [];
  readonly invites: InviteHandle[] = [];
  readonly revoked: InviteHandle[] = [];
  readonly removed: { groupId: number; userId: number }[] = [];
  readonly members = new Set<string>();
  failRevoke = false;
  failRemove = false;
  private sequence = 0;

  async sendDirectMessage(userId: number, content: Outbound): Promise<void> {
    this.dms.push({ userId, content });
  }

  async sendGroupMessage(groupId: number, content: Outbound): Promise<void> {
    this.groupMessages.push({ groupId, content });
  }

  async createOneTimeInvite(groupId: number, options: { name: string; expiresAt: number }): Promise<InviteHandle> {
    this.inviteRequests.push({ groupId, ...options });
    const invite = { groupId, link: `https://t.me/+invite${++this.sequence}`, expiresAt: options.expiresAt };
    this.invites.push(invite);
    return invite;
  }

  async revokeInvite(invite: InviteHandle): Promise<void> {
    if (this.failRevoke) throw new Error('INVITE_LINK_EXPIRED');
    this.revoked.push(invite);
  }

  async removeMember(groupId: number, userId: number): Promise<void> {
    if (this.failRemove) throw new Error('not enough rights');
    this.removed.push({ groupId, userId });
    this.members.delete(`${groupId}:${userId}`);
  }

  async isMember(groupId: number, userId: number): Promise<boolean> {
    return this.members.has(`${groupId}:${userId}`);
  }

  startLink(payload: string): string {
    return `https://t.me/test_bot?start=${payload}`;
  }

  dmTexts(userId: number): string[] {
    return this.dms.filter(dm => dm.userId === userId).map(dm => textOf(dm.content));
  }

  lastDm(userId: number): Outbound | undefined {
    const mine = this.dms.filter(dm => dm.userId === userId);
    return mine[mine.length - 1]?.content;
  }

  groupTexts(groupId: number): string[] {
    return this.groupMessages.filter(m => m.groupId === groupId).map(m => textOf(m.content));
  }
}

export function createClock(start: number = 1_700_000_000_000) {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

export function memoryStore(): SqliteStore {
  return new SqliteStore(openDatabase(':memory:'));
}

export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

export function setupServices(overrides: Partial<ServiceSettings> = {}) {
  const clock = createClock();
  const store = memoryStore();
  const chain = new FakeChainClient();
  const gateway = new FakeGateway();
  const settings: ServiceSettings = {
    ownerUserId: OWNER,
    chainId: 'bitcoincash',
    sessionTimeoutMs: 10 * 60 * 1000,
    transferRetryLimit: 3,
    transferRetryCooldownMs: 60 * 1000,
    inviteTtlMs: 10 * 60 * 1000,
    reverifyIntervalMs: 6 * 60 * 60 * 1000,
    chainRetry: FAST_RETRY,
    now: clock.now,
    ...overrides,
  };
  const services = createServices(store, chain, gateway, settings);
  return { ...services, clock, store, chain, gateway };
}

/** Configured group with minimum balance 100 and a link token "link-token". */
export function setupConfiguredGroup(overrides: Partial<ServiceSettings> = {}) {
  const env = setupServices(overrides);
  env.store.upsertGroupConfig({
    groupId: GROUP,
    chainId: 'bitcoincash',
    tokenAddress: CATEGORY,
    minBalance: '100',
    verifierAddress: VERIFIER,
    updatedAt: env.clock.now(),
  });
  env.store.addVerificationLink({ token: 'link-token', groupId: GROUP, createdAt: env.clock.now() });
  return env;
}
