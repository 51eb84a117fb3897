import type { ChainClient, TokenBalance } from '../blockchain/client.js';
import { requireChain, shortAddress } from '../blockchain/chains.js';
import { formatAmount, meetsMinimum, oneTokenUnit } from '../blockchain/amounts.js';
import { withRetry, type RetryOptions } from '../blockchain/retry.js';
import { ConfigurationError, InputError, errorMessage, isChainError } from '../errors.js';
import type { GroupConfig, Store } from '../storage/types.js';
import type { InviteLinkManager } from './invites.js';
import { KeyedMutex, userKey } from './locks.js';
import type { MessageContent, MessagingGateway, Outbound } from './messaging.js';

export type SessionState =
  | 'AwaitingAddress'
  | 'CheckingBalance'
  | 'AwaitingTransfer'
  | 'ConfirmingTransfer'
  | 'Verified'
  | 'Failed'
  | 'Expired';

export interface VerificationSession {
  /** Changes whenever a session is replaced, so late chain results can be discarded. */
  id: number;
  groupId: number;
  userId: number;
  state: SessionState;
  address?: string;
  decimals?: number;
  attempts: number;
  startedAt: number;
  lastActivityAt: number;
  retryAvailableAt?: number;
}

export type StartOutcome =
  | 'invalid_link'
  | 'not_configured'
  | 'owner_invite'
  | 'already_verified'
  | 'reinvited'
  | 'resumed'
  | 'started';

export interface EngineOptions {
  ownerUserId: number;
  sessionTimeoutMs: number;
  transferRetryLimit: number;
  transferRetryCooldownMs: number;
  chainRetry: RetryOptions;
  now?: () => number;
}

export interface EngineDeps {
  store: Store;
  chain: ChainClient;
  gateway: MessagingGateway;
  invites: InviteLinkManager;
  locks: KeyedMutex;
}

type Lookup =
  | { kind: 'none' }
  | { kind: 'expired' }
  | { kind: 'live'; session: VerificationSession };

const NO_SESSION_MESSAGE =
  'No verification in progress. Open the verification link from your group to start.';
const EXPIRED_MESSAGE =
  '⌛ Your verification session expired. Open the verification link again to restart.';
const BUSY_MESSAGE = '⏳ Still checking the blockchain, please wait a moment.';

export const verifyActions = {
  done: (groupId: number) => `verify:done:${groupId}`,
  retry: (groupId: number) => `verify:retry:${groupId}`,
  cancel: (groupId: number) => `verify:cancel:${groupId}`,
};

/**
 * Drives each user's verification for a group: address, balance check,
 * ownership-proof transfer, invite.
 *
 * State changes happen under the per-user lock; chain calls run outside it
 * and their results are committed only if the session is still the same one.
 */
export class VerificationEngine {
  private readonly sessions = new Map<string, VerificationSession>();
  // userId -> groupId of the session that receives the user's text messages
  private readonly activeGroup = new Map<number, number>();
  private nextId = 1;
  private readonly now: () => number;

  constructor(
    private readonly deps: EngineDeps,
    private readonly options: EngineOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  getSession(groupId: number, userId: number): VerificationSession | undefined {
    const session = this.sessions.get(userKey(groupId, userId));
    return session ? { ...session } : undefined;
  }

  async start(userId: number, linkToken: string): Promise<StartOutcome> {
    const { store, gateway, locks } = this.deps;

    const link = store.getVerificationLink(linkToken);
    if (!link) {
      await gateway.sendDirectMessage(userId, '❌ This verification link is invalid. Ask a group admin for a new one.');
      return 'invalid_link';
    }

    const groupId = link.groupId;
    const config = store.getGroupConfig(groupId);
    if (!config) {
      const error = new ConfigurationError(`Group ${groupId} is not set up`);
      console.log(`[engine] ${error.message}`);
      await gateway.sendDirectMessage(userId, '⚠️ This group has not been set up yet. Ask a group admin to run /setup.');
      return 'not_configured';
    }

    if (userId === this.options.ownerUserId) {
      await this.sendInvite(groupId, userId, '👑 Owner access granted.');
      return 'owner_invite';
    }

    const record = store.getUserRecord(groupId, userId);
    if (record?.verified) {
      if (await this.isStillMember(groupId, userId)) {
        await gateway.sendDirectMessage(userId, '✅ You are already verified for this group.');
        return 'already_verified';
      }
      await this.sendInvite(groupId, userId, '✅ You are already verified. Here is a fresh invite to rejoin.');
      return 'reinvited';
    }

    const key = userKey(groupId, userId);
    const result = await locks.runExclusive(key, () => {
      const lookup = this.lookup(key);
      if (lookup.kind === 'live') {
        lookup.session.lastActivityAt = this.now();
        this.activeGroup.set(userId, groupId);
        return { outcome: 'resumed' as const, session: { ...lookup.session } };
      }

      const now = this.now();
      const session: VerificationSession = {
        id: this.nextId++,
        groupId,
        userId,
        state: 'AwaitingAddress',
        attempts: 0,
        startedAt: now,
        lastActivityAt: now,
      };
      this.sessions.set(key, session);
      this.activeGroup.set(userId, groupId);
      return { outcome: 'started' as const, session: { ...session } };
    });

    console.log(`[engine] Session ${result.outcome} for user ${userId} in group ${groupId}`);
    await gateway.sendDirectMessage(userId, this.promptFor(config, result.session));
    return result.outcome;
  }

  /**
   * Route a private text message to the user's current session.
   * Returns false when the user has no session.
   */
  async handleText(userId: number, text: string): Promise<boolean> {
    const groupId = this.activeGroup.get(userId);
    const session = groupId === undefined ? undefined : this.sessions.get(userKey(groupId, userId));
    if (groupId === undefined || !session) {
      await this.deps.gateway.sendDirectMessage(userId, NO_SESSION_MESSAGE);
      return false;
    }

    const input = text.trim();
    const command = input.toLowerCase();

    if (command === 'cancel') {
      await this.cancel(userId, groupId);
      return true;
    }

    switch (session.state) {
      case 'AwaitingAddress':
        await this.submitAddress(groupId, userId, input);
        break;
      case 'AwaitingTransfer':
        if (command === 'done') {
          await this.confirmTransfer(groupId, userId);
        } else {
          const config = this.deps.store.getGroupConfig(groupId);
          await this.deps.gateway.sendDirectMessage(
            userId,
            config ? this.promptFor(config, session) : NO_SESSION_MESSAGE
          );
        }
        break;
      default:
        await this.deps.gateway.sendDirectMessage(userId, BUSY_MESSAGE);
    }
    return true;
  }

  async submitAddress(groupId: number, userId: number, text: string): Promise<SessionState | undefined> {
    const { store, gateway, locks, chain } = this.deps;
    const key = userKey(groupId, userId);
    const config = this.requireConfig(groupId);
    const rules = requireChain(config.chainId);

    const step = await locks.runExclusive(key, () => {
      const lookup = this.lookup(key);
      if (lookup.kind !== 'live') return lookup;

      const session = lookup.session;
      if (session.state !== 'AwaitingAddress') {
        return { kind: 'busy' as const, state: session.state };
      }

      session.lastActivityAt = this.now();
      const address = rules.normalizeAddress(text);
      if (!address) {
        return { kind: 'invalid' as const, error: new InputError(`Not a valid ${rules.name} address`) };
      }

      const holder = store.findVerifiedUserByAddress(groupId, address);
      if (holder && holder.userId !== userId) {
        this.discard(session, 'Failed');
        return { kind: 'duplicate' as const };
      }

      session.state = 'CheckingBalance';
      session.address = address;
      return { kind: 'checking' as const, id: session.id, address };
    });

    switch (step.kind) {
      case 'none':
        await gateway.sendDirectMessage(userId, NO_SESSION_MESSAGE);
        return undefined;
      case 'expired':
        await gateway.sendDirectMessage(userId, EXPIRED_MESSAGE);
        return 'Expired';
      case 'busy':
        await gateway.sendDirectMessage(userId, BUSY_MESSAGE);
        return step.state;
      case 'invalid':
        await gateway.sendDirectMessage(userId, `❌ ${step.error.message}. Please send a CashAddr such as bitcoincash:qq...`);
        return 'AwaitingAddress';
      case 'duplicate':
        await gateway.sendDirectMessage(
          userId,
          '❌ This wallet is already linked to another verified member of this group. Verification failed.'
        );
        return 'Failed';
    }

    await gateway.sendDirectMessage(userId, '🔍 Checking your token balance...');

    let balance: TokenBalance;
    try {
      balance = await withRetry(
        'getBalance',
        () => chain.getBalance(config.chainId, config.tokenAddress, step.address),
        this.options.chainRetry
      );
    } catch (error) {
      return this.handleChainFailure(groupId, userId, step.id, 'AwaitingAddress', error, session => {
        session.address = undefined;
      });
    }

    const outcome = await locks.runExclusive(key, () => {
      const session = this.sessions.get(key);
      if (!session || session.id !== step.id) return 'stale' as const;

      if (!meetsMinimum(balance.amount, balance.decimals, config.minBalance)) {
        this.discard(session, 'Failed');
        return 'insufficient' as const;
      }

      session.state = 'AwaitingTransfer';
      session.decimals = balance.decimals;
      session.lastActivityAt = this.now();
      return { ...session };
    });

    if (outcome === 'stale') return undefined;

    if (outcome === 'insufficient') {
      console.log(`[engine] User ${userId} below minimum for group ${groupId}`);
      await gateway.sendDirectMessage(
        userId,
        `❌ Insufficient balance: this wallet holds ${formatAmount(balance.amount, balance.decimals)} ` +
        `but at least ${config.minBalance} is required. Verification failed.`
      );
      return 'Failed';
    }

    await gateway.sendDirectMessage(userId, this.promptFor(config, outcome, balance));
    return 'AwaitingTransfer';
  }

  async confirmTransfer(groupId: number, userId: number): Promise<SessionState | undefined> {
    const { gateway, locks, chain } = this.deps;
    const key = userKey(groupId, userId);
    const config = this.requireConfig(groupId);

    const step = await locks.runExclusive(key, () => {
      const lookup = this.lookup(key);
      if (lookup.kind !== 'live') return lookup;

      const session = lookup.session;
      if (session.state !== 'AwaitingTransfer' || !session.address) {
        return { kind: 'busy' as const, state: session.state };
      }

      const now = this.now();
      session.lastActivityAt = now;
      if (session.retryAvailableAt !== undefined && session.retryAvailableAt > now) {
        return { kind: 'cooldown' as const, waitSeconds: Math.ceil((session.retryAvailableAt - now) / 1000) };
      }

      session.state = 'ConfirmingTransfer';
      return {
        kind: 'checking' as const,
        id: session.id,
        address: session.address,
        decimals: session.decimals ?? 0,
        startedAt: session.startedAt,
      };
    });

    switch (step.kind) {
      case 'none':
        await gateway.sendDirectMessage(userId, NO_SESSION_MESSAGE);
        return undefined;
      case 'expired':
        await gateway.sendDirectMessage(userId, EXPIRED_MESSAGE);
        return 'Expired';
      case 'busy':
        await gateway.sendDirectMessage(
          userId,
          step.state === 'AwaitingAddress' ? 'Please send your wallet address first.' : BUSY_MESSAGE
        );
        return step.state;
      case 'cooldown':
        await gateway.sendDirectMessage(userId, `⏳ Please wait ${step.waitSeconds}s before checking again.`);
        return 'AwaitingTransfer';
    }

    await gateway.sendDirectMessage(userId, '🔍 Looking for your transfer...');

    let found: boolean;
    try {
      found = await withRetry(
        'findTransfer',
        () => chain.findTransfer(
          config.chainId,
          config.tokenAddress,
          step.address,
          config.verifierAddress,
          oneTokenUnit(step.decimals),
          step.startedAt
        ),
        this.options.chainRetry
      );
    } catch (error) {
      return this.handleChainFailure(groupId, userId, step.id, 'AwaitingTransfer', error);
    }

    if (found) {
      return this.complete(config, userId, step.id, step.address);
    }

    const limit = this.options.transferRetryLimit;
    const outcome = await locks.runExclusive(key, () => {
      const session = this.sessions.get(key);
      if (!session || session.id !== step.id) return undefined;

      session.attempts += 1;
      if (session.attempts >= limit) {
        this.discard(session, 'Failed');
        return { state: 'Failed' as const, remaining: 0 };
      }

      const now = this.now();
      session.state = 'AwaitingTransfer';
      session.retryAvailableAt = now + this.options.transferRetryCooldownMs;
      session.lastActivityAt = now;
      return { state: 'AwaitingTransfer' as const, remaining: limit - session.attempts };
    });

    if (!outcome) return undefined;

    if (outcome.state === 'Failed') {
      console.log(`[engine] User ${userId} exhausted transfer attempts for group ${groupId}`);
      await gateway.sendDirectMessage(
        userId,
        `❌ No transfer found after ${limit} attempts. Verification failed. Open the verification link to start over.`
      );
      return 'Failed';
    }

    const cooldownSeconds = Math.round(this.options.transferRetryCooldownMs / 1000);
    await gateway.sendDirectMessage(userId, {
      text:
        `⚠️ Transfer not found yet. ${outcome.remaining} attempt(s) left.\n` +
        `Blocks can take a while; try again in ${cooldownSeconds}s.`,
      buttons: [
        [{ label: '🔁 Retry', action: verifyActions.retry(groupId) }],
        [{ label: '✖️ Cancel', action: verifyActions.cancel(groupId) }],
      ],
    });
    return 'AwaitingTransfer';
  }

  /** Discard the session. Without `groupId`, the one receiving the user's messages. */
  async cancel(userId: number, groupId?: number): Promise<boolean> {
    const targetGroup = groupId ?? this.activeGroup.get(userId);
    const cancelled =
      targetGroup !== undefined &&
      (await this.deps.locks.runExclusive(userKey(targetGroup, userId), () => {
        const session = this.sessions.get(userKey(targetGroup, userId));
        if (!session) return false;
        this.discard(session, 'Failed');
        return true;
      }));

    await this.deps.gateway.sendDirectMessage(
      userId,
      cancelled ? 'Verification cancelled.' : 'No verification in progress.'
    );
    return cancelled;
  }

  /** Expire idle sessions and tell their users. Returns how many expired. */
  async sweepExpired(): Promise<number> {
    const expired: VerificationSession[] = [];

    for (const [key, session] of [...this.sessions]) {
      if (!this.isIdle(session)) continue;

      await this.deps.locks.runExclusive(key, () => {
        const current = this.sessions.get(key);
        if (current && current.id === session.id && this.isIdle(current)) {
          this.discard(current, 'Expired');
          expired.push(current);
        }
      });
    }

    for (const session of expired) {
      try {
        await this.deps.gateway.sendDirectMessage(session.userId, EXPIRED_MESSAGE);
      } catch (error) {
        console.error(`[engine] Could not notify user ${session.userId} of expiry: ${errorMessage(error)}`);
      }
    }

    if (expired.length > 0) {
      console.log(`[engine] Expired ${expired.length} idle session(s)`);
    }
    return expired.length;
  }

  private async complete(
    config: GroupConfig,
    userId: number,
    sessionId: number,
    address: string
  ): Promise<SessionState | undefined> {
    const { store, gateway, locks } = this.deps;
    const groupId = config.groupId;
    const key = userKey(groupId, userId);

    const outcome = await locks.runExclusive(key, () => {
      const session = this.sessions.get(key);
      if (!session || session.id !== sessionId) return 'stale' as const;

      // Another member may have verified with the same wallet meanwhile
      const holder = store.findVerifiedUserByAddress(groupId, address);
      if (holder && holder.userId !== userId) {
        this.discard(session, 'Failed');
        return 'duplicate' as const;
      }

      store.upsertUserRecord({
        groupId,
        userId,
        address,
        verified: true,
        lastVerifiedAt: this.now(),
        verificationTxConfirmed: true,
      });
      this.discard(session, 'Verified');
      return 'verified' as const;
    });

    if (outcome === 'stale') return undefined;
    if (outcome === 'duplicate') {
      await gateway.sendDirectMessage(
        userId,
        '❌ This wallet was just linked to another verified member of this group. Verification failed.'
      );
      return 'Failed';
    }

    console.log(`[engine] ✅ User ${userId} verified for group ${groupId} (${shortAddress(address)})`);
    await this.sendInvite(groupId, userId, '🎉 Verification complete!');
    return 'Verified';
  }

  private async handleChainFailure(
    groupId: number,
    userId: number,
    sessionId: number,
    revertTo: SessionState,
    error: unknown,
    reset?: (session: VerificationSession) => void
  ): Promise<SessionState | undefined> {
    const key = userKey(groupId, userId);
    const permanent = isChainError(error) && !error.retryable;

    const state = await this.deps.locks.runExclusive(key, () => {
      const session = this.sessions.get(key);
      if (!session || session.id !== sessionId) return undefined;

      if (permanent) {
        this.discard(session, 'Failed');
        return 'Failed' as const;
      }
      session.state = revertTo;
      session.lastActivityAt = this.now();
      reset?.(session);
      return revertTo;
    });

    if (!isChainError(error)) {
      throw error;
    }

    console.error(`[engine] Chain call failed for ${key} (${error.kind}): ${error.message}`);
    if (state === 'Failed') {
      await this.deps.gateway.sendDirectMessage(
        userId,
        '❌ The token or wallet could not be found on chain. Verification failed.'
      );
    } else if (state) {
      await this.deps.gateway.sendDirectMessage(
        userId,
        revertTo === 'AwaitingAddress'
          ? '⚠️ The blockchain service is busy. Please send your address again in a minute.'
          : '⚠️ The blockchain service is busy. Please try again in a minute.'
      );
    }
    return state;
  }

  private async sendInvite(groupId: number, userId: number, headline: string): Promise<void> {
    const { gateway, invites } = this.deps;
    try {
      const invite = await invites.issue(groupId, userId);
      const minutes = Math.max(1, Math.round((invite.expiresAt - this.now()) / 60000));
      await gateway.sendDirectMessage(userId, {
        text: `${headline}\n\nHere is your invite link. It works once and expires in ${minutes} minutes:\n${invite.link}`,
        buttons: [[{ label: '🚪 Join group', url: invite.link }]],
      });
    } catch (error) {
      console.error(`[engine] Could not issue invite for user ${userId} in group ${groupId}: ${errorMessage(error)}`);
      await gateway.sendDirectMessage(
        userId,
        `${headline}\n\n⚠️ I could not create an invite link. Please contact a group admin.`
      );
    }
  }

  private async isStillMember(groupId: number, userId: number): Promise<boolean> {
    try {
      return await this.deps.gateway.isMember(groupId, userId);
    } catch (error) {
      console.error(`[engine] Membership lookup failed for user ${userId}: ${errorMessage(error)}`);
      return false;
    }
  }

  private requireConfig(groupId: number): GroupConfig {
    const config = this.deps.store.getGroupConfig(groupId);
    if (!config) {
      throw new ConfigurationError(`Group ${groupId} is not set up`);
    }
    return config;
  }

  private isIdle(session: VerificationSession): boolean {
    return this.now() - session.lastActivityAt > this.options.sessionTimeoutMs;
  }

  /** Must be called under the key's lock. Idle sessions are expired here. */
  private lookup(key: string): Lookup {
    const session = this.sessions.get(key);
    if (!session) return { kind: 'none' };
    if (this.isIdle(session)) {
      this.discard(session, 'Expired');
      return { kind: 'expired' };
    }
    return { kind: 'live', session };
  }

  private discard(session: VerificationSession, state: SessionState): void {
    session.state = state;
    this.sessions.delete(userKey(session.groupId, session.userId));
    if (this.activeGroup.get(session.userId) === session.groupId) {
      this.activeGroup.delete(session.userId);
    }
  }

  private promptFor(config: GroupConfig, session: VerificationSession, balance?: TokenBalance): Outbound {
    const chain = requireChain(config.chainId);

    switch (session.state) {
      case 'AwaitingAddress':
        return {
          text:
            `🔐 This group requires holding at least ${config.minBalance} of token ` +
            `${config.tokenAddress.slice(0, 12)}... on ${chain.name}.\n\n` +
            `Please send your wallet address (CashAddr).`,
          buttons: [[{ label: '✖️ Cancel', action: verifyActions.cancel(config.groupId) }]],
        };
      case 'AwaitingTransfer':
        return this.transferPrompt(config, session, balance);
      default:
        return BUSY_MESSAGE;
    }
  }

  private transferPrompt(config: GroupConfig, session: VerificationSession, balance?: TokenBalance): MessageContent {
    const held = balance ? ` (${formatAmount(balance.amount, balance.decimals)} held)` : '';
    return {
      text:
        `✅ Balance check passed${held}.\n\n` +
        `Final step: send exactly 1 token from ${session.address ?? 'your wallet'} to:\n` +
        `${config.verifierAddress}\n\n` +
        `Tap Done (or reply "done") once the transfer is sent.`,
      buttons: [
        [{ label: '✅ Done', action: verifyActions.done(config.groupId) }],
        [{ label: '✖️ Cancel', action: verifyActions.cancel(config.groupId) }],
      ],
    };
  }
}
