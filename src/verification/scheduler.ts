import type { ChainClient } from '../blockchain/client.js';
import { meetsMinimum } from '../blockchain/amounts.js';
import { shortAddress } from '../blockchain/chains.js';
import { withRetry, type RetryOptions } from '../blockchain/retry.js';
import { errorMessage } from '../errors.js';
import type { GroupConfig, Store, UserRecord } from '../storage/types.js';
import { KeyedMutex, userKey } from './locks.js';
import type { MessagingGateway } from './messaging.js';

export interface SweepSummary {
  groups: number;
  checked: number;
  valid: number;
  evicted: number;
  skipped: number;
  errors: number;
}

export interface SchedulerOptions {
  ownerUserId: number;
  intervalMs: number;
  chainRetry: RetryOptions;
  now?: () => number;
}

export interface SchedulerDeps {
  store: Store;
  chain: ChainClient;
  gateway: MessagingGateway;
  locks: KeyedMutex;
}

type UserOutcome = 'valid' | 'evicted' | 'skipped' | 'error';

const emptySummary = (): SweepSummary => ({ groups: 0, checked: 0, valid: 0, evicted: 0, skipped: 0, errors: 0 });

/**
 * Periodically re-checks every verified member's balance and removes those
 * who no longer meet their group's minimum.
 */
export class ReverificationScheduler {
  private timer: ReturnType<typeof setInterval> | null = null;
  private running: Promise<SweepSummary> | null = null;
  private readonly now: () => number;

  constructor(
    private readonly deps: SchedulerDeps,
    private readonly options: SchedulerOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  /** Run a sweep now, then every interval. Ticks that overlap a running sweep are skipped. */
  start(): void {
    if (this.timer) {
      console.log('[sweep] Scheduler already running');
      return;
    }

    this.timer = setInterval(() => this.tick(), this.options.intervalMs);
    console.log(`[sweep] Scheduler started (every ${Math.round(this.options.intervalMs / 3600000)}h)`);
    this.tick();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      console.log('[sweep] Scheduler stopped');
    }
  }

  get isSweeping(): boolean {
    return this.running !== null;
  }

  async runSweepOnce(): Promise<SweepSummary> {
    const startedAt = this.now();
    const summary = emptySummary();

    for (const config of this.deps.store.listGroupConfigs()) {
      const groupSummary = await this.sweepConfig(config);
      summary.groups++;
      summary.checked += groupSummary.checked;
      summary.valid += groupSummary.valid;
      summary.evicted += groupSummary.evicted;
      summary.skipped += groupSummary.skipped;
      summary.errors += groupSummary.errors;
    }

    const elapsed = ((this.now() - startedAt) / 1000).toFixed(1);
    console.log(
      `[sweep] ${summary.groups} groups | ${summary.checked} checked | ${summary.valid} valid | ` +
      `${summary.evicted} evicted | ${summary.skipped} skipped | ${summary.errors} errors | ${elapsed}s`
    );
    return summary;
  }

  async sweepGroup(groupId: number): Promise<SweepSummary> {
    const config = this.deps.store.getGroupConfig(groupId);
    if (!config) return emptySummary();
    const summary = await this.sweepConfig(config);
    console.log(`[sweep] group ${groupId}: ${summary.checked} checked, ${summary.evicted} evicted, ${summary.errors} errors`);
    return summary;
  }

  private tick(): void {
    if (this.running) {
      console.log('[sweep] Previous sweep still running, skipping tick');
      return;
    }

    this.running = this.runSweepOnce();
    this.running
      .catch(error => {
        console.error('[sweep] Sweep failed:', error);
      })
      .finally(() => {
        this.running = null;
      });
  }

  private async sweepConfig(config: GroupConfig): Promise<SweepSummary> {
    const summary = emptySummary();
    summary.groups = 1;

    for (const record of this.deps.store.listUserRecords(config.groupId, true)) {
      const outcome = await this.checkUser(config, record);
      switch (outcome) {
        case 'valid':
          summary.checked++;
          summary.valid++;
          break;
        case 'evicted':
          summary.checked++;
          summary.evicted++;
          break;
        case 'skipped':
          summary.skipped++;
          break;
        case 'error':
          summary.errors++;
          break;
      }
    }
    return summary;
  }

  private async checkUser(config: GroupConfig, snapshot: UserRecord): Promise<UserOutcome> {
    const { store, chain, gateway, locks } = this.deps;
    const { groupId, userId } = snapshot;

    if (userId === this.options.ownerUserId) return 'skipped';

    let eligible: boolean;
    try {
      const balance = await withRetry(
        'getBalance',
        () => chain.getBalance(config.chainId, config.tokenAddress, snapshot.address),
        this.options.chainRetry
      );
      eligible = meetsMinimum(balance.amount, balance.decimals, config.minBalance);
    } catch (error) {
      console.error(`[sweep] Balance check failed for user ${userId} in group ${groupId}: ${errorMessage(error)}`);
      return 'error';
    }

    return locks.runExclusive(userKey(groupId, userId), async (): Promise<UserOutcome> => {
      const current = store.getUserRecord(groupId, userId);
      // Re-verified or removed while the balance was being fetched
      if (!current || !current.verified || current.lastVerifiedAt !== snapshot.lastVerifiedAt || current.address !== snapshot.address) {
        return 'skipped';
      }

      if (eligible) {
        store.upsertUserRecord({ ...current, lastVerifiedAt: this.now() });
        return 'valid';
      }

      console.log(`[sweep] User ${userId} (${shortAddress(current.address)}) below minimum in group ${groupId}, removing`);
      try {
        await gateway.sendDirectMessage(
          userId,
          `⚠️ Your wallet no longer holds the minimum ${config.minBalance} tokens required for this group, ` +
          `so you have been removed. Verify again once your balance is restored.`
        );
      } catch (error) {
        console.error(`[sweep] Could not notify user ${userId}: ${errorMessage(error)}`);
      }

      try {
        await gateway.removeMember(groupId, userId);
      } catch (error) {
        // Keep the record so the next sweep tries again
        console.error(`[sweep] Could not remove user ${userId} from group ${groupId}: ${errorMessage(error)}`);
        return 'error';
      }

      store.deleteUserRecord(groupId, userId);
      return 'evicted';
    });
  }
}
