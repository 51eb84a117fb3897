import { describe, it, expect, vi } from 'vitest';
import type { UserRecord } from '../../../src/storage/types.js';
import { ALICE, BOB, GROUP, OTHER_USER, OWNER, USER, setupConfiguredGroup } from '../../helpers/fakes.js';

function verified(env: ReturnType<typeof setupConfiguredGroup>, userId: number, address: string): UserRecord {
  const record: UserRecord = {
    groupId: GROUP,
    userId,
    address,
    verified: true,
    lastVerifiedAt: env.clock.now(),
    verificationTxConfirmed: true,
  };
  env.store.upsertUserRecord(record);
  env.gateway.members.add(`${GROUP}:${userId}`);
  return record;
}

describe('ReverificationScheduler', () => {
  it('removes a member whose balance fell below the minimum, exactly once', async () => {
    const env = setupConfiguredGroup();
    verified(env, USER, ALICE);
    env.chain.balances.set(ALICE, 50n);

    const first = await env.scheduler.runSweepOnce();
    const second = await env.scheduler.runSweepOnce();

    expect(first).toEqual({ groups: 1, checked: 1, valid: 0, evicted: 1, skipped: 0, errors: 0 });
    expect(second).toEqual({ groups: 1, checked: 0, valid: 0, evicted: 0, skipped: 0, errors: 0 });
    expect(env.gateway.removed).toEqual([{ groupId: GROUP, userId: USER }]);
    expect(env.store.getUserRecord(GROUP, USER)).toBeUndefined();
    expect(env.gateway.dmTexts(USER)).toEqual([
      '⚠️ Your wallet no longer holds the minimum 100 tokens required for this group, ' +
      'so you have been removed. Verify again once your balance is restored.',
    ]);
  });

  it('refreshes eligible members and evicts nobody on repeat sweeps', async () => {
    const env = setupConfiguredGroup();
    verified(env, USER, ALICE);
    env.chain.balances.set(ALICE, 150n);

    env.clock.advance(1000);
    await env.scheduler.runSweepOnce();
    env.clock.advance(1000);
    const second = await env.scheduler.runSweepOnce();

    expect(second.valid).toBe(1);
    expect(second.evicted).toBe(0);
    expect(env.gateway.removed).toEqual([]);
    expect(env.store.getUserRecord(GROUP, USER)?.lastVerifiedAt).toBe(env.clock.now());
  });

  it('never evicts the owner', async () => {
    const env = setupConfiguredGroup();
    verified(env, OWNER, ALICE);

    const summary = await env.scheduler.runSweepOnce();

    expect(summary.skipped).toBe(1);
    expect(env.chain.balanceCalls).toBe(0);
    expect(env.store.getUserRecord(GROUP, OWNER)).toBeDefined();
  });

  it('isolates chain failures to the affected user', async () => {
    const env = setupConfiguredGroup();
    verified(env, USER, ALICE);
    verified(env, OTHER_USER, BOB);
    env.chain.failing.add(ALICE);
    env.chain.balances.set(BOB, 150n);

    const summary = await env.scheduler.runSweepOnce();

    expect(summary).toEqual({ groups: 1, checked: 1, valid: 1, evicted: 0, skipped: 0, errors: 1 });
    expect(env.store.getUserRecord(GROUP, USER)).toBeDefined();
    // Three attempts for the failing address, one for the healthy one
    expect(env.chain.balanceCalls).toBe(4);
  });

  it('skips a record that was re-verified while its balance was fetched', async () => {
    const env = setupConfiguredGroup();
    const record = verified(env, USER, ALICE);
    env.chain.balances.set(ALICE, 0n);
    env.chain.beforeBalance = async () => {
      env.store.upsertUserRecord({ ...record, lastVerifiedAt: record.lastVerifiedAt + 1 });
    };

    const summary = await env.scheduler.runSweepOnce();

    expect(summary.skipped).toBe(1);
    expect(env.gateway.removed).toEqual([]);
    expect(env.store.getUserRecord(GROUP, USER)).toBeDefined();
  });

  it('keeps the record when removal fails so the next sweep retries', async () => {
    const env = setupConfiguredGroup();
    verified(env, USER, ALICE);
    env.gateway.failRemove = true;

    const summary = await env.scheduler.runSweepOnce();

    expect(summary.errors).toBe(1);
    expect(env.store.getUserRecord(GROUP, USER)).toBeDefined();
  });

  it('sweeps a single group on demand', async () => {
    const env = setupConfiguredGroup();
    verified(env, USER, ALICE);
    env.chain.balances.set(ALICE, 100n);

    expect(await env.scheduler.sweepGroup(GROUP)).toEqual({
      groups: 1, checked: 1, valid: 1, evicted: 0, skipped: 0, errors: 0,
    });
    expect(await env.scheduler.sweepGroup(-5)).toEqual({
      groups: 0, checked: 0, valid: 0, evicted: 0, skipped: 0, errors: 0,
    });
  });

  it('runs a sweep on start and does not stack timers', async () => {
    const env = setupConfiguredGroup();
    verified(env, USER, ALICE);
    env.chain.balances.set(ALICE, 150n);

    env.scheduler.start();
    env.scheduler.start();
    await vi.waitFor(() => expect(env.scheduler.isSweeping).toBe(false));
    env.scheduler.stop();

    expect(env.chain.balanceCalls).toBe(1);
  });
});
