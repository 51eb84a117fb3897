import { describe, it, expect } from 'vitest';
import { MAX_REJECTIONS, type SetupRequest } from '../../../src/verification/onboarding.js';
import { CATEGORY, GROUP, OWNER, USER, VERIFIER, setupConfiguredGroup, setupServices } from '../../helpers/fakes.js';

const request: SetupRequest = {
  groupId: GROUP,
  groupName: 'Holders Lounge',
  adminId: USER,
  adminName: 'dana',
};

describe('OnboardingWorkflow', () => {
  describe('whitelist requests', () => {
    it('queues a request from an unknown group and asks the owner', async () => {
      const { onboarding, store, gateway } = setupServices();

      expect(await onboarding.requestSetup(request)).toBe('pending');

      expect(store.getPendingRequest(GROUP)).toMatchObject({
        groupName: 'Holders Lounge',
        requestingAdminId: USER,
        requestingAdminName: 'dana',
      });
      const ownerDm = gateway.lastDm(OWNER);
      expect(typeof ownerDm === 'object' && ownerDm.buttons).toEqual([[
        { label: '✅ Approve', action: `approve:${GROUP}` },
        { label: '❌ Reject', action: `reject:${GROUP}` },
      ]]);
      expect(onboarding.hasDialog(GROUP, USER)).toBe(false);
    });

    it('lets the owner set up any group without approval', async () => {
      const { onboarding, store } = setupServices();

      expect(await onboarding.requestSetup({ ...request, adminId: OWNER })).toBe('setup_started');
      expect(store.getPendingRequest(GROUP)).toBeUndefined();
      expect(onboarding.hasDialog(GROUP, OWNER)).toBe(true);
    });

    it('starts setup directly for a whitelisted group', async () => {
      const { onboarding, store } = setupServices();
      store.setWhitelisted(GROUP, true);

      expect(await onboarding.requestSetup(request)).toBe('setup_started');
      expect(onboarding.isAuthorized(GROUP, USER)).toBe(true);
    });
  });

  describe('decisions', () => {
    it('approving whitelists the group and opens setup for the requester', async () => {
      const { onboarding, store, gateway } = setupServices();
      await onboarding.requestSetup(request);

      expect(await onboarding.approve(GROUP, OWNER)).toEqual({ outcome: 'approved', setupStarted: true });

      expect(store.isWhitelisted(GROUP)).toBe(true);
      expect(store.getPendingRequest(GROUP)).toBeUndefined();
      expect(onboarding.hasDialog(GROUP, USER)).toBe(true);
      expect(gateway.groupTexts(GROUP)).toContain('✅ This group has been approved by the bot owner.');
    });

    it('ignores decisions from anyone but the owner', async () => {
      const { onboarding, store } = setupServices();
      await onboarding.requestSetup(request);

      expect(await onboarding.approve(GROUP, USER)).toEqual({ outcome: 'forbidden' });
      expect(await onboarding.reject(GROUP, USER)).toEqual({ outcome: 'forbidden' });
      expect(store.isWhitelisted(GROUP)).toBe(false);
      expect(store.getRejectedGroup(GROUP)).toBeUndefined();
    });

    it('blocks a group permanently after three rejections', async () => {
      const { onboarding, store, gateway, clock } = setupServices();
      const firstAt = clock.now();

      for (let strike = 1; strike <= MAX_REJECTIONS; strike++) {
        expect(await onboarding.requestSetup(request)).toBe('pending');
        const decision = await onboarding.reject(GROUP, OWNER);
        expect(decision).toEqual({ outcome: 'rejected', rejectionCount: strike, blocked: strike === MAX_REJECTIONS });
        clock.advance(1000);
      }

      expect(onboarding.isBlocked(GROUP)).toBe(true);
      expect(await onboarding.requestSetup(request)).toBe('blocked');
      expect(store.getPendingRequest(GROUP)).toBeUndefined();
      expect(store.getRejectedGroup(GROUP)).toMatchObject({
        rejectionCount: 3,
        blocked: true,
        groupName: 'Holders Lounge',
        lastAdminId: USER,
        firstRejectedAt: firstAt,
        lastRejectedAt: firstAt + 2000,
      });
      expect(gateway.groupTexts(GROUP).at(-1)).toBe('🚫 This group has been blocked from using this bot.');
    });

    it('never approves a blocked group, even from an old request', async () => {
      const { onboarding, store, gateway } = setupServices();
      for (let strike = 1; strike <= MAX_REJECTIONS; strike++) {
        await onboarding.requestSetup(request);
        await onboarding.reject(GROUP, OWNER);
      }
      const messagesBefore = gateway.groupMessages.length;

      expect(await onboarding.approve(GROUP, OWNER)).toEqual({ outcome: 'blocked' });

      expect(store.isWhitelisted(GROUP)).toBe(false);
      expect(onboarding.isBlocked(GROUP)).toBe(true);
      expect(onboarding.hasDialog(GROUP, USER)).toBe(false);
      expect(gateway.groupMessages).toHaveLength(messagesBefore);
    });

    it('keeps counting rejections once blocked', async () => {
      const { onboarding, store } = setupServices();
      for (let i = 0; i < 4; i++) {
        await onboarding.reject(GROUP, OWNER);
      }

      expect(store.getRejectedGroup(GROUP)).toMatchObject({ rejectionCount: 4, blocked: true, groupName: `Group ${GROUP}` });
    });
  });

  describe('setup dialog', () => {
    it('collects the configuration step by step and mints a link', async () => {
      const { onboarding, store, gateway } = setupServices();
      await onboarding.requestSetup({ ...request, adminId: OWNER });

      expect(await onboarding.handleSetupInput(GROUP, OWNER, 'not-a-category')).toBe(true);
      expect(gateway.groupTexts(GROUP).at(-1)).toMatch(/^❌ That is not a valid CashToken category ID/);

      await onboarding.handleSetupInput(GROUP, OWNER, CATEGORY.toUpperCase());
      expect(gateway.groupTexts(GROUP).at(-1)).toMatch(/^Step 2\/3/);

      await onboarding.handleSetupInput(GROUP, OWNER, '0');
      expect(gateway.groupTexts(GROUP).at(-1)).toMatch(/^❌ The minimum balance must be a positive number\./);

      await onboarding.handleSetupInput(GROUP, OWNER, '2.50');
      await onboarding.handleSetupInput(GROUP, OWNER, 'bitcoincash:qqq');
      expect(gateway.groupTexts(GROUP).at(-1)).toMatch(/^❌ That is not a valid Bitcoin Cash address\./);

      await onboarding.handleSetupInput(GROUP, OWNER, VERIFIER);

      expect(store.getGroupConfig(GROUP)).toMatchObject({
        chainId: 'bitcoincash',
        tokenAddress: CATEGORY,
        minBalance: '2.5',
        verifierAddress: VERIFIER,
      });
      const link = store.getLatestVerificationLink(GROUP);
      expect(link).toBeDefined();
      expect(gateway.groupTexts(GROUP).at(-1)).toContain(`https://t.me/test_bot?start=${link?.token}`);
      expect(onboarding.hasDialog(GROUP, OWNER)).toBe(false);
    });

    it('whitelists a group the owner set up directly', async () => {
      const { onboarding, store } = setupServices();
      await onboarding.requestSetup({ ...request, adminId: OWNER });
      await onboarding.handleSetupInput(GROUP, OWNER, CATEGORY);
      await onboarding.handleSetupInput(GROUP, OWNER, '100');
      await onboarding.handleSetupInput(GROUP, OWNER, VERIFIER);

      expect(store.isWhitelisted(GROUP)).toBe(true);
      expect(onboarding.isAuthorized(GROUP, USER)).toBe(true);
      expect(await onboarding.requestSetup(request)).toBe('setup_started');
      expect(store.getPendingRequest(GROUP)).toBeUndefined();
    });

    it('asks before replacing an existing configuration', async () => {
      const { onboarding, store, gateway } = setupConfiguredGroup();
      await onboarding.beginSetup(GROUP, OWNER);

      expect(gateway.groupTexts(GROUP).at(-1)).toBe(
        `⚠️ This group is already configured (token ${CATEGORY.slice(0, 12)}..., minimum 100).\n` +
        'Reply "yes" to replace the configuration.'
      );

      await onboarding.handleSetupInput(GROUP, OWNER, 'maybe');
      expect(gateway.groupTexts(GROUP).at(-1)).toBe(
        'Please reply "yes" to replace the current configuration, or "no" to keep it.'
      );

      await onboarding.handleSetupInput(GROUP, OWNER, 'no');
      expect(gateway.groupTexts(GROUP).at(-1)).toBe('Setup cancelled. Run /setup to start again.');
      expect(store.getGroupConfig(GROUP)?.minBalance).toBe('100');
      expect(onboarding.hasDialog(GROUP, OWNER)).toBe(false);
    });

    it('ignores input from admins without an open dialog', async () => {
      const { onboarding } = setupServices();

      expect(await onboarding.handleSetupInput(GROUP, USER, 'hello')).toBe(false);
      expect(await onboarding.cancelSetup(GROUP, USER)).toBe(false);
    });
  });

  describe('verification links', () => {
    it('reuses the latest link and mints one only when none exists', () => {
      const { onboarding, store } = setupConfiguredGroup();

      expect(onboarding.verificationLinkFor(GROUP)).toBe('https://t.me/test_bot?start=link-token');
      expect(onboarding.verificationLinkFor(-5)).toBeUndefined();

      store.upsertGroupConfig({ ...store.listGroupConfigs()[0], groupId: -2002 });
      const minted = onboarding.verificationLinkFor(-2002);
      expect(minted).toBe(`https://t.me/test_bot?start=${store.getLatestVerificationLink(-2002)?.token}`);
    });
  });
});
