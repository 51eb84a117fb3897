import crypto from 'crypto';
import { parsePositiveDecimal } from '../blockchain/amounts.js';
import { requireChain } from '../blockchain/chains.js';
import { errorMessage } from '../errors.js';
import type { GroupConfig, Store, VerificationLink } from '../storage/types.js';
import { KeyedMutex, groupKey } from './locks.js';
import type { MessagingGateway, Outbound } from './messaging.js';

/** Rejections after which a group is blocked for good. */
export const MAX_REJECTIONS = 3;

export type SetupStep = 'confirm_overwrite' | 'token_address' | 'min_balance' | 'verifier_address';

interface SetupDialog {
  groupId: number;
  adminId: number;
  step: SetupStep;
  tokenAddress?: string;
  minBalance?: string;
}

export interface SetupRequest {
  groupId: number;
  groupName: string;
  adminId: number;
  adminName: string;
}

export type SetupRequestOutcome = 'blocked' | 'pending' | 'setup_started';

export type DecisionOutcome =
  | { outcome: 'forbidden' }
  | { outcome: 'blocked' }
  | { outcome: 'approved'; setupStarted: boolean }
  | { outcome: 'rejected'; rejectionCount: number; blocked: boolean };

export interface OnboardingOptions {
  ownerUserId: number;
  chainId: string;
  now?: () => number;
  generateToken?: () => string;
}

export interface OnboardingDeps {
  store: Store;
  gateway: MessagingGateway;
  locks: KeyedMutex;
}

export const onboardingActions = {
  approve: (groupId: number) => `approve:${groupId}`,
  reject: (groupId: number) => `reject:${groupId}`,
  cancelSetup: 'setup:cancel',
};

const CANCEL_SETUP_BUTTON = [[{ label: '✖️ Cancel setup', action: onboardingActions.cancelSetup }]];

function dialogKey(groupId: number, adminId: number): string {
  return `${groupId}:${adminId}`;
}

/**
 * Group onboarding: owner approval of new groups (with permanent blocking
 * after repeated rejections) and the admin setup dialog that follows.
 */
export class OnboardingWorkflow {
  private readonly dialogs = new Map<string, SetupDialog>();
  private readonly now: () => number;
  private readonly generateToken: () => string;

  constructor(
    private readonly deps: OnboardingDeps,
    private readonly options: OnboardingOptions
  ) {
    this.now = options.now ?? Date.now;
    this.generateToken = options.generateToken ?? (() => crypto.randomBytes(16).toString('base64url'));
  }

  isBlocked(groupId: number): boolean {
    return this.deps.store.getRejectedGroup(groupId)?.blocked ?? false;
  }

  isAuthorized(groupId: number, userId: number): boolean {
    return userId === this.options.ownerUserId || this.deps.store.isWhitelisted(groupId);
  }

  async requestSetup(request: SetupRequest): Promise<SetupRequestOutcome> {
    const { store, locks } = this.deps;
    const { groupId } = request;

    if (request.adminId !== this.options.ownerUserId) {
      const outcome = await locks.runExclusive(groupKey(groupId), () => {
        if (this.isBlocked(groupId)) return 'blocked' as const;
        if (store.isWhitelisted(groupId)) return 'whitelisted' as const;

        store.upsertPendingRequest({
          groupId,
          groupName: request.groupName,
          requestingAdminId: request.adminId,
          requestingAdminName: request.adminName,
          requestedAt: this.now(),
        });
        return 'pending' as const;
      });

      if (outcome === 'blocked') {
        console.log(`[onboarding] Refused setup for blocked group ${groupId}`);
        await this.notifyGroup(groupId, '🚫 This group has been blocked from using this bot.');
        return 'blocked';
      }

      if (outcome === 'pending') {
        console.log(`[onboarding] Whitelist request from group ${groupId} (${request.groupName})`);
        await this.notifyOwner({
          text:
            `📝 New whitelist request\n\n` +
            `Group: ${request.groupName}\n` +
            `Group ID: ${groupId}\n` +
            `Requested by: ${request.adminName} (${request.adminId})`,
          buttons: [[
            { label: '✅ Approve', action: onboardingActions.approve(groupId) },
            { label: '❌ Reject', action: onboardingActions.reject(groupId) },
          ]],
        });
        await this.notifyGroup(
          groupId,
          '⏳ This group is not whitelisted yet. A request has been sent to the bot owner; you will be notified here.'
        );
        return 'pending';
      }
    }

    await this.beginSetup(groupId, request.adminId);
    return 'setup_started';
  }

  async approve(groupId: number, actorId: number): Promise<DecisionOutcome> {
    if (actorId !== this.options.ownerUserId) return { outcome: 'forbidden' };
    const { store, locks } = this.deps;

    const result = await locks.runExclusive(groupKey(groupId), () => {
      if (this.isBlocked(groupId)) {
        store.deletePendingRequest(groupId);
        return { blocked: true as const };
      }
      const request = store.getPendingRequest(groupId);
      store.transaction(() => {
        store.setWhitelisted(groupId, true);
        store.deletePendingRequest(groupId);
      });
      return { blocked: false as const, pending: request };
    });

    if (result.blocked) {
      console.log(`[onboarding] Refused to approve blocked group ${groupId}`);
      return { outcome: 'blocked' };
    }
    const { pending } = result;

    console.log(`[onboarding] Group ${groupId} approved`);
    await this.notifyGroup(groupId, '✅ This group has been approved by the bot owner.');

    if (pending) {
      await this.beginSetup(groupId, pending.requestingAdminId);
    }
    return { outcome: 'approved', setupStarted: pending !== undefined };
  }

  async reject(groupId: number, actorId: number): Promise<DecisionOutcome> {
    if (actorId !== this.options.ownerUserId) return { outcome: 'forbidden' };
    const { store, locks } = this.deps;

    const record = await locks.runExclusive(groupKey(groupId), () => {
      const pending = store.getPendingRequest(groupId);
      const previous = store.getRejectedGroup(groupId);
      const now = this.now();
      const rejectionCount = (previous?.rejectionCount ?? 0) + 1;

      const next = {
        groupId,
        rejectionCount,
        groupName: pending?.groupName ?? previous?.groupName ?? `Group ${groupId}`,
        lastAdminId: pending?.requestingAdminId ?? previous?.lastAdminId ?? 0,
        lastAdminName: pending?.requestingAdminName ?? previous?.lastAdminName ?? 'unknown',
        firstRejectedAt: previous?.firstRejectedAt ?? now,
        lastRejectedAt: now,
        blocked: (previous?.blocked ?? false) || rejectionCount >= MAX_REJECTIONS,
      };
      store.transaction(() => {
        store.upsertRejectedGroup(next);
        store.deletePendingRequest(groupId);
      });
      return next;
    });

    console.log(`[onboarding] Group ${groupId} rejected (${record.rejectionCount}/${MAX_REJECTIONS})${record.blocked ? ', blocked' : ''}`);
    await this.notifyGroup(
      groupId,
      record.blocked
        ? `🚫 This group has been rejected ${record.rejectionCount} times and is now permanently blocked.`
        : `❌ The whitelist request for this group was rejected (strike ${record.rejectionCount}/${MAX_REJECTIONS}). ` +
          `After ${MAX_REJECTIONS} rejections the group is blocked.`
    );
    return { outcome: 'rejected', rejectionCount: record.rejectionCount, blocked: record.blocked };
  }

  async beginSetup(groupId: number, adminId: number): Promise<void> {
    const existing = this.deps.store.getGroupConfig(groupId);
    const dialog: SetupDialog = {
      groupId,
      adminId,
      step: existing ? 'confirm_overwrite' : 'token_address',
    };
    this.dialogs.set(dialogKey(groupId, adminId), dialog);
    console.log(`[onboarding] Setup started in group ${groupId} by ${adminId}`);
    await this.deps.gateway.sendGroupMessage(groupId, this.promptFor(dialog, existing));
  }

  hasDialog(groupId: number, adminId: number): boolean {
    return this.dialogs.has(dialogKey(groupId, adminId));
  }

  /**
   * Feed a group message from an admin into their setup dialog.
   * Returns false when that admin has no dialog open.
   */
  async handleSetupInput(groupId: number, adminId: number, text: string): Promise<boolean> {
    const dialog = this.dialogs.get(dialogKey(groupId, adminId));
    if (!dialog) return false;

    const { gateway } = this.deps;
    const chain = requireChain(this.options.chainId);
    const input = text.trim();

    switch (dialog.step) {
      case 'confirm_overwrite': {
        const answer = input.toLowerCase();
        if (answer === 'yes' || answer === 'y') {
          dialog.step = 'token_address';
        } else if (answer === 'no' || answer === 'n') {
          await this.cancelSetup(groupId, adminId);
          return true;
        } else {
          await gateway.sendGroupMessage(groupId, {
            text: 'Please reply "yes" to replace the current configuration, or "no" to keep it.',
            buttons: CANCEL_SETUP_BUTTON,
          });
          return true;
        }
        break;
      }

      case 'token_address': {
        const tokenAddress = chain.normalizeTokenAddress(input);
        if (!tokenAddress) {
          await this.reprompt(dialog, `❌ That is not a valid ${chain.tokenLabel}.`);
          return true;
        }
        dialog.tokenAddress = tokenAddress;
        dialog.step = 'min_balance';
        break;
      }

      case 'min_balance': {
        const minBalance = parsePositiveDecimal(input);
        if (!minBalance) {
          await this.reprompt(dialog, '❌ The minimum balance must be a positive number.');
          return true;
        }
        dialog.minBalance = minBalance;
        dialog.step = 'verifier_address';
        break;
      }

      case 'verifier_address': {
        const verifierAddress = chain.normalizeAddress(input);
        if (!verifierAddress) {
          await this.reprompt(dialog, `❌ That is not a valid ${chain.name} address.`);
          return true;
        }
        if (!dialog.tokenAddress || !dialog.minBalance) {
          // Fields are filled in order, so this only happens if the dialog was corrupted
          await this.cancelSetup(groupId, adminId);
          return true;
        }

        await this.completeSetup(dialog, {
          groupId,
          chainId: chain.id,
          tokenAddress: dialog.tokenAddress,
          minBalance: dialog.minBalance,
          verifierAddress,
          updatedAt: this.now(),
        });
        return true;
      }
    }

    await gateway.sendGroupMessage(groupId, this.promptFor(dialog));
    return true;
  }

  async cancelSetup(groupId: number, adminId: number): Promise<boolean> {
    const removed = this.dialogs.delete(dialogKey(groupId, adminId));
    if (removed) {
      await this.deps.gateway.sendGroupMessage(groupId, 'Setup cancelled. Run /setup to start again.');
    }
    return removed;
  }

  /** Latest verification link for the group, minting one if it has none. */
  verificationLinkFor(groupId: number): string | undefined {
    if (!this.deps.store.getGroupConfig(groupId)) return undefined;
    const link = this.deps.store.getLatestVerificationLink(groupId) ?? this.mintLink(groupId);
    return this.deps.gateway.startLink(link.token);
  }

  mintLink(groupId: number): VerificationLink {
    const link: VerificationLink = {
      token: this.generateToken(),
      groupId,
      createdAt: this.now(),
    };
    this.deps.store.addVerificationLink(link);
    return link;
  }

  private async completeSetup(dialog: SetupDialog, config: GroupConfig): Promise<void> {
    const { store, gateway, locks } = this.deps;

    const link = await locks.runExclusive(groupKey(config.groupId), () =>
      store.transaction(() => {
        store.upsertGroupConfig(config);
        // Owner-run setups skip the request path, so record the approval here
        store.setWhitelisted(config.groupId, true);
        return this.mintLink(config.groupId);
      })
    );
    this.dialogs.delete(dialogKey(dialog.groupId, dialog.adminId));

    console.log(`[onboarding] ✅ Group ${config.groupId} configured for token ${config.tokenAddress.slice(0, 12)}...`);
    await gateway.sendGroupMessage(
      config.groupId,
      `✅ Setup complete!\n\n` +
      `Chain: ${requireChain(config.chainId).name}\n` +
      `Token: ${config.tokenAddress}\n` +
      `Minimum balance: ${config.minBalance}\n` +
      `Verifier address: ${config.verifierAddress}\n\n` +
      `Share this verification link with new members:\n${gateway.startLink(link.token)}`
    );
  }

  private async reprompt(dialog: SetupDialog, problem: string): Promise<void> {
    const prompt = this.promptFor(dialog);
    const text = typeof prompt === 'string' ? prompt : prompt.text;
    await this.deps.gateway.sendGroupMessage(dialog.groupId, {
      text: `${problem}\n\n${text}`,
      buttons: CANCEL_SETUP_BUTTON,
    });
  }

  private promptFor(dialog: SetupDialog, existing?: GroupConfig): Outbound {
    const chain = requireChain(this.options.chainId);

    switch (dialog.step) {
      case 'confirm_overwrite':
        return {
          text:
            `⚠️ This group is already configured` +
            (existing ? ` (token ${existing.tokenAddress.slice(0, 12)}..., minimum ${existing.minBalance})` : '') +
            `.\nReply "yes" to replace the configuration.`,
          buttons: CANCEL_SETUP_BUTTON,
        };
      case 'token_address':
        return {
          text: `🛠 Setup (${chain.name})\n\nStep 1/3: send the ${chain.tokenLabel} of the token that grants access.`,
          buttons: CANCEL_SETUP_BUTTON,
        };
      case 'min_balance':
        return {
          text: 'Step 2/3: send the minimum balance a member must hold (for example 100 or 0.5).',
          buttons: CANCEL_SETUP_BUTTON,
        };
      case 'verifier_address':
        return {
          text: 'Step 3/3: send the verifier address. Members prove wallet ownership by sending 1 token to it.',
          buttons: CANCEL_SETUP_BUTTON,
        };
    }
  }

  private async notifyOwner(content: Outbound): Promise<void> {
    try {
      await this.deps.gateway.sendDirectMessage(this.options.ownerUserId, content);
    } catch (error) {
      console.error(`[onboarding] Could not notify owner: ${errorMessage(error)}`);
    }
  }

  private async notifyGroup(groupId: number, content: Outbound): Promise<void> {
    try {
      await this.deps.gateway.sendGroupMessage(groupId, content);
    } catch (error) {
      console.error(`[onboarding] Could not message group ${groupId}: ${errorMessage(error)}`);
    }
  }
}
