import { Composer, type Context } from 'grammy';
import { requireChain } from '../../blockchain/chains.js';
import { formatAmount, meetsMinimum } from '../../blockchain/amounts.js';
import { errorMessage } from '../../errors.js';
import type { Services } from '../../services.js';
import { MAX_REJECTIONS, type DecisionOutcome } from '../../verification/onboarding.js';
import { checkBotPermissions, requireGroupAdmin, requireOwner } from '../middleware/auth.js';

const formatTime = (ms: number) => new Date(ms).toISOString().slice(0, 16).replace('T', ' ');

const OWNER_HELP =
  `👑 Owner commands\n\n` +
  `/admin pending - Groups waiting for approval\n` +
  `/admin approve <group_id> - Whitelist a group\n` +
  `/admin reject <group_id> - Reject a group (adds a strike)\n` +
  `/admin list - Whitelisted groups\n` +
  `/admin blocked - Blocked groups\n` +
  `/admin rejections - Rejection history\n` +
  `/admin strikes <group_id> - Strikes for one group`;

function displayName(ctx: Context): string {
  const from = ctx.from;
  if (!from) return 'unknown';
  return from.username ? `@${from.username}` : from.first_name;
}

function describeDecision(groupId: number, decision: DecisionOutcome): string {
  switch (decision.outcome) {
    case 'forbidden':
      return 'Only the bot owner can do this.';
    case 'blocked':
      return `🚫 Group ${groupId} is blocked and cannot be approved.`;
    case 'approved':
      return `✅ Group ${groupId} approved.`;
    case 'rejected':
      return `❌ Group ${groupId} rejected (${decision.rejectionCount}/${MAX_REJECTIONS})${decision.blocked ? ', now blocked' : ''}.`;
  }
}

function parseGroupId(value: string | undefined): number | null {
  if (!value || !/^-?\d+$/.test(value)) return null;
  return Number(value);
}

export function adminHandlers(services: Services): Composer<Context> {
  const { store, onboarding, scheduler, chain, settings, tokenName } = services;
  const composer = new Composer<Context>();
  const groupAdmin = requireGroupAdmin(settings.ownerUserId);
  const owner = requireOwner(settings.ownerUserId);
  const groups = composer.chatType(['group', 'supergroup']);

  // /setup - request access (or start configuring once whitelisted)
  composer.command('setup', groupAdmin, async (ctx) => {
    const chat = ctx.chat;
    const userId = ctx.from?.id;
    if (!chat || chat.type === 'private' || !userId) {
      await ctx.reply('This command must be used in a group.');
      return;
    }

    const permissions = await checkBotPermissions(ctx);
    if (!permissions.canKick || !permissions.canInvite) {
      await ctx.reply(
        '⚠️ I need to be an admin with "Ban users" and "Invite users via link" rights ' +
        'to gate this group. Setup continues, but members cannot be managed until then.'
      );
    }

    await onboarding.requestSetup({
      groupId: chat.id,
      groupName: chat.title,
      adminId: userId,
      adminName: displayName(ctx),
    });
  });

  // /status - show configuration and verification link
  composer.command('status', groupAdmin, async (ctx) => {
    const chat = ctx.chat;
    if (!chat || chat.type === 'private') {
      await ctx.reply('This command must be used in a group.');
      return;
    }

    const config = store.getGroupConfig(chat.id);
    if (!config && !onboarding.isAuthorized(chat.id, ctx.from?.id ?? 0)) {
      const pending = store.getPendingRequest(chat.id);
      const strikes = store.getRejectedGroup(chat.id)?.rejectionCount ?? 0;
      await ctx.reply(
        pending
          ? `⏳ Whitelist request pending since ${formatTime(pending.requestedAt)}.`
          : `This group is not whitelisted. Use /setup to request access.` +
            (strikes > 0 ? ` (${strikes}/${MAX_REJECTIONS} rejections so far)` : '')
      );
      return;
    }

    if (!config) {
      await ctx.reply('✅ Whitelisted, but not configured yet. Use /setup to configure.');
      return;
    }

    const members = store.listUserRecords(chat.id, true).length;
    const token = await tokenName(config.tokenAddress);
    await ctx.reply(
      `📊 Group status\n\n` +
      `Chain: ${requireChain(config.chainId).name}\n` +
      `Token: ${token}\n` +
      `Category: ${config.tokenAddress}\n` +
      `Minimum balance: ${config.minBalance}\n` +
      `Verifier address: ${config.verifierAddress}\n` +
      `Verified members: ${members}\n` +
      `Last updated: ${formatTime(config.updatedAt)}\n\n` +
      `Verification link:\n${onboarding.verificationLinkFor(chat.id) ?? 'n/a'}`
    );
  });

  // /scan - re-check every verified member of this group now
  composer.command('scan', groupAdmin, async (ctx) => {
    const chat = ctx.chat;
    if (!chat || chat.type === 'private') {
      await ctx.reply('This command must be used in a group.');
      return;
    }
    if (!store.getGroupConfig(chat.id)) {
      await ctx.reply('This group is not configured. Use /setup first.');
      return;
    }

    await ctx.reply('🔍 Re-checking all verified members...');
    const summary = await scheduler.sweepGroup(chat.id);
    await ctx.reply(
      `✅ Scan complete\n\n` +
      `Checked: ${summary.checked}\n` +
      `Still eligible: ${summary.valid}\n` +
      `Removed: ${summary.evicted}\n` +
      `Errors: ${summary.errors}`
    );
  });

  // /testbalance <address> - balance of this group's token at an address
  composer.command('testbalance', groupAdmin, async (ctx) => {
    const chat = ctx.chat;
    const config = chat ? store.getGroupConfig(chat.id) : undefined;
    if (!config) {
      await ctx.reply('This group is not configured. Use /setup first.');
      return;
    }

    const address = requireChain(config.chainId).normalizeAddress(ctx.match);
    if (!address) {
      await ctx.reply('Usage: /testbalance <address>');
      return;
    }

    try {
      const balance = await chain.getBalance(config.chainId, config.tokenAddress, address);
      const eligible = meetsMinimum(balance.amount, balance.decimals, config.minBalance);
      await ctx.reply(
        `💰 ${formatAmount(balance.amount, balance.decimals)} tokens at ${address}\n` +
        `${eligible ? '✅ Meets' : '❌ Below'} the minimum of ${config.minBalance}.`
      );
    } catch (error) {
      await ctx.reply(`⚠️ Balance lookup failed: ${errorMessage(error)}`);
    }
  });

  // Setup dialog input from the admin who started it
  groups.on('message:text', async (ctx, next) => {
    const userId = ctx.from?.id;
    if (!userId || ctx.message.text.startsWith('/') || !onboarding.hasDialog(ctx.chat.id, userId)) {
      await next();
      return;
    }
    await onboarding.handleSetupInput(ctx.chat.id, userId, ctx.message.text);
  });

  composer.callbackQuery('setup:cancel', async (ctx) => {
    const chatId = ctx.chat?.id;
    const cancelled = chatId !== undefined && (await onboarding.cancelSetup(chatId, ctx.callbackQuery.from.id));
    await ctx.answerCallbackQuery(cancelled ? 'Setup cancelled' : 'No setup in progress for you');
  });

  // Owner decisions from the whitelist request DM
  composer.callbackQuery(/^(approve|reject):(-?\d+)$/, async (ctx) => {
    const match = typeof ctx.match === 'string' ? null : ctx.match;
    const groupId = parseGroupId(match?.[2]);
    if (!match || groupId === null) {
      await ctx.answerCallbackQuery();
      return;
    }

    const decision = match[1] === 'approve'
      ? await onboarding.approve(groupId, ctx.callbackQuery.from.id)
      : await onboarding.reject(groupId, ctx.callbackQuery.from.id);

    switch (decision.outcome) {
      case 'forbidden':
        await ctx.answerCallbackQuery('Only the bot owner can do this.');
        return;
      case 'blocked':
        await ctx.answerCallbackQuery('Group is blocked');
        await ctx.editMessageText(`🚫 Group ${groupId} is blocked and cannot be approved.`);
        return;
      case 'approved':
        await ctx.answerCallbackQuery('Approved');
        await ctx.editMessageText(`✅ Group ${groupId} approved.`);
        return;
      case 'rejected':
        await ctx.answerCallbackQuery('Rejected');
        await ctx.editMessageText(
          `❌ Group ${groupId} rejected (${decision.rejectionCount}/${MAX_REJECTIONS})` +
          (decision.blocked ? ' and blocked.' : '.')
        );
        return;
    }
  });

  // /admin <subcommand> - owner only, in DM
  composer.chatType('private').command('admin', owner, async (ctx) => {
    const [subcommand = '', argument] = ctx.match.trim().split(/\s+/);
    const actorId = settings.ownerUserId;

    switch (subcommand.toLowerCase()) {
      case 'pending': {
        const pending = store.listPendingRequests();
        await ctx.reply(
          pending.length === 0
            ? 'No pending requests.'
            : '⏳ Pending requests\n\n' + pending
                .map(p => `• ${p.groupName} (${p.groupId}) by ${p.requestingAdminName}, ${formatTime(p.requestedAt)}`)
                .join('\n')
        );
        return;
      }

      case 'approve':
      case 'reject': {
        const groupId = parseGroupId(argument);
        if (groupId === null) {
          await ctx.reply(`Usage: /admin ${subcommand} <group_id>`);
          return;
        }
        const decision = subcommand === 'approve'
          ? await onboarding.approve(groupId, actorId)
          : await onboarding.reject(groupId, actorId);
        await ctx.reply(describeDecision(groupId, decision));
        return;
      }

      case 'list': {
        const whitelisted = store.listWhitelistedGroups();
        await ctx.reply(
          whitelisted.length === 0
            ? 'No whitelisted groups.'
            : '✅ Whitelisted groups\n\n' + whitelisted
                .map(id => `• ${id}${store.getGroupConfig(id) ? '' : ' (not configured)'}`)
                .join('\n')
        );
        return;
      }

      case 'blocked':
      case 'rejections': {
        const rejected = store
          .listRejectedGroups()
          .filter(r => subcommand === 'rejections' || r.blocked);
        await ctx.reply(
          rejected.length === 0
            ? subcommand === 'blocked' ? 'No blocked groups.' : 'No rejections.'
            : rejected
                .map(r =>
                  `• ${r.groupName} (${r.groupId}): ${r.rejectionCount}/${MAX_REJECTIONS}` +
                  `${r.blocked ? ' 🚫' : ''}, last ${formatTime(r.lastRejectedAt)} by ${r.lastAdminName}`
                )
                .join('\n')
        );
        return;
      }

      case 'strikes': {
        const groupId = parseGroupId(argument);
        if (groupId === null) {
          await ctx.reply('Usage: /admin strikes <group_id>');
          return;
        }
        const record = store.getRejectedGroup(groupId);
        await ctx.reply(
          record
            ? `Group ${groupId}: ${record.rejectionCount}/${MAX_REJECTIONS} strikes` +
              `${record.blocked ? ' (blocked)' : ''}, first ${formatTime(record.firstRejectedAt)}, ` +
              `last ${formatTime(record.lastRejectedAt)}`
            : `Group ${groupId} has no strikes.`
        );
        return;
      }

      default:
        await ctx.reply(OWNER_HELP);
    }
  });

  return composer;
}
