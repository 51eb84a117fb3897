import type { Context, MiddlewareFn } from 'grammy';
import type { OnboardingWorkflow } from '../../verification/onboarding.js';
import { isAdminStatus } from '../utils/permissions.js';

/**
 * Middleware to check that the sender is the bot owner
 */
export function requireOwner(ownerUserId: number): MiddlewareFn<Context> {
  return async (ctx, next) => {
    if (ctx.from?.id !== ownerUserId) {
      await ctx.reply('This command is only available to the bot owner.');
      return;
    }
    await next();
  };
}

/**
 * Middleware to check if user is a group admin (the owner always passes)
 */
export function requireGroupAdmin(ownerUserId: number): MiddlewareFn<Context> {
  return async (ctx, next) => {
    const userId = ctx.from?.id;
    const chatId = ctx.chat?.id;

    if (!userId || !chatId) {
      await ctx.reply('Could not determine user or chat.');
      return;
    }

    if (userId === ownerUserId) {
      await next();
      return;
    }

    if (ctx.chat?.type === 'private') {
      await ctx.reply('This command must be used in a group.');
      return;
    }

    try {
      const member = await ctx.api.getChatMember(chatId, userId);
      if (!isAdminStatus(member)) {
        await ctx.reply('This command is only available to group administrators.');
        return;
      }
    } catch (error) {
      console.error('Error checking admin status:', error);
      await ctx.reply('Could not verify admin status.');
      return;
    }

    await next();
  };
}

/**
 * Drop every update from a group that has been blocked after repeated rejections
 */
export function ignoreBlockedGroups(onboarding: OnboardingWorkflow): MiddlewareFn<Context> {
  return async (ctx, next) => {
    const chat = ctx.chat;
    if (chat && chat.type !== 'private' && onboarding.isBlocked(chat.id)) {
      return;
    }
    await next();
  };
}

/**
 * Check if the bot has the rights gating needs in a group
 */
export async function checkBotPermissions(ctx: Context): Promise<{
  canKick: boolean;
  canInvite: boolean;
}> {
  const chatId = ctx.chat?.id;
  if (!chatId) {
    return { canKick: false, canInvite: false };
  }

  try {
    const botMember = await ctx.api.getChatMember(chatId, ctx.me.id);

    if (botMember.status !== 'administrator') {
      return { canKick: false, canInvite: false };
    }

    return {
      canKick: botMember.can_restrict_members ?? false,
      canInvite: botMember.can_invite_users ?? false,
    };
  } catch (error) {
    console.error('Error checking bot permissions:', error);
    return { canKick: false, canInvite: false };
  }
}
