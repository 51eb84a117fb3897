import { Composer, type Context } from 'grammy';
import { errorMessage } from '../../errors.js';
import type { Services } from '../../services.js';
import { isAdminStatus, isPresent } from '../utils/permissions.js';

export function joinHandlers(services: Services): Composer<Context> {
  const { store, invites, onboarding, gateway, settings } = services;
  const composer = new Composer<Context>();

  // Handle new chat members
  composer.on('chat_member', async (ctx) => {
    const { chat, new_chat_member, old_chat_member } = ctx.chatMember;
    const userId = new_chat_member.user.id;

    if (isPresent(old_chat_member) || !isPresent(new_chat_member)) {
      return; // Not a join
    }

    console.log(`[chat_member] User ${userId} joined group ${chat.id}`);

    // Ignore bot's own join, admins and the owner
    if (userId === ctx.me.id || userId === settings.ownerUserId || isAdminStatus(new_chat_member)) {
      return;
    }

    const consumed = await invites.onMemberJoined(chat.id, userId);
    if (consumed) {
      console.log(`[chat_member] User ${userId} used their invite for group ${chat.id}`);
    }

    // Not a gated group
    if (!store.getGroupConfig(chat.id)) {
      return;
    }

    if (store.getUserRecord(chat.id, userId)?.verified) {
      return;
    }

    // Unverified joiner (e.g. via a public or admin-made link)
    console.log(`[chat_member] Removing unverified user ${userId} from group ${chat.id}`);
    try {
      await gateway.removeMember(chat.id, userId);
    } catch (error) {
      console.error(`[chat_member] Failed to remove user ${userId}: ${errorMessage(error)}`);
      return;
    }

    const link = onboarding.verificationLinkFor(chat.id);
    const title = 'title' in chat ? chat.title : 'This group';
    try {
      await gateway.sendDirectMessage(
        userId,
        `👋 "${title}" requires token verification before you can join.\n\n` +
        `Click here to verify:\n${link ?? ''}`
      );
    } catch (error) {
      // Users who never opened a chat with the bot cannot be messaged
      console.log(`[chat_member] Could not DM user ${userId}: ${errorMessage(error)}`);
    }
  });

  return composer;
}
