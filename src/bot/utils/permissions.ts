import type { Api } from 'grammy';
import type { ChatMember } from 'grammy/types';

/**
 * Remove a user from a group without leaving them banned.
 *
 * Telegram has no plain "kick": ban, then unban so the user can come back
 * through a fresh invite once verified.
 */
export async function kickMember(
  api: Pick<Api, 'banChatMember' | 'unbanChatMember'>,
  chatId: number,
  userId: number
): Promise<void> {
  await api.banChatMember(chatId, userId);
  await api.unbanChatMember(chatId, userId, { only_if_banned: true });
}

/**
 * Whether a chat member entry describes someone currently in the group
 */
export function isPresent(member: ChatMember): boolean {
  switch (member.status) {
    case 'creator':
    case 'administrator':
    case 'member':
      return true;
    case 'restricted':
      return member.is_member;
    default:
      return false;
  }
}

export function isAdminStatus(member: ChatMember): boolean {
  return member.status === 'administrator' || member.status === 'creator';
}
