import { InlineKeyboard, type Api } from 'grammy';
import type { InlineButton, InviteHandle, MessagingGateway, Outbound } from '../verification/messaging.js';
import { isPresent, kickMember } from './utils/permissions.js';

export type GatewayApi = Pick<
  Api,
  | 'sendMessage'
  | 'createChatInviteLink'
  | 'revokeChatInviteLink'
  | 'banChatMember'
  | 'unbanChatMember'
  | 'getChatMember'
>;

export function toKeyboard(rows: InlineButton[][]): InlineKeyboard {
  const keyboard = new InlineKeyboard();
  rows.forEach((row, index) => {
    for (const button of row) {
      if ('url' in button) {
        keyboard.url(button.label, button.url);
      } else {
        keyboard.text(button.label, button.action);
      }
    }
    if (index < rows.length - 1) keyboard.row();
  });
  return keyboard;
}

/**
 * MessagingGateway over the Telegram Bot API.
 */
export class GrammyGateway implements MessagingGateway {
  constructor(
    private readonly api: GatewayApi,
    private readonly botUsername: () => string
  ) {}

  async sendDirectMessage(userId: number, content: Outbound): Promise<void> {
    await this.send(userId, content);
  }

  async sendGroupMessage(groupId: number, content: Outbound): Promise<void> {
    await this.send(groupId, content);
  }

  async createOneTimeInvite(
    groupId: number,
    options: { name: string; expiresAt: number }
  ): Promise<InviteHandle> {
    const invite = await this.api.createChatInviteLink(groupId, {
      name: options.name,
      member_limit: 1,
      expire_date: Math.floor(options.expiresAt / 1000),
    });
    return { groupId, link: invite.invite_link, expiresAt: options.expiresAt };
  }

  async revokeInvite(invite: InviteHandle): Promise<void> {
    await this.api.revokeChatInviteLink(invite.groupId, invite.link);
  }

  async removeMember(groupId: number, userId: number): Promise<void> {
    await kickMember(this.api, groupId, userId);
  }

  async isMember(groupId: number, userId: number): Promise<boolean> {
    const member = await this.api.getChatMember(groupId, userId);
    return isPresent(member);
  }

  startLink(payload: string): string {
    return `https://t.me/${this.botUsername()}?start=${payload}`;
  }

  private async send(chatId: number, content: Outbound): Promise<void> {
    // No parse_mode: bot usernames and addresses contain underscores that break Markdown
    if (typeof content === 'string') {
      await this.api.sendMessage(chatId, content);
      return;
    }
    await this.api.sendMessage(
      chatId,
      content.text,
      content.buttons?.length ? { reply_markup: toKeyboard(content.buttons) } : {}
    );
  }
}
