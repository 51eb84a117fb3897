import { Bot } from 'grammy';
import type { Chat, ChatMember, Update, User } from 'grammy/types';
import { registerHandlers } from '../../src/bot/bot.js';
import type { Services } from '../../src/services.js';
import { GROUP, OWNER, USER } from './fakes.js';

export const BOT_ID = 1;

const botInfo = {
  id: BOT_ID,
  is_bot: true as const,
  first_name: 'Gate',
  username: 'test_bot',
  can_join_groups: true,
  can_read_all_group_messages: false,
  supports_inline_queries: false,
  can_connect_to_business: false,
  has_main_web_app: false,
  has_topics_enabled: false,
};

export const ownerUser: User = { id: OWNER, is_bot: false, first_name: 'Owner' };
export const memberUser: User = { id: USER, is_bot: false, first_name: 'Dana', username: 'dana' };
export const group: Chat.SupergroupChat = { id: GROUP, type: 'supergroup', title: 'Holders Lounge' };

export interface ApiCall {
  method: string;
  payload: unknown;
}

/**
 * A bot with every handler registered whose API calls are answered locally.
 * `admins` lists users getChatMember reports as group creators.
 */
export function createTestBot(services: Services, admins: number[] = []) {
  const calls: ApiCall[] = [];
  const bot = new Bot('test-token', { botInfo });

  bot.api.config.use(async (_prev, method, payload) => {
    calls.push({ method, payload });
    if (method === 'getChatMember') {
      const userId = typeof payload === 'object' && payload !== null && 'user_id' in payload
        ? payload.user_id
        : undefined;
      const user: User = { id: typeof userId === 'number' ? userId : 0, is_bot: false, first_name: 'Someone' };
      const member: ChatMember = admins.includes(user.id)
        ? { status: 'creator', user, is_anonymous: false }
        : { status: 'member', user };
      return { ok: true, result: member };
    }
    return { ok: true, result: true };
  });

  registerHandlers(bot, services);
  return { bot, calls };
}

/** Text of every call to `method`, in order. */
export function textsSent(calls: ApiCall[], method: string): string[] {
  const texts: string[] = [];
  for (const { method: called, payload } of calls) {
    if (called !== method) continue;
    if (typeof payload === 'object' && payload !== null && 'text' in payload && typeof payload.text === 'string') {
      texts.push(payload.text);
    }
  }
  return texts;
}

let updateId = 0;

export function joinUpdate(user: User, options: { chat?: Chat; from?: ChatMember; to?: ChatMember } = {}): Update {
  return {
    update_id: ++updateId,
    chat_member: {
      chat: options.chat ?? group,
      from: user,
      date: 1_700_000_000,
      old_chat_member: options.from ?? { status: 'left', user },
      new_chat_member: options.to ?? { status: 'member', user },
    },
  };
}

export function callbackUpdate(from: User, data: string): Update {
  return {
    update_id: ++updateId,
    callback_query: {
      id: `cb-${updateId}`,
      from,
      chat_instance: 'chat-instance',
      data,
      message: {
        message_id: 10,
        date: 1_700_000_000,
        chat: { id: from.id, type: 'private', first_name: from.first_name },
        text: 'Whitelist request',
      },
    },
  };
}

export function commandUpdate(from: User, chat: Chat.SupergroupChat | Chat.PrivateChat, text: string): Update {
  const command = text.split(' ')[0];
  return {
    update_id: ++updateId,
    message: {
      message_id: 20,
      date: 1_700_000_000,
      chat,
      from,
      text,
      entities: [{ type: 'bot_command', offset: 0, length: command.length }],
    },
  };
}
