import { Composer, type Context } from 'grammy';
import type { Services } from '../../services.js';

const WELCOME =
  `👋 Welcome!\n\n` +
  `I verify token holders for private groups. Open the verification link ` +
  `shared by your group to start, then follow the steps here.\n\n` +
  `/cancel - Cancel verification\n` +
  `/help - Show help`;

export function verifyHandlers(services: Services): Composer<Context> {
  const { engine } = services;
  const composer = new Composer<Context>();
  const dm = composer.chatType('private');

  // /start <token> - deep link from a group's verification link
  dm.command('start', async (ctx) => {
    const userId = ctx.from?.id;
    if (!userId) return;

    const token = ctx.match.trim();
    if (!token) {
      await ctx.reply(WELCOME);
      return;
    }
    await engine.start(userId, token);
  });

  dm.command('cancel', async (ctx) => {
    const userId = ctx.from?.id;
    if (!userId) return;
    await engine.cancel(userId);
  });

  composer.callbackQuery(/^verify:(done|retry|cancel):(-?\d+)$/, async (ctx) => {
    await ctx.answerCallbackQuery();
    const match = typeof ctx.match === 'string' ? null : ctx.match;
    if (!match) return;

    const userId = ctx.callbackQuery.from.id;
    const groupId = Number(match[2]);
    if (match[1] === 'cancel') {
      await engine.cancel(userId, groupId);
    } else {
      await engine.confirmTransfer(groupId, userId);
    }
  });

  // Free text in DMs drives the current session (address, "done", "cancel")
  dm.on('message:text', async (ctx, next) => {
    if (ctx.message.text.startsWith('/')) {
      await next();
      return;
    }
    const userId = ctx.from?.id;
    if (!userId) return;
    await engine.handleText(userId, ctx.message.text);
  });

  return composer;
}
