import { Bot } from 'grammy';
import { errorMessage } from '../errors.js';
import type { Services } from '../services.js';
import { adminHandlers } from './handlers/admin.js';
import { verifyHandlers } from './handlers/verify.js';
import { joinHandlers } from './handlers/join.js';
import { ignoreBlockedGroups } from './middleware/auth.js';

const GUIDE =
  `📖 Setup guide\n\n` +
  `1. Add me to your group as an admin with "Ban users" and "Invite users via link" rights.\n` +
  `2. Run /setup in the group. New groups need approval from the bot owner first.\n` +
  `3. Answer the setup questions: token category, minimum balance, verifier address.\n` +
  `4. Share the verification link with people who want to join.\n\n` +
  `Members prove ownership by holding the minimum balance and sending 1 token to the verifier address. ` +
  `Balances are re-checked periodically and members who fall below the minimum are removed.`;

export function createBot(token: string): Bot {
  return new Bot(token);
}

export function registerHandlers(bot: Bot, services: Services): void {
  const { ownerUserId } = services.settings;

  // Error handler
  bot.catch(async (err) => {
    console.error('Bot error:', err.error);
    try {
      await bot.api.sendMessage(
        ownerUserId,
        `⚠️ Error while handling update ${err.ctx.update.update_id}: ${errorMessage(err.error)}`
      );
    } catch (notifyError) {
      console.error('Could not notify owner of error:', errorMessage(notifyError));
    }
  });

  // Register handlers
  bot.use(ignoreBlockedGroups(services.onboarding));
  bot.use(joinHandlers(services));
  bot.use(adminHandlers(services));
  bot.use(verifyHandlers(services));

  // Help command (available to everyone)
  bot.command('help', async (ctx) => {
    if (ctx.chat?.type === 'private') {
      await ctx.reply(
        `🤖 Token Gate Bot\n\n` +
        `I let private groups admit only holders of a token.\n\n` +
        `User commands:\n` +
        `/start - Start the bot (or open a verification link)\n` +
        `/cancel - Cancel verification\n` +
        `/help - Show this help\n` +
        `/guide - How group setup works\n\n` +
        `Admin commands (in groups):\n` +
        `/setup - Request access / configure the group\n` +
        `/status - Show group configuration and verification link\n` +
        `/scan - Re-check all verified members now\n` +
        `/testbalance <address> - Check an address's token balance` +
        (ctx.from?.id === ownerUserId ? `\n\nOwner: /admin` : '')
      );
    } else {
      await ctx.reply(
        `Admins: /setup, /status, /scan, /testbalance.\n` +
        `For verification, open the group's verification link.`
      );
    }
  });

  bot.command('guide', async (ctx) => {
    await ctx.reply(GUIDE);
  });
}
