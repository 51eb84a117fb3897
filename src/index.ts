import { config, validateConfig } from './config.js';
import { openDatabase } from './storage/db.js';
import { SqliteStore } from './storage/queries.js';
import { TokenMetadataService } from './blockchain/bcmr.js';
import { ElectrumChainClient } from './blockchain/electrum.js';
import { connectElectrum, disconnectElectrum } from './blockchain/provider.js';
import { createBot, registerHandlers } from './bot/bot.js';
import { GrammyGateway } from './bot/gateway.js';
import { createServices } from './services.js';
import { settingsFromConfig } from './settings.js';

async function main(): Promise<void> {
  console.log('🚀 Starting Token Gate Bot...');

  // Validate config
  try {
    validateConfig();
  } catch (error) {
    console.error('Configuration error:', error);
    process.exit(1);
  }

  // Initialize database
  const db = openDatabase(config.dbPath);
  const store = new SqliteStore(db);

  const metadata = new TokenMetadataService(store, config.bcmrApiUrl);
  const chain = new ElectrumChainClient(connectElectrum, category => metadata.getDecimals(category));

  const bot = createBot(config.botToken);
  const gateway = new GrammyGateway(bot.api, () => bot.botInfo.username);
  const services = createServices(store, chain, gateway, settingsFromConfig(), category =>
    metadata.getFormattedTokenName(category)
  );
  registerHandlers(bot, services);

  // Periodic re-verification of every verified member
  services.scheduler.start();
  console.log('✅ Re-verification scheduler started');

  // Expire idle sessions and unused invites
  const housekeeping = setInterval(() => {
    services.engine.sweepExpired().catch(error => console.error('Session sweep failed:', error));
    services.invites.expireStale().catch(error => console.error('Invite expiry failed:', error));
  }, 60 * 1000);

  // Handle shutdown
  const shutdown = async (signal: string): Promise<void> => {
    console.log(`\n${signal} received, shutting down...`);

    clearInterval(housekeeping);
    services.scheduler.stop();
    await bot.stop();
    await disconnectElectrum();
    db.close();

    console.log('Bot stopped');
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  // Start polling
  console.log('✅ Bot starting...');

  await bot.api.setMyCommands([
    { command: 'start', description: 'Start the bot' },
    { command: 'help', description: 'Show help' },
    { command: 'cancel', description: 'Cancel verification' },
    { command: 'guide', description: 'How group setup works' },
  ]);

  await bot.start({
    allowed_updates: ['message', 'callback_query', 'chat_member', 'my_chat_member'],
    onStart: (botInfo) => {
      console.log(`✅ Bot @${botInfo.username} is running!`);
    },
  });
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
