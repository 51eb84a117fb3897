/**
 * One-shot re-verification sweep, for running from cron instead of the
 * in-process scheduler.
 */
import { config, validateConfig } from './config.js';
import { openDatabase } from './storage/db.js';
import { SqliteStore } from './storage/queries.js';
import { TokenMetadataService } from './blockchain/bcmr.js';
import { ElectrumChainClient } from './blockchain/electrum.js';
import { connectElectrum, disconnectElectrum } from './blockchain/provider.js';
import { createBot } from './bot/bot.js';
import { GrammyGateway } from './bot/gateway.js';
import { createServices } from './services.js';
import { settingsFromConfig } from './settings.js';

async function main(): Promise<void> {
  validateConfig();

  const db = openDatabase(config.dbPath);
  const store = new SqliteStore(db);
  const metadata = new TokenMetadataService(store, config.bcmrApiUrl);
  const chain = new ElectrumChainClient(connectElectrum, category => metadata.getDecimals(category));

  const bot = createBot(config.botToken);
  await bot.init();
  const gateway = new GrammyGateway(bot.api, () => bot.botInfo.username);
  const services = createServices(store, chain, gateway, settingsFromConfig());

  try {
    const summary = await services.scheduler.runSweepOnce();
    console.log(`✅ Sweep finished: ${summary.evicted} removed, ${summary.errors} errors`);
  } finally {
    await disconnectElectrum();
    db.close();
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
