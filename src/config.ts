import 'dotenv/config';

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const value = parseInt(raw.trim(), 10);
  return isNaN(value) ? fallback : value;
}

export const config = {
  botToken: process.env.BOT_TOKEN || '',
  ownerUserId: intFromEnv('OWNER_USER_ID', 0),
  electrumServer: process.env.ELECTRUM_SERVER || '',
  dbPath: process.env.DB_PATH || './data/bot.db',
  bcmrApiUrl: process.env.BCMR_API_URL || 'https://bcmr.paytaca.com/api/tokens',
  chainId: 'bitcoincash',
  reverifyIntervalHours: intFromEnv('REVERIFY_INTERVAL_HOURS', 6),
  sessionTimeoutMinutes: intFromEnv('SESSION_TIMEOUT_MINUTES', 10),
  transferRetryLimit: intFromEnv('TRANSFER_RETRY_LIMIT', 3),
  transferRetryCooldownSeconds: intFromEnv('TRANSFER_RETRY_COOLDOWN_SECONDS', 60),
  inviteTtlMinutes: intFromEnv('INVITE_TTL_MINUTES', 10),
  chainRetry: {
    attempts: 3,
    baseDelayMs: 1000,
    maxDelayMs: 8000,
  },
};

export function validateConfig(): void {
  if (!config.botToken) {
    throw new Error('BOT_TOKEN environment variable is required');
  }
  if (!config.ownerUserId) {
    throw new Error('OWNER_USER_ID environment variable is required');
  }
  if (config.transferRetryLimit < 1) {
    throw new Error('TRANSFER_RETRY_LIMIT must be at least 1');
  }
  if (config.reverifyIntervalHours < 1) {
    throw new Error('REVERIFY_INTERVAL_HOURS must be at least 1');
  }
}
