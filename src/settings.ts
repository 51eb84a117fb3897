import { config } from './config.js';
import type { ServiceSettings } from './services.js';

export function settingsFromConfig(): ServiceSettings {
  return {
    ownerUserId: config.ownerUserId,
    chainId: config.chainId,
    sessionTimeoutMs: config.sessionTimeoutMinutes * 60 * 1000,
    transferRetryLimit: config.transferRetryLimit,
    transferRetryCooldownMs: config.transferRetryCooldownSeconds * 1000,
    inviteTtlMs: config.inviteTtlMinutes * 60 * 1000,
    reverifyIntervalMs: config.reverifyIntervalHours * 60 * 60 * 1000,
    chainRetry: config.chainRetry,
  };
}
