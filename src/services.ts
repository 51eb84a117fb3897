import type { ChainClient } from './blockchain/client.js';
import type { RetryOptions } from './blockchain/retry.js';
import type { Store } from './storage/types.js';
import { VerificationEngine } from './verification/engine.js';
import { InviteLinkManager } from './verification/invites.js';
import { KeyedMutex } from './verification/locks.js';
import type { MessagingGateway } from './verification/messaging.js';
import { OnboardingWorkflow } from './verification/onboarding.js';
import { ReverificationScheduler } from './verification/scheduler.js';

export interface ServiceSettings {
  ownerUserId: number;
  chainId: string;
  sessionTimeoutMs: number;
  transferRetryLimit: number;
  transferRetryCooldownMs: number;
  inviteTtlMs: number;
  reverifyIntervalMs: number;
  chainRetry: RetryOptions;
  now?: () => number;
}

/** Human-readable token label, e.g. from a metadata registry. */
export type TokenNamer = (category: string) => Promise<string>;

export interface Services {
  settings: ServiceSettings;
  store: Store;
  chain: ChainClient;
  gateway: MessagingGateway;
  engine: VerificationEngine;
  onboarding: OnboardingWorkflow;
  invites: InviteLinkManager;
  scheduler: ReverificationScheduler;
  tokenName: TokenNamer;
}

export function createServices(
  store: Store,
  chain: ChainClient,
  gateway: MessagingGateway,
  settings: ServiceSettings,
  tokenName: TokenNamer = async category => category
): Services {
  // Shared so sessions, sweeps and onboarding serialize on the same keys
  const locks = new KeyedMutex();
  const now = settings.now;

  const invites = new InviteLinkManager(gateway, { ttlMs: settings.inviteTtlMs, now });

  const engine = new VerificationEngine(
    { store, chain, gateway, invites, locks },
    {
      ownerUserId: settings.ownerUserId,
      sessionTimeoutMs: settings.sessionTimeoutMs,
      transferRetryLimit: settings.transferRetryLimit,
      transferRetryCooldownMs: settings.transferRetryCooldownMs,
      chainRetry: settings.chainRetry,
      now,
    }
  );

  const onboarding = new OnboardingWorkflow(
    { store, gateway, locks },
    { ownerUserId: settings.ownerUserId, chainId: settings.chainId, now }
  );

  const scheduler = new ReverificationScheduler(
    { store, chain, gateway, locks },
    {
      ownerUserId: settings.ownerUserId,
      intervalMs: settings.reverifyIntervalMs,
      chainRetry: settings.chainRetry,
      now,
    }
  );

  return { settings, store, chain, gateway, engine, onboarding, invites, scheduler, tokenName };
}
