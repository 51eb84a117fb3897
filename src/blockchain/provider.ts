import { getNetworkProvider, type NetworkProvider } from 'mainnet-js';
import { config } from '../config.js';
import type { ChainProvider } from './electrum.js';

// One Electrum connection per process, opened on first use
let shared: NetworkProvider | null = null;

export async function connectElectrum(): Promise<ChainProvider> {
  if (shared) return shared;

  shared = getNetworkProvider('mainnet', config.electrumServer || undefined);
  console.log(`[chain] Electrum: ${config.electrumServer || 'mainnet-js default servers'}`);
  return shared;
}

export async function disconnectElectrum(): Promise<void> {
  const current = shared;
  shared = null;
  if (current) {
    await current.disconnect();
    console.log('[chain] Electrum disconnected');
  }
}
