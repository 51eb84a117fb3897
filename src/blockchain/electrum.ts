import { z } from 'zod';
import { ChainError, errorMessage } from '../errors.js';
import type { ChainClient, TokenBalance } from './client.js';
import { requireChain } from './chains.js';

/**
 * The subset of mainnet-js' NetworkProvider used here.
 * Responses are validated before use.
 */
export interface ChainProvider {
  getUtxos(address: string): Promise<unknown[]>;
  getHistory(address: string): Promise<unknown[]>;
  getRawTransactionObject(txHash: string, loadInputValues?: boolean): Promise<unknown>;
}

export type DecimalsLookup = (category: string) => Promise<number>;

const amountSchema = z
  .union([z.bigint(), z.number().int().nonnegative(), z.string().regex(/^\d+$/)])
  .transform(value => BigInt(value));

const utxoSchema = z.object({
  token: z
    .object({
      amount: amountSchema.optional(),
      tokenId: z.string().optional(),
      category: z.string().optional(),
    })
    .optional(),
});

const historySchema = z.object({
  tx_hash: z.string(),
  height: z.number(),
});

const tokenDataSchema = z.object({
  category: z.string(),
  amount: amountSchema,
});

const scriptPubKeySchema = z.object({
  addresses: z.array(z.string()).optional(),
  address: z.string().optional(),
});

const rawTransactionSchema = z.object({
  txid: z.string(),
  time: z.number().optional(),
  blocktime: z.number().optional(),
  vin: z.array(
    z.object({
      address: z.string().optional(),
      tokenData: tokenDataSchema.optional(),
    })
  ),
  vout: z.array(
    z.object({
      scriptPubKey: scriptPubKeySchema.optional(),
      tokenData: tokenDataSchema.optional(),
    })
  ),
});

/** How many recent history entries are inspected for the proof transfer. */
const TRANSFER_SCAN_DEPTH = 25;

function classify(error: unknown, context: string): ChainError {
  if (error instanceof ChainError) return error;

  const message = errorMessage(error);
  if (/rate.?limit|too many|429/i.test(message)) {
    return new ChainError('RateLimited', `${context}: ${message}`, error);
  }
  if (/invalid address|bad address|unknown address/i.test(message)) {
    return new ChainError('NotFound', `${context}: ${message}`, error);
  }
  return new ChainError('Transient', `${context}: ${message}`, error);
}

function parseOrThrow<S extends z.ZodTypeAny>(schema: S, value: unknown, context: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ChainError('Transient', `${context}: unexpected response (${result.error.issues[0]?.message ?? 'invalid'})`);
  }
  return result.data;
}

function sameAddress(a: string | undefined, b: string): boolean {
  if (!a) return false;
  const strip = (value: string) => value.toLowerCase().replace(/^bitcoincash:/, '');
  return strip(a) === strip(b);
}

/**
 * ChainClient over an Electrum (Fulcrum) server for CashTokens.
 */
export class ElectrumChainClient implements ChainClient {
  constructor(
    private readonly getProvider: () => Promise<ChainProvider>,
    private readonly lookupDecimals: DecimalsLookup
  ) {}

  async getBalance(chainId: string, tokenAddress: string, address: string): Promise<TokenBalance> {
    requireChain(chainId);
    const category = tokenAddress.toLowerCase();

    let utxos: unknown[];
    try {
      const provider = await this.getProvider();
      utxos = await provider.getUtxos(address);
    } catch (error) {
      throw classify(error, `getUtxos ${address}`);
    }

    let amount = 0n;
    for (const raw of utxos) {
      const utxo = parseOrThrow(utxoSchema, raw, 'getUtxos');
      const tokenCategory = utxo.token?.category ?? utxo.token?.tokenId;
      if (utxo.token && tokenCategory?.toLowerCase() === category) {
        amount += utxo.token.amount ?? 0n;
      }
    }

    const decimals = await this.lookupDecimals(category);
    console.log(`[chain] balance ${address.slice(0, 25)}... token ${category.slice(0, 8)}: ${amount} (decimals ${decimals})`);
    return { amount, decimals };
  }

  async findTransfer(
    chainId: string,
    tokenAddress: string,
    from: string,
    to: string,
    minAmount: bigint,
    sinceTimestamp: number
  ): Promise<boolean> {
    requireChain(chainId);
    const category = tokenAddress.toLowerCase();

    try {
      const provider = await this.getProvider();
      const history = (await provider.getHistory(to))
        .map(entry => parseOrThrow(historySchema, entry, 'getHistory'))
        .slice(-TRANSFER_SCAN_DEPTH)
        .reverse();

      for (const entry of history) {
        const raw = await provider.getRawTransactionObject(entry.tx_hash, true);
        const tx = parseOrThrow(rawTransactionSchema, raw, `transaction ${entry.tx_hash}`);

        // Unconfirmed transactions carry no time and are always recent enough
        const seconds = tx.time ?? tx.blocktime;
        if (entry.height > 0 && seconds !== undefined && seconds * 1000 < sinceTimestamp) {
          continue;
        }

        const fromSender = tx.vin.some(input => sameAddress(input.address, from));
        if (!fromSender) continue;

        const received = tx.vout
          .filter(output => {
            const script = output.scriptPubKey;
            const recipients = [...(script?.addresses ?? []), ...(script?.address ? [script.address] : [])];
            return recipients.some(recipient => sameAddress(recipient, to));
          })
          .reduce((sum, output) => {
            const token = output.tokenData;
            return token && token.category.toLowerCase() === category ? sum + token.amount : sum;
          }, 0n);

        if (received >= minAmount) {
          console.log(`[chain] transfer found: ${tx.txid} (${received} units)`);
          return true;
        }
      }

      return false;
    } catch (error) {
      throw classify(error, `findTransfer ${to}`);
    }
  }
}
