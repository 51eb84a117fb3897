import { describe, it, expect } from 'vitest';
import { bitcoinCash, normalizeCashAddress, requireChain, shortAddress } from '../../../src/blockchain/chains.js';
import { ALICE, CATEGORY } from '../../helpers/fakes.js';

describe('normalizeCashAddress', () => {
  it('accepts prefixed and bare CashAddrs', () => {
    expect(normalizeCashAddress(ALICE)).toBe(ALICE);
    expect(normalizeCashAddress(ALICE.replace('bitcoincash:', ''))).toBe(ALICE);
    expect(normalizeCashAddress(`  ${ALICE.toUpperCase()} `)).toBe(ALICE);
  });

  it('rejects bad checksums, other prefixes and junk', () => {
    expect(normalizeCashAddress(ALICE.slice(0, -1) + 'b')).toBeNull();
    expect(normalizeCashAddress(ALICE.replace('bitcoincash:', 'bchtest:'))).toBeNull();
    expect(normalizeCashAddress('hello')).toBeNull();
    expect(normalizeCashAddress('')).toBeNull();
  });
});

describe('bitcoinCash', () => {
  it('normalizes token categories to lower-case hex', () => {
    expect(bitcoinCash.normalizeTokenAddress(CATEGORY.toUpperCase())).toBe(CATEGORY);
    expect(bitcoinCash.normalizeTokenAddress(CATEGORY.slice(2))).toBeNull();
    expect(bitcoinCash.normalizeTokenAddress('zz'.repeat(32))).toBeNull();
  });

  it('is the only registered chain', () => {
    expect(requireChain('bitcoincash')).toBe(bitcoinCash);
    expect(() => requireChain('ethereum')).toThrow('Unsupported chain: ethereum');
  });
});

describe('shortAddress', () => {
  it('drops the prefix and elides the middle', () => {
    expect(shortAddress(ALICE)).toBe('qpm2qszn...2gdx6a');
    expect(shortAddress('bitcoincash:qshort')).toBe('qshort');
  });
});
