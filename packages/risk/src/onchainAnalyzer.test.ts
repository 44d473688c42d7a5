import { describe, it, expect } from 'vitest';
import type { Address, TokenMetadata } from '@token-risk/core';
import { analyzeOnchain } from './onchainAnalyzer';

const TOKEN: Address = '0x1111111111111111111111111111111111111111';
const PAIR: Address = '0x2222222222222222222222222222222222222222';

function metadata(overrides: Partial<TokenMetadata> = {}): TokenMetadata {
  return {
    address: TOKEN,
    name: 'Test Token',
    symbol: 'TEST',
    decimals: 18,
    totalSupply: 1000n,
    sourceVerified: true,
    sourceText: '',
    holders: [
      { address: PAIR, balance: 400n },
      { address: '0x000000000000000000000000000000000000dEaD', balance: 100n },
      { address: '0xaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa', balance: 50n },
      { address: '0xbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbb', balance: 300n },
      { address: '0xcccccccccccccccccccccccccccccccccccccccc', balance: 150n }
    ],
    lpInfo: { pairAddress: PAIR, locked: true, percentLocked: 90 },
    ...overrides
  };
}

describe('analyzeOnchain', () => {
  it('measures concentration without the pair and burn addresses', () => {
    expect(analyzeOnchain(metadata())).toEqual({
      lp: { locked: true, percentLocked: 90 },
      topHolderPercent: 30,
      top10HoldersPercent: 50,
      holderCount: 3
    });
  });

  it('reports an unlocked pool when LP info is missing', () => {
    const findings = analyzeOnchain(metadata({ lpInfo: null }));
    expect(findings.lp).toEqual({ locked: false, percentLocked: 0 });
    // the pair is an ordinary holder once it is not known
    expect(findings.topHolderPercent).toBe(40);
  });

  it('returns zero percentages for a zero supply', () => {
    const findings = analyzeOnchain(metadata({ totalSupply: 0n }));
    expect(findings.topHolderPercent).toBe(0);
    expect(findings.top10HoldersPercent).toBe(0);
  });
});
