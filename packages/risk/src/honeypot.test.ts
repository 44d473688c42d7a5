import { describe, it, expect } from 'vitest';
import { parseEther } from 'viem';
import type { Address, SimulationReport, TokenMetadata } from '@token-risk/core';
import {
  FakeChainReader,
  LiquidityProber,
  TradeSimulator,
  constantProductOut,
  ok,
  reverted
} from '@token-risk/chain';
import { EMPTY_PATTERN_REPORT, scanSource } from './patternScanner';
import { HoneypotDetector, aggregate, fallbackVerdict } from './honeypot';

const WBNB: Address = '0xbb4CdB9CBd36B01bD1cBaeBF2De08d9173bc095c';
const TOKEN: Address = '0x1111111111111111111111111111111111111111';
const PAIR: Address = '0x2222222222222222222222222222222222222222';

const RESERVE_NATIVE = parseEther('100');
const RESERVE_TOKEN = parseEther('1000000');

function simulation(overrides: Partial<SimulationReport> = {}): SimulationReport {
  return {
    buyAttempts: [],
    sellAttempts: [],
    canBuy: true,
    canSell: true,
    avgBuyTax: 0,
    avgSellTax: 0,
    errors: [],
    baseline: 'reserves',
    ...overrides
  };
}

const POOL = { hasLiquidity: true, pairAddress: PAIR } as const;

describe('aggregate', () => {
  it('reports a clean token at the floor confidence', () => {
    const verdict = aggregate(simulation(), EMPTY_PATTERN_REPORT, POOL);

    expect(verdict.isHoneypot).toBe(false);
    expect(verdict.confidence).toBe(5);
    expect(verdict.riskLevel).toBe('LOW');
    expect(verdict.indicators).toEqual([]);
    expect(verdict.recommendation).toBe('LOW RISK - No significant honeypot indicators found');
    expect(verdict.method).toBe('simulation');
  });

  it('flags a token that can be bought but not sold', () => {
    const verdict = aggregate(simulation({ canSell: false }), EMPTY_PATTERN_REPORT, POOL);

    expect(verdict.isHoneypot).toBe(true);
    expect(verdict.confidence).toBe(90);
    expect(verdict.riskLevel).toBe('CRITICAL');
    expect(verdict.indicators).toEqual(['cannot sell after buying']);
    expect(verdict.recommendation).toBe('AVOID - High probability honeypot detected');
  });

  it('flags a token that cannot be bought', () => {
    const verdict = aggregate(simulation({ canBuy: false, canSell: false }), EMPTY_PATTERN_REPORT, POOL);

    expect(verdict.isHoneypot).toBe(true);
    expect(verdict.confidence).toBe(70);
    expect(verdict.riskLevel).toBe('HIGH');
    expect(verdict.recommendation).toBe('HIGH RISK - Likely honeypot, avoid trading');
  });

  it('treats a confiscatory sell tax as a honeypot', () => {
    const verdict = aggregate(simulation({ avgSellTax: 99 }), EMPTY_PATTERN_REPORT, POOL);

    expect(verdict.indicators).toContain('extremely high sell tax');
    expect(verdict.isHoneypot).toBe(true);
    expect(verdict.confidence).toBe(80);
    expect(verdict.riskLevel).toBe('CRITICAL');
    expect(verdict.sellTax).toBe(99);
  });

  it('requires more than 60 confidence to call a honeypot', () => {
    const verdict = aggregate(simulation({ avgSellTax: 30 }), EMPTY_PATTERN_REPORT, POOL);

    expect(verdict.indicators).toEqual(['high sell tax']);
    expect(verdict.confidence).toBe(60);
    expect(verdict.isHoneypot).toBe(false);
    expect(verdict.riskLevel).toBe('HIGH');
    expect(verdict.recommendation).toBe('MODERATE RISK - Exercise caution, small test trades only');
  });

  it('takes the strongest signal instead of summing them', () => {
    const patterns = { ...EMPTY_PATTERN_REPORT, score: 20, hasSource: true };
    const verdict = aggregate(simulation(), patterns, { hasLiquidity: false });

    expect(verdict.indicators).toEqual(['some suspicious patterns', 'no liquidity pool']);
    expect(verdict.confidence).toBe(40);
    expect(verdict.riskLevel).toBe('MEDIUM');
    expect(verdict.isHoneypot).toBe(false);
  });
});

describe('fallbackVerdict', () => {
  it('assumes the worst when detection fails', () => {
    const verdict = fallbackVerdict('rpc down');

    expect(verdict.isHoneypot).toBe(true);
    expect(verdict.confidence).toBe(0);
    expect(verdict.riskLevel).toBe('UNKNOWN');
    expect(verdict.method).toBe('fallback');
    expect(verdict.indicators).toEqual(['analysis failed']);
    expect(verdict.recommendation).toBe('UNKNOWN RISK - Analysis failed, proceed with extreme caution');
    expect(verdict.canSell).toBe(false);
    expect(verdict.error).toBe('rpc down');
  });
});

function metadata(sourceText = ''): TokenMetadata {
  return {
    address: TOKEN,
    name: 'Test Token',
    symbol: 'TEST',
    decimals: 18,
    totalSupply: RESERVE_TOKEN,
    sourceVerified: sourceText.length > 0,
    sourceText,
    holders: [],
    lpInfo: null
  };
}

function pool(sellReverts = false) {
  const reader = new FakeChainReader()
    .setPair(TOKEN, WBNB, PAIR)
    .setReserves(PAIR, { token0: WBNB, reserve0: RESERVE_NATIVE, reserve1: RESERVE_TOKEN });
  reader.quote = (amountIn, path) => {
    const isBuy = path[0] === WBNB;
    if (!isBuy && sellReverts) return reverted('TRANSFER_FAILED');
    return ok([
      amountIn,
      isBuy
        ? constantProductOut(amountIn, RESERVE_NATIVE, RESERVE_TOKEN)
        : constantProductOut(amountIn, RESERVE_TOKEN, RESERVE_NATIVE)
    ]);
  };
  return reader;
}

function detector(reader: FakeChainReader) {
  return new HoneypotDetector(
    new TradeSimulator(reader, { wrappedNative: WBNB, baseline: 'reserves' }),
    new LiquidityProber(reader),
    { wrappedNative: WBNB, sizes: [parseEther('0.01')] }
  );
}

describe('HoneypotDetector', () => {
  it('passes a tradable token with a live pool', async () => {
    const verdict = await detector(pool()).detectHoneypot(TOKEN, metadata());

    expect(verdict.isHoneypot).toBe(false);
    expect(verdict.canBuy).toBe(true);
    expect(verdict.canSell).toBe(true);
    expect(verdict.buyTax).toBe(0);
    expect(verdict.liquidity.hasLiquidity).toBe(true);
    expect(verdict.liquidity.pairAddress).toBe(PAIR);
    expect(verdict.transactions.analysisAvailable).toBe(false);
  });

  it('catches a token whose sells revert', async () => {
    const verdict = await detector(pool(true)).detectHoneypot(TOKEN, metadata());

    expect(verdict.isHoneypot).toBe(true);
    expect(verdict.confidence).toBe(90);
    expect(verdict.simulation.sellAttempts[0].error).toBe('Contract logic error: TRANSFER_FAILED');
  });

  it('folds the source scan into the verdict', async () => {
    const source = 'require(false); assert(false); revert(); _balances[a] = 0; return 0;';
    const verdict = await detector(pool()).detectHoneypot(TOKEN, metadata(source));

    expect(verdict.patterns).toEqual(scanSource(source));
    expect(verdict.indicators).toEqual(['multiple suspicious patterns']);
    expect(verdict.confidence).toBe(70);
    expect(verdict.isHoneypot).toBe(true);
  });

  it('falls back to the worst-case verdict when a component throws', async () => {
    class BrokenSimulator extends TradeSimulator {
      override async simulateTrades(): Promise<SimulationReport> {
        throw new Error('boom');
      }
    }
    const reader = pool();
    const verdict = await new HoneypotDetector(new BrokenSimulator(reader), new LiquidityProber(reader), {
      wrappedNative: WBNB
    }).detectHoneypot(TOKEN, metadata());

    expect(verdict.method).toBe('fallback');
    expect(verdict.error).toBe('boom');
    expect(verdict.isHoneypot).toBe(true);
  });
});
