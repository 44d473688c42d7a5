import { describe, it, expect } from 'vitest';
import { parseEther } from 'viem';
import type { Address } from '@token-risk/core';
import { FakeChainReader, LiquidityProber, TradeSimulator, constantProductOut, ok } from '@token-risk/chain';
import { LP_LOCKERS, MetadataProvider } from '@token-risk/data';
import { HoneypotDetector, RiskScorer } from '@token-risk/risk';
import { TokenAnalysisPipeline } from './pipeline';

const WBNB: Address = '0xbb4CdB9CBd36B01bD1cBaeBF2De08d9173bc095c';
const TOKEN: Address = '0x1111111111111111111111111111111111111111';
const PAIR: Address = '0x2222222222222222222222222222222222222222';
const DEAD: Address = '0x000000000000000000000000000000000000dEaD';

const RESERVE_NATIVE = parseEther('100');
const RESERVE_TOKEN = parseEther('1000000');

function healthyChain() {
  const reader = new FakeChainReader()
    .setToken(TOKEN, { name: 'Test Token', symbol: 'TEST', decimals: 18, totalSupply: RESERVE_TOKEN * 2n }, DEAD)
    .setPair(TOKEN, WBNB, PAIR)
    .setReserves(PAIR, { token0: WBNB, reserve0: RESERVE_NATIVE, reserve1: RESERVE_TOKEN })
    .setToken(PAIR, { name: 'Pancake LPs', symbol: 'Cake-LP', decimals: 18, totalSupply: 1000n })
    .setBalance(PAIR, LP_LOCKERS.PinkLock, 900n);
  reader.quote = (amountIn, path) =>
    ok([
      amountIn,
      path[0] === WBNB
        ? constantProductOut(amountIn, RESERVE_NATIVE, RESERVE_TOKEN)
        : constantProductOut(amountIn, RESERVE_TOKEN, RESERVE_NATIVE)
    ]);
  return reader;
}

function pipeline(reader: FakeChainReader) {
  return new TokenAnalysisPipeline({
    metadata: new MetadataProvider(reader, { apiKey: '', wrappedNative: WBNB }),
    detector: new HoneypotDetector(
      new TradeSimulator(reader, { wrappedNative: WBNB, baseline: 'reserves' }),
      new LiquidityProber(reader),
      { wrappedNative: WBNB, sizes: [parseEther('0.01')] }
    ),
    scorer: new RiskScorer()
  });
}

describe('TokenAnalysisPipeline', () => {
  it('scores a tradable token with locked liquidity and renounced ownership', async () => {
    const analysis = await pipeline(healthyChain()).analyze(TOKEN);

    expect(analysis.error).toBeUndefined();
    expect(analysis.requestId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(analysis.token).toMatchObject({ name: 'Test Token', degraded: false, pairAddress: PAIR });
    expect(analysis.staticFindings.owner.renounced).toBe(true);
    expect(analysis.onchainFindings.lp).toEqual({ locked: true, percentLocked: 90 });
    expect(analysis.honeypot.isHoneypot).toBe(false);
    expect(analysis.honeypot.canSell).toBe(true);
    // the only factor is the unverified source
    expect(analysis.breakdown.riskFactors.map((f) => f.title)).toEqual(['Contract Not Verified']);
    expect(analysis.breakdown.categoryScores.technical).toBe(98.8);
    expect(analysis.breakdown.finalScore).toBe(99.9);
    expect(analysis.breakdown.grade).toBe('A+');
    expect(analysis.breakdown.confidenceLevel).toBe(0.8);
  });

  it('continues with degraded metadata when token reads fail', async () => {
    const analysis = await pipeline(new FakeChainReader()).analyze(TOKEN);

    expect(analysis.error).toBeUndefined();
    expect(analysis.token.degraded).toBe(true);
    expect(analysis.honeypot.canBuy).toBe(false);
    expect(analysis.honeypot.indicators).toEqual(['cannot buy', 'no liquidity pool']);
    expect(analysis.honeypot.isHoneypot).toBe(true);
  });

  it('returns the conservative analysis for an invalid address', async () => {
    const analysis = await pipeline(healthyChain()).analyze('not-an-address');

    expect(analysis.error).toBe('invalid address: not-an-address');
    expect(analysis.address).toBe('not-an-address');
    expect(analysis.honeypot.method).toBe('fallback');
    expect(analysis.breakdown.finalScore).toBe(0);
    expect(analysis.breakdown.grade).toBe('F');
    expect(analysis.breakdown.riskLevel).toBe('CRITICAL');
  });

  it('accepts lowercase addresses and reports them checksummed', async () => {
    const analysis = await pipeline(healthyChain()).analyze(WBNB.toLowerCase());
    expect(analysis.address).toBe(WBNB);
  });
});
