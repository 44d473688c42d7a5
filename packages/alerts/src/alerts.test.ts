import { describe, it, expect, vi } from 'vitest';
import type { PoolAnalysis, ScoreBreakdown, TokenAnalysis } from '@token-risk/core';
import { EMPTY_PATTERN_REPORT, aggregate, analyzeStatic, errorBreakdown, fallbackVerdict } from '@token-risk/risk';
import { AlertService } from './index';

const CLEAN_SIM = {
  buyAttempts: [],
  sellAttempts: [],
  canBuy: true,
  canSell: true,
  avgBuyTax: 0,
  avgSellTax: 0,
  errors: [],
  baseline: 'reserves'
} as const;

function analysis(honeypot: TokenAnalysis['honeypot'], breakdown: ScoreBreakdown): TokenAnalysis {
  return {
    requestId: 'req-1',
    address: '0x1111111111111111111111111111111111111111',
    analyzedAt: '2026-01-01T00:00:00.000Z',
    durationMs: 5,
    token: {
      address: '0x1111111111111111111111111111111111111111',
      name: 'Test Token',
      symbol: 'TEST',
      decimals: 18,
      totalSupply: 1n,
      sourceVerified: true,
      holderCount: 10,
      degraded: false
    },
    staticFindings: analyzeStatic('contract Token {}'),
    onchainFindings: { lp: { locked: true, percentLocked: 100 }, topHolderPercent: 1, top10HoldersPercent: 5, holderCount: 10 },
    honeypot,
    breakdown
  };
}

const safeVerdict = aggregate(CLEAN_SIM, EMPTY_PATTERN_REPORT, { hasLiquidity: true });

const withScore = (finalScore: number, riskLevel: ScoreBreakdown['riskLevel']): ScoreBreakdown => ({
  ...errorBreakdown('n/a'),
  riskFactors: [],
  finalScore,
  riskLevel,
  grade: 'C'
});

function pool(overrides: Partial<PoolAnalysis> = {}): PoolAnalysis {
  return {
    pairAddress: '0x2222222222222222222222222222222222222222',
    analyzedAt: '2026-01-01T00:00:00.000Z',
    codeSize: 2_000,
    lock: { locked: true, percentLocked: 90 },
    distribution: { holderCount: 0, largestHolderPercent: 0, top10Percent: 0, concentrationRisk: 'unknown' },
    security: { score: 100, issues: [] },
    risk: { score: 30, grade: 'B', riskLevel: 'LOW' },
    ...overrides
  };
}

describe('AlertService', () => {
  it('raises an error for suspected honeypots', () => {
    const alerts = new AlertService();
    const notify = vi.spyOn(alerts, 'notify');

    expect(alerts.notifyAnalysis(analysis(fallbackVerdict('rpc down'), errorBreakdown('rpc down')))).toBe('error');
    expect(notify).toHaveBeenCalledWith(
      'error',
      'Honeypot suspected: UNKNOWN RISK - Analysis failed, proceed with extreme caution',
      expect.objectContaining({ requestId: 'req-1', confidence: 0 })
    );
  });

  it('warns for high risk scores', () => {
    const alerts = new AlertService();
    expect(alerts.notifyAnalysis(analysis(safeVerdict, withScore(55, 'HIGH')))).toBe('warn');
  });

  it('stays quiet for acceptable tokens', () => {
    const alerts = new AlertService();
    const notify = vi.spyOn(alerts, 'notify');

    expect(alerts.notifyAnalysis(analysis(safeVerdict, withScore(70, 'MODERATE')))).toBeUndefined();
    expect(notify).not.toHaveBeenCalled();
  });

  it('warns for risky pools and stays quiet for locked ones', () => {
    const alerts = new AlertService();
    const notify = vi.spyOn(alerts, 'notify');

    expect(alerts.notifyPool(pool())).toBeUndefined();
    expect(alerts.notifyPool(pool({ risk: { score: 95, grade: 'F', riskLevel: 'VERY_HIGH' } }))).toBe('warn');
    expect(notify).toHaveBeenCalledWith('warn', 'Risky pool (F, 95/100)', {
      pair: '0x2222222222222222222222222222222222222222',
      score: 95,
      grade: 'F',
      percentLocked: 90
    });
  });

  it('raises an error for a pool that could not be analyzed', () => {
    const alerts = new AlertService();
    expect(alerts.notifyPool(pool({ error: 'no contract code at pool address' }))).toBe('error');
  });
});
