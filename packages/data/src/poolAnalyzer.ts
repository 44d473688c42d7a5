import { getAddress, isAddress, zeroAddress } from 'viem';
import {
  clampScore,
  errorMessage,
  logger,
  round,
  type Address,
  type ConcentrationRisk,
  type Holder,
  type PoolAnalysis,
  type PoolRisk
} from '@token-risk/core';
import type { ChainReader } from '@token-risk/chain';
import { LP_DEAD_ADDRESS, LP_LOCKERS, measureLpLock } from './lpLock';
import type { MetadataProvider } from './metadataProvider';

export type HolderSource = Pick<MetadataProvider, 'holders'>;

const NOT_DISTRIBUTION_HOLDERS = new Set(
  [...Object.values(LP_LOCKERS), LP_DEAD_ADDRESS, zeroAddress].map((a) => a.toLowerCase())
);

/**
 * 0-100, higher is riskier. Starts at 50, a lock of at least 80% (50%) takes
 * off 20 (10), no lock adds 30, concentrated LP adds up to 20 and a third of
 * the missing security points is added on top.
 */
export function poolRiskScore(
  lock: { locked: boolean; percentLocked: number },
  concentration: ConcentrationRisk,
  securityScore: number
): PoolRisk {
  let score = 50;

  if (lock.locked) {
    if (lock.percentLocked >= 80) score -= 20;
    else if (lock.percentLocked >= 50) score -= 10;
  } else {
    score += 30;
  }

  if (concentration === 'high') score += 20;
  else if (concentration === 'medium') score += 10;

  score += (100 - securityScore) * 0.3;

  return poolRisk(clampScore(Math.trunc(score)));
}

function poolRisk(score: number): PoolRisk {
  if (score <= 20) return { score, grade: 'A', riskLevel: 'VERY_LOW' };
  if (score <= 40) return { score, grade: 'B', riskLevel: 'LOW' };
  if (score <= 60) return { score, grade: 'C', riskLevel: 'MEDIUM' };
  if (score <= 80) return { score, grade: 'D', riskLevel: 'HIGH' };
  return { score, grade: 'F', riskLevel: 'VERY_HIGH' };
}

function concentrationFor(largestPercent: number, holderCount: number): ConcentrationRisk {
  if (holderCount === 0) return 'unknown';
  if (largestPercent > 50) return 'high';
  if (largestPercent > 20) return 'medium';
  return 'low';
}

const percentOf = (amount: bigint, supply: bigint) =>
  round(Number((amount * 1_000_000n) / supply) / 10_000, 2);

function failedPool(pairAddress: string, error: string): PoolAnalysis {
  return {
    pairAddress,
    analyzedAt: new Date().toISOString(),
    codeSize: 0,
    lock: { locked: false, percentLocked: 0 },
    distribution: { holderCount: 0, largestHolderPercent: 0, top10Percent: 0, concentrationRisk: 'unknown' },
    security: { score: 0, issues: [error] },
    risk: { score: 100, grade: 'F', riskLevel: 'VERY_HIGH' },
    error
  };
}

export type PoolAnalyzerOptions = {
  // LP token holders; without one the distribution stays unknown
  holders?: HolderSource;
};

/** Safety summary of a single PancakeSwap V2 pair, addressed by its LP token. */
export class PoolAnalyzer {
  private log = logger.child({ component: 'pool-analyzer' });
  private holderSource?: HolderSource;

  constructor(private reader: ChainReader, opts: PoolAnalyzerOptions = {}) {
    this.holderSource = opts.holders;
  }

  async analyzePool(input: string): Promise<PoolAnalysis> {
    if (!isAddress(input, { strict: false })) return failedPool(input, `invalid address: ${input}`);
    const pair = getAddress(input);

    try {
      const code = await this.reader.getCodeSize(pair);
      if (!code.ok) return failedPool(pair, `pool code unavailable: ${code.error}`);
      if (code.value === 0) return failedPool(pair, 'no contract code at pool address');

      const [reserves, lock, holders] = await Promise.all([
        this.reader.getReserves(pair),
        measureLpLock(this.reader, pair),
        this.holderSource ? this.holderSource.holders(pair) : Promise.resolve<Holder[]>([])
      ]);

      const issues: string[] = [];
      let security = 100;
      if (!reserves.ok) {
        issues.push('reserves unavailable');
        security -= 30;
      } else if (reserves.value.reserve0 === 0n || reserves.value.reserve1 === 0n) {
        issues.push('pool holds no liquidity');
        security -= 50;
      }
      if (lock.lpSupply === undefined) {
        issues.push('LP supply unavailable');
        security -= 20;
      }
      security = clampScore(security);

      const supply = lock.lpSupply ?? 0n;
      const free = holders
        .filter((h) => !NOT_DISTRIBUTION_HOLDERS.has(h.address.toLowerCase()) && h.balance > 0n)
        .sort((a, b) => (b.balance > a.balance ? 1 : b.balance < a.balance ? -1 : 0));
      const largest = supply > 0n && free[0] ? percentOf(free[0].balance, supply) : 0;
      const top10 =
        supply > 0n ? percentOf(free.slice(0, 10).reduce((sum, h) => sum + h.balance, 0n), supply) : 0;
      const concentrationRisk = supply > 0n ? concentrationFor(largest, free.length) : 'unknown';

      const analysis: PoolAnalysis = {
        pairAddress: pair,
        analyzedAt: new Date().toISOString(),
        codeSize: code.value,
        ...(reserves.ok ? { reserves: reserves.value } : {}),
        ...(lock.lpSupply !== undefined ? { lpSupply: lock.lpSupply } : {}),
        lock: {
          locked: lock.locked,
          percentLocked: lock.percentLocked,
          ...(lock.lockerAddress ? { lockerAddress: lock.lockerAddress } : {})
        },
        distribution: {
          holderCount: free.length,
          largestHolderPercent: largest,
          top10Percent: Math.min(100, top10),
          concentrationRisk
        },
        security: { score: security, issues },
        risk: poolRiskScore(lock, concentrationRisk, security)
      };

      this.log.info(
        { pair, score: analysis.risk.score, grade: analysis.risk.grade, locked: lock.percentLocked },
        'pool analyzed'
      );
      return analysis;
    } catch (err) {
      this.log.error({ pair, err: errorMessage(err) }, 'pool analysis failed');
      return failedPool(pair, errorMessage(err));
    }
  }
}
