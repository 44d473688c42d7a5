import { getAddress } from 'viem';
import {
  env,
  errorMessage,
  logger,
  type Address,
  type HoneypotRiskLevel,
  type HoneypotVerdict,
  type LiquiditySnapshot,
  type PatternReport,
  type SimulationReport,
  type TokenMetadata,
  type TransactionHistory
} from '@token-risk/core';
import { failedSimulation, type LiquidityProber, type TradeSimulator } from '@token-risk/chain';
import { EMPTY_PATTERN_REPORT, scanSource } from './patternScanner';

type Signal = { indicator: string; confidence: number };

export const NO_TRANSACTION_HISTORY: TransactionHistory = {
  recentTransactions: 0,
  successfulSells: 0,
  failedSells: 0,
  sellSuccessRate: 0,
  analysisAvailable: false
};

function simulationSignal(sim: SimulationReport): Signal | undefined {
  if (sim.canBuy && !sim.canSell) return { indicator: 'cannot sell after buying', confidence: 90 };
  if (!sim.canBuy) return { indicator: 'cannot buy', confidence: 70 };
  if (sim.avgSellTax > 50) return { indicator: 'extremely high sell tax', confidence: 80 };
  if (sim.avgSellTax > 20) return { indicator: 'high sell tax', confidence: 60 };
  return undefined;
}

function patternSignal(patterns: PatternReport): Signal | undefined {
  if (patterns.score > 30) return { indicator: 'multiple suspicious patterns', confidence: 70 };
  if (patterns.score > 15) return { indicator: 'some suspicious patterns', confidence: 40 };
  return undefined;
}

function liquiditySignal(liquidity: LiquiditySnapshot): Signal | undefined {
  if (!liquidity.hasLiquidity) return { indicator: 'no liquidity pool', confidence: 30 };
  return undefined;
}

export function honeypotRiskLevel(confidence: number): HoneypotRiskLevel {
  if (confidence >= 80) return 'CRITICAL';
  if (confidence >= 60) return 'HIGH';
  if (confidence >= 30) return 'MEDIUM';
  return 'LOW';
}

export function honeypotRecommendation(isHoneypot: boolean, confidence: number): string {
  if (isHoneypot && confidence >= 80) return 'AVOID - High probability honeypot detected';
  if (isHoneypot && confidence >= 60) return 'HIGH RISK - Likely honeypot, avoid trading';
  if (confidence >= 30) return 'MODERATE RISK - Exercise caution, small test trades only';
  return 'LOW RISK - No significant honeypot indicators found';
}

/**
 * Fuses the independent signals into one verdict. Only the strongest
 * confidence counts; candidates are never summed or averaged.
 */
export function aggregate(
  simulation: SimulationReport,
  patterns: PatternReport,
  liquidity: LiquiditySnapshot,
  transactions: TransactionHistory = NO_TRANSACTION_HISTORY
): HoneypotVerdict {
  const signals = [simulationSignal(simulation), patternSignal(patterns), liquiditySignal(liquidity)].filter(
    (s): s is Signal => s !== undefined
  );

  const strongest = Math.max(0, ...signals.map((s) => s.confidence));
  const isHoneypot = signals.length > 0 && strongest > 60;
  const confidence = signals.length > 0 ? strongest : 5;

  return {
    isHoneypot,
    confidence,
    riskLevel: honeypotRiskLevel(confidence),
    indicators: signals.map((s) => s.indicator),
    recommendation: honeypotRecommendation(isHoneypot, confidence),
    method: 'simulation',
    canBuy: simulation.canBuy,
    canSell: simulation.canSell,
    buyTax: simulation.avgBuyTax,
    sellTax: simulation.avgSellTax,
    simulation,
    patterns,
    liquidity,
    transactions
  };
}

/** Worst-case verdict used whenever detection itself could not complete. */
export function fallbackVerdict(error: string): HoneypotVerdict {
  return {
    isHoneypot: true,
    confidence: 0,
    riskLevel: 'UNKNOWN',
    indicators: ['analysis failed'],
    recommendation: 'UNKNOWN RISK - Analysis failed, proceed with extreme caution',
    method: 'fallback',
    canBuy: false,
    canSell: false,
    buyTax: 0,
    sellTax: 0,
    simulation: failedSimulation(env.TAX_BASELINE, error),
    patterns: EMPTY_PATTERN_REPORT,
    liquidity: { hasLiquidity: false, error },
    transactions: NO_TRANSACTION_HISTORY,
    error
  };
}

export type HoneypotDetectorOptions = {
  wrappedNative?: Address;
  sizes?: readonly bigint[];
  deadlineMs?: number;
};

export class HoneypotDetector {
  private log = logger.child({ component: 'honeypot-detector' });
  private wrappedNative: Address;

  constructor(
    private simulator: TradeSimulator,
    private prober: LiquidityProber,
    private opts: HoneypotDetectorOptions = {}
  ) {
    this.wrappedNative = opts.wrappedNative ?? getAddress(env.WBNB_ADDRESS);
  }

  /**
   * Runs trade simulation, source scan and liquidity probe side by side. Each
   * sub-analysis honors the deadline on its own and degrades to its
   * conservative value, so the verdict is always produced.
   */
  async detectHoneypot(
    tokenAddress: Address,
    metadata: TokenMetadata,
    opts: { deadlineMs?: number } = {}
  ): Promise<HoneypotVerdict> {
    const deadlineMs = opts.deadlineMs ?? this.opts.deadlineMs;
    const started = Date.now();

    try {
      const [simulation, liquidity, transactions] = await Promise.all([
        this.simulator.simulateTrades(tokenAddress, this.opts.sizes, { deadlineMs }),
        this.prober.probeLiquidity(tokenAddress, this.wrappedNative, { deadlineMs }),
        this.transactionHistory(tokenAddress)
      ]);
      const patterns = scanSource(metadata.sourceText);

      const verdict = aggregate(simulation, patterns, liquidity, transactions);
      this.log.info(
        {
          token: tokenAddress,
          isHoneypot: verdict.isHoneypot,
          confidence: verdict.confidence,
          indicators: verdict.indicators,
          durationMs: Date.now() - started
        },
        'honeypot detection completed'
      );
      return verdict;
    } catch (err) {
      this.log.error({ token: tokenAddress, err: errorMessage(err) }, 'honeypot detection failed');
      return fallbackVerdict(errorMessage(err));
    }
  }

  // Recent Swap logs of the pair are not read yet
  private async transactionHistory(_token: Address): Promise<TransactionHistory> {
    return NO_TRANSACTION_HISTORY;
  }
}
