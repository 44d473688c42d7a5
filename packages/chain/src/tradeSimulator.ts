import { getAddress, parseEther, zeroAddress } from 'viem';
import {
  env,
  errorMessage,
  logger,
  mean,
  round,
  withDeadline,
  type Address,
  type SimulationReport,
  type TaxBaseline,
  type TradeAttempt,
  type TradeDirection
} from '@token-risk/core';
import type { ChainReader } from './chainReader';

const BPS = 10_000n;

export type TradeSimulatorConfig = {
  wrappedNative: Address;
  baseline: TaxBaseline;
  // Swap fee the pool charges, in basis points (30 => 997/1000)
  feeBps: number;
};

export type SimulateOptions = {
  deadlineMs?: number;
};

type PoolSide = {
  reserveNative: bigint;
  reserveToken: bigint;
};

type SizeRound = {
  buy: TradeAttempt;
  sell?: TradeAttempt;
};

/**
 * Constant-product output for `amountIn`, after the pool's swap fee and before
 * anything the token contract withholds.
 */
export function constantProductOut(amountIn: bigint, reserveIn: bigint, reserveOut: bigint, feeBps = 30): bigint {
  if (amountIn <= 0n || reserveIn <= 0n || reserveOut <= 0n) return 0n;
  const amountInWithFee = amountIn * (BPS - BigInt(feeBps));
  return (reserveOut * amountInWithFee) / (reserveIn * BPS + amountInWithFee);
}

/**
 * Tax is the share of the theoretical output that went missing (never negative);
 * slippage is the absolute deviation. Both are percentages rounded to 2 decimals.
 */
export function computeTaxAndSlippage(theoretical: bigint, realized: bigint) {
  if (theoretical <= 0n) return { taxPercent: 0, slippagePercent: 0 };
  // 4 decimal places of percentage precision before rounding
  const deviation = Number(((theoretical - realized) * 1_000_000n) / theoretical) / 10_000;
  return {
    taxPercent: round(Math.max(0, deviation), 2),
    slippagePercent: round(Math.abs(deviation), 2)
  };
}

export function defaultSimulationSizes(): bigint[] {
  return env.SIMULATION_SIZES_BNB.map((s) => parseEther(s));
}

function failedAttempt(direction: TradeDirection, amountIn: bigint, error: string): TradeAttempt {
  return {
    direction,
    amountIn,
    success: false,
    amountOut: 0n,
    theoreticalOut: 0n,
    taxPercent: 0,
    slippagePercent: 0,
    error
  };
}

export function failedSimulation(baseline: TaxBaseline, error: string): SimulationReport {
  return {
    buyAttempts: [],
    sellAttempts: [],
    canBuy: false,
    canSell: false,
    avgBuyTax: 0,
    avgSellTax: 0,
    errors: [error],
    baseline
  };
}

export function buildSimulationReport(
  buyAttempts: readonly TradeAttempt[],
  sellAttempts: readonly TradeAttempt[],
  baseline: TaxBaseline,
  errors: readonly string[] = []
): SimulationReport {
  const okBuys = buyAttempts.filter((a) => a.success);
  const okSells = sellAttempts.filter((a) => a.success);
  return {
    buyAttempts,
    sellAttempts,
    canBuy: okBuys.length > 0,
    canSell: okSells.length > 0,
    avgBuyTax: round(mean(okBuys.map((a) => a.taxPercent)), 2),
    avgSellTax: round(mean(okSells.map((a) => a.taxPercent)), 2),
    errors,
    baseline
  };
}

/**
 * Quotes buys and sells through the AMM router without sending anything.
 * Buys at different sizes run concurrently; each sell waits for its own buy.
 */
export class TradeSimulator {
  private log = logger.child({ component: 'trade-simulator' });
  private config: TradeSimulatorConfig;

  constructor(private reader: ChainReader, config: Partial<TradeSimulatorConfig> = {}) {
    this.config = {
      wrappedNative: config.wrappedNative ?? getAddress(env.WBNB_ADDRESS),
      baseline: config.baseline ?? env.TAX_BASELINE,
      feeBps: config.feeBps ?? env.AMM_FEE_BPS
    };
  }

  async simulateTrades(
    token: Address,
    sizes: readonly bigint[] = defaultSimulationSizes(),
    opts: SimulateOptions = {}
  ): Promise<SimulationReport> {
    try {
      const report = await withDeadline(this.run(token, sizes), opts.deadlineMs);
      this.log.debug(
        { token, canBuy: report.canBuy, canSell: report.canSell, buyTax: report.avgBuyTax, sellTax: report.avgSellTax },
        'trade simulation finished'
      );
      return report;
    } catch (err) {
      this.log.warn({ token, err: errorMessage(err) }, 'trade simulation failed');
      return failedSimulation(this.config.baseline, errorMessage(err));
    }
  }

  private async run(token: Address, sizes: readonly bigint[]): Promise<SimulationReport> {
    const pool = this.config.baseline === 'reserves' ? await this.loadPool(token) : undefined;
    const rounds = await Promise.all(sizes.map((size) => this.simulateSize(token, size, pool)));

    return buildSimulationReport(
      rounds.map((r) => r.buy),
      rounds.flatMap((r) => (r.sell ? [r.sell] : [])),
      this.config.baseline
    );
  }

  private async simulateSize(token: Address, size: bigint, pool?: PoolSide): Promise<SizeRound> {
    const native = this.config.wrappedNative;
    const buy = await this.quote('buy', size, [native, token], pool);
    if (!buy.success || buy.amountOut <= 0n) return { buy };

    const sell = await this.quote('sell', buy.amountOut, [token, native], pool);
    return { buy, sell };
  }

  private async quote(
    direction: TradeDirection,
    amountIn: bigint,
    path: readonly Address[],
    pool?: PoolSide
  ): Promise<TradeAttempt> {
    const res = await this.reader.getAmountsOut(amountIn, path);
    if (!res.ok) {
      const error = res.reason === 'reverted' ? `Contract logic error: ${res.error}` : res.error;
      return failedAttempt(direction, amountIn, error);
    }

    const amountOut = res.value[res.value.length - 1] ?? 0n;
    if (amountOut <= 0n) {
      return failedAttempt(direction, amountIn, direction === 'buy' ? 'No tokens received' : 'No BNB received');
    }

    const theoreticalOut = await this.theoreticalOut(direction, amountIn, path, pool);
    return {
      direction,
      amountIn,
      success: true,
      amountOut,
      theoreticalOut,
      ...computeTaxAndSlippage(theoreticalOut, amountOut)
    };
  }

  private async theoreticalOut(
    direction: TradeDirection,
    amountIn: bigint,
    path: readonly Address[],
    pool?: PoolSide
  ): Promise<bigint> {
    if (this.config.baseline === 'quote') {
      // Same router call as the realized amount, so tax reads as ~0 for any token
      const res = await this.reader.getAmountsOut(amountIn, path);
      return res.ok ? (res.value[res.value.length - 1] ?? 0n) : 0n;
    }

    if (!pool) return 0n;
    return direction === 'buy'
      ? constantProductOut(amountIn, pool.reserveNative, pool.reserveToken, this.config.feeBps)
      : constantProductOut(amountIn, pool.reserveToken, pool.reserveNative, this.config.feeBps);
  }

  private async loadPool(token: Address): Promise<PoolSide | undefined> {
    const native = this.config.wrappedNative;
    const pair = await this.reader.getPair(token, native);
    if (!pair.ok || pair.value.toLowerCase() === zeroAddress) return undefined;

    const reserves = await this.reader.getReserves(pair.value);
    if (!reserves.ok) return undefined;

    const { token0, reserve0, reserve1 } = reserves.value;
    const nativeIsToken0 = token0.toLowerCase() === native.toLowerCase();
    return nativeIsToken0
      ? { reserveNative: reserve0, reserveToken: reserve1 }
      : { reserveNative: reserve1, reserveToken: reserve0 };
  }
}
