import { getAddress, zeroAddress } from 'viem';
import { env, errorMessage, logger, withDeadline, type Address, type LiquiditySnapshot } from '@token-risk/core';
import type { ChainReader } from './chainReader';

export class LiquidityProber {
  private log = logger.child({ component: 'liquidity-prober' });

  constructor(private reader: ChainReader) {}

  async probeLiquidity(
    token: Address,
    wrappedNative: Address = getAddress(env.WBNB_ADDRESS),
    opts: { deadlineMs?: number } = {}
  ): Promise<LiquiditySnapshot> {
    try {
      return await withDeadline(this.run(token, wrappedNative), opts.deadlineMs);
    } catch (err) {
      this.log.warn({ token, err: errorMessage(err) }, 'liquidity probe failed');
      return { hasLiquidity: false, error: errorMessage(err) };
    }
  }

  private async run(token: Address, wrappedNative: Address): Promise<LiquiditySnapshot> {
    const pair = await this.reader.getPair(token, wrappedNative);
    if (!pair.ok) return { hasLiquidity: false, error: pair.error };

    const pairAddress = pair.value;
    if (pairAddress.toLowerCase() === zeroAddress) return { hasLiquidity: false };

    const code = await this.reader.getCodeSize(pairAddress);
    if (!code.ok) return { hasLiquidity: false, pairAddress, error: code.error };
    if (code.value === 0) {
      return { hasLiquidity: false, pairAddress, codeSize: 0, error: 'pair address has no contract code' };
    }

    // reserves are enrichment only; a failed read does not change the verdict
    const reserves = await this.reader.getReserves(pairAddress);
    return {
      hasLiquidity: true,
      pairAddress,
      codeSize: code.value,
      ...(reserves.ok ? { reserves: reserves.value } : {})
    };
  }
}
