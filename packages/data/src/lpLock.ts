import { round, type Address } from '@token-risk/core';
import type { ChainReader } from '@token-risk/chain';

// LP lock contracts on BSC; LP tokens they hold count as locked
export const LP_LOCKERS: Readonly<Record<string, Address>> = {
  PinkLock: '0x1fE80fC86816B778B529D3C2a3830e44A6519A25',
  Mudra: '0x88b8e5f5b052f9b38b3b7f529d6bd0a09c84c3a0',
  Unicrypt: '0x407993575c91ce7643a4d4cCACc9A98c36eE1BBE',
  TeamFinance: '0x17e00383A843A9922bCA3B280C0ADE9f8BA48449'
};

// LP sent here is burned by the owner. The zero address is left out: every
// V2 pair mints MINIMUM_LIQUIDITY to it on the first deposit.
export const LP_DEAD_ADDRESS: Address = '0x000000000000000000000000000000000000dEaD';

export type LpLock = {
  // undefined when totalSupply() could not be read
  lpSupply?: bigint;
  lockedAmount: bigint;
  locked: boolean;
  percentLocked: number;
  lockerAddress?: Address;
};

/** Share of a pair's LP supply held by known lockers and the dead address. */
export async function measureLpLock(reader: ChainReader, pair: Address): Promise<LpLock> {
  const lockers = Object.values(LP_LOCKERS);
  const [supply, held] = await Promise.all([
    reader.totalSupply(pair),
    Promise.all(
      [...lockers, LP_DEAD_ADDRESS].map(async (holder) => {
        const res = await reader.balanceOf(pair, holder);
        return { holder, balance: res.ok ? res.value : 0n };
      })
    )
  ]);

  const lockedAmount = held.reduce((sum, h) => sum + h.balance, 0n);
  const percentLocked =
    supply.ok && supply.value > 0n
      ? Math.min(100, round(Number((lockedAmount * 1_000_000n) / supply.value) / 10_000, 2))
      : 0;

  const topLocker = held
    .filter((h) => lockers.includes(h.holder) && h.balance > 0n)
    .reduce<{ holder: Address; balance: bigint } | undefined>(
      (best, h) => (!best || h.balance > best.balance ? h : best),
      undefined
    );

  return {
    ...(supply.ok ? { lpSupply: supply.value } : {}),
    lockedAmount,
    locked: percentLocked > 0,
    percentLocked,
    ...(topLocker ? { lockerAddress: topLocker.holder } : {})
  };
}
