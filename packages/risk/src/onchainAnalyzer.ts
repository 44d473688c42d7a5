import { BURN_ADDRESSES, round, type Holder, type OnchainFindings, type TokenMetadata } from '@token-risk/core';

function percentOf(amount: bigint, total: bigint) {
  if (total <= 0n) return 0;
  return Number((amount * 1_000_000n) / total) / 10_000;
}

const byBalanceDesc = (a: Holder, b: Holder) => (a.balance > b.balance ? -1 : a.balance < b.balance ? 1 : 0);

/**
 * Holder concentration and LP lock state. The pool pair and burn addresses are
 * not counted as holders: tokens there are not in anyone's hands.
 */
export function analyzeOnchain(metadata: TokenMetadata): OnchainFindings {
  const excluded = new Set(BURN_ADDRESSES.map((a) => a.toLowerCase()));
  if (metadata.lpInfo) excluded.add(metadata.lpInfo.pairAddress.toLowerCase());

  const holders = metadata.holders
    .filter((h) => h.balance > 0n && !excluded.has(h.address.toLowerCase()))
    .sort(byBalanceDesc);

  const top10 = holders.slice(0, 10).reduce((sum, h) => sum + h.balance, 0n);

  return {
    lp: metadata.lpInfo
      ? { locked: metadata.lpInfo.locked, percentLocked: metadata.lpInfo.percentLocked }
      : { locked: false, percentLocked: 0 },
    topHolderPercent: round(percentOf(holders[0]?.balance ?? 0n, metadata.totalSupply), 2),
    top10HoldersPercent: round(percentOf(top10, metadata.totalSupply), 2),
    holderCount: holders.length
  };
}
