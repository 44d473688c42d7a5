import type { Address, PairReserves } from '@token-risk/core';
import { networkError, ok, reverted, type CallResult, type ChainReader, type Erc20Info } from './chainReader';

type QuoteFn = (amountIn: bigint, path: readonly Address[]) => CallResult<readonly bigint[]>;

const key = (...parts: string[]) => parts.map((p) => p.toLowerCase()).join(':');

/**
 * In-memory ChainReader for tests and offline runs. Unknown lookups behave like
 * an empty chain: no pair, no code, reverting token calls.
 */
export class FakeChainReader implements ChainReader {
  quote: QuoteFn = () => reverted('Pancake: INSUFFICIENT_LIQUIDITY');
  offline = false;
  readonly calls: string[] = [];

  private pairs = new Map<string, Address>();
  private reserves = new Map<string, PairReserves>();
  private codeSizes = new Map<string, number>();
  private tokens = new Map<string, Erc20Info>();
  private owners = new Map<string, Address>();
  private balances = new Map<string, bigint>();

  setPair(tokenA: Address, tokenB: Address, pair: Address, codeSize = 2_000) {
    this.pairs.set(key(tokenA, tokenB), pair);
    this.pairs.set(key(tokenB, tokenA), pair);
    this.codeSizes.set(key(pair), codeSize);
    return this;
  }

  setReserves(pair: Address, reserves: PairReserves) {
    this.reserves.set(key(pair), reserves);
    return this;
  }

  setToken(token: Address, info: Erc20Info, owner?: Address) {
    this.tokens.set(key(token), info);
    if (owner) this.owners.set(key(token), owner);
    return this;
  }

  setBalance(token: Address, holder: Address, balance: bigint) {
    this.balances.set(key(token, holder), balance);
    return this;
  }

  private record(call: string): CallResult<never> | undefined {
    this.calls.push(call);
    return this.offline ? networkError('fetch failed') : undefined;
  }

  async getAmountsOut(amountIn: bigint, path: readonly Address[]) {
    return this.record('getAmountsOut') ?? this.quote(amountIn, path);
  }

  async getPair(tokenA: Address, tokenB: Address): Promise<CallResult<Address>> {
    return this.record('getPair') ?? ok(this.pairs.get(key(tokenA, tokenB)) ?? '0x0000000000000000000000000000000000000000');
  }

  async getReserves(pair: Address): Promise<CallResult<PairReserves>> {
    const reserves = this.reserves.get(key(pair));
    return this.record('getReserves') ?? (reserves ? ok(reserves) : reverted('getReserves reverted'));
  }

  async getCodeSize(address: Address): Promise<CallResult<number>> {
    return this.record('getCode') ?? ok(this.codeSizes.get(key(address)) ?? 0);
  }

  async getTokenInfo(token: Address): Promise<CallResult<Erc20Info>> {
    const info = this.tokens.get(key(token));
    return this.record('erc20') ?? (info ? ok(info) : reverted('not an ERC-20'));
  }

  async getOwner(token: Address): Promise<CallResult<Address>> {
    const owner = this.owners.get(key(token));
    return this.record('owner') ?? (owner ? ok(owner) : reverted('owner() not implemented'));
  }

  async balanceOf(token: Address, holder: Address): Promise<CallResult<bigint>> {
    return this.record('balanceOf') ?? ok(this.balances.get(key(token, holder)) ?? 0n);
  }

  async totalSupply(token: Address): Promise<CallResult<bigint>> {
    const info = this.tokens.get(key(token));
    return this.record('totalSupply') ?? (info ? ok(info.totalSupply) : reverted('not an ERC-20'));
  }
}
