import {
  BaseError,
  ContractFunctionRevertedError,
  ContractFunctionZeroDataError,
  createPublicClient,
  fallback,
  getAddress,
  http,
  parseAbi,
  type PublicClient
} from 'viem';
import { bsc } from 'viem/chains';
import { env, errorMessage, logger, withRetry, type Address, type PairReserves } from '@token-risk/core';

export type CallFailureReason = 'reverted' | 'network';

export type CallResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: CallFailureReason; error: string };

export const ok = <T>(value: T): CallResult<T> => ({ ok: true, value });

export const reverted = (error: string): CallResult<never> => ({ ok: false, reason: 'reverted', error });

export const networkError = (error: string): CallResult<never> => ({ ok: false, reason: 'network', error });

export type Erc20Info = {
  name: string;
  symbol: string;
  decimals: number;
  totalSupply: bigint;
};

/**
 * Read-only view of the chain used by the analyzers. Every call resolves to a
 * CallResult; implementations never throw.
 */
export interface ChainReader {
  getAmountsOut(amountIn: bigint, path: readonly Address[]): Promise<CallResult<readonly bigint[]>>;
  getPair(tokenA: Address, tokenB: Address): Promise<CallResult<Address>>;
  getReserves(pair: Address): Promise<CallResult<PairReserves>>;
  getCodeSize(address: Address): Promise<CallResult<number>>;
  getTokenInfo(token: Address): Promise<CallResult<Erc20Info>>;
  getOwner(token: Address): Promise<CallResult<Address>>;
  balanceOf(token: Address, holder: Address): Promise<CallResult<bigint>>;
  totalSupply(token: Address): Promise<CallResult<bigint>>;
}

const ROUTER_ABI = parseAbi([
  'function getAmountsOut(uint256 amountIn, address[] path) view returns (uint256[] amounts)'
]);

const FACTORY_ABI = parseAbi(['function getPair(address tokenA, address tokenB) view returns (address pair)']);

const PAIR_ABI = parseAbi([
  'function token0() view returns (address)',
  'function getReserves() view returns (uint112 reserve0, uint112 reserve1, uint32 blockTimestampLast)'
]);

const ERC20_ABI = parseAbi([
  'function name() view returns (string)',
  'function symbol() view returns (string)',
  'function decimals() view returns (uint8)',
  'function totalSupply() view returns (uint256)',
  'function balanceOf(address account) view returns (uint256)',
  'function owner() view returns (address)'
]);

/**
 * A revert (or an empty return from a contract) is a property of the token,
 * not of the connection, so it is never retried.
 */
export function classifyCallError(err: unknown): CallFailureReason {
  if (err instanceof BaseError) {
    const contractFailure = err.walk(
      (e) => e instanceof ContractFunctionRevertedError || e instanceof ContractFunctionZeroDataError
    );
    if (contractFailure) return 'reverted';
  }
  return 'network';
}

export function createBscClient(urls: string[] = env.RPC_URLS, timeoutMs: number = env.RPC_TIMEOUT_MS) {
  // retries are handled per call by ViemChainReader
  const transports = urls.map((url) => http(url, { timeout: timeoutMs, retryCount: 0 }));
  return createPublicClient({
    chain: bsc,
    transport: fallback(transports)
  });
}

export type ViemChainReaderOptions = {
  router?: Address;
  factory?: Address;
  attempts?: number;
  backoffMs?: number;
};

export class ViemChainReader implements ChainReader {
  private log = logger.child({ component: 'chain-reader' });
  private router: Address;
  private factory: Address;
  private attempts: number;
  private backoffMs: number;

  constructor(private client: PublicClient, opts: ViemChainReaderOptions = {}) {
    this.router = opts.router ?? getAddress(env.PANCAKESWAP_ROUTER_V2);
    this.factory = opts.factory ?? getAddress(env.PANCAKESWAP_FACTORY_V2);
    this.attempts = opts.attempts ?? env.RPC_MAX_ATTEMPTS;
    this.backoffMs = opts.backoffMs ?? env.RPC_BACKOFF_MS;
  }

  private async call<T>(label: string, fn: () => Promise<T>): Promise<CallResult<T>> {
    try {
      const value = await withRetry(fn, {
        attempts: this.attempts,
        baseDelayMs: this.backoffMs,
        shouldRetry: (err) => classifyCallError(err) === 'network',
        onRetry: (attempt, err) => this.log.warn({ attempt, call: label, err: errorMessage(err) }, 'rpc call failed, retrying')
      });
      return ok(value);
    } catch (err) {
      const reason = classifyCallError(err);
      if (reason === 'network') this.log.error({ call: label, err: errorMessage(err) }, 'rpc call failed');
      return { ok: false, reason, error: shortMessage(err) };
    }
  }

  getAmountsOut(amountIn: bigint, path: readonly Address[]) {
    return this.call('getAmountsOut', () =>
      this.client.readContract({
        address: this.router,
        abi: ROUTER_ABI,
        functionName: 'getAmountsOut',
        args: [amountIn, path]
      })
    );
  }

  getPair(tokenA: Address, tokenB: Address) {
    return this.call('getPair', () =>
      this.client.readContract({
        address: this.factory,
        abi: FACTORY_ABI,
        functionName: 'getPair',
        args: [tokenA, tokenB]
      })
    );
  }

  getReserves(pair: Address) {
    return this.call('getReserves', async () => {
      const [token0, reserves] = await Promise.all([
        this.client.readContract({ address: pair, abi: PAIR_ABI, functionName: 'token0' }),
        this.client.readContract({ address: pair, abi: PAIR_ABI, functionName: 'getReserves' })
      ]);
      const [reserve0, reserve1] = reserves;
      return { token0, reserve0, reserve1 } satisfies PairReserves;
    });
  }

  getCodeSize(address: Address) {
    return this.call('getCode', async () => {
      const code = await this.client.getCode({ address });
      if (!code || code === '0x') return 0;
      return (code.length - 2) / 2;
    });
  }

  getTokenInfo(token: Address) {
    return this.call('erc20', async () => {
      const [name, symbol, decimals, totalSupply] = await Promise.all([
        this.client.readContract({ address: token, abi: ERC20_ABI, functionName: 'name' }),
        this.client.readContract({ address: token, abi: ERC20_ABI, functionName: 'symbol' }),
        this.client.readContract({ address: token, abi: ERC20_ABI, functionName: 'decimals' }),
        this.client.readContract({ address: token, abi: ERC20_ABI, functionName: 'totalSupply' })
      ]);
      return { name, symbol, decimals, totalSupply } satisfies Erc20Info;
    });
  }

  getOwner(token: Address) {
    return this.call('owner', () => this.client.readContract({ address: token, abi: ERC20_ABI, functionName: 'owner' }));
  }

  balanceOf(token: Address, holder: Address) {
    return this.call('balanceOf', () =>
      this.client.readContract({ address: token, abi: ERC20_ABI, functionName: 'balanceOf', args: [holder] })
    );
  }

  totalSupply(token: Address) {
    return this.call('totalSupply', () =>
      this.client.readContract({ address: token, abi: ERC20_ABI, functionName: 'totalSupply' })
    );
  }
}

function shortMessage(err: unknown) {
  if (err instanceof BaseError) return err.shortMessage;
  return errorMessage(err);
}
