import { getAddress, isAddress, zeroAddress } from 'viem';
import { z } from 'zod';
import {
  MemoryTtlCache,
  env,
  errorMessage,
  logger,
  type Address,
  type Holder,
  type LpInfo,
  type TokenMetadata,
  type TtlCache
} from '@token-risk/core';
import type { ChainReader } from '@token-risk/chain';
import { measureLpLock } from './lpLock';

const HOLDER_PAGE_SIZE = 100;

const addressSchema = z
  .string()
  .refine((s) => isAddress(s, { strict: false }), 'invalid address')
  .transform((s) => getAddress(s));

const sourceRowSchema = z.object({
  SourceCode: z.string(),
  ContractName: z.string().default(''),
  Proxy: z.string().default('0'),
  Implementation: z.string().default('')
});

const holderRowSchema = z.object({
  TokenHolderAddress: addressSchema,
  TokenHolderQuantity: z
    .string()
    .regex(/^\d+$/)
    .transform((q) => BigInt(q))
});

// status "0" carries an error string in `result`
const sourceResponseSchema = z.object({
  status: z.string(),
  result: z.union([z.array(sourceRowSchema), z.string()])
});

const holderResponseSchema = z.object({
  status: z.string(),
  result: z.union([z.array(holderRowSchema), z.string()])
});

const standardJsonSchema = z.object({
  sources: z.record(z.object({ content: z.string() }))
});

type SourceInfo = {
  sourceText: string;
  contractName?: string;
  proxyHint?: boolean;
};

export class MetadataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MetadataError';
  }
}

/**
 * Explorer source for multi-file contracts is a standard-JSON input, sometimes
 * wrapped in an extra pair of braces. Returns the concatenated file contents,
 * or the input unchanged when it is plain Solidity.
 */
export function flattenSource(raw: string): string {
  const trimmed = raw.trim();
  if (!trimmed.startsWith('{')) return raw;

  const body = trimmed.startsWith('{{') && trimmed.endsWith('}}') ? trimmed.slice(1, -1) : trimmed;
  try {
    const parsed = standardJsonSchema.safeParse(JSON.parse(body));
    if (!parsed.success) return raw;
    return Object.values(parsed.data.sources)
      .map((s) => s.content)
      .join('\n');
  } catch (err) {
    logger.debug({ err: errorMessage(err) }, 'source is not standard-json input');
    return raw;
  }
}

/** Metadata for a token nothing could be learned about. */
export function degradedMetadata(address: Address): TokenMetadata {
  return {
    address,
    name: '',
    symbol: '',
    decimals: 18,
    totalSupply: 0n,
    sourceVerified: false,
    sourceText: '',
    holders: [],
    lpInfo: null
  };
}

export type MetadataProviderOptions = {
  apiUrl?: string;
  apiKey?: string;
  wrappedNative?: Address;
  timeoutMs?: number;
  cache?: TtlCache<string, TokenMetadata>;
};

/**
 * Assembles TokenMetadata from ERC-20 reads, the BscScan API and the LP pair.
 * Explorer data is optional: without an API key, or when BscScan fails, the
 * token reads as unverified with no known holders.
 */
export class MetadataProvider {
  private log = logger.child({ component: 'metadata-provider' });
  private apiUrl: string;
  private apiKey?: string;
  private wrappedNative: Address;
  private timeoutMs: number;
  private cache: TtlCache<string, TokenMetadata>;

  constructor(private reader: ChainReader, opts: MetadataProviderOptions = {}) {
    this.apiUrl = opts.apiUrl ?? env.BSCSCAN_API_URL;
    this.apiKey = opts.apiKey ?? env.BSCSCAN_API_KEY;
    this.wrappedNative = opts.wrappedNative ?? getAddress(env.WBNB_ADDRESS);
    this.timeoutMs = opts.timeoutMs ?? env.RPC_TIMEOUT_MS;
    this.cache =
      opts.cache ?? new MemoryTtlCache<string, TokenMetadata>(env.METADATA_CACHE_TTL_SEC * 1000, env.METADATA_CACHE_MAX);

    if (!this.apiKey) this.log.warn('no BscScan API key; source and holder data disabled');
  }

  /** Throws MetadataError when the address does not answer ERC-20 reads. */
  async fetch(address: Address): Promise<TokenMetadata> {
    const key = address.toLowerCase();
    const cached = this.cache.get(key);
    if (cached) return cached;

    const info = await this.reader.getTokenInfo(address);
    if (!info.ok) throw new MetadataError(`token info unavailable: ${info.error}`);

    const [owner, source, holders, lpInfo] = await Promise.all([
      this.reader.getOwner(address),
      this.sourceInfo(address),
      this.holders(address),
      this.lpInfo(address)
    ]);

    const metadata: TokenMetadata = {
      address,
      ...info.value,
      sourceVerified: source.sourceText.length > 0,
      ...source,
      ...(owner.ok ? { owner: owner.value } : {}),
      holders,
      lpInfo
    };

    this.cache.set(key, metadata);
    this.log.debug(
      { token: address, verified: metadata.sourceVerified, holders: holders.length, lp: lpInfo?.pairAddress },
      'metadata assembled'
    );
    return metadata;
  }

  private async sourceInfo(address: Address): Promise<SourceInfo> {
    const body = await this.explorer({ module: 'contract', action: 'getsourcecode', address });
    const parsed = sourceResponseSchema.safeParse(body);
    if (!parsed.success || typeof parsed.data.result === 'string') return { sourceText: '' };

    const row = parsed.data.result[0];
    if (!row) return { sourceText: '' };

    return {
      sourceText: flattenSource(row.SourceCode),
      ...(row.ContractName ? { contractName: row.ContractName } : {}),
      proxyHint: row.Proxy === '1' || row.Implementation.length > 0
    };
  }

  /** Top holders from BscScan; empty without an API key or on explorer failure. */
  async holders(address: Address): Promise<Holder[]> {
    const body = await this.explorer({
      module: 'token',
      action: 'tokenholderlist',
      contractaddress: address,
      page: '1',
      offset: String(HOLDER_PAGE_SIZE)
    });
    const parsed = holderResponseSchema.safeParse(body);
    if (!parsed.success || typeof parsed.data.result === 'string') return [];

    return parsed.data.result.map((row) => ({ address: row.TokenHolderAddress, balance: row.TokenHolderQuantity }));
  }

  private async lpInfo(token: Address): Promise<LpInfo | null> {
    const pair = await this.reader.getPair(token, this.wrappedNative);
    if (!pair.ok || pair.value.toLowerCase() === zeroAddress) return null;
    const pairAddress = pair.value;

    const [reserves, lock] = await Promise.all([
      this.reader.getReserves(pairAddress),
      measureLpLock(this.reader, pairAddress)
    ]);

    return {
      pairAddress,
      ...(reserves.ok ? { reserves: reserves.value } : {}),
      locked: lock.locked,
      percentLocked: lock.percentLocked,
      ...(lock.lockerAddress ? { lockerAddress: lock.lockerAddress } : {})
    };
  }

  private async explorer(params: Record<string, string>): Promise<unknown> {
    if (!this.apiKey) return undefined;

    const url = new URL(this.apiUrl);
    for (const [k, v] of Object.entries(params)) url.searchParams.set(k, v);
    url.searchParams.set('apikey', this.apiKey);

    try {
      const res = await fetch(url, { signal: AbortSignal.timeout(this.timeoutMs) });
      if (!res.ok) {
        this.log.warn({ action: params.action, status: res.status }, 'explorer request failed');
        return undefined;
      }
      return await res.json();
    } catch (err) {
      this.log.warn({ action: params.action, err: errorMessage(err) }, 'explorer request failed');
      return undefined;
    }
  }
}
