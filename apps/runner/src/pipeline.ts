import { getAddress, isAddress, zeroAddress } from 'viem';
import { v4 as uuid } from 'uuid';
import {
  env,
  errorMessage,
  logger,
  type Address,
  type TokenAnalysis,
  type TokenMetadata,
  type TokenSummary
} from '@token-risk/core';
import { degradedMetadata, type MetadataProvider } from '@token-risk/data';
import {
  analyzeOnchain,
  analyzeStatic,
  errorBreakdown,
  fallbackVerdict,
  type HoneypotDetector,
  type RiskScorer
} from '@token-risk/risk';

export type PipelineDeps = {
  metadata: Pick<MetadataProvider, 'fetch'>;
  detector: HoneypotDetector;
  scorer: RiskScorer;
};

function summarize(metadata: TokenMetadata, degraded: boolean): TokenSummary {
  return {
    address: metadata.address,
    name: metadata.name,
    symbol: metadata.symbol,
    decimals: metadata.decimals,
    totalSupply: metadata.totalSupply,
    sourceVerified: metadata.sourceVerified,
    ...(metadata.contractName ? { contractName: metadata.contractName } : {}),
    holderCount: metadata.holders.length,
    ...(metadata.lpInfo ? { pairAddress: metadata.lpInfo.pairAddress } : {}),
    degraded
  };
}

/**
 * Metadata, static and on-chain findings, honeypot detection and scoring for
 * one token. Always resolves; failures produce the conservative analysis.
 */
export class TokenAnalysisPipeline {
  private log = logger.child({ component: 'pipeline' });

  constructor(
    private deps: PipelineDeps,
    private opts: { deadlineMs?: number } = {}
  ) {}

  async analyze(input: string): Promise<TokenAnalysis> {
    const requestId = uuid();
    const started = Date.now();
    const log = this.log.child({ requestId, token: input });

    if (!isAddress(input, { strict: false })) {
      log.warn('invalid token address');
      return this.failed(requestId, input, started, `invalid address: ${input}`);
    }
    const address = getAddress(input);

    try {
      const { metadata, degraded } = await this.loadMetadata(address);

      const staticFindings = analyzeStatic(metadata.sourceText, {
        ownerAddress: metadata.owner,
        proxyHint: metadata.proxyHint
      });
      const onchainFindings = analyzeOnchain(metadata);
      const honeypot = await this.deps.detector.detectHoneypot(address, metadata, {
        deadlineMs: this.opts.deadlineMs ?? env.ANALYSIS_DEADLINE_MS
      });
      const breakdown = this.deps.scorer.scoreToken(staticFindings, honeypot, onchainFindings);

      const analysis: TokenAnalysis = {
        requestId,
        address,
        analyzedAt: new Date(started).toISOString(),
        durationMs: Date.now() - started,
        token: summarize(metadata, degraded),
        staticFindings,
        onchainFindings,
        honeypot,
        breakdown
      };

      log.info(
        {
          score: breakdown.finalScore,
          grade: breakdown.grade,
          riskLevel: breakdown.riskLevel,
          isHoneypot: honeypot.isHoneypot,
          durationMs: analysis.durationMs
        },
        'analysis complete'
      );
      return analysis;
    } catch (err) {
      log.error({ err: errorMessage(err) }, 'analysis failed');
      return this.failed(requestId, address, started, errorMessage(err));
    }
  }

  private async loadMetadata(address: Address): Promise<{ metadata: TokenMetadata; degraded: boolean }> {
    try {
      return { metadata: await this.deps.metadata.fetch(address), degraded: false };
    } catch (err) {
      this.log.warn({ token: address, err: errorMessage(err) }, 'metadata unavailable, continuing with defaults');
      return { metadata: degradedMetadata(address), degraded: true };
    }
  }

  private failed(requestId: string, address: string, started: number, error: string): TokenAnalysis {
    const placeholder = degradedMetadata(zeroAddress);
    return {
      requestId,
      address,
      analyzedAt: new Date(started).toISOString(),
      durationMs: Date.now() - started,
      token: { ...summarize(placeholder, true), address },
      staticFindings: analyzeStatic(''),
      onchainFindings: analyzeOnchain(placeholder),
      honeypot: fallbackVerdict(error),
      breakdown: errorBreakdown(error),
      error
    };
  }
}
