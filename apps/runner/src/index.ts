import { Command } from 'commander';
import { bigintReplacer, env, errorMessage } from '@token-risk/core';
import { LiquidityProber, TradeSimulator, ViemChainReader, createBscClient } from '@token-risk/chain';
import { MetadataProvider, PoolAnalyzer } from '@token-risk/data';
import { HoneypotDetector, RiskScorer } from '@token-risk/risk';
import { AnalysisStore } from '@token-risk/storage';
import { AlertService } from '@token-risk/alerts';
import { TokenAnalysisPipeline } from './pipeline';

const alerts = new AlertService();

const reader = new ViemChainReader(createBscClient(env.RPC_URLS, env.RPC_TIMEOUT_MS), {
  attempts: env.RPC_MAX_ATTEMPTS,
  backoffMs: env.RPC_BACKOFF_MS
});

const metadata = new MetadataProvider(reader);

const print = (value: unknown) => process.stdout.write(`${JSON.stringify(value, bigintReplacer)}\n`);

async function analyzeTokens(addresses: string[]) {
  const pipeline = new TokenAnalysisPipeline({
    metadata,
    detector: new HoneypotDetector(new TradeSimulator(reader), new LiquidityProber(reader)),
    scorer: new RiskScorer()
  });

  const storage = new AnalysisStore();
  try {
    // one token at a time keeps RPC load predictable
    for (const address of addresses) {
      const analysis = await pipeline.analyze(address);
      storage.saveAnalysis(analysis);
      alerts.notifyAnalysis(analysis);
      print(analysis);
    }
  } finally {
    storage.close();
  }
}

async function analyzePools(addresses: string[]) {
  const analyzer = new PoolAnalyzer(reader, { holders: metadata });
  for (const address of addresses) {
    const pool = await analyzer.analyzePool(address);
    alerts.notifyPool(pool);
    print(pool);
  }
}

const program = new Command();

program
  .name('token-risk')
  .description('Assess trading safety of BNB Smart Chain tokens and PancakeSwap pools')
  .argument('<addresses...>', 'token addresses, or LP pair addresses with --pool')
  .option('-p, --pool', 'analyze LP pair addresses instead of tokens', false)
  .action(async (addresses: string[], options: { pool: boolean }) => {
    if (options.pool) await analyzePools(addresses);
    else await analyzeTokens(addresses);
  });

program.parseAsync().catch((e) => {
  alerts.notify('error', `Analysis run failed: ${errorMessage(e)}`);
  process.exit(1);
});
