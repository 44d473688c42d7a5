export type Address = `0x${string}`;

// Tokens (and LP tokens) sent here are out of circulation
export const BURN_ADDRESSES: readonly Address[] = [
  '0x0000000000000000000000000000000000000000',
  '0x000000000000000000000000000000000000dEaD'
];

export const isBurnAddress = (address: string) =>
  BURN_ADDRESSES.some((burn) => burn.toLowerCase() === address.toLowerCase());

// ---------------------------------------------------------------------------
// Token metadata (supplied by the metadata provider)
// ---------------------------------------------------------------------------

export type Holder = {
  address: Address;
  balance: bigint;
};

export type PairReserves = {
  token0: Address;
  reserve0: bigint;
  reserve1: bigint;
};

export type LpInfo = {
  pairAddress: Address;
  reserves?: PairReserves;
  locked: boolean;
  percentLocked: number;
  lockerAddress?: Address;
};

export type TokenMetadata = {
  address: Address;
  name: string;
  symbol: string;
  decimals: number;
  totalSupply: bigint;
  sourceVerified: boolean;
  // Empty when the explorer has no verified source
  sourceText: string;
  contractName?: string;
  proxyHint?: boolean;
  owner?: Address;
  holders: Holder[];
  lpInfo: LpInfo | null;
};

// ---------------------------------------------------------------------------
// Trade simulation
// ---------------------------------------------------------------------------

export type TradeDirection = 'buy' | 'sell';

export type TaxBaseline = 'reserves' | 'quote';

export type TradeAttempt = Readonly<{
  direction: TradeDirection;
  amountIn: bigint;
  success: boolean;
  amountOut: bigint;
  // No-fee output the realized amount is compared against
  theoreticalOut: bigint;
  taxPercent: number;
  slippagePercent: number;
  error?: string;
}>;

export type SimulationReport = Readonly<{
  buyAttempts: readonly TradeAttempt[];
  sellAttempts: readonly TradeAttempt[];
  canBuy: boolean;
  canSell: boolean;
  avgBuyTax: number;
  avgSellTax: number;
  errors: readonly string[];
  baseline: TaxBaseline;
}>;

// ---------------------------------------------------------------------------
// Source pattern scanning
// ---------------------------------------------------------------------------

export type PatternGroup =
  | 'transfer restrictions'
  | 'sell blocking'
  | 'balance manipulation'
  | 'approval blocking'
  | 'blacklist functions'
  | 'pause functions'
  | 'max transaction'
  | 'cooldown mechanisms';

export type PatternFinding = Readonly<{
  pattern: PatternGroup;
  keyword: string;
  severity: 'high' | 'medium';
  contribution: number;
}>;

export type PatternReport = Readonly<{
  score: number;
  // 0-100
  confidence: number;
  findings: readonly PatternFinding[];
  hasSource: boolean;
}>;

// ---------------------------------------------------------------------------
// Liquidity / transaction history
// ---------------------------------------------------------------------------

export type LiquiditySnapshot = Readonly<{
  hasLiquidity: boolean;
  pairAddress?: Address;
  codeSize?: number;
  reserves?: PairReserves;
  error?: string;
}>;

export type TransactionHistory = Readonly<{
  recentTransactions: number;
  successfulSells: number;
  failedSells: number;
  sellSuccessRate: number;
  analysisAvailable: boolean;
}>;

// ---------------------------------------------------------------------------
// Honeypot verdict
// ---------------------------------------------------------------------------

export type HoneypotRiskLevel = 'CRITICAL' | 'HIGH' | 'MEDIUM' | 'LOW' | 'UNKNOWN';

export type HoneypotMethod = 'simulation' | 'fallback';

export type HoneypotVerdict = Readonly<{
  isHoneypot: boolean;
  // 0-100
  confidence: number;
  riskLevel: HoneypotRiskLevel;
  indicators: readonly string[];
  recommendation: string;
  method: HoneypotMethod;
  canBuy: boolean;
  canSell: boolean;
  buyTax: number;
  sellTax: number;
  simulation: SimulationReport;
  patterns: PatternReport;
  liquidity: LiquiditySnapshot;
  transactions: TransactionHistory;
  error?: string;
}>;

// ---------------------------------------------------------------------------
// Static / on-chain findings consumed by the scorer
// ---------------------------------------------------------------------------

export type FindingSeverity = 'critical' | 'high' | 'medium' | 'low';

export type DangerousFunction = Readonly<{
  name: string;
  severity: FindingSeverity;
  message: string;
}>;

export type StaticFindings = Readonly<{
  isVerified: boolean;
  owner: { address?: Address; renounced: boolean };
  hasMint: boolean;
  hasPause: boolean;
  hasBlacklist: boolean;
  hasSetFee: boolean;
  isProxy: boolean;
  dangerousFunctions: readonly DangerousFunction[];
  dangerousModifiers: readonly string[];
}>;

export type OnchainFindings = Readonly<{
  lp: { locked: boolean; percentLocked: number };
  topHolderPercent: number;
  top10HoldersPercent: number;
  holderCount: number;
}>;

// ---------------------------------------------------------------------------
// Risk scoring
// ---------------------------------------------------------------------------

export const RISK_CATEGORIES = ['security', 'liquidity', 'ownership', 'trading', 'technical', 'market'] as const;

export type RiskCategory = (typeof RISK_CATEGORIES)[number];

export type Severity = 'critical' | 'high' | 'medium' | 'low' | 'info';

export const SEVERITY_WEIGHTS = {
  critical: 1.0,
  high: 0.7,
  medium: 0.4,
  low: 0.2,
  info: 0.1
} as const satisfies Record<Severity, number>;

export type RiskFactor = Readonly<{
  category: RiskCategory;
  severity: Severity;
  // Importance within the category, 0-1
  weight: number;
  // Unweighted penalty points, never negative
  scoreImpact: number;
  // 0-1
  confidence: number;
  title: string;
  description: string;
  recommendation: string;
  evidence: Readonly<Record<string, unknown>>;
}>;

export type Grade = 'A+' | 'A' | 'A-' | 'B+' | 'B' | 'B-' | 'C+' | 'C' | 'C-' | 'D+' | 'D' | 'D-' | 'F';

export type ScoreRiskLevel = 'VERY_LOW' | 'LOW' | 'MODERATE' | 'HIGH' | 'VERY_HIGH' | 'CRITICAL';

export type ScoreBreakdown = Readonly<{
  baseScore: number;
  categoryScores: Readonly<Record<RiskCategory, number>>;
  riskFactors: readonly RiskFactor[];
  finalScore: number;
  // 0-1
  confidenceLevel: number;
  grade: Grade;
  riskLevel: ScoreRiskLevel;
}>;

// ---------------------------------------------------------------------------
// Pool analysis
// ---------------------------------------------------------------------------

export type ConcentrationRisk = 'high' | 'medium' | 'low' | 'unknown';

export type PoolGrade = 'A' | 'B' | 'C' | 'D' | 'F';

export type PoolRiskLevel = 'VERY_LOW' | 'LOW' | 'MEDIUM' | 'HIGH' | 'VERY_HIGH';

export type PoolRisk = Readonly<{
  // 0-100, higher is riskier
  score: number;
  grade: PoolGrade;
  riskLevel: PoolRiskLevel;
}>;

export type PoolAnalysis = Readonly<{
  pairAddress: string;
  analyzedAt: string;
  codeSize: number;
  reserves?: PairReserves;
  lpSupply?: bigint;
  lock: { locked: boolean; percentLocked: number; lockerAddress?: Address };
  // LP holders outside lockers and the dead address
  distribution: {
    holderCount: number;
    largestHolderPercent: number;
    top10Percent: number;
    concentrationRisk: ConcentrationRisk;
  };
  security: { score: number; issues: readonly string[] };
  risk: PoolRisk;
  error?: string;
}>;

// ---------------------------------------------------------------------------
// Full analysis (pipeline output)
// ---------------------------------------------------------------------------

export type TokenSummary = Readonly<{
  address: string;
  name: string;
  symbol: string;
  decimals: number;
  totalSupply: bigint;
  sourceVerified: boolean;
  contractName?: string;
  holderCount: number;
  pairAddress?: Address;
  // true when metadata could not be fetched and defaults were used
  degraded: boolean;
}>;

export type TokenAnalysis = Readonly<{
  requestId: string;
  address: string;
  analyzedAt: string;
  durationMs: number;
  token: TokenSummary;
  staticFindings: StaticFindings;
  onchainFindings: OnchainFindings;
  honeypot: HoneypotVerdict;
  breakdown: ScoreBreakdown;
  error?: string;
}>;
