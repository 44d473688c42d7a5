import {
  RISK_CATEGORIES,
  SEVERITY_WEIGHTS,
  clampScore,
  errorMessage,
  logger,
  mean,
  round,
  type FindingSeverity,
  type Grade,
  type HoneypotVerdict,
  type OnchainFindings,
  type RiskCategory,
  type RiskFactor,
  type ScoreBreakdown,
  type ScoreRiskLevel,
  type Severity,
  type StaticFindings
} from '@token-risk/core';

export const BASE_SCORE = 100;

export const CATEGORY_WEIGHTS = {
  security: 0.35,
  liquidity: 0.2,
  ownership: 0.15,
  trading: 0.15,
  technical: 0.1,
  market: 0.05
} as const satisfies Record<RiskCategory, number>;

export type CategoryWeights = Readonly<Record<RiskCategory, number>>;

const GRADE_THRESHOLDS: ReadonlyArray<readonly [number, Grade]> = [
  [95, 'A+'],
  [90, 'A'],
  [85, 'A-'],
  [80, 'B+'],
  [75, 'B'],
  [70, 'B-'],
  [65, 'C+'],
  [60, 'C'],
  [55, 'C-'],
  [50, 'D+'],
  [45, 'D'],
  [40, 'D-']
];

const RISK_LEVEL_THRESHOLDS: ReadonlyArray<readonly [number, ScoreRiskLevel]> = [
  [85, 'VERY_LOW'],
  [75, 'LOW'],
  [65, 'MODERATE'],
  [50, 'HIGH'],
  [30, 'VERY_HIGH']
];

const SEVERITY_RANK: Record<FindingSeverity, number> = { critical: 0, high: 1, medium: 2, low: 3 };

export function gradeFor(score: number): Grade {
  return GRADE_THRESHOLDS.find(([min]) => score >= min)?.[1] ?? 'F';
}

export function riskLevelFor(score: number): ScoreRiskLevel {
  return RISK_LEVEL_THRESHOLDS.find(([min]) => score >= min)?.[1] ?? 'CRITICAL';
}

export function weightsSumToOne(weights: CategoryWeights) {
  const total = RISK_CATEGORIES.reduce((sum, c) => sum + weights[c], 0);
  return Math.abs(total - 1) <= 1e-6;
}

type FactorInput = Omit<RiskFactor, 'evidence'> & { evidence?: Record<string, unknown> };

function factor(input: FactorInput): RiskFactor {
  return { ...input, scoreImpact: Math.max(0, input.scoreImpact), evidence: input.evidence ?? {} };
}

// ---------------------------------------------------------------------------
// Category analyzers
// ---------------------------------------------------------------------------

export function securityFactors(stat: StaticFindings, honeypot: HoneypotVerdict): RiskFactor[] {
  const factors: RiskFactor[] = [];

  if (honeypot.isHoneypot) {
    const confidence = honeypot.confidence / 100;
    factors.push(
      factor({
        category: 'security',
        severity: confidence >= 0.8 ? 'critical' : 'high',
        weight: 1.0,
        scoreImpact: 80 * confidence,
        confidence,
        title: 'Honeypot Detected',
        description: `Token appears to be a honeypot (confidence: ${(confidence * 100).toFixed(1)}%)`,
        recommendation: honeypot.recommendation,
        evidence: { indicators: honeypot.indicators, canBuy: honeypot.canBuy, canSell: honeypot.canSell }
      })
    );
  }

  if (!honeypot.canSell) {
    factors.push(
      factor({
        category: 'security',
        severity: 'critical',
        weight: 1.0,
        scoreImpact: 70,
        confidence: 0.9,
        title: 'Sell Restriction',
        description: 'Token selling appears to be blocked',
        recommendation: 'Cannot sell tokens - avoid this token',
        evidence: { canSell: false }
      })
    );
  }

  if (!honeypot.canBuy) {
    factors.push(
      factor({
        category: 'security',
        severity: 'high',
        weight: 0.2,
        scoreImpact: 20,
        confidence: 0.8,
        title: 'Buy Restriction',
        description: 'Token buying appears to be blocked',
        recommendation: 'Cannot buy tokens - check contract status',
        evidence: { canBuy: false }
      })
    );
  }

  const worstFirst = [...stat.dangerousFunctions].sort((a, b) => SEVERITY_RANK[a.severity] - SEVERITY_RANK[b.severity]);
  for (const fn of worstFirst.slice(0, 3)) {
    const severity: Severity = fn.severity;
    factors.push(
      factor({
        category: 'security',
        severity,
        weight: 0.1,
        scoreImpact: 15 * SEVERITY_WEIGHTS[severity],
        confidence: 0.7,
        title: `Dangerous Function: ${fn.name}`,
        description: fn.message,
        recommendation: 'Review function implementation carefully',
        evidence: { function: fn.name, severity: fn.severity }
      })
    );
  }

  return factors;
}

export function liquidityFactors(onchain: OnchainFindings, honeypot: HoneypotVerdict): RiskFactor[] {
  const factors: RiskFactor[] = [];
  const { locked, percentLocked } = onchain.lp;

  if (!locked) {
    factors.push(
      factor({
        category: 'liquidity',
        severity: 'high',
        weight: 0.6,
        scoreImpact: 25,
        confidence: 0.9,
        title: 'Liquidity Not Locked',
        description: 'Liquidity pool is not locked - rug pull risk',
        recommendation: 'High rug pull risk - exercise extreme caution',
        evidence: { locked: false, percentLocked: 0 }
      })
    );
  } else if (percentLocked < 80) {
    factors.push(
      factor({
        category: 'liquidity',
        severity: 'medium',
        weight: 0.4,
        scoreImpact: 15,
        confidence: 0.8,
        title: 'Partial Liquidity Lock',
        description: `Only ${percentLocked}% of liquidity is locked`,
        recommendation: 'Partial rug pull risk - be cautious',
        evidence: { locked: true, percentLocked }
      })
    );
  }

  if (!honeypot.liquidity.hasLiquidity) {
    factors.push(
      factor({
        category: 'liquidity',
        severity: 'high',
        weight: 0.4,
        scoreImpact: 20,
        confidence: 0.9,
        title: 'No Liquidity Pool',
        description: 'No liquidity pool found for trading',
        recommendation: 'Cannot trade - no liquidity available',
        evidence: { pairAddress: honeypot.liquidity.pairAddress, error: honeypot.liquidity.error }
      })
    );
  }

  return factors;
}

export function ownershipFactors(stat: StaticFindings): RiskFactor[] {
  const factors: RiskFactor[] = [];

  if (!stat.owner.renounced) {
    factors.push(
      factor({
        category: 'ownership',
        severity: 'medium',
        weight: 0.5,
        scoreImpact: 12,
        confidence: 0.8,
        title: 'Ownership Not Renounced',
        description: 'Contract owner can still modify contract',
        recommendation: 'Owner has control - verify owner trustworthiness',
        evidence: { ownerAddress: stat.owner.address ?? 'unknown' }
      })
    );
  }

  if (stat.hasMint) {
    factors.push(
      factor({
        category: 'ownership',
        severity: 'medium',
        weight: 0.3,
        scoreImpact: 10,
        confidence: 0.7,
        title: 'Mint Function Present',
        description: 'Contract can create new tokens',
        recommendation: 'Inflation risk - check mint controls',
        evidence: { hasMint: true }
      })
    );
  }

  if (stat.hasPause) {
    factors.push(
      factor({
        category: 'ownership',
        severity: 'medium',
        weight: 0.2,
        scoreImpact: 8,
        confidence: 0.7,
        title: 'Pause Function Present',
        description: 'Contract can be paused by owner',
        recommendation: 'Trading can be halted - check pause controls',
        evidence: { hasPause: true }
      })
    );
  }

  return factors;
}

export function tradingFactors(honeypot: HoneypotVerdict): RiskFactor[] {
  const factors: RiskFactor[] = [];
  const { buyTax, sellTax } = honeypot;

  if (buyTax > 20 || sellTax > 20) {
    factors.push(
      factor({
        category: 'trading',
        severity: 'high',
        weight: 0.4,
        scoreImpact: 20,
        confidence: 0.9,
        title: 'Extremely High Fees',
        description: `Very high trading fees: Buy ${buyTax}%, Sell ${sellTax}%`,
        recommendation: 'Extremely high fees - avoid trading',
        evidence: { buyTax, sellTax }
      })
    );
  } else if (buyTax > 10 || sellTax > 10) {
    factors.push(
      factor({
        category: 'trading',
        severity: 'medium',
        weight: 0.3,
        scoreImpact: 12,
        confidence: 0.8,
        title: 'High Trading Fees',
        description: `High trading fees: Buy ${buyTax}%, Sell ${sellTax}%`,
        recommendation: 'High fees reduce profitability',
        evidence: { buyTax, sellTax }
      })
    );
  }

  // Only a sell tax above the buy tax counts; the reverse is not an exit trap
  const difference = sellTax - buyTax;
  if (difference > 15) {
    factors.push(
      factor({
        category: 'trading',
        severity: 'medium',
        weight: 0.3,
        scoreImpact: 10,
        confidence: 0.7,
        title: 'Large Fee Discrepancy',
        description: `Sell fee (${sellTax}%) far above buy fee (${buyTax}%)`,
        recommendation: 'Unusual fee structure - investigate further',
        evidence: { buyTax, sellTax, difference }
      })
    );
  }

  return factors;
}

export function technicalFactors(stat: StaticFindings): RiskFactor[] {
  const factors: RiskFactor[] = [];

  if (!stat.isVerified) {
    factors.push(
      factor({
        category: 'technical',
        severity: 'medium',
        weight: 0.4,
        scoreImpact: 8,
        confidence: 0.9,
        title: 'Contract Not Verified',
        description: 'Source code is not verified on blockchain explorer',
        recommendation: 'Cannot audit code - higher risk',
        evidence: { verified: false }
      })
    );
  }

  if (stat.hasBlacklist) {
    factors.push(
      factor({
        category: 'technical',
        severity: 'medium',
        weight: 0.3,
        scoreImpact: 6,
        confidence: 0.7,
        title: 'Blacklist Function',
        description: 'Contract can blacklist addresses',
        recommendation: 'Addresses can be blocked from trading',
        evidence: { hasBlacklist: true }
      })
    );
  }

  if (stat.isProxy) {
    factors.push(
      factor({
        category: 'technical',
        severity: 'low',
        weight: 0.3,
        scoreImpact: 4,
        confidence: 0.6,
        title: 'Proxy Contract',
        description: 'Contract uses proxy pattern',
        recommendation: 'Implementation can be changed - verify upgrade controls',
        evidence: { isProxy: true }
      })
    );
  }

  return factors;
}

export function marketFactors(onchain: OnchainFindings): RiskFactor[] {
  const top = onchain.topHolderPercent;

  if (top > 50) {
    return [
      factor({
        category: 'market',
        severity: 'high',
        weight: 0.6,
        scoreImpact: 15,
        confidence: 0.8,
        title: 'High Holder Concentration',
        description: `Top holder owns ${top}% of supply`,
        recommendation: 'Whale risk - large holder can manipulate price',
        evidence: { topHolderPercent: top }
      })
    ];
  }

  if (top > 20) {
    return [
      factor({
        category: 'market',
        severity: 'medium',
        weight: 0.4,
        scoreImpact: 8,
        confidence: 0.7,
        title: 'Moderate Holder Concentration',
        description: `Top holder owns ${top}% of supply`,
        recommendation: 'Some concentration risk',
        evidence: { topHolderPercent: top }
      })
    ];
  }

  return [];
}

// ---------------------------------------------------------------------------
// Score arithmetic
// ---------------------------------------------------------------------------

export function penaltyFraction(f: RiskFactor) {
  return (f.scoreImpact * SEVERITY_WEIGHTS[f.severity] * f.confidence * f.weight) / 100;
}

/** Multiplicative penalties: each factor removes a share of what is left. */
export function categoryScore(factors: readonly RiskFactor[]) {
  const score = factors.reduce((acc, f) => clampScore(acc * (1 - penaltyFraction(f))), BASE_SCORE);
  return round(clampScore(score), 1);
}

export function errorBreakdown(error: string): ScoreBreakdown {
  return {
    baseScore: BASE_SCORE,
    categoryScores: { security: 0, liquidity: 0, ownership: 0, trading: 0, technical: 0, market: 0 },
    riskFactors: [
      factor({
        category: 'technical',
        severity: 'critical',
        weight: 1.0,
        scoreImpact: 100,
        confidence: 0,
        title: 'Analysis Failed',
        description: `Risk analysis failed: ${error}`,
        recommendation: 'Cannot assess risk - avoid trading',
        evidence: { error }
      })
    ],
    finalScore: 0,
    confidenceLevel: 0,
    grade: 'F',
    riskLevel: 'CRITICAL'
  };
}

export class RiskScorer {
  private log = logger.child({ component: 'risk-scorer' });
  readonly weights: CategoryWeights;

  constructor(weights: CategoryWeights = CATEGORY_WEIGHTS) {
    if (!weightsSumToOne(weights)) throw new Error('category weights must sum to 1.0');
    this.weights = weights;
  }

  /**
   * Scores a token from static, honeypot and on-chain findings. Never throws:
   * any failure yields the conservative breakdown (everything 0, grade F).
   */
  scoreToken(stat: StaticFindings, honeypot: HoneypotVerdict, onchain: OnchainFindings): ScoreBreakdown {
    try {
      const riskFactors = [
        ...securityFactors(stat, honeypot),
        ...liquidityFactors(onchain, honeypot),
        ...ownershipFactors(stat),
        ...tradingFactors(honeypot),
        ...technicalFactors(stat),
        ...marketFactors(onchain)
      ];

      const categoryScores = this.categoryScores(riskFactors);
      const finalScore = round(
        clampScore(RISK_CATEGORIES.reduce((sum, c) => sum + categoryScores[c] * this.weights[c], 0)),
        1
      );

      const confidenceTerms = [
        stat.isVerified ? 0.9 : 0.6,
        honeypot.method === 'simulation' ? 0.9 : 0.7,
        ...(riskFactors.length ? [mean(riskFactors.map((f) => f.confidence))] : [])
      ];

      const breakdown: ScoreBreakdown = {
        baseScore: BASE_SCORE,
        categoryScores,
        riskFactors,
        finalScore,
        confidenceLevel: round(mean(confidenceTerms), 2),
        grade: gradeFor(finalScore),
        riskLevel: riskLevelFor(finalScore)
      };

      this.log.debug(
        { finalScore, grade: breakdown.grade, riskLevel: breakdown.riskLevel, factors: riskFactors.length },
        'risk scoring completed'
      );
      return breakdown;
    } catch (err) {
      this.log.error({ err: errorMessage(err) }, 'risk scoring failed');
      return errorBreakdown(errorMessage(err));
    }
  }

  private categoryScores(factors: readonly RiskFactor[]): Record<RiskCategory, number> {
    const scoreOf = (c: RiskCategory) => categoryScore(factors.filter((f) => f.category === c));
    return {
      security: scoreOf('security'),
      liquidity: scoreOf('liquidity'),
      ownership: scoreOf('ownership'),
      trading: scoreOf('trading'),
      technical: scoreOf('technical'),
      market: scoreOf('market')
    };
  }
}
