import { logger, type PoolAnalysis, type PoolRiskLevel, type ScoreRiskLevel, type TokenAnalysis } from '@token-risk/core';

export type AlertLevel = 'info' | 'warn' | 'error';

const WARN_LEVELS: ReadonlySet<ScoreRiskLevel> = new Set(['HIGH', 'VERY_HIGH', 'CRITICAL']);

const POOL_WARN_LEVELS: ReadonlySet<PoolRiskLevel> = new Set(['HIGH', 'VERY_HIGH']);

export class AlertService {
  private log = logger.child({ component: 'alerts' });

  notify(level: AlertLevel, message: string, fields: Record<string, unknown> = {}) {
    if (level === 'info') this.log.info(fields, message);
    else if (level === 'warn') this.log.warn(fields, message);
    else this.log.error(fields, message);
  }

  /** Raises an alert for a finished analysis; returns the level used, if any. */
  notifyAnalysis(analysis: TokenAnalysis): AlertLevel | undefined {
    const { honeypot, breakdown } = analysis;
    const fields = {
      requestId: analysis.requestId,
      token: analysis.address,
      score: breakdown.finalScore,
      grade: breakdown.grade,
      riskLevel: breakdown.riskLevel
    };

    if (honeypot.isHoneypot) {
      this.notify('error', `Honeypot suspected: ${honeypot.recommendation}`, {
        ...fields,
        confidence: honeypot.confidence,
        indicators: honeypot.indicators
      });
      return 'error';
    }

    if (WARN_LEVELS.has(breakdown.riskLevel)) {
      this.notify('warn', `High risk token (${breakdown.grade}, ${breakdown.finalScore}/100)`, fields);
      return 'warn';
    }

    return undefined;
  }

  notifyPool(pool: PoolAnalysis): AlertLevel | undefined {
    const fields = {
      pair: pool.pairAddress,
      score: pool.risk.score,
      grade: pool.risk.grade,
      percentLocked: pool.lock.percentLocked
    };

    if (pool.error) {
      this.notify('error', `Pool analysis failed: ${pool.error}`, fields);
      return 'error';
    }

    if (POOL_WARN_LEVELS.has(pool.risk.riskLevel)) {
      this.notify('warn', `Risky pool (${pool.risk.grade}, ${pool.risk.score}/100)`, fields);
      return 'warn';
    }

    return undefined;
  }
}
