import type { PatternFinding, PatternGroup, PatternReport } from '@token-risk/core';

const HONEYPOT_PATTERNS: ReadonlyArray<readonly [PatternGroup, readonly string[]]> = [
  ['transfer restrictions', ['onlyOwner', 'require(from == owner', 'require(to == owner']],
  ['sell blocking', ['revert()', 'require(false)', 'assert(false)']],
  ['balance manipulation', ['balanceOf[', '_balances[', 'return 0']],
  ['approval blocking', ['approve(', 'allowance(', 'return false']],
  ['blacklist functions', ['blacklist', 'isBlacklisted', 'blocked']],
  ['pause functions', ['pause', 'paused', 'whenNotPaused']],
  ['max transaction', ['maxTxAmount', 'maxTransactionAmount', 'require(amount <']],
  ['cooldown mechanisms', ['cooldown', 'lastTx', 'block.timestamp']]
];

const HIGH_SEVERITY: ReadonlySet<PatternGroup> = new Set(['sell blocking', 'balance manipulation']);

// Matched verbatim (case-sensitive); each one found lowers the score by 2
const SAFE_LIBRARY_MARKERS = ['OpenZeppelin', 'SafeMath', 'IERC20', 'Context', 'Ownable'];

export const EMPTY_PATTERN_REPORT: PatternReport = { score: 0, confidence: 0, findings: [], hasSource: false };

/**
 * Keyword scan of verified source for honeypot-style constructs. This is text
 * matching, not parsing: a keyword inside a comment still counts.
 */
export function scanSource(sourceText: string): PatternReport {
  if (!sourceText) return EMPTY_PATTERN_REPORT;

  const haystack = sourceText.toLowerCase();
  const findings: PatternFinding[] = [];

  for (const [pattern, keywords] of HONEYPOT_PATTERNS) {
    const high = HIGH_SEVERITY.has(pattern);
    for (const keyword of keywords) {
      if (!haystack.includes(keyword.toLowerCase())) continue;
      findings.push({ pattern, keyword, severity: high ? 'high' : 'medium', contribution: high ? 10 : 5 });
    }
  }

  const raw = findings.reduce((total, f) => total + f.contribution, 0);
  const score = SAFE_LIBRARY_MARKERS.reduce(
    (total, marker) => (sourceText.includes(marker) ? Math.max(0, total - 2) : total),
    raw
  );

  return {
    score,
    confidence: Math.min(100, score * 2),
    findings,
    hasSource: true
  };
}
