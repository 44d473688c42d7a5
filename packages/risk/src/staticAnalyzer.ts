import { isBurnAddress, type Address, type DangerousFunction, type FindingSeverity, type StaticFindings } from '@token-risk/core';

const DANGEROUS_FUNCTIONS = [
  'mint',
  'setFee',
  'setFees',
  'excludeFromReward',
  'includeInReward',
  'setTaxFeePercent',
  'setBuyFee',
  'setSellFee',
  'setSellTax',
  'blacklist',
  'pause',
  'unpause',
  'transferOwnership',
  'renounceOwnership'
] as const;

const DANGEROUS_MODIFIERS = ['onlyOwner', 'admin', 'isOwner', 'hasRole'] as const;

const PROXY_MARKERS = [/delegatecall/i, /function\s+upgradeTo\s*\(/i, /eip1967\.proxy\.implementation/i];

function severityOf(fn: (typeof DANGEROUS_FUNCTIONS)[number]): FindingSeverity {
  if (fn === 'mint' || fn === 'blacklist') return 'high';
  return 'medium';
}

export type StaticContext = {
  ownerAddress?: Address;
  proxyHint?: boolean;
};

export function analyzeStatic(sourceText: string, ctx: StaticContext = {}): StaticFindings {
  const renounced = ctx.ownerAddress !== undefined && isBurnAddress(ctx.ownerAddress);
  const owner = { address: ctx.ownerAddress, renounced };

  const dangerousFunctions: DangerousFunction[] = [];
  for (const name of DANGEROUS_FUNCTIONS) {
    if (!new RegExp(`function\\s+${name}\\s*\\(`, 'i').test(sourceText)) continue;
    dangerousFunctions.push({
      name,
      severity: severityOf(name),
      message: `Dangerous function '${name}' found in contract`
    });
  }

  const dangerousModifiers = DANGEROUS_MODIFIERS.filter(
    (m) => new RegExp(`modifier\\s+${m}`, 'i').test(sourceText) || new RegExp(`\\b${m}\\s*\\(`, 'i').test(sourceText)
  );

  const found = new Set(dangerousFunctions.map((f) => f.name));

  return {
    isVerified: sourceText.length > 0,
    owner,
    hasMint: found.has('mint'),
    hasPause: found.has('pause') || found.has('unpause'),
    hasBlacklist: found.has('blacklist'),
    hasSetFee: dangerousFunctions.some((f) => /fee|tax/i.test(f.name)),
    isProxy: ctx.proxyHint === true || PROXY_MARKERS.some((re) => re.test(sourceText)),
    dangerousFunctions,
    dangerousModifiers
  };
}
