import { describe, it, expect } from 'vitest';
import { analyzeStatic } from './staticAnalyzer';

const SOURCE = `
contract Token {
  modifier onlyOwner() { _; }
  function mint(address to, uint256 amount) public onlyOwner {}
  function setFee(uint256 fee) external onlyOwner {}
  function blacklist(address account) external onlyOwner {}
}
`;

describe('analyzeStatic', () => {
  it('finds dangerous functions and modifiers in declaration order', () => {
    const findings = analyzeStatic(SOURCE);

    expect(findings.dangerousFunctions.map((f) => [f.name, f.severity])).toEqual([
      ['mint', 'high'],
      ['setFee', 'medium'],
      ['blacklist', 'high']
    ]);
    expect(findings.dangerousFunctions[0].message).toBe("Dangerous function 'mint' found in contract");
    expect(findings.dangerousModifiers).toEqual(['onlyOwner']);
    expect(findings.hasMint).toBe(true);
    expect(findings.hasBlacklist).toBe(true);
    expect(findings.hasSetFee).toBe(true);
    expect(findings.hasPause).toBe(false);
    expect(findings.isVerified).toBe(true);
    expect(findings.isProxy).toBe(false);
  });

  it('does not count call sites as declarations', () => {
    expect(analyzeStatic('_mint(msg.sender, 1); token.mint(1);').hasMint).toBe(false);
  });

  it('treats a dead or zero owner as renounced', () => {
    expect(analyzeStatic('', { ownerAddress: '0x000000000000000000000000000000000000dEaD' }).owner.renounced).toBe(true);
    expect(analyzeStatic('', { ownerAddress: '0x0000000000000000000000000000000000000000' }).owner.renounced).toBe(true);
    expect(analyzeStatic('', { ownerAddress: '0x3333333333333333333333333333333333333333' }).owner.renounced).toBe(false);
  });

  it('does not assume renounced ownership when the owner is unknown', () => {
    const findings = analyzeStatic('');
    expect(findings.owner).toEqual({ address: undefined, renounced: false });
    expect(findings.isVerified).toBe(false);
  });

  it('flags proxies from source markers or the explorer hint', () => {
    expect(analyzeStatic('assembly { let r := delegatecall(gas(), impl, 0, 0, 0, 0) }').isProxy).toBe(true);
    expect(analyzeStatic('', { proxyHint: true }).isProxy).toBe(true);
  });
});
