export * from './patternScanner';
export * from './staticAnalyzer';
export * from './onchainAnalyzer';
export * from './honeypot';
export * from './scorer';
