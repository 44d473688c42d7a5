export * from './chainReader';
export * from './tradeSimulator';
export * from './liquidityProber';
export * from './fakeChainReader';
