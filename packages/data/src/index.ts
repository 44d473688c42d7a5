export * from './lpLock';
export * from './metadataProvider';
export * from './poolAnalyzer';
