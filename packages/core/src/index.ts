export * from './config';
export * from './logging';
export * from './types';
export * from './utils';
export * from './cache';
