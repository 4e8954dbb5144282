export * from './config';
export * from './direction';
export * from './math';
export type * from './types';
