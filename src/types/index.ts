// src/types/index.ts
export * from './measurement';
export * from './network';
export * from './topology';

export type LogLevel = 'error' | 'warn' | 'success' | 'info' | 'debug';
