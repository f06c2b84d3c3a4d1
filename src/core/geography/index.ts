// src/core/geography/index.ts

export * from './alias-rules';
export * from './geography-normalizer';
export * from './interfaces/services';
