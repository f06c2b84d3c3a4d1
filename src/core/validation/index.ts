// src/core/validation/index.ts

export * from './validation.service';
export * from './interfaces/services';
