// src/core/pipeline/index.ts

export * from './report-pipeline.service';
export * from './interfaces/services';
