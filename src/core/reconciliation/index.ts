// src/core/reconciliation/index.ts

// Export the service implementation
export * from './reconciliation.service';
export * from './row-ordering';

// Export interfaces
export * from './interfaces/services';
