// src/core/parsing/index.ts

// Export the service implementation
export * from './extract-parser.service';
export * from './extract-schemas';
export * from './visit-date';

// Export interfaces
export * from './interfaces/services';
