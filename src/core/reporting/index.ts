// src/core/reporting/index.ts

// Export the service implementations
export * from './report-columns';
export * from './report-serializer.service';
export * from './report-workbook.service';

// Export interfaces
export * from './interfaces/services';
