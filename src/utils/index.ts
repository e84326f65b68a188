// HTTP utilities
export {
  createHttpClient,
  addLoggingInterceptor,
  formatHttpError,
  getHttpStatus,
  isHttpStatus,
  DEFAULT_TIMEOUT_MS,
} from './http';

// CSV utilities
export { escapeCSVValue, stringifyCellValue, toCSVRow } from './csv';

// Display formatting
export { capitalizeLabel, formatDisplayValue, describeJsonType } from './format';

// Hash utilities
export { sha256, hashForLogging } from './hash';

// Re-export types
export type { HttpClientConfig } from '../types/http.types';
