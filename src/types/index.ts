// Environment configuration type
export interface EnvConfig {
  NODE_ENV: 'development' | 'production' | 'test';
  LOG_LEVEL: 'error' | 'warn' | 'info' | 'http' | 'debug';
  MATCHING_CHUNK_SIZE: number;
  MATCHING_AUTO_APPROVE_THRESHOLD: number;
  MATCHING_MANUAL_REVIEW_THRESHOLD: number;
  MATCHING_INVOICE_STATUSES: string[];
}
