export { default as logger } from './logger';
export { AppError, MatchingFailedError } from './AppError';
