/**
 * Remittance matching: public API.
 *
 * The matching engine (`./matching`) is pure and in-memory. The service
 * layer (`./services`) wires it to an injected invoice store.
 */

export * from './matching';
export * from './services';
export { AppError, MatchingFailedError } from './utils';
export { env, parseEnv } from './config';
export type { EnvConfig } from './types';
