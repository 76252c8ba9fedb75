export { createLogger, getLoggerOptionsFromEnv, isLogLevel } from './logger.js';
export type { ElectionLogger, LogFormat, LogLevel, LoggerOptions } from './logger.js';
export { tryFn, tryFnSync } from './try-fn.js';
export type { TryResult } from './try-fn.js';
export { randomIdentity, encodeIdentity, decodeIdentity, sameIdentity } from './identity.js';
export type { IdentityGenerator } from './identity.js';
export { computeBackoff } from './backoff.js';
