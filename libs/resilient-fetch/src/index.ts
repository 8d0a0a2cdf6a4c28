export * from './types';
export * from './errors';
export { computeBackoffDelay, createBackoffPolicy, DEFAULT_BACKOFF_BASE_MS } from './backoff';
export { classifyExchange, RETRYABLE_STATUSES } from './classifier';
export {
  ResilientRequestExecutor,
  resolveExecutorConfig,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_TIMEOUT_MS,
  MAX_TIMER_DELAY_MS,
} from './executor';
export { paginateRecords, streamPages } from './pagination';
export type { Page, PageFetcher, PaginateOptions } from './pagination';
export { WatermarkTracker, trackWatermark } from './watermark';
export type { WatermarkTrackerOptions } from './watermark';
export { IntervalRateLimiter } from './rateLimit';
export { ConsoleLogger, noopLogger, parseLogLevel } from './logger';
export type { LogLevel } from './logger';
export * from './transport/fetchTransport';
