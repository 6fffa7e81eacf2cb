// Types and constants
export type { Sample, SampleRecord } from './types/sample.js';
export {
  RETENTION_SECONDS,
  POLL_INTERVAL_SECONDS,
  SampleRecordSchema,
  SampleFileSchema,
  toRecord,
  fromRecord,
  nowSeconds,
} from './types/sample.js';

// Configuration
export * from './config/index.js';

// Logging
export { createLogger, silentLogger, describeError, LOG_LEVELS } from './logging/logger.js';
export type { Logger, LogLevel, LogWriter, LoggerOptions } from './logging/logger.js';

// Source reader
export * from './source/index.js';

// Storage
export { SampleStore, SampleStoreError, pruneSamples } from './storage/sample-store.js';
export type { SampleStoreDeps, SampleStoreOptions } from './storage/sample-store.js';

// Sampler
export { SamplerLoop } from './sampler/sampler-loop.js';
export type { TickOutcome, SleepFn, SamplerLoopOptions, SamplerStatus } from './sampler/sampler-loop.js';

// Rendering
export * from './render/index.js';

// Facade
export { PriceTracker } from './tracker.js';
export type { PriceTrackerOverrides } from './tracker.js';

// Chat gateway
export * from './chat/index.js';
