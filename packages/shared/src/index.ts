/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { loadConfig, type Config, type Env } from './config';

// Types
export * from './types';

// Metrics
export {
  register,
  enableDefaultMetrics,
  llmRequestsCounter,
  llmRequestDurationHistogram,
  llmJsonRecoveryCounter,
  extractionDurationHistogram,
  patternFallbackCounter,
  reviewFlagCounter,
  ocrPagesCounter,
  documentsProcessedCounter,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Schemas
export { validateExtractionResult, type ValidationResult } from './schemas';

// Text and dates
export { normalizeText, maskPhi } from './text';
export { parseDateToIso, MIN_DOB_YEAR } from './dates';

// Page sampling
export { selectPages, type PageSamplingPolicy } from './page-sampler';

// Templates
export { MEDICAL_FIELDS_TEMPLATE } from './templates/medical-fields.template';
export type { ExtractionTemplate } from './templates/types';

// Field extractors
export * from './extractors';
