/**
 * Prometheus Metrics
 *
 * Metrics for monitoring model availability, fallback usage and request handling.
 */

import * as promClient from 'prom-client';
import { logger } from './logger';

// Create a Registry for metrics
export const register = new promClient.Registry();

/**
 * Collect default process metrics (CPU, memory, etc.). Called by service
 * entry points; wrapped to avoid crashes on restricted environments.
 */
export function enableDefaultMetrics(): void {
  try {
    promClient.collectDefaultMetrics({ register });
  } catch (err) {
    logger.warn('Default Prometheus metrics collection skipped', {
      error: err instanceof Error ? err.message : String(err),
    });
  }
}

// ============================================================================
// LLM Metrics
// ============================================================================

export const llmRequestsCounter = new promClient.Counter({
  name: 'medparse_llm_requests_total',
  help: 'Total number of LLM requests',
  labelNames: ['model', 'status'],
  registers: [register],
});

export const llmRequestDurationHistogram = new promClient.Histogram({
  name: 'medparse_llm_request_duration_seconds',
  help: 'Duration of LLM requests',
  labelNames: ['model'],
  buckets: [0.5, 1, 2, 5, 10, 20, 30, 60],
  registers: [register],
});

export const llmJsonRecoveryCounter = new promClient.Counter({
  name: 'medparse_llm_json_recovery_total',
  help: 'LLM replies parsed only after extracting a brace-delimited span',
  registers: [register],
});

// ============================================================================
// Extraction Metrics
// ============================================================================

export const extractionDurationHistogram = new promClient.Histogram({
  name: 'medparse_extraction_duration_seconds',
  help: 'Duration of field extraction',
  labelNames: ['source'],
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60],
  registers: [register],
});

export const patternFallbackCounter = new promClient.Counter({
  name: 'medparse_pattern_fallback_fields_total',
  help: 'Fields left empty by the LLM and filled from pattern matches',
  labelNames: ['field'],
  registers: [register],
});

export const reviewFlagCounter = new promClient.Counter({
  name: 'medparse_review_flags_total',
  help: 'Extraction results by review flag',
  labelNames: ['flagged'],
  registers: [register],
});

// ============================================================================
// OCR Metrics
// ============================================================================

export const ocrPagesCounter = new promClient.Counter({
  name: 'medparse_ocr_pages_total',
  help: 'Pages sent to OCR',
  labelNames: ['status'],
  registers: [register],
});

export const documentsProcessedCounter = new promClient.Counter({
  name: 'medparse_documents_processed_total',
  help: 'Total number of uploaded documents processed',
  labelNames: ['status'],
  registers: [register],
});

// ============================================================================
// HTTP Request Metrics
// ============================================================================

export const httpRequestDurationHistogram = new promClient.Histogram({
  name: 'medparse_http_request_duration_seconds',
  help: 'Duration of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 10, 30],
  registers: [register],
});

export const httpRequestsCounter = new promClient.Counter({
  name: 'medparse_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  registers: [register],
});

/**
 * Get Prometheus metrics endpoint handler
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Get content type for Prometheus metrics
 */
export function getMetricsContentType(): string {
  return register.contentType;
}
