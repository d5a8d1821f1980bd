/**
 * Centralized Configuration
 *
 * Built once at process start with loadConfig() and passed to each pipeline
 * component, so tests can run the pipeline with their own thresholds and budgets.
 */

import os from 'node:os';

export interface Config {
  // LLM (OpenAI-compatible endpoint, e.g. a local Ollama server)
  llmBaseUrl: string;
  llmModel: string;
  llmRequestTimeoutMs: number;

  // OCR
  ocrDpi: number;
  processingTempDir: string;

  // Page sampling
  maxPagesProcess: number;
  headerPages: number;
  footerPages: number;

  // Review gate
  confThreshold: number;
}

export type Env = Record<string, string | undefined>;

function intFromEnv(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function floatFromEnv(value: string | undefined, fallback: number): number {
  const parsed = parseFloat(value || '');
  return Number.isNaN(parsed) ? fallback : parsed;
}

export function loadConfig(env: Env = process.env): Config {
  return {
    // LLM
    llmBaseUrl: env.LLM_BASE_URL || 'http://localhost:11434/v1',
    llmModel: env.LLM_MODEL || 'gemma3',
    llmRequestTimeoutMs: intFromEnv(env.LLM_REQUEST_TIMEOUT_MS, 30000),

    // OCR
    ocrDpi: intFromEnv(env.OCR_DPI, 300),
    processingTempDir: env.PROCESSING_TEMP_DIR || os.tmpdir(),

    // Page sampling
    maxPagesProcess: intFromEnv(env.MAX_PAGES_PROCESS, 50),
    headerPages: intFromEnv(env.HEADER_PAGES, 5),
    footerPages: intFromEnv(env.FOOTER_PAGES, 3),

    // Review gate
    confThreshold: floatFromEnv(env.CONF_THRESHOLD, 0.7),
  };
}
