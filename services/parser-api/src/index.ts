/**
 * Parser API entry point
 *
 * Wires the OCR binaries and the model endpoint from the environment and
 * starts the HTTP server.
 */

import {
  logger,
  loadConfig,
  enableDefaultMetrics,
  combine,
  createOpenAIModelClient,
} from '@medparse/shared';
import { createApp } from './app';
import { recognizeDocument } from './lib/ocr';
import { PopplerRasterizer } from './lib/pdf';
import { TesseractOcrProvider } from './lib/tesseract';

const config = loadConfig();
const port = parseInt(process.env.PORT || '8080', 10);

enableDefaultMetrics();

const provider = new TesseractOcrProvider();
const rasterizer = new PopplerRasterizer(config.ocrDpi);
const modelClient = createOpenAIModelClient(config);

const app = createApp({
  recognize: (bytes) => recognizeDocument(bytes, { config, provider, rasterizer }),
  extract: (pages) => combine(pages, { config, modelClient }),
});

const server = app.listen(port, () => {
  logger.info('Parser API started', {
    port,
    model: config.llmModel,
    llm_base_url: config.llmBaseUrl,
    conf_threshold: config.confThreshold,
  });
});

// Graceful shutdown
function shutdown(signal: string): void {
  logger.info(`${signal} received, shutting down`);
  server.close((error) => {
    if (error) {
      logger.error('Error while closing server', error);
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
