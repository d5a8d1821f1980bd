/**
 * Parser API
 *
 * Accepts a medical document upload and returns the extracted doctor name,
 * patient name and date of birth with confidences and a review flag.
 */

import express, { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { ulid } from 'ulid';
import {
  logger,
  runWithContext,
  getCorrelationId,
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  documentsProcessedCounter,
  validateExtractionResult,
  type ErrorEnvelope,
  type ExtractionResult,
  type HealthResponse,
  type Page,
} from '@medparse/shared';
import { isSupportedUpload } from './lib/document-type';

export const MAX_UPLOAD_BYTES = 25 * 1024 * 1024;

export interface ParserDependencies {
  /** Document bytes to ordered page text; rejects when the document cannot be read */
  recognize(bytes: Buffer): Promise<Page[]>;
  extract(pages: Page[]): Promise<ExtractionResult>;
}

export interface ParserOptions {
  /** Largest accepted upload in bytes */
  maxUploadBytes?: number;
}

function receiveUpload(upload: express.RequestHandler, req: Request, res: Response): Promise<void> {
  return new Promise((resolve, reject) => {
    upload(req, res, (err?: unknown) => (err ? reject(err) : resolve()));
  });
}

function correlationIdOf(res: Response): string {
  const header = res.getHeader('X-Correlation-Id');
  return typeof header === 'string' ? header : getCorrelationId();
}

function sendError(res: Response, status: number, code: string, message: string): void {
  const error: ErrorEnvelope = {
    error: {
      code,
      message,
      correlation_id: correlationIdOf(res),
    },
  };
  res.status(status).json(error);
}

export function createApp(deps: ParserDependencies, options: ParserOptions = {}): express.Express {
  const maxUploadBytes = options.maxUploadBytes ?? MAX_UPLOAD_BYTES;
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxUploadBytes, files: 1 },
  }).single('file');

  const app = express();

  // Correlation ID middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const correlationId = req.header('x-correlation-id') || ulid();
    res.setHeader('X-Correlation-Id', correlationId);

    runWithContext({ correlationId }, () => {
      next();
    });
  });

  // Request timing middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = (Date.now() - start) / 1000;
      const routePath: unknown = req.route?.path;
      const path = typeof routePath === 'string' ? routePath : req.path;

      httpRequestDurationHistogram.observe(
        { method: req.method, path, status: res.statusCode.toString() },
        duration
      );
      httpRequestsCounter.inc({
        method: req.method,
        path,
        status: res.statusCode.toString(),
      });

      logger.info('Request completed', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Math.round(duration * 1000),
      });
    });

    next();
  });

  app.get('/health', (req: Request, res: Response) => {
    const body: HealthResponse = { status: 'ok' };
    res.json(body);
  });

  app.get('/metrics', async (req: Request, res: Response) => {
    res.setHeader('Content-Type', getMetricsContentType());
    res.send(await getMetrics());
  });

  /**
   * POST /parse
   * Multipart upload with a single `file` field (PDF, PNG, JPEG, TIFF or BMP)
   */
  app.post('/parse', async (req: Request, res: Response) => {
    try {
      await receiveUpload(upload, req, res);
    } catch (error) {
      if (error instanceof multer.MulterError && error.code === 'LIMIT_FILE_SIZE') {
        sendError(res, 413, 'payload_too_large', `File exceeds ${maxUploadBytes} bytes`);
        return;
      }
      logger.warn('Upload rejected', { error: error instanceof Error ? error.message : String(error) });
      sendError(res, 400, 'invalid_request', 'Malformed multipart upload');
      return;
    }

    const file = req.file;
    if (!file) {
      sendError(res, 400, 'invalid_request', 'Missing multipart field "file"');
      return;
    }

    if (!isSupportedUpload(file.mimetype, file.originalname)) {
      sendError(
        res,
        400,
        'unsupported_media_type',
        `Unsupported file type: ${file.mimetype}. Allowed: PDF, PNG, JPEG, TIFF, BMP`
      );
      return;
    }

    if (file.size === 0) {
      sendError(res, 400, 'empty_file', 'Empty file uploaded');
      return;
    }

    const context = { correlationId: correlationIdOf(res), contentType: file.mimetype };
    await runWithContext(context, async () => {
      logger.info('Processing upload', { bytes: file.size });

      let pages: Page[];
      try {
        pages = await deps.recognize(file.buffer);
      } catch (error) {
        logger.error('OCR processing failed', error);
        documentsProcessedCounter.inc({ status: 'ocr_failed' });
        sendError(res, 422, 'ocr_failed', 'Failed to process document');
        return;
      }

      if (pages.length === 0) {
        documentsProcessedCounter.inc({ status: 'no_text' });
        sendError(res, 422, 'no_text', 'No text could be extracted from document');
        return;
      }

      let result: ExtractionResult;
      try {
        result = await deps.extract(pages);
      } catch (error) {
        logger.error('Extraction failed', error);
        documentsProcessedCounter.inc({ status: 'extraction_failed' });
        sendError(res, 500, 'extraction_failed', 'Extraction failed');
        return;
      }

      const validation = validateExtractionResult(result);
      if (!validation.valid) {
        logger.warn('ExtractionResult validation failed', { errors: validation.errors });
      }

      documentsProcessedCounter.inc({ status: 'success' });
      logger.info('Extraction complete', {
        flag_for_review: result.flag_for_review,
        llm_unavailable: result.llm_unavailable === true,
      });
      res.json(result);
    });
  });

  return app;
}
