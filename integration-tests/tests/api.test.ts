/**
 * Parser API Tests
 *
 * Drives the express app with supertest; OCR and extraction are in-process fakes.
 */

import request from 'supertest';
import type { ExtractionResult, Page } from '@medparse/shared';
import { createApp, type ParserDependencies } from '../../services/parser-api/src/app';
import { OcrError } from '../../services/parser-api/src/lib/errors';

const PDF_BYTES = Buffer.from('%PDF-1.7\n1 0 obj\n<< >>\nendobj\n');

const PAGES: Page[] = [{ page: 1, text: 'Patient Name: Jane Doe DOB: 02/14/1980' }];

const RESULT: ExtractionResult = {
  doctor_name: '',
  patient_name: 'Jane Doe',
  dob: '1980-02-14',
  confidence: { doctor: 0, patient: 0.6, dob: 0.65 },
  evidence: ['PATTERN:patient:Patient Name: Jane Doe', 'PATTERN:dob:DOB: 02/14/1980'],
  flag_for_review: true,
  llm_unavailable: true,
};

function fakeDeps() {
  const recognize = jest.fn(async (_bytes: Buffer): Promise<Page[]> => PAGES);
  const extract = jest.fn(async (_pages: Page[]): Promise<ExtractionResult> => RESULT);
  return { recognize, extract };
}

describe('Parser API', () => {
  describe('GET /health', () => {
    it('should report ok with a generated correlation id', async () => {
      const response = await request(createApp(fakeDeps())).get('/health');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ status: 'ok' });
      expect(response.headers['x-correlation-id']).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);
    });

    it('should echo a caller correlation id', async () => {
      const response = await request(createApp(fakeDeps()))
        .get('/health')
        .set('X-Correlation-Id', 'test-correlation-1');

      expect(response.headers['x-correlation-id']).toBe('test-correlation-1');
    });
  });

  describe('GET /metrics', () => {
    it('should serve the Prometheus registry', async () => {
      const app = createApp(fakeDeps());
      await request(app).get('/health');
      const response = await request(app).get('/metrics');

      expect(response.status).toBe(200);
      expect(response.headers['content-type']).toMatch(/^text\/plain/);
      expect(response.text).toContain('medparse_http_requests_total');
    });
  });

  describe('POST /parse', () => {
    it('should return the extraction result', async () => {
      const deps = fakeDeps();
      const response = await request(createApp(deps))
        .post('/parse')
        .attach('file', PDF_BYTES, { filename: 'referral.pdf', contentType: 'application/pdf' });

      expect(response.status).toBe(200);
      expect(response.body).toEqual(RESULT);
      expect(deps.recognize).toHaveBeenCalledTimes(1);
      expect(deps.recognize.mock.calls[0][0].equals(PDF_BYTES)).toBe(true);
      expect(deps.extract).toHaveBeenCalledWith(PAGES);
    });

    it('should accept a supported extension with a generic content type', async () => {
      const response = await request(createApp(fakeDeps()))
        .post('/parse')
        .attach('file', PDF_BYTES, { filename: 'referral.pdf', contentType: 'application/octet-stream' });

      expect(response.status).toBe(200);
    });

    it('should reject a request without a file', async () => {
      const response = await request(createApp(fakeDeps()))
        .post('/parse')
        .set('X-Correlation-Id', 'test-correlation-2');

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        error: {
          code: 'invalid_request',
          message: 'Missing multipart field "file"',
          correlation_id: 'test-correlation-2',
        },
      });
    });

    it('should reject an unsupported file type', async () => {
      const deps = fakeDeps();
      const response = await request(createApp(deps))
        .post('/parse')
        .attach('file', Buffer.from('notes'), { filename: 'notes.txt', contentType: 'text/plain' });

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe('unsupported_media_type');
      expect(deps.recognize).not.toHaveBeenCalled();
    });

    it('should reject an empty file', async () => {
      const response = await request(createApp(fakeDeps()))
        .post('/parse')
        .attach('file', Buffer.alloc(0), { filename: 'scan.png', contentType: 'image/png' });

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe('empty_file');
    });

    it('should reject an upload over the size limit', async () => {
      const response = await request(createApp(fakeDeps(), { maxUploadBytes: 16 }))
        .post('/parse')
        .attach('file', Buffer.alloc(64, 0x20), { filename: 'scan.png', contentType: 'image/png' });

      expect(response.status).toBe(413);
      expect(response.body.error.code).toBe('payload_too_large');
    });

    it('should map recognition failures to ocr_failed', async () => {
      const deps: ParserDependencies = {
        ...fakeDeps(),
        recognize: async () => {
          throw new OcrError('Failed to read PDF');
        },
      };
      const response = await request(createApp(deps))
        .post('/parse')
        .set('X-Correlation-Id', 'test-correlation-3')
        .attach('file', PDF_BYTES, { filename: 'referral.pdf', contentType: 'application/pdf' });

      expect(response.status).toBe(422);
      expect(response.body).toEqual({
        error: {
          code: 'ocr_failed',
          message: 'Failed to process document',
          correlation_id: 'test-correlation-3',
        },
      });
    });

    it('should map a document without pages to no_text', async () => {
      const deps: ParserDependencies = { ...fakeDeps(), recognize: async () => [] };
      const response = await request(createApp(deps))
        .post('/parse')
        .attach('file', PDF_BYTES, { filename: 'referral.pdf', contentType: 'application/pdf' });

      expect(response.status).toBe(422);
      expect(response.body.error.code).toBe('no_text');
    });

    it('should map extraction failures to extraction_failed', async () => {
      const deps: ParserDependencies = {
        ...fakeDeps(),
        extract: async () => {
          throw new Error('unexpected');
        },
      };
      const response = await request(createApp(deps))
        .post('/parse')
        .attach('file', PDF_BYTES, { filename: 'referral.pdf', contentType: 'application/pdf' });

      expect(response.status).toBe(500);
      expect(response.body.error.code).toBe('extraction_failed');
    });
  });
});
