/**
 * Document Recognition
 *
 * Turns uploaded bytes into ordered, normalized page text. Images become a
 * single page; PDFs are sampled, rasterized page by page and recognized.
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import {
  logger,
  maskPhi,
  normalizeText,
  selectPages,
  ocrPagesCounter,
  type Config,
  type Page,
} from '@medparse/shared';
import { sniffDocumentKind, STAGING_EXTENSIONS } from './document-type';
import { OcrError, UnsupportedDocumentError } from './errors';
import type { PdfRasterizer } from './pdf';
import type { OcrProvider } from './tesseract';

export interface RecognitionDependencies {
  config: Pick<Config, 'processingTempDir' | 'maxPagesProcess' | 'headerPages' | 'footerPages'>;
  provider: OcrProvider;
  rasterizer: PdfRasterizer;
}

/**
 * Recognize one page image. A failed page contributes empty text.
 */
async function recognizePage(
  pageNumber: number,
  imagePath: () => Promise<string>,
  provider: OcrProvider
): Promise<Page> {
  try {
    const text = normalizeText(await provider.recognize(await imagePath()));
    ocrPagesCounter.inc({ status: 'success' });
    logger.debug('Page recognized', { page: pageNumber, text: maskPhi(text) });
    return { page: pageNumber, text };
  } catch (error) {
    ocrPagesCounter.inc({ status: 'failed' });
    logger.warn('Page recognition failed, using empty text', {
      page: pageNumber,
      provider: provider.name,
      error: error instanceof Error ? error.message : String(error),
    });
    return { page: pageNumber, text: '' };
  }
}

async function recognizePdf(
  pdfPath: string,
  workDir: string,
  deps: RecognitionDependencies
): Promise<Page[]> {
  const totalPages = await deps.rasterizer.countPages(pdfPath);
  const pageNumbers = selectPages(totalPages, {
    maxPages: deps.config.maxPagesProcess,
    headerPages: deps.config.headerPages,
    footerPages: deps.config.footerPages,
  });

  if (pageNumbers.length < totalPages) {
    logger.info('Sampling long document', {
      total_pages: totalPages,
      sampled_pages: pageNumbers.length,
    });
  }

  const pages: Page[] = [];
  for (const pageNumber of pageNumbers) {
    pages.push(
      await recognizePage(
        pageNumber,
        () => deps.rasterizer.renderPage(pdfPath, pageNumber, workDir),
        deps.provider
      )
    );
  }
  return pages;
}

/**
 * Recognize a PDF or raster image.
 *
 * @throws UnsupportedDocumentError when the bytes are neither
 * @throws OcrError when the document cannot be opened at all
 */
export async function recognizeDocument(bytes: Buffer, deps: RecognitionDependencies): Promise<Page[]> {
  const kind = sniffDocumentKind(bytes);
  if (!kind) {
    throw new UnsupportedDocumentError();
  }

  let workDir: string;
  try {
    workDir = await mkdtemp(path.join(deps.config.processingTempDir, 'medparse-'));
  } catch (error) {
    throw new OcrError('Failed to create staging directory', error);
  }

  try {
    const documentPath = path.join(workDir, `document.${STAGING_EXTENSIONS[kind]}`);
    await writeFile(documentPath, bytes);

    const pages =
      kind === 'pdf'
        ? await recognizePdf(documentPath, workDir, deps)
        : [await recognizePage(1, async () => documentPath, deps.provider)];

    logger.info('Document recognized', {
      kind,
      pages: pages.length,
      chars: pages.reduce((sum, p) => sum + p.text.length, 0),
    });
    return pages;
  } catch (error) {
    if (error instanceof OcrError) {
      throw error;
    }
    throw new OcrError('Document recognition failed', error);
  } finally {
    try {
      await rm(workDir, { recursive: true, force: true });
    } catch (error) {
      logger.warn('Failed to remove staging directory', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
