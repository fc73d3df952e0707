import { createRequire } from 'node:module';
import { join } from 'node:path';
import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import type { Logger } from 'pino';
import type { PDFPageProxy, TextItem } from 'pdfjs-dist/types/src/display/api.js';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, describeCause, ErrorCode, type AppError } from '../../domain/errors.js';
import type { OcrResultDocument } from '../../domain/schemas.js';
import type { BlobStore } from '../blob-store.js';
import { logger } from '../logger.js';
import { extractPageImages } from './page-images.js';
import type { OcrAnnotateRequest, OcrAnnotation, OcrEngine, PageRecognizer } from './types.js';

const require = createRequire(import.meta.url);
const STANDARD_FONT_DATA_URL = join(
  require.resolve('pdfjs-dist/package.json'),
  '../standard_fonts/',
);

export const MAX_PDF_SIZE_BYTES = 10 * 1024 * 1024; // 10MB
export const DEFAULT_BATCH_SIZE = 2;

export interface PdfTextOcrEngineOptions {
  batchSize?: number;
  maxSizeBytes?: number;
  /** Reads pages that have no text layer, such as scans. Without one those pages come back empty. */
  recognizer?: PageRecognizer;
}

type PageResponse = OcrResultDocument['responses'][number];

function aborted(log: Logger, page: number): Result<never, AppError> {
  log.warn({ errorCode: ErrorCode.OCR_TIMEOUT, retryable: true, page }, 'OCR annotation aborted');
  return err(createAppError(ErrorCode.OCR_TIMEOUT, 'OCR annotation aborted', true));
}

async function textLayerOf(page: PDFPageProxy): Promise<string> {
  const content = await page.getTextContent();
  return content.items
    .filter((item): item is TextItem => 'str' in item)
    .map((item) => item.str)
    .join(' ')
    .trim();
}

export function outputBlobName(prefix: string, fromPage: number, toPage: number): string {
  const pad = (page: number) => String(page).padStart(4, '0');
  return `${prefix}output-${pad(fromPage)}-to-${pad(toPage)}.json`;
}

/** Text-layer extraction with pdfjs-dist, written out in the batch annotation blob layout. */
export class PdfTextOcrEngine implements OcrEngine {
  private readonly blobs: BlobStore;
  private readonly batchSize: number;
  private readonly maxSizeBytes: number;
  private readonly recognizer: PageRecognizer | undefined;

  constructor(blobs: BlobStore, options: PdfTextOcrEngineOptions = {}) {
    this.blobs = blobs;
    this.batchSize = Math.max(1, options.batchSize ?? DEFAULT_BATCH_SIZE);
    this.maxSizeBytes = options.maxSizeBytes ?? MAX_PDF_SIZE_BYTES;
    this.recognizer = options.recognizer;
  }

  async annotate(request: OcrAnnotateRequest): Promise<Result<OcrAnnotation, AppError>> {
    const { source, destination } = request;
    const log = logger.child({ module: 'ocr', bucket: source.bucket, name: source.name });

    const data = await this.blobs.read(source.bucket, source.name);
    if (!data.ok) {
      return err(createAppError(ErrorCode.OCR_FAILED, 'OCR source object could not be read', false, data.error.message));
    }

    const buffer = data.value;
    if (buffer.length > this.maxSizeBytes) {
      log.error({ errorCode: ErrorCode.PDF_TOO_LARGE, retryable: false, sizeBytes: buffer.length }, 'PDF exceeds size limit');
      return err(
        createAppError(
          ErrorCode.PDF_TOO_LARGE,
          `PDF size ${buffer.length} bytes exceeds ${this.maxSizeBytes} byte limit`,
          false,
        ),
      );
    }

    let pdf;
    try {
      pdf = await getDocument({
        data: new Uint8Array(buffer),
        standardFontDataUrl: STANDARD_FONT_DATA_URL,
        // Decoded images must come back as pixel data, not bitmaps.
        isOffscreenCanvasSupported: false,
      }).promise;
    } catch (cause) {
      const details = describeCause(cause);
      log.error({ errorCode: ErrorCode.PDF_PARSE_FAILED, retryable: false, details }, 'Failed to parse PDF');
      return err(createAppError(ErrorCode.PDF_PARSE_FAILED, 'Failed to parse PDF document', false, details));
    }

    const outputs: string[] = [];
    try {
      for (let from = 1; from <= pdf.numPages; from += this.batchSize) {
        const to = Math.min(from + this.batchSize - 1, pdf.numPages);
        const responses: PageResponse[] = [];
        for (let pageNumber = from; pageNumber <= to; pageNumber++) {
          if (request.signal?.aborted) return aborted(log, pageNumber);
          const page = await pdf.getPage(pageNumber);
          let text = await textLayerOf(page);
          if (!text) {
            const recognized = await this.recognizePage(page, pageNumber, source.name, request.signal, log);
            if (!recognized.ok) return recognized;
            text = recognized.value;
          }
          // Blank pages carry no annotation.
          responses.push(text ? { fullTextAnnotation: { text: `${text}\n` } } : {});
        }

        if (request.signal?.aborted) return aborted(log, to);
        const name = outputBlobName(destination.prefix, from, to);
        const written = await this.blobs.put(
          destination.bucket,
          name,
          JSON.stringify({ responses } satisfies OcrResultDocument),
        );
        if (!written.ok) return written;
        outputs.push(name);
      }
    } catch (cause) {
      const details = describeCause(cause);
      log.error({ errorCode: ErrorCode.OCR_FAILED, retryable: false, details }, 'Failed to extract text from PDF');
      return err(createAppError(ErrorCode.OCR_FAILED, 'Failed to extract text from PDF', false, details));
    } finally {
      await pdf.destroy();
    }

    log.info({ pageCount: pdf.numPages, outputCount: outputs.length }, 'OCR annotation complete');
    return ok({ pageCount: pdf.numPages, outputs });
  }

  private async recognizePage(
    page: PDFPageProxy,
    pageNumber: number,
    sourceName: string,
    signal: AbortSignal | undefined,
    log: Logger,
  ): Promise<Result<string, AppError>> {
    if (!this.recognizer) {
      log.warn({ errorCode: ErrorCode.OCR_NO_TEXT, retryable: false, page: pageNumber }, 'Page has no text layer');
      return ok('');
    }

    const images = await extractPageImages(page, pageNumber, sourceName);
    if (images.length === 0) {
      log.warn({ errorCode: ErrorCode.OCR_NO_TEXT, retryable: false, page: pageNumber }, 'Page has neither text nor images');
      return ok('');
    }

    const texts: string[] = [];
    for (const image of images) {
      if (signal?.aborted) return aborted(log, pageNumber);
      const recognized = await this.recognizer.recognize(image, signal);
      if (!recognized.ok) {
        const { error } = recognized;
        log.error(
          { errorCode: ErrorCode.OCR_FAILED, retryable: error.retryable, page: pageNumber, details: error.message },
          'Page recognition failed',
        );
        return err(createAppError(ErrorCode.OCR_FAILED, 'Page recognition failed', error.retryable, error.message));
      }
      const text = recognized.value.trim();
      if (text) texts.push(text);
    }
    if (signal?.aborted) return aborted(log, pageNumber);

    log.info({ page: pageNumber, imageCount: images.length }, 'Recognized page without text layer');
    return ok(texts.join('\n'));
  }
}
