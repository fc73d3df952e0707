import type { Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';

export interface OcrAnnotateRequest {
  source: { bucket: string; name: string };
  /** Result blobs are written as `<prefix>output-<from>-to-<to>.json`. */
  destination: { bucket: string; prefix: string };
  signal?: AbortSignal;
}

export interface OcrAnnotation {
  pageCount: number;
  outputs: string[];
}

/**
 * Asynchronous batch text detection. Each result blob holds
 * `{ responses: [{ fullTextAnnotation: { text } }] }`, one response per page.
 */
export interface OcrEngine {
  annotate(request: OcrAnnotateRequest): Promise<Result<OcrAnnotation, AppError>>;
}

/** One picture found on a page without a text layer, re-encoded as PNG. */
export interface PageImage {
  sourceName: string;
  pageNumber: number;
  width: number;
  height: number;
  png: Buffer;
}

/** Reads the text in a page image, e.g. a scanned form, with a vision-capable model. */
export interface PageRecognizer {
  recognize(image: PageImage, signal?: AbortSignal): Promise<Result<string, AppError>>;
}
