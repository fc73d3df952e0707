import { describe, it, expect, vi } from 'vitest';
import sharp from 'sharp';
import { ImageKind } from 'pdfjs-dist/legacy/build/pdf.mjs';
import { PdfTextOcrEngine, outputBlobName } from '../../src/infrastructure/ocr/pdf-text-engine.js';
import { toRawPixels } from '../../src/infrastructure/ocr/page-images.js';
import type { PageImage, PageRecognizer } from '../../src/infrastructure/ocr/types.js';
import { ok, err } from '../../src/domain/result.js';
import { createAppError } from '../../src/domain/errors.js';
import { ocrResultDocumentSchema } from '../../src/domain/schemas.js';
import { InMemoryBlobStore } from '../helpers/in-memory.js';
import { createScannedPdf, createTestPdf } from '../helpers/pdf.js';

const BUCKET = 'consents';
const request = {
  source: { bucket: BUCKET, name: 'form.pdf' },
  destination: { bucket: BUCKET, prefix: 'form.pdf-ocr-output/' },
};

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

function scanImage(side = 64): Promise<Buffer> {
  return sharp({ create: { width: side, height: side, channels: 3, background: { r: 0, g: 0, b: 0 } } })
    .png()
    .toBuffer();
}

function recognizerReturning(text: string) {
  const recognize = vi.fn<PageRecognizer['recognize']>(async () => ok(text));
  return { recognize };
}

async function readOutput(blobs: InMemoryBlobStore, name: string) {
  const data = await blobs.read(BUCKET, name);
  if (!data.ok) throw new Error(`missing ${name}`);
  return ocrResultDocumentSchema.parse(JSON.parse(data.value.toString('utf8')));
}

describe('outputBlobName', () => {
  it('zero-pads page numbers so listing order matches page order', () => {
    expect(outputBlobName('form.pdf-ocr-output/', 1, 2)).toBe('form.pdf-ocr-output/output-0001-to-0002.json');
    expect(outputBlobName('p/', 11, 12) > outputBlobName('p/', 9, 10)).toBe(true);
  });
});

describe('PdfTextOcrEngine.annotate', () => {
  it('writes one result blob per batch of pages', async () => {
    const blobs = new InMemoryBlobStore();
    await blobs.put(BUCKET, 'form.pdf', await createTestPdf(['Consent for surgery', 'Patient Jane Roe', 'Declined transfusion']));
    const engine = new PdfTextOcrEngine(blobs, { batchSize: 2 });

    const result = await engine.annotate(request);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.pageCount).toBe(3);
    expect(result.value.outputs).toEqual([
      'form.pdf-ocr-output/output-0001-to-0002.json',
      'form.pdf-ocr-output/output-0003-to-0003.json',
    ]);

    const first = await readOutput(blobs, result.value.outputs[0]);
    expect(first.responses).toHaveLength(2);
    expect(first.responses[0].fullTextAnnotation?.text).toContain('Consent for surgery');
    expect(first.responses[1].fullTextAnnotation?.text).toContain('Patient Jane Roe');

    const second = await readOutput(blobs, result.value.outputs[1]);
    expect(second.responses).toHaveLength(1);
    expect(second.responses[0].fullTextAnnotation?.text).toContain('Declined transfusion');
  });

  it('leaves the annotation out for a page without text', async () => {
    const blobs = new InMemoryBlobStore();
    await blobs.put(BUCKET, 'form.pdf', await createTestPdf(['']));
    const engine = new PdfTextOcrEngine(blobs);

    const result = await engine.annotate(request);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const output = await readOutput(blobs, result.value.outputs[0]);
    expect(output.responses).toEqual([{}]);
  });

  it('returns PDF_TOO_LARGE above the size limit', async () => {
    const blobs = new InMemoryBlobStore();
    await blobs.put(BUCKET, 'form.pdf', await createTestPdf(['Consent']));
    const engine = new PdfTextOcrEngine(blobs, { maxSizeBytes: 10 });

    const result = await engine.annotate(request);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('PDF_TOO_LARGE');
      expect(result.error.retryable).toBe(false);
    }
  });

  it('returns PDF_PARSE_FAILED for corrupt data', async () => {
    const blobs = new InMemoryBlobStore();
    await blobs.put(BUCKET, 'form.pdf', 'not a pdf at all');
    const engine = new PdfTextOcrEngine(blobs);

    const result = await engine.annotate(request);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('PDF_PARSE_FAILED');
    }
  });

  it('returns OCR_FAILED when the source object is missing', async () => {
    const engine = new PdfTextOcrEngine(new InMemoryBlobStore());

    const result = await engine.annotate(request);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('OCR_FAILED');
    }
  });

  it('stops with OCR_TIMEOUT once the signal is aborted', async () => {
    const blobs = new InMemoryBlobStore();
    await blobs.put(BUCKET, 'form.pdf', await createTestPdf(['Consent']));
    const engine = new PdfTextOcrEngine(blobs);
    const controller = new AbortController();
    controller.abort();

    const result = await engine.annotate({ ...request, signal: controller.signal });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('OCR_TIMEOUT');
    }
    expect(blobs.names(BUCKET)).toEqual(['form.pdf']);
  });

  it('transcribes a page that only holds a scanned image', async () => {
    const blobs = new InMemoryBlobStore();
    await blobs.put(BUCKET, 'form.pdf', await createScannedPdf([await scanImage()]));
    const recognizer = recognizerReturning('  I decline a blood transfusion.  ');
    const engine = new PdfTextOcrEngine(blobs, { recognizer });

    const result = await engine.annotate(request);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const output = await readOutput(blobs, result.value.outputs[0]);
    expect(output.responses).toEqual([{ fullTextAnnotation: { text: 'I decline a blood transfusion.\n' } }]);

    expect(recognizer.recognize).toHaveBeenCalledTimes(1);
    const image: PageImage | undefined = recognizer.recognize.mock.calls[0]?.[0];
    expect(image).toMatchObject({ sourceName: 'form.pdf', pageNumber: 1, width: 64, height: 64 });
    expect(image?.png.subarray(0, 8).equals(PNG_SIGNATURE)).toBe(true);
  });

  it('leaves a scanned page empty when no recognizer is configured', async () => {
    const blobs = new InMemoryBlobStore();
    await blobs.put(BUCKET, 'form.pdf', await createScannedPdf([await scanImage()]));
    const engine = new PdfTextOcrEngine(blobs);

    const result = await engine.annotate(request);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const output = await readOutput(blobs, result.value.outputs[0]);
    expect(output.responses).toEqual([{}]);
  });

  it('does not call the recognizer for pages with a text layer or without images', async () => {
    const blobs = new InMemoryBlobStore();
    await blobs.put(BUCKET, 'form.pdf', await createTestPdf(['Consent for surgery', '']));
    const recognizer = recognizerReturning('unused');
    const engine = new PdfTextOcrEngine(blobs, { recognizer });

    const result = await engine.annotate(request);

    expect(result.ok).toBe(true);
    expect(recognizer.recognize).not.toHaveBeenCalled();
  });

  it('skips pictures too small to hold text', async () => {
    const blobs = new InMemoryBlobStore();
    await blobs.put(BUCKET, 'form.pdf', await createScannedPdf([await scanImage(16)]));
    const recognizer = recognizerReturning('unused');
    const engine = new PdfTextOcrEngine(blobs, { recognizer });

    const result = await engine.annotate(request);

    expect(result.ok).toBe(true);
    expect(recognizer.recognize).not.toHaveBeenCalled();
  });

  it('returns OCR_FAILED with the recognizer retry hint when recognition fails', async () => {
    const blobs = new InMemoryBlobStore();
    await blobs.put(BUCKET, 'form.pdf', await createScannedPdf([await scanImage()]));
    const recognizer: PageRecognizer = {
      recognize: async () => err(createAppError('LLM_RATE_LIMITED', 'Groq API rate limited', true)),
    };
    const engine = new PdfTextOcrEngine(blobs, { recognizer });

    const result = await engine.annotate(request);

    expect(result).toEqual({
      ok: false,
      error: expect.objectContaining({ code: 'OCR_FAILED', retryable: true, details: 'Groq API rate limited' }),
    });
    expect(blobs.names(BUCKET)).toEqual(['form.pdf']);
  });

  it('writes nothing when the signal is aborted while a page is being recognized', async () => {
    const blobs = new InMemoryBlobStore();
    await blobs.put(BUCKET, 'form.pdf', await createScannedPdf([await scanImage()]));
    const controller = new AbortController();
    const recognizer: PageRecognizer = {
      recognize: async () => {
        controller.abort();
        return ok('late transcription');
      },
    };
    const engine = new PdfTextOcrEngine(blobs, { recognizer });

    const result = await engine.annotate({ ...request, signal: controller.signal });

    expect(!result.ok && result.error.code).toBe('OCR_TIMEOUT');
    expect(blobs.names(BUCKET)).toEqual(['form.pdf']);
  });
});

describe('toRawPixels', () => {
  it('unpacks 1-bit rows into one gray byte per pixel', () => {
    const raw = toRawPixels({
      width: 10,
      height: 1,
      kind: ImageKind.GRAYSCALE_1BPP,
      data: new Uint8Array([0b10100000, 0b01000000]),
    });

    expect(raw?.channels).toBe(1);
    expect([...(raw?.data ?? [])]).toEqual([255, 0, 255, 0, 0, 0, 0, 0, 0, 255]);
  });

  it('passes RGB and RGBA data through with their channel counts', () => {
    const rgb = toRawPixels({ width: 1, height: 1, kind: ImageKind.RGB_24BPP, data: new Uint8Array([1, 2, 3]) });
    const rgba = toRawPixels({ width: 1, height: 1, kind: ImageKind.RGBA_32BPP, data: new Uint8ClampedArray([1, 2, 3, 4]) });

    expect(rgb?.channels).toBe(3);
    expect(rgba?.channels).toBe(4);
    expect([...(rgba?.data ?? [])]).toEqual([1, 2, 3, 4]);
  });

  it('rejects short buffers and unknown layouts', () => {
    expect(toRawPixels({ width: 2, height: 2, kind: ImageKind.RGB_24BPP, data: new Uint8Array(3) })).toBeNull();
    expect(toRawPixels({ width: 1, height: 1, kind: 99, data: new Uint8Array(4) })).toBeNull();
  });
});
