import sharp from 'sharp';
import { ImageKind, OPS } from 'pdfjs-dist/legacy/build/pdf.mjs';
import type { PDFPageProxy } from 'pdfjs-dist/types/src/display/api.js';
import type { PageImage } from './types.js';

// Smaller pictures are logos, ticks or bullets rather than scanned content.
export const MIN_IMAGE_SIDE = 32;

export interface DecodedImage {
  width: number;
  height: number;
  kind: number;
  data: Uint8Array | Uint8ClampedArray;
}

interface RawPixels {
  data: Buffer;
  channels: 1 | 3 | 4;
}

function isDecodedImage(value: unknown): value is DecodedImage {
  return (
    typeof value === 'object' &&
    value !== null &&
    'width' in value &&
    typeof value.width === 'number' &&
    'height' in value &&
    typeof value.height === 'number' &&
    'kind' in value &&
    typeof value.kind === 'number' &&
    'data' in value &&
    (value.data instanceof Uint8Array || value.data instanceof Uint8ClampedArray)
  );
}

/** Unpacks pdfjs pixel layouts into rows sharp can read; set bits in 1bpp data are white. */
export function toRawPixels(image: DecodedImage): RawPixels | null {
  const { width, height, kind, data } = image;
  const bytes = Buffer.from(data.buffer, data.byteOffset, data.byteLength);

  switch (kind) {
    case ImageKind.RGBA_32BPP:
      return bytes.length >= width * height * 4 ? { data: bytes, channels: 4 } : null;
    case ImageKind.RGB_24BPP:
      return bytes.length >= width * height * 3 ? { data: bytes, channels: 3 } : null;
    case ImageKind.GRAYSCALE_1BPP: {
      const rowBytes = Math.ceil(width / 8);
      if (bytes.length < rowBytes * height) return null;
      const gray = Buffer.alloc(width * height);
      for (let y = 0; y < height; y++) {
        for (let x = 0; x < width; x++) {
          const bit = bytes[y * rowBytes + (x >> 3)] & (0x80 >> (x & 7));
          gray[y * width + x] = bit ? 255 : 0;
        }
      }
      return { data: gray, channels: 1 };
    }
    default:
      return null;
  }
}

function resolveImageObject(page: PDFPageProxy, objId: string): Promise<unknown> {
  // Images shared across pages live in the document-wide store.
  const store = objId.startsWith('g_') ? page.commonObjs : page.objs;
  return new Promise((resolve) => {
    store.get(objId, resolve);
  });
}

/** Pictures painted on `page`, in drawing order, skipping ones too small to hold text. */
export async function extractPageImages(
  page: PDFPageProxy,
  pageNumber: number,
  sourceName: string,
): Promise<PageImage[]> {
  const operators = await page.getOperatorList();
  const images: PageImage[] = [];

  for (const [index, fn] of operators.fnArray.entries()) {
    const args: unknown = operators.argsArray[index];
    if (!Array.isArray(args)) continue;

    let decoded: unknown;
    if (fn === OPS.paintImageXObject && typeof args[0] === 'string') {
      decoded = await resolveImageObject(page, args[0]);
    } else if (fn === OPS.paintInlineImageXObject) {
      decoded = args[0];
    } else {
      continue;
    }

    if (!isDecodedImage(decoded) || decoded.width < MIN_IMAGE_SIDE || decoded.height < MIN_IMAGE_SIDE) continue;
    const raw = toRawPixels(decoded);
    if (!raw) continue;

    const png = await sharp(raw.data, {
      raw: { width: decoded.width, height: decoded.height, channels: raw.channels },
    })
      .png()
      .toBuffer();
    images.push({ sourceName, pageNumber, width: decoded.width, height: decoded.height, png });
  }

  return images;
}
