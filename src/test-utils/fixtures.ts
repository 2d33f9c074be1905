import sharp from 'sharp';
import { createArchive } from '~/utils/archive';
import type { ArchiveFile } from '~/utils/archive';

/**
 * Noisy photo-like JPEG; noise keeps quality settings from collapsing to
 * the same output size.
 */
export function createTestJpeg(width = 160, height = 120, quality = 95): Promise<Buffer> {
  return sharp({
    create: {
      width,
      height,
      channels: 3,
      background: { r: 40, g: 120, b: 200 },
      noise: { type: 'gaussian', mean: 128, sigma: 40 }
    }
  })
    .jpeg({ quality })
    .toBuffer();
}

export function createTestPng({ width = 120, height = 90, alpha = false, opacity = 1 } = {}): Promise<Buffer> {
  return sharp({
    create: {
      width,
      height,
      channels: alpha ? 4 : 3,
      background: { r: 220, g: 60, b: 30, alpha: opacity }
    }
  })
    .png()
    .toBuffer();
}

export function createTestGif(width = 40, height = 40): Promise<Buffer> {
  return sharp({
    create: { width, height, channels: 3, background: { r: 0, g: 128, b: 0 } }
  })
    .gif()
    .toBuffer();
}

function createNoise(width: number, height: number) {
  return sharp({
    create: {
      width,
      height,
      channels: 3,
      background: { r: 90, g: 90, b: 90 },
      noise: { type: 'gaussian', mean: 128, sigma: 60 }
    }
  });
}

export function createTestWebp(width = 64, height = 64): Promise<Buffer> {
  return createNoise(width, height).webp({ lossless: true }).toBuffer();
}

export function createTestTiff(width = 64, height = 64): Promise<Buffer> {
  return createNoise(width, height).tiff({ compression: 'none' }).toBuffer();
}

export function createTestZip(files: ArchiveFile[]): Promise<Buffer> {
  return createArchive(files);
}

/** Minimal BMP header; enough for format detection. */
export function createBmpHeader(): Buffer {
  const header = Buffer.alloc(54);
  header.write('BM', 0, 'ascii');
  header.writeUInt32LE(54, 2);
  return header;
}
