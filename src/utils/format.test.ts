import { describe, it, expect } from 'vitest';
import { detectFormat, formatBytes, hasImageExtension, replaceExtension } from './format';
import { createBmpHeader, createTestGif, createTestJpeg, createTestPng } from '~/test-utils/fixtures';

describe('detectFormat', () => {
  it('should recognise encoded images by their leading bytes', async () => {
    expect(detectFormat(await createTestJpeg())).toBe('jpeg');
    expect(detectFormat(await createTestPng())).toBe('png');
    expect(detectFormat(await createTestGif())).toBe('gif');
    expect(detectFormat(createBmpHeader())).toBe('bmp');
  });

  it('should recognise TIFF in both byte orders', () => {
    expect(detectFormat(Buffer.from([0x49, 0x49, 0x2a, 0x00, 0x08]))).toBe('tiff');
    expect(detectFormat(Buffer.from([0x4d, 0x4d, 0x00, 0x2a, 0x00]))).toBe('tiff');
  });

  it('should require the WEBP tag after the RIFF header', () => {
    const webp = Buffer.concat([Buffer.from('RIFF'), Buffer.alloc(4), Buffer.from('WEBPVP8 ')]);
    const wav = Buffer.concat([Buffer.from('RIFF'), Buffer.alloc(4), Buffer.from('WAVEfmt ')]);

    expect(detectFormat(webp)).toBe('webp');
    expect(detectFormat(wav)).toBe('unknown');
  });

  it('should report unknown for text and empty input', () => {
    expect(detectFormat(Buffer.from('hello world'))).toBe('unknown');
    expect(detectFormat(Buffer.alloc(0))).toBe('unknown');
  });
});

describe('hasImageExtension', () => {
  it('should match supported extensions case-insensitively', () => {
    expect(hasImageExtension('holiday/IMG_001.JPG')).toBe(true);
    expect(hasImageExtension('scan.tif')).toBe(true);
    expect(hasImageExtension('notes.txt')).toBe(false);
    expect(hasImageExtension('README')).toBe(false);
  });
});

describe('replaceExtension', () => {
  it('should swap the extension and keep directories', () => {
    expect(replaceExtension('shots/b.png', '.jpg')).toBe('shots/b.jpg');
    expect(replaceExtension('archive.tar.png', '.jpg')).toBe('archive.tar.jpg');
    expect(replaceExtension('noext', '.jpg')).toBe('noext.jpg');
  });
});

describe('formatBytes', () => {
  it('should format byte counts with units', () => {
    expect(formatBytes(512)).toBe('512 B');
    expect(formatBytes(1536)).toBe('1.50 KB');
    expect(formatBytes(50 * 1024)).toBe('50.0 KB');
    expect(formatBytes(3 * 1024 * 1024)).toBe('3.00 MB');
  });
});
