import path from 'path';

export const ImageFormat = {
  JPEG: 'jpeg',
  PNG: 'png',
  GIF: 'gif',
  BMP: 'bmp',
  TIFF: 'tiff',
  WEBP: 'webp',
  UNKNOWN: 'unknown'
} as const;

export type ImageFormatName = (typeof ImageFormat)[keyof typeof ImageFormat];

export const IMAGE_EXTENSIONS = new Set(['.jpg', '.jpeg', '.png', '.gif', '.bmp', '.tif', '.tiff', '.webp']);

function startsWith(bytes: Uint8Array, signature: number[], offset = 0): boolean {
  if (bytes.length < offset + signature.length) return false;
  return signature.every((byte, i) => bytes[offset + i] === byte);
}

/**
 * Identifies the container from its leading bytes. The file name is not
 * consulted: a `.jpg` holding PNG data is a PNG.
 */
export function detectFormat(bytes: Uint8Array): ImageFormatName {
  if (startsWith(bytes, [0xff, 0xd8, 0xff])) return ImageFormat.JPEG;
  if (startsWith(bytes, [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])) return ImageFormat.PNG;
  if (startsWith(bytes, [0x47, 0x49, 0x46, 0x38])) return ImageFormat.GIF;
  if (startsWith(bytes, [0x42, 0x4d])) return ImageFormat.BMP;
  if (startsWith(bytes, [0x49, 0x49, 0x2a, 0x00]) || startsWith(bytes, [0x4d, 0x4d, 0x00, 0x2a])) {
    return ImageFormat.TIFF;
  }
  if (startsWith(bytes, [0x52, 0x49, 0x46, 0x46]) && startsWith(bytes, [0x57, 0x45, 0x42, 0x50], 8)) {
    return ImageFormat.WEBP;
  }
  return ImageFormat.UNKNOWN;
}

export function hasImageExtension(name: string): boolean {
  return IMAGE_EXTENSIONS.has(path.extname(name).toLowerCase());
}

export function replaceExtension(name: string, extension: string): string {
  const ext = path.posix.extname(name);
  return `${ext ? name.slice(0, -ext.length) : name}${extension}`;
}

export function formatBytes(bytes: number): string {
  if (!Number.isFinite(bytes)) return 'N/A';
  if (bytes < 1024) return `${bytes} B`;

  const units = ['KB', 'MB', 'GB'];
  let value = bytes / 1024;
  let unitIndex = 0;

  while (value >= 1024 && unitIndex < units.length - 1) {
    value /= 1024;
    unitIndex += 1;
  }

  return `${value.toFixed(value >= 100 ? 0 : value >= 10 ? 1 : 2)} ${units[unitIndex]}`;
}
