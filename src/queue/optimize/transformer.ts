import sharp from 'sharp';
import { toErrorMessage } from '~/utils/errors';
import { ImageFormat, replaceExtension } from '~/utils/format';
import type { ImageFormatName } from '~/utils/format';
import type { OptimizationOptions, OptimizedResult, ResultStatus } from './schemas';

export interface TransformOutput {
  bytes: Buffer;
  result: OptimizedResult;
}

interface Encoded {
  bytes: Buffer;
  format: ImageFormatName;
  converted?: boolean;
}

const DECODE_OPTIONS = { failOn: 'warning' } as const;

export function calculateSavingPercentage(originalSize: number, optimizedSize: number): number {
  if (originalSize <= 0) return 0;
  return ((originalSize - optimizedSize) / originalSize) * 100;
}

export function describeDecoderError(error: unknown): string {
  const message = toErrorMessage(error, 'Image could not be decoded');
  if (/unsupported image format/i.test(message)) {
    return 'Image cannot be parsed or format is unsupported';
  }
  if (/VipsJpeg|corrupt|Premature end|bad seek|truncated|read error/i.test(message)) {
    return `Image cannot be parsed or is corrupted: ${message}`;
  }
  return message;
}

async function encodeJpeg(bytes: Buffer, options: OptimizationOptions): Promise<Buffer> {
  return sharp(bytes, DECODE_OPTIONS).rotate().jpeg({ quality: options.jpegQuality, mozjpeg: true }).toBuffer();
}

async function encodePng(bytes: Buffer, options: OptimizationOptions): Promise<Encoded> {
  const metadata = await sharp(bytes, DECODE_OPTIONS).metadata();

  // Alpha channel presence alone blocks conversion, even when every pixel is opaque
  if (options.convertPngToJpeg && !metadata.hasAlpha) {
    return { bytes: await encodeJpeg(bytes, options), format: ImageFormat.JPEG, converted: true };
  }

  const png = await sharp(bytes, DECODE_OPTIONS).png({ compressionLevel: 9, adaptiveFiltering: true }).toBuffer();
  return { bytes: png, format: ImageFormat.PNG };
}

async function encode(
  bytes: Buffer,
  format: ImageFormatName,
  options: OptimizationOptions
): Promise<Encoded | null> {
  switch (format) {
    case ImageFormat.JPEG:
      return { bytes: await encodeJpeg(bytes, options), format };
    case ImageFormat.PNG:
      return encodePng(bytes, options);
    case ImageFormat.GIF:
      return {
        bytes: await sharp(bytes, { ...DECODE_OPTIONS, animated: true }).gif({ effort: 10, reuse: true }).toBuffer(),
        format
      };
    case ImageFormat.TIFF:
      return { bytes: await sharp(bytes, DECODE_OPTIONS).tiff({ compression: 'lzw' }).toBuffer(), format };
    case ImageFormat.WEBP:
      return {
        bytes: await sharp(bytes, { ...DECODE_OPTIONS, animated: true })
          .webp({ lossless: true, effort: 6 })
          .toBuffer(),
        format
      };
    case ImageFormat.BMP:
      return null;
    case ImageFormat.UNKNOWN:
      throw new Error('Unrecognized image format');
  }
}

function buildResult(
  name: string,
  originalSize: number,
  status: ResultStatus,
  encoded: { bytes: Buffer; format: ImageFormatName; outputName: string; converted: boolean },
  errorDetail?: string
): TransformOutput {
  const optimizedSize = encoded.bytes.length;
  return {
    bytes: encoded.bytes,
    result: {
      name,
      outputName: encoded.outputName,
      outputFormat: encoded.format,
      originalSize,
      optimizedSize,
      savingPercentage: calculateSavingPercentage(originalSize, optimizedSize),
      status,
      converted: encoded.converted,
      ...(errorDetail !== undefined ? { errorDetail } : {})
    }
  };
}

/**
 * Recompresses one image. Never throws: decoder failures come back as an
 * `error` result carrying the untouched input bytes.
 */
export async function transform(
  name: string,
  bytes: Buffer,
  declaredFormat: ImageFormatName,
  options: OptimizationOptions
): Promise<TransformOutput> {
  const originalSize = bytes.length;
  const passthrough = { bytes, format: declaredFormat, outputName: name, converted: false };

  if (originalSize === 0) {
    return buildResult(name, originalSize, 'error', passthrough, 'Empty file');
  }

  try {
    const encoded = await encode(bytes, declaredFormat, options);
    if (!encoded) {
      return buildResult(name, originalSize, 'skipped', passthrough);
    }

    const converted = encoded.converted ?? false;
    return buildResult(name, originalSize, 'success', {
      bytes: encoded.bytes,
      format: encoded.format,
      outputName: converted ? replaceExtension(name, '.jpg') : name,
      converted
    });
  } catch (error) {
    return buildResult(name, originalSize, 'error', passthrough, describeDecoderError(error));
  }
}
