import { z } from 'zod';
import type { ImageFormatName } from '~/utils/format';

export const OptimizationOptionsSchema = z
  .object({
    jpegQuality: z.number().int().min(1).max(100),
    convertPngToJpeg: z.boolean()
  })
  .readonly();

export type OptimizationOptions = z.infer<typeof OptimizationOptionsSchema>;

export type ResultStatus = 'success' | 'skipped' | 'error';

export interface OptimizedResult {
  name: string;
  outputName: string;
  outputFormat: ImageFormatName;
  originalSize: number;
  optimizedSize: number;
  savingPercentage: number;
  status: ResultStatus;
  converted: boolean;
  errorDetail?: string;
}

export type ProgressEvent =
  | { type: 'progress'; percent: number }
  | { type: 'file_complete'; result: OptimizedResult }
  | { type: 'complete'; artifactId: string }
  | { type: 'failed'; reason: string };

export type TerminalEvent = Extract<ProgressEvent, { type: 'complete' | 'failed' }>;

export function isTerminalEvent(event: ProgressEvent): event is TerminalEvent {
  return event.type === 'complete' || event.type === 'failed';
}

export interface OptimizeJobData {
  jobId: string;
  archive: Buffer;
  options: OptimizationOptions;
}
