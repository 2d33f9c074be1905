/**
 * Batch entry point: optimizes a ZIP archive on disk without the HTTP server.
 *
 *   tsx src/cli.ts photos.zip photos-optimized.zip --quality 80 --convert-png
 */
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { env } from '~/config/env';
import { logger } from '~/config/logger';
import { OptimizationService } from '~/components/optimize/service';
import type { OptimizedResult } from '~/queue/optimize/schemas';
import { toErrorMessage } from '~/utils/errors';
import { formatBytes } from '~/utils/format';
import { LocalArtifactStore } from '~/utils/storage';

function describeResult(result: OptimizedResult): string {
  const target = result.outputName === result.name ? '' : ` -> ${result.outputName}`;
  if (result.status === 'error') {
    return `  ✗ ${result.name}: ${result.errorDetail ?? 'error'}`;
  }
  const sign = result.savingPercentage >= 0 ? '-' : '+';
  return `  ${result.status === 'skipped' ? '•' : '✓'} ${result.name}${target}: ${formatBytes(result.originalSize)} → ${formatBytes(result.optimizedSize)} (${sign}${Math.abs(result.savingPercentage).toFixed(1)}%)`;
}

async function main(): Promise<number> {
  const argv = await yargs(hideBin(process.argv))
    .scriptName('optimize-zip')
    .usage('$0 <input.zip> <output.zip> [options]')
    .option('quality', {
      alias: 'q',
      describe: 'JPEG quality (1-100)',
      type: 'number',
      default: env.DEFAULT_JPEG_QUALITY
    })
    .option('convert-png', {
      describe: 'Convert PNGs without an alpha channel to JPEG',
      type: 'boolean',
      default: false
    })
    .demandCommand(2, 'Input and output ZIP paths are required')
    .strictOptions()
    .help()
    .parseAsync();

  const [inputPath, outputPath] = argv._.map(String);
  if (!inputPath || !outputPath) {
    throw new Error('Input and output ZIP paths are required');
  }

  const workDir = await mkdtemp(path.join(os.tmpdir(), 'optimize-zip-'));
  const service = new OptimizationService({
    store: new LocalArtifactStore(workDir),
    concurrency: 1,
    retentionMs: env.ARTIFACT_RETENTION_MS,
    idleTimeoutMs: env.JOB_IDLE_TIMEOUT_MS,
    backlogLimit: env.EVENT_BACKLOG_LIMIT
  });

  try {
    console.log(`Reading ${inputPath}...`);
    const jobId = await service.submit(await readFile(inputPath), {
      jpegQuality: argv.quality,
      convertPngToJpeg: argv['convert-png']
    });

    let processed = 0;
    let succeeded = 0;
    for await (const event of service.streamEvents(jobId)) {
      switch (event.type) {
        case 'file_complete':
          processed += 1;
          if (event.result.status !== 'error') succeeded += 1;
          console.log(describeResult(event.result));
          break;
        case 'progress':
          logger.debug({ jobId, percent: event.percent }, 'Progress');
          break;
        case 'complete': {
          const artifact = await service.fetchArtifact(event.artifactId);
          await writeFile(outputPath, artifact.bytes);
          console.log(`\nProcessing complete:`);
          console.log(`- Successfully processed: ${succeeded}/${processed} images`);
          console.log(`- Output saved to: ${outputPath}`);
          return 0;
        }
        case 'failed':
          console.error(`Optimization failed: ${event.reason}`);
          return 1;
      }
    }
    return 1;
  } finally {
    await service.onIdle();
    await rm(workDir, { recursive: true, force: true });
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(toErrorMessage(error));
    process.exitCode = 1;
  });
