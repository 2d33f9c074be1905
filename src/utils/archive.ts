import archiver from 'archiver';
import yauzl from 'yauzl';
import type { Entry, ZipFile } from 'yauzl';
import type { Readable } from 'stream';
import { ArchiveError, toErrorMessage } from './errors';
import { detectFormat, hasImageExtension, ImageFormat } from './format';
import type { ImageFormatName } from './format';

export interface SourceEntry {
  name: string;
  bytes: Buffer;
  detectedFormat: ImageFormatName;
}

export interface ArchiveFile {
  name: string;
  bytes: Buffer;
}

function openZip(bytes: Buffer): Promise<ZipFile> {
  return new Promise((resolve, reject) => {
    yauzl.fromBuffer(bytes, { lazyEntries: true }, (err, zipfile) => {
      if (err || !zipfile) {
        reject(new ArchiveError(`Invalid ZIP archive: ${toErrorMessage(err, 'unreadable container')}`, { cause: err }));
        return;
      }
      resolve(zipfile);
    });
  });
}

function nextEntry(zipfile: ZipFile): Promise<Entry | null> {
  return new Promise((resolve, reject) => {
    const cleanup = () => {
      zipfile.off('entry', onEntry);
      zipfile.off('end', onEnd);
      zipfile.off('error', onError);
    };
    const onEntry = (entry: Entry) => {
      cleanup();
      resolve(entry);
    };
    const onEnd = () => {
      cleanup();
      resolve(null);
    };
    const onError = (err: Error) => {
      cleanup();
      reject(new ArchiveError(`Failed to read ZIP entry: ${err.message}`, { cause: err }));
    };

    zipfile.on('entry', onEntry);
    zipfile.on('end', onEnd);
    zipfile.on('error', onError);
    zipfile.readEntry();
  });
}

function openEntryStream(zipfile: ZipFile, entry: Entry): Promise<Readable> {
  return new Promise((resolve, reject) => {
    zipfile.openReadStream(entry, (err, stream) => {
      if (err || !stream) {
        reject(new ArchiveError(`Failed to open ${entry.fileName}: ${toErrorMessage(err)}`, { cause: err }));
        return;
      }
      resolve(stream);
    });
  });
}

async function readEntry(zipfile: ZipFile, entry: Entry): Promise<Buffer> {
  const stream = await openEntryStream(zipfile, entry);
  const chunks: Buffer[] = [];
  try {
    for await (const chunk of stream) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    }
  } catch (error) {
    throw new ArchiveError(`Failed to inflate ${entry.fileName}: ${toErrorMessage(error)}`, { cause: error });
  }
  return Buffer.concat(chunks);
}

function isSkippedPath(name: string): boolean {
  return name.endsWith('/') || name.startsWith('__MACOSX/');
}

/**
 * Opens the container and reads its central directory without inflating
 * anything. Throws ArchiveError for payloads that are not ZIP archives.
 */
export async function inspectArchive(bytes: Buffer): Promise<{ entryCount: number }> {
  const zipfile = await openZip(bytes);
  const entryCount = zipfile.entryCount;
  zipfile.close();
  return { entryCount };
}

/**
 * Returns every file member in central-directory order with its detected
 * format. Directories and macOS resource forks are not members.
 */
export async function extractEntries(bytes: Buffer): Promise<SourceEntry[]> {
  const zipfile = await openZip(bytes);
  const entries: SourceEntry[] = [];

  try {
    for (let entry = await nextEntry(zipfile); entry; entry = await nextEntry(zipfile)) {
      if (isSkippedPath(entry.fileName)) {
        continue;
      }
      const data = await readEntry(zipfile, entry);
      entries.push({ name: entry.fileName, bytes: data, detectedFormat: detectFormat(data) });
    }
  } finally {
    zipfile.close();
  }

  return entries;
}

export function isImageEntry(entry: SourceEntry): boolean {
  return entry.detectedFormat !== ImageFormat.UNKNOWN || hasImageExtension(entry.name);
}

export async function createArchive(files: Iterable<ArchiveFile>): Promise<Buffer> {
  const archive = archiver('zip', { zlib: { level: 9 } });
  const chunks: Buffer[] = [];

  const done = new Promise<Buffer>((resolve, reject) => {
    archive.on('data', (chunk: Buffer) => chunks.push(chunk));
    archive.on('end', () => resolve(Buffer.concat(chunks)));
    archive.on('error', reject);
  });

  for (const file of files) {
    archive.append(file.bytes, { name: file.name });
  }

  const [, output] = await Promise.all([archive.finalize(), done]);
  return output;
}
