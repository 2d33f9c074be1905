import { describe, it, expect } from 'vitest';
import { createArchive, extractEntries, inspectArchive, isImageEntry } from './archive';
import { ArchiveError } from './errors';
import { createTestJpeg, createTestPng } from '~/test-utils/fixtures';

describe('extractEntries', () => {
  it('should return members in archive order with detected formats', async () => {
    const jpeg = await createTestJpeg();
    const png = await createTestPng();
    const zip = await createArchive([
      { name: 'b/second.png', bytes: png },
      { name: 'a.jpg', bytes: jpeg },
      { name: 'notes.txt', bytes: Buffer.from('just text') }
    ]);

    const entries = await extractEntries(zip);

    expect(entries.map((entry) => entry.name)).toEqual(['b/second.png', 'a.jpg', 'notes.txt']);
    expect(entries.map((entry) => entry.detectedFormat)).toEqual(['png', 'jpeg', 'unknown']);
    expect(entries[1]?.bytes.equals(jpeg)).toBe(true);
  });

  it('should skip macOS resource forks', async () => {
    const zip = await createArchive([
      { name: '__MACOSX/._a.jpg', bytes: Buffer.from('resource fork') },
      { name: 'a.jpg', bytes: await createTestJpeg() }
    ]);

    const entries = await extractEntries(zip);

    expect(entries.map((entry) => entry.name)).toEqual(['a.jpg']);
  });

  it('should reject payloads that are not ZIP archives', async () => {
    await expect(extractEntries(Buffer.from('definitely not a zip'))).rejects.toBeInstanceOf(ArchiveError);
  });
});

describe('inspectArchive', () => {
  it('should count entries without inflating them', async () => {
    const zip = await createArchive([
      { name: 'one.png', bytes: await createTestPng() },
      { name: 'two.txt', bytes: Buffer.from('two') }
    ]);

    await expect(inspectArchive(zip)).resolves.toEqual({ entryCount: 2 });
  });

  it('should throw ArchiveError for an empty payload', async () => {
    await expect(inspectArchive(Buffer.alloc(0))).rejects.toBeInstanceOf(ArchiveError);
  });
});

describe('isImageEntry', () => {
  it('should accept detected images regardless of name', () => {
    expect(isImageEntry({ name: 'photo', bytes: Buffer.alloc(0), detectedFormat: 'png' })).toBe(true);
  });

  it('should accept undecodable members that carry an image extension', () => {
    expect(isImageEntry({ name: 'broken.jpg', bytes: Buffer.from('x'), detectedFormat: 'unknown' })).toBe(true);
  });

  it('should exclude other members', () => {
    expect(isImageEntry({ name: 'c.txt', bytes: Buffer.from('x'), detectedFormat: 'unknown' })).toBe(false);
  });
});
