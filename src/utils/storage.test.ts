import { describe, it, expect, afterAll } from 'vitest';
import { existsSync, rmSync } from 'fs';
import path from 'path';
import { LocalArtifactStore, isArtifactId } from './storage';

const TEST_DIR = path.join(process.cwd(), 'test-outputs', 'storage');
const ARTIFACT_ID = '0123456789abcdef0123456789abcdef';

describe('LocalArtifactStore', () => {
  const store = new LocalArtifactStore(TEST_DIR);

  afterAll(() => {
    if (existsSync(TEST_DIR)) {
      rmSync(TEST_DIR, { recursive: true, force: true });
    }
  });

  it('should write once and read back identical bytes', async () => {
    const bytes = Buffer.from('zip bytes');
    await store.put(ARTIFACT_ID, bytes);

    expect((await store.get(ARTIFACT_ID))?.equals(bytes)).toBe(true);
    await expect(store.put(ARTIFACT_ID, Buffer.from('again'))).rejects.toThrow();
  });

  it('should return null after delete', async () => {
    await store.delete(ARTIFACT_ID);

    expect(await store.get(ARTIFACT_ID)).toBeNull();
    expect(existsSync(path.join(TEST_DIR, `${ARTIFACT_ID}.zip`))).toBe(false);
  });

  it('should not resolve ids outside the artifact namespace', async () => {
    expect(await store.get('../../etc/passwd')).toBeNull();
  });
});

describe('isArtifactId', () => {
  it('should accept 32 lower-case hex characters only', () => {
    expect(isArtifactId(ARTIFACT_ID)).toBe(true);
    expect(isArtifactId('0123456789ABCDEF0123456789ABCDEF')).toBe(false);
    expect(isArtifactId('abc')).toBe(false);
  });
});
