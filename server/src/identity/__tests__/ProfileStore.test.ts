import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ProfileStore } from '../ProfileStore.js';
import { cosineSimilarity } from '../embedding.js';

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'vigil-profiles-'));
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe('ProfileStore', () => {
  it('treats missing files as not enrolled', async () => {
    const store = new ProfileStore(dir);
    await store.load();

    expect(store.has('voice')).toBe(false);
    expect(store.get('face')).toBeNull();
  });

  it('saves a normalized profile that loads back unchanged', async () => {
    const store = new ProfileStore(path.join(dir, 'nested'));
    await store.save({ modality: 'voice', vector: Float32Array.from([3, 4]), samples: 5, createdAt: 1700000000000 });

    const reloaded = new ProfileStore(path.join(dir, 'nested'));
    await reloaded.load();
    const profile = reloaded.get('voice');

    expect(profile?.samples).toBe(5);
    expect(profile?.createdAt).toBe(1700000000000);
    expect(profile?.vector[0]).toBeCloseTo(0.6, 5);
    expect(profile?.vector[1]).toBeCloseTo(0.8, 5);
    expect(cosineSimilarity(profile?.vector ?? [], [3, 4])).toBeCloseTo(1, 5);
    expect(reloaded.has('face')).toBe(false);
  });

  it('ignores a file that is not JSON', async () => {
    await fs.writeFile(path.join(dir, 'voiceprint.json'), '{not json', 'utf-8');
    const store = new ProfileStore(dir);
    await store.load();

    expect(store.has('voice')).toBe(false);
  });

  it('ignores a file that fails the schema', async () => {
    await fs.writeFile(path.join(dir, 'faceprint.json'), JSON.stringify({ modality: 'face', vector: [], samples: 1, createdAt: 0 }));
    const store = new ProfileStore(dir);
    await store.load();

    expect(store.has('face')).toBe(false);
  });

  it('ignores a profile stored under the wrong modality', async () => {
    await fs.writeFile(path.join(dir, 'faceprint.json'), JSON.stringify({ modality: 'voice', vector: [1, 0], samples: 1, createdAt: 0 }));
    const store = new ProfileStore(dir);
    await store.load();

    expect(store.has('face')).toBe(false);
  });
});
