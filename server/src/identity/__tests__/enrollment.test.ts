import { describe, expect, it } from 'vitest';
import { enrollFace, enrollVoice } from '../enrollment.js';
import { cosineSimilarity } from '../embedding.js';
import { ResourceGuard } from '../../resources/ResourceGuard.js';
import { CommandRecorder } from '../../audio/CommandRecorder.js';
import { ResourceBusyError } from '../../errors.js';
import {
  FakeCamera,
  FakeFaceEmbedder,
  FakeMicrophone,
  FakeVoiceEmbedder,
  face,
  vectorAt,
} from '../../__tests__/fakes.js';

describe('enrollVoice', () => {
  it('averages one embedding per recorded sample', async () => {
    const micGuard = new ResourceGuard('mic');
    const recorder = new CommandRecorder(micGuard, new FakeMicrophone(), { sampleRate: 1000 });
    const embedder = new FakeVoiceEmbedder(vectorAt(0.3));
    const progress: number[] = [];

    const profile = await enrollVoice(
      { micGuard, recorder, embedder },
      { samples: 3, durationSec: 0.01, onProgress: (collected) => progress.push(collected) },
    );

    expect(profile.modality).toBe('voice');
    expect(profile.samples).toBe(3);
    expect(cosineSimilarity(profile.vector, vectorAt(0.3))).toBeCloseTo(1, 5);
    expect(progress).toEqual([1, 2, 3]);
    expect(micGuard.snapshot().exclusiveHolder).toBeNull();
  });

  it('fails when no sample produced an embedding', async () => {
    const micGuard = new ResourceGuard('mic');
    const recorder = new CommandRecorder(micGuard, new FakeMicrophone(), { sampleRate: 1000 });

    await expect(
      enrollVoice({ micGuard, recorder, embedder: new FakeVoiceEmbedder(null) }, { samples: 2, durationSec: 0.01 }),
    ).rejects.toMatchObject({ code: 'ENROLLMENT_FAILED' });
    expect(micGuard.snapshot().exclusiveHolder).toBeNull();
  });
});

describe('enrollFace', () => {
  it('collects the requested number of faces, skipping empty frames', async () => {
    const cameraGuard = new ResourceGuard('camera');
    const camera = new FakeCamera();
    camera.script = [null, null];
    const embedder = new FakeFaceEmbedder([face(vectorAt(1))]);

    const profile = await enrollFace({ cameraGuard, camera, embedder }, { frames: 4, frameTimeoutMs: 50 });

    expect(profile.samples).toBe(4);
    expect(camera.reads).toBe(6);
    expect(cosineSimilarity(profile.vector, vectorAt(1))).toBeCloseTo(1, 5);
    expect(camera.isOpen).toBe(false);
  });

  it('stops after maxReads and keeps what it has', async () => {
    const cameraGuard = new ResourceGuard('camera');
    const camera = new FakeCamera();
    camera.script = [null, null, null];
    const embedder = new FakeFaceEmbedder([face(vectorAt(1))]);

    const profile = await enrollFace({ cameraGuard, camera, embedder }, { frames: 4, frameTimeoutMs: 50, maxReads: 5 });

    expect(profile.samples).toBe(2);
  });

  it('refuses while the camera is held', async () => {
    const cameraGuard = new ResourceGuard('camera');
    await cameraGuard.acquire('exclusive', 'identity-verifier');

    await expect(
      enrollFace({ cameraGuard, camera: new FakeCamera(), embedder: new FakeFaceEmbedder() }, { frames: 1, frameTimeoutMs: 50 }),
    ).rejects.toBeInstanceOf(ResourceBusyError);
  });
});
