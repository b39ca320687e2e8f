/**
 * Enrollment
 * Builds an owner profile from several samples: every embedding is
 * normalized, averaged, and the mean is normalized again.
 */

import { logger } from '../utils/logger.js';
import { withTimeout } from '../utils/async.js';
import { DeviceUnavailableError, ResourceBusyError, VigilError, guardCollaborator } from '../errors.js';
import { averageEmbeddings } from './embedding.js';
import { largestFace } from './embedders.js';
import type { FaceEmbedder, VoiceEmbedder } from './embedders.js';
import type { CommandRecorder } from '../audio/CommandRecorder.js';
import type { ResourceGuard } from '../resources/ResourceGuard.js';
import type { CameraDevice } from '../devices/types.js';
import type { BiometricProfile } from '../types/index.js';

export type EnrollmentProgress = (collected: number, target: number) => void;

export interface VoiceEnrollmentDeps {
  micGuard: ResourceGuard;
  recorder: CommandRecorder;
  embedder: VoiceEmbedder;
}

export interface FaceEnrollmentDeps {
  cameraGuard: ResourceGuard;
  camera: CameraDevice;
  embedder: FaceEmbedder;
}

const HOLDER = 'enrollment';
const TIMED_OUT = Symbol('timed-out');

export async function enrollVoice(
  deps: VoiceEnrollmentDeps,
  options: { samples: number; durationSec: number; onProgress?: EnrollmentProgress },
): Promise<BiometricProfile> {
  const result = await deps.micGuard.acquire('exclusive', HOLDER);
  if (result.status === 'busy') {
    throw new ResourceBusyError('mic', result.heldBy);
  }

  const embeddings: Float32Array[] = [];
  try {
    for (let i = 0; i < options.samples; i++) {
      logger.info('Enrollment', `Voice enrollment: recording sample ${i + 1}/${options.samples}`);
      const recording = await deps.recorder.record(result.lease, options.durationSec);
      const embedding = await guardCollaborator('voice embedder', () => deps.embedder.embed(recording));
      if (!embedding) {
        logger.warn('Enrollment', `Sample ${i + 1} produced no embedding, skipped`);
        continue;
      }
      embeddings.push(embedding);
      options.onProgress?.(embeddings.length, options.samples);
    }
  } finally {
    await deps.micGuard.release(result.lease);
  }

  if (embeddings.length === 0) {
    throw new VigilError('No voice embeddings collected.', 'ENROLLMENT_FAILED', { modality: 'voice' });
  }
  return { modality: 'voice', vector: averageEmbeddings(embeddings), samples: embeddings.length, createdAt: Date.now() };
}

export async function enrollFace(
  deps: FaceEnrollmentDeps,
  options: { frames: number; frameTimeoutMs: number; maxReads?: number; onProgress?: EnrollmentProgress },
): Promise<BiometricProfile> {
  const maxReads = options.maxReads ?? options.frames * 5;
  const result = await deps.cameraGuard.acquire('exclusive', HOLDER);
  if (result.status === 'busy') {
    throw new ResourceBusyError('camera', result.heldBy);
  }

  const embeddings: Float32Array[] = [];
  try {
    try {
      await deps.camera.open();
    } catch (err) {
      throw new DeviceUnavailableError('camera', err);
    }
    try {
      for (let reads = 0; reads < maxReads && embeddings.length < options.frames; reads++) {
        const frame = await withTimeout(deps.camera.read(), options.frameTimeoutMs, TIMED_OUT);
        if (!frame || frame === TIMED_OUT) continue;
        const faces = await guardCollaborator('face embedder', () => deps.embedder.detect(frame));
        const face = largestFace(faces);
        if (!face) continue;
        embeddings.push(face.embedding);
        logger.info('Enrollment', `Face enrollment: collected ${embeddings.length}/${options.frames}`);
        options.onProgress?.(embeddings.length, options.frames);
      }
    } finally {
      await deps.camera.close();
    }
  } finally {
    await deps.cameraGuard.release(result.lease);
  }

  if (embeddings.length === 0) {
    throw new VigilError('No face embeddings collected.', 'ENROLLMENT_FAILED', { modality: 'face' });
  }
  return { modality: 'face', vector: averageEmbeddings(embeddings), samples: embeddings.length, createdAt: Date.now() };
}
