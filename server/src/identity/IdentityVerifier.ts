/**
 * Identity Verifier
 * Voice and face checks against enrolled profiles.
 *
 * The verifier keeps no state between calls. The face path borrows the camera
 * through an exclusive lease, which preempts the camera monitor, and always
 * hands it back before returning.
 */

import { logger } from '../utils/logger.js';
import { withTimeout } from '../utils/async.js';
import { DeviceUnavailableError, ResourceBusyError, guardCollaborator } from '../errors.js';
import { cosineSimilarity } from './embedding.js';
import { largestFace } from './embedders.js';
import type { FaceEmbedder, VoiceEmbedder } from './embedders.js';
import type { ResourceGuard } from '../resources/ResourceGuard.js';
import type { CameraDevice } from '../devices/types.js';
import type { BiometricProfile, Frame, Recording, VerificationResult } from '../types/index.js';

export interface IdentityThresholds {
  voice: number;
  face: number;
}

export interface FaceCheckOptions {
  frameTimeoutMs: number;
  maxAttempts: number;
  sessionId?: string;
}

const HOLDER = 'identity-verifier';
const FRAME_TIMED_OUT = Symbol('frame-timed-out');

export class IdentityVerifier {
  constructor(
    private readonly voiceEmbedder: VoiceEmbedder,
    private readonly faceEmbedder: FaceEmbedder,
    private readonly cameraGuard: ResourceGuard,
    private readonly camera: CameraDevice,
    private readonly thresholds: IdentityThresholds,
  ) {}

  async verifyVoice(recording: Recording, profile: BiometricProfile, sessionId?: string): Promise<VerificationResult> {
    const embedding = await guardCollaborator('voice embedder', () => this.voiceEmbedder.embed(recording));
    if (!embedding) {
      logger.warn('Identity', 'Voice embedder returned nothing for this recording', undefined, sessionId);
      return { modality: 'voice', similarity: 0, matched: false, reason: 'no-embedding' };
    }

    const similarity = cosineSimilarity(profile.vector, embedding);
    const matched = similarity >= this.thresholds.voice;
    logger.info('Identity', `Voice similarity: ${similarity.toFixed(3)} (threshold ${this.thresholds.voice})`, { matched }, sessionId);
    return { modality: 'voice', similarity, matched };
  }

  /**
   * Sample up to `maxAttempts` frames and keep the best similarity of the
   * largest face in each. Stops at the first match.
   *
   * Throws ResourceBusyError or DeviceUnavailableError when the camera cannot
   * be borrowed; the caller treats both as "face unavailable".
   */
  async verifyFace(profile: BiometricProfile, options: FaceCheckOptions): Promise<VerificationResult> {
    const { sessionId } = options;
    const result = await this.cameraGuard.acquire('exclusive', HOLDER);
    if (result.status === 'busy') {
      throw new ResourceBusyError('camera', result.heldBy);
    }
    const lease = result.lease;

    try {
      try {
        await this.camera.open();
      } catch (err) {
        throw new DeviceUnavailableError('camera', err);
      }

      try {
        return await this.sampleFaces(profile, options);
      } finally {
        await this.camera.close();
      }
    } finally {
      const handedBack = await this.cameraGuard.release(lease);
      if (!handedBack) {
        logger.error('Identity', 'Camera could not be handed back to the monitor', undefined, sessionId);
      }
    }
  }

  private async sampleFaces(profile: BiometricProfile, options: FaceCheckOptions): Promise<VerificationResult> {
    const { sessionId } = options;
    let best = -1;
    let sawFace = false;
    let attempts = 0;

    while (attempts < options.maxAttempts) {
      attempts++;
      const frame = await this.readFrame(options.frameTimeoutMs);
      if (!frame) continue;

      const faces = await guardCollaborator('face embedder', () => this.faceEmbedder.detect(frame));
      const face = largestFace(faces);
      if (!face) continue;

      sawFace = true;
      const similarity = cosineSimilarity(profile.vector, face.embedding);
      best = Math.max(best, similarity);
      logger.info('Identity', `Face similarity attempt ${attempts}: ${similarity.toFixed(3)}`, undefined, sessionId);

      if (similarity >= this.thresholds.face) {
        return { modality: 'face', similarity, matched: true, attempts };
      }
    }

    if (!sawFace) {
      logger.warn('Identity', `No face seen in ${attempts} attempt(s)`, undefined, sessionId);
      return { modality: 'face', similarity: -1, matched: false, attempts, reason: 'no-face' };
    }
    return { modality: 'face', similarity: best, matched: false, attempts };
  }

  private async readFrame(timeoutMs: number): Promise<Frame | null> {
    let frame: Frame | null | typeof FRAME_TIMED_OUT;
    try {
      frame = await withTimeout(this.camera.read(), timeoutMs, FRAME_TIMED_OUT);
    } catch (err) {
      logger.warn('Identity', 'Camera read failed during face check', err);
      return null;
    }
    if (frame === FRAME_TIMED_OUT) {
      logger.warn('Identity', `Camera frame timed out after ${timeoutMs}ms`);
      return null;
    }
    return frame;
  }
}
