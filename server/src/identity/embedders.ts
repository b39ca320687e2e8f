/**
 * Embedding model contracts.
 */

import type { DetectedFace, Frame, Recording } from '../types/index.js';

export interface VoiceEmbedder {
  /**
   * Speaker embedding for one utterance; null when nothing usable was heard.
   */
  embed(recording: Recording): Promise<Float32Array | null>;
}

export interface FaceEmbedder {
  /**
   * All faces found in the frame. An empty list means no face, not an error.
   */
  detect(frame: Frame): Promise<DetectedFace[]>;
}

export function boxArea(face: DetectedFace): number {
  return Math.max(0, face.box.width) * Math.max(0, face.box.height);
}

export function largestFace(faces: DetectedFace[]): DetectedFace | null {
  let best: DetectedFace | null = null;
  for (const face of faces) {
    if (!best || boxArea(face) > boxArea(best)) {
      best = face;
    }
  }
  return best;
}
