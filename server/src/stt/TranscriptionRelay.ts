/**
 * Transcription Relay
 * Hands a recording to the speech-to-text collaborator and normalizes the
 * answer. Blank results surface as TranscriptionEmptyError.
 */

import { logger } from '../utils/logger.js';
import { TranscriptionEmptyError, guardCollaborator } from '../errors.js';
import type { Transcriber } from './transcriber.js';
import type { Recording } from '../types/index.js';

export class TranscriptionRelay {
  constructor(private readonly transcriber: Transcriber) {}

  async transcribe(recording: Recording, sessionId?: string): Promise<string> {
    const started = Date.now();
    const raw = await guardCollaborator(this.transcriber.name, () =>
      this.transcriber.transcribe(recording.samples, recording.sampleRate),
    );
    const text = raw.replace(/\s+/g, ' ').trim();
    logger.info('STT', `Transcribed in ${Date.now() - started}ms: "${text}"`, undefined, sessionId);
    if (!text) {
      throw new TranscriptionEmptyError();
    }
    return text;
  }
}
