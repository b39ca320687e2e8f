/**
 * Speech-to-text collaborators
 */

import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { encodeWav } from './wav.js';
import type { Recording } from '../types/index.js';

export interface Transcriber {
  readonly name: string;
  /**
   * Text heard in the recording. An empty string means nothing was understood.
   */
  transcribe(samples: Float32Array, sampleRate: number): Promise<string>;
}

const transcriptionResponseSchema = z.object({
  text: z.string(),
});

export interface OpenAITranscriberOptions {
  apiKey: string;
  model: string;
  url: string;
  language?: string;
  timeoutMs?: number;
}

/**
 * Posts the recording as WAV to the OpenAI transcription endpoint.
 */
export class OpenAITranscriber implements Transcriber {
  readonly name = 'OpenAI transcription';

  constructor(private readonly options: OpenAITranscriberOptions) {}

  async transcribe(samples: Float32Array, sampleRate: number): Promise<string> {
    const recording: Recording = { samples, sampleRate };
    const form = new FormData();
    form.append('file', new Blob([new Uint8Array(encodeWav(recording))], { type: 'audio/wav' }), 'command.wav');
    form.append('model', this.options.model);
    form.append('language', this.options.language ?? 'en');

    const timeoutMs = this.options.timeoutMs ?? 30000;
    const response = await fetch(this.options.url, {
      method: 'POST',
      headers: {
        'Authorization': `Bearer ${this.options.apiKey}`,
      },
      body: form,
      signal: AbortSignal.timeout(timeoutMs),
    }).catch((err: unknown) => {
      if (err instanceof Error && err.name === 'TimeoutError') {
        throw new Error(`Transcription request timed out after ${timeoutMs}ms`);
      }
      throw err;
    });

    if (!response.ok) {
      const errorText = await response.text();
      logger.error('STT', `Transcription request failed: ${response.status}`, errorText);
      throw new Error(`Transcription request failed with status ${response.status}`);
    }

    const parsed = transcriptionResponseSchema.parse(await response.json());
    return parsed.text;
  }
}

/**
 * Returns transcripts pushed from a control client, one per recording.
 * Used when no speech-to-text service is configured.
 */
export class ScriptedTranscriber implements Transcriber {
  readonly name = 'Scripted transcripts';
  private pending: string[] = [];

  inject(text: string): void {
    this.pending.push(text);
    logger.info('STT', `Transcript queued for the next command: "${text}"`);
  }

  async transcribe(_samples: Float32Array, _sampleRate: number): Promise<string> {
    return this.pending.shift() ?? '';
  }
}
