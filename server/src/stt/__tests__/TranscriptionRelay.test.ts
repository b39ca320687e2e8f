import { afterEach, describe, expect, it, vi } from 'vitest';
import { TranscriptionRelay } from '../TranscriptionRelay.js';
import { OpenAITranscriber, ScriptedTranscriber } from '../transcriber.js';
import { encodeWav } from '../wav.js';
import { CollaboratorError, TranscriptionEmptyError } from '../../errors.js';
import { FakeTranscriber } from '../../__tests__/fakes.js';
import type { Recording } from '../../types/index.js';

const recording: Recording = { samples: new Float32Array(160), sampleRate: 16000 };

describe('TranscriptionRelay', () => {
  it('collapses whitespace in the transcript', async () => {
    const relay = new TranscriptionRelay(new FakeTranscriber('  note   buy\n milk  '));
    expect(await relay.transcribe(recording)).toBe('note buy milk');
  });

  it('throws TranscriptionEmptyError for a blank transcript', async () => {
    const relay = new TranscriptionRelay(new FakeTranscriber('   '));
    await expect(relay.transcribe(recording)).rejects.toBeInstanceOf(TranscriptionEmptyError);
  });

  it('wraps transcriber failures', async () => {
    const transcriber = new FakeTranscriber();
    transcriber.error = new Error('timeout');
    const relay = new TranscriptionRelay(transcriber);

    await expect(relay.transcribe(recording)).rejects.toThrow('fake transcriber failed: timeout');
    await expect(relay.transcribe(recording)).rejects.toBeInstanceOf(CollaboratorError);
  });
});

describe('OpenAITranscriber', () => {
  interface FetchInit {
    method?: string;
    headers?: Record<string, string>;
    body?: unknown;
    signal?: AbortSignal;
  }

  const options = { apiKey: 'test-secret', model: 'whisper-1', url: 'http://stt.test/transcriptions' };

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  function reply(status: number, body: unknown) {
    return { ok: status >= 200 && status < 300, status, json: async () => body, text: async () => JSON.stringify(body) };
  }

  it('posts the recording as a WAV form and returns the text', async () => {
    const calls: Array<{ url: string; init: FetchInit }> = [];
    vi.stubGlobal('fetch', async (url: string, init: FetchInit) => {
      calls.push({ url, init });
      return reply(200, { text: 'what time is it' });
    });

    const text = await new OpenAITranscriber(options).transcribe(recording.samples, recording.sampleRate);

    expect(text).toBe('what time is it');
    expect(calls).toHaveLength(1);
    expect(calls[0]?.url).toBe('http://stt.test/transcriptions');
    expect(calls[0]?.init.method).toBe('POST');
    expect(calls[0]?.init.headers).toEqual({ Authorization: 'Bearer test-secret' });
    const body = calls[0]?.init.body;
    expect(body).toBeInstanceOf(FormData);
    if (body instanceof FormData) {
      expect(body.get('model')).toBe('whisper-1');
      expect(body.get('language')).toBe('en');
    }
    expect(calls[0]?.init.signal).toBeInstanceOf(AbortSignal);
  });

  it('fails on an error status', async () => {
    vi.stubGlobal('fetch', async () => reply(401, { error: 'bad key' }));

    await expect(new OpenAITranscriber(options).transcribe(recording.samples, 16000)).rejects.toThrow(
      'Transcription request failed with status 401',
    );
  });

  it('gives up on a request that hangs', async () => {
    vi.stubGlobal('fetch', (_url: string, init: FetchInit) =>
      new Promise((_resolve, reject) => {
        init.signal?.addEventListener('abort', () => reject(init.signal?.reason));
      }),
    );
    const relay = new TranscriptionRelay(new OpenAITranscriber({ ...options, timeoutMs: 20 }));

    const failure = relay.transcribe(recording);

    await expect(failure).rejects.toBeInstanceOf(CollaboratorError);
    await expect(failure).rejects.toThrow('OpenAI transcription failed: Transcription request timed out after 20ms');
  });
});

describe('ScriptedTranscriber', () => {
  it('hands out injected transcripts in order, then empty strings', async () => {
    const transcriber = new ScriptedTranscriber();
    transcriber.inject('first');
    transcriber.inject('second');

    expect(await transcriber.transcribe(recording.samples, 16000)).toBe('first');
    expect(await transcriber.transcribe(recording.samples, 16000)).toBe('second');
    expect(await transcriber.transcribe(recording.samples, 16000)).toBe('');
  });
});

describe('encodeWav', () => {
  it('writes a 16-bit mono PCM header and clamped samples', () => {
    const wav = encodeWav({ samples: Float32Array.from([0, 1, -1, 2]), sampleRate: 8000 });

    expect(wav.length).toBe(44 + 8);
    expect(wav.toString('ascii', 0, 4)).toBe('RIFF');
    expect(wav.toString('ascii', 8, 12)).toBe('WAVE');
    expect(wav.readUInt16LE(22)).toBe(1);
    expect(wav.readUInt32LE(24)).toBe(8000);
    expect(wav.readUInt32LE(40)).toBe(8);
    expect([wav.readInt16LE(44), wav.readInt16LE(46), wav.readInt16LE(48), wav.readInt16LE(50)]).toEqual([
      0, 32767, -32768, 32767,
    ]);
  });
});
