/**
 * Mock devices for testing without hardware
 * Stand in for real microphone/camera/speaker drivers and embedding models so
 * the whole pipeline can be driven from the browser.
 */

import { logger } from '../utils/logger.js';
import { ManualWakewordEngine } from '../wakeword/engine.js';
import { ScriptedTranscriber } from '../stt/transcriber.js';
import type { CameraDevice, MicrophoneDevice, SpeakerDevice } from './types.js';
import type { FaceEmbedder, VoiceEmbedder } from '../identity/embedders.js';
import type { DetectedFace, Frame, Recording } from '../types/index.js';

/**
 * Controls a client can poke at
 */
export interface DeviceSimulator {
  triggerWake(): void;
  injectTranscript(text: string): void;
  setCameraCovered(covered: boolean): void;
  setCameraFailing(failing: boolean): void;
}

export class MockMicrophone implements MicrophoneDevice {
  private isOpen = false;
  private sampleRate = 16000;
  private pending: Set<(frame: Float32Array | null) => void> = new Set();

  async open(sampleRate: number): Promise<void> {
    this.sampleRate = sampleRate;
    this.isOpen = true;
  }

  read(frameLength: number): Promise<Float32Array | null> {
    if (!this.isOpen) return Promise.resolve(null);
    return new Promise((resolve) => {
      this.pending.add(resolve);
      setTimeout(() => {
        if (!this.pending.delete(resolve)) return;
        resolve(this.isOpen ? new Float32Array(frameLength) : null);
      }, (frameLength / this.sampleRate) * 1000);
    });
  }

  async close(): Promise<void> {
    this.isOpen = false;
    for (const resolve of this.pending) resolve(null);
    this.pending.clear();
  }
}

const FRAME_WIDTH = 32;
const FRAME_HEIGHT = 24;

export class MockCamera implements CameraDevice {
  private isOpen = false;
  covered = false;
  failing = false;

  async open(): Promise<void> {
    this.isOpen = true;
  }

  async read(): Promise<Frame | null> {
    if (!this.isOpen || this.failing) return null;
    const level = this.covered ? 8 : 128;
    return {
      width: FRAME_WIDTH,
      height: FRAME_HEIGHT,
      channels: 1,
      data: new Uint8Array(FRAME_WIDTH * FRAME_HEIGHT).fill(level),
      ts: Date.now(),
    };
  }

  async close(): Promise<void> {
    this.isOpen = false;
  }
}

export class ConsoleSpeaker implements SpeakerDevice {
  constructor(private readonly msPerWord = 250) {}

  say(text: string): Promise<void> {
    logger.info('Speaker', `🔊 ${text}`);
    const words = text.split(/\s+/).filter(Boolean).length;
    return new Promise((resolve) => setTimeout(resolve, words * this.msPerWord));
  }
}

const MOCK_DIMENSIONS = 8;

function mockVector(seed: number): Float32Array {
  const vector = new Float32Array(MOCK_DIMENSIONS);
  for (let i = 0; i < MOCK_DIMENSIONS; i++) {
    vector[i] = Math.sin(seed * (i + 1));
  }
  return vector;
}

/**
 * Every recording embeds to the same vector, so an enrolled mock owner
 * always matches.
 */
export class MockVoiceEmbedder implements VoiceEmbedder {
  async embed(_recording: Recording): Promise<Float32Array | null> {
    return mockVector(1);
  }
}

/**
 * Sees one face in any frame bright enough to be uncovered.
 */
export class MockFaceEmbedder implements FaceEmbedder {
  async detect(frame: Frame): Promise<DetectedFace[]> {
    const sample = frame.data[0] ?? 0;
    if (sample < 60) return [];
    return [{ box: { x: 8, y: 4, width: 16, height: 16 }, embedding: mockVector(2) }];
  }
}

/**
 * Bundles the mock devices and collaborators behind DeviceSimulator.
 */
export class MockRig implements DeviceSimulator {
  readonly mic = new MockMicrophone();
  readonly camera = new MockCamera();
  readonly speaker = new ConsoleSpeaker();
  readonly voiceEmbedder = new MockVoiceEmbedder();
  readonly faceEmbedder = new MockFaceEmbedder();
  readonly transcriber = new ScriptedTranscriber();
  readonly wakeword: ManualWakewordEngine;

  constructor(wakePhrase: string, frameLength: number, sampleRate: number) {
    this.wakeword = new ManualWakewordEngine(wakePhrase, frameLength, sampleRate);
  }

  triggerWake(): void {
    this.wakeword.triggerWake();
  }

  injectTranscript(text: string): void {
    this.transcriber.inject(text);
  }

  setCameraCovered(covered: boolean): void {
    logger.info('Simulator', `Camera ${covered ? 'covered' : 'uncovered'}`);
    this.camera.covered = covered;
  }

  setCameraFailing(failing: boolean): void {
    logger.info('Simulator', `Camera reads ${failing ? 'failing' : 'working'}`);
    this.camera.failing = failing;
  }
}
