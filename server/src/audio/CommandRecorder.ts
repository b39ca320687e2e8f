/**
 * Command Recorder
 * Records a fixed-duration command under an exclusive microphone lease.
 */

import { logger } from '../utils/logger.js';
import { withTimeout } from '../utils/async.js';
import { DeviceUnavailableError, VigilError } from '../errors.js';
import type { ResourceGuard } from '../resources/ResourceGuard.js';
import type { MicrophoneDevice } from '../devices/types.js';
import type { Recording, ResourceLease } from '../types/index.js';

export interface CommandRecorderOptions {
  sampleRate: number;
  chunkLength?: number;
  // Extra wall-clock allowance on top of the recording duration
  slackMs?: number;
}

const TIMED_OUT = Symbol('timed-out');

export class CommandRecorder {
  private readonly chunkLength: number;
  private readonly slackMs: number;

  constructor(
    private readonly guard: ResourceGuard,
    private readonly mic: MicrophoneDevice,
    private readonly options: CommandRecorderOptions,
  ) {
    this.chunkLength = options.chunkLength ?? 1024;
    this.slackMs = options.slackMs ?? 2000;
  }

  async record(lease: ResourceLease, durationSec: number, sessionId?: string): Promise<Recording> {
    if (lease.kind !== 'mic' || lease.priority !== 'exclusive' || this.guard.statusOf(lease) !== 'active') {
      throw new VigilError('Recording needs an active exclusive microphone lease', 'INVALID_LEASE', { lease });
    }

    const total = Math.round(durationSec * this.options.sampleRate);
    logger.info('Recorder', `Recording ${durationSec}s (${total} samples)`, undefined, sessionId);

    try {
      await this.mic.open(this.options.sampleRate);
    } catch (err) {
      throw new DeviceUnavailableError('mic', err);
    }

    try {
      const result = await withTimeout(this.collect(total), durationSec * 1000 + this.slackMs, TIMED_OUT);
      if (result === TIMED_OUT) {
        throw new DeviceUnavailableError('mic', new Error('Recording did not finish in time'));
      }
      logger.debug('Recorder', 'Recording complete', { samples: result.length }, sessionId);
      return { samples: result, sampleRate: this.options.sampleRate };
    } finally {
      await this.mic.close();
    }
  }

  private async collect(total: number): Promise<Float32Array> {
    const samples = new Float32Array(total);
    let filled = 0;
    while (filled < total) {
      const chunk = await this.mic.read(Math.min(this.chunkLength, total - filled));
      if (chunk === null) {
        throw new DeviceUnavailableError('mic', new Error('Microphone closed mid-recording'));
      }
      const take = Math.min(chunk.length, total - filled);
      samples.set(chunk.subarray(0, take), filled);
      filled += take;
    }
    return samples;
  }
}
