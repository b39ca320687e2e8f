/**
 * Vigil Server Entry Point
 * Wires devices, guards and workers into the orchestrator and serves control clients.
 */

import express from 'express';
import cors from 'cors';
import { ENV, validateConfig } from './config/env.js';
import { logger } from './utils/logger.js';
import { createResourceGuards } from './resources/ResourceGuard.js';
import { MockRig } from './devices/mock.js';
import { WakeListener } from './wakeword/WakeListener.js';
import { CameraMonitor } from './camera/CameraMonitor.js';
import { CommandRecorder } from './audio/CommandRecorder.js';
import { SpeechOutput } from './audio/SpeechOutput.js';
import { IdentityVerifier } from './identity/IdentityVerifier.js';
import { ProfileStore } from './identity/ProfileStore.js';
import { OpenAITranscriber } from './stt/transcriber.js';
import type { Transcriber } from './stt/transcriber.js';
import { TranscriptionRelay } from './stt/TranscriptionRelay.js';
import { InMemoryNoteStore, KeywordCommandDispatcher } from './commands/dispatcher.js';
import { Timeline } from './timeline/Timeline.js';
import { Orchestrator } from './orchestrator/index.js';
import { VigilWebSocketServer } from './websocket/server.js';
import { createApiRouter } from './routes/api.js';

async function main(): Promise<void> {
  console.log(`
  ╔══════════════════════════════════════╗
  ║      Vigil - Guarded Voice Agent     ║
  ║            Server v0.1.0             ║
  ╚══════════════════════════════════════╝
  `);

  // Validate configuration
  validateConfig();

  const rig = new MockRig(ENV.WAKE_PHRASE, ENV.WAKE_FRAME_LENGTH, ENV.MIC_SAMPLE_RATE);
  const guards = createResourceGuards();
  const timeline = new Timeline(ENV.TIMELINE_LIMIT);

  const transcriber: Transcriber = ENV.OPENAI_API_KEY
    ? new OpenAITranscriber({
        apiKey: ENV.OPENAI_API_KEY,
        model: ENV.STT_MODEL,
        url: ENV.STT_URL,
        timeoutMs: ENV.STT_TIMEOUT_MS,
      })
    : rig.transcriber;

  const orchestrator = new Orchestrator(
    {
      guards,
      wakeListener: new WakeListener(guards.mic, rig.mic, rig.wakeword),
      cameraMonitor: new CameraMonitor(guards.camera, rig.camera, {
        darkThreshold: ENV.CAMERA_DARK_THRESHOLD,
        darkFramesRequired: ENV.CAMERA_DARK_FRAMES,
        maxFailures: ENV.CAMERA_MAX_FAILURES,
        pollMs: ENV.CAMERA_POLL_MS,
        retryMs: ENV.CAMERA_RETRY_MS,
      }),
      recorder: new CommandRecorder(guards.mic, rig.mic, { sampleRate: ENV.MIC_SAMPLE_RATE }),
      verifier: new IdentityVerifier(rig.voiceEmbedder, rig.faceEmbedder, guards.camera, rig.camera, {
        voice: ENV.VOICE_THRESHOLD,
        face: ENV.FACE_THRESHOLD,
      }),
      transcription: new TranscriptionRelay(transcriber),
      dispatcher: new KeywordCommandDispatcher(new InMemoryNoteStore(), ENV.WAKE_PHRASE),
      speech: new SpeechOutput(guards.speaker, rig.speaker),
      profiles: new ProfileStore(ENV.PROFILE_DIR),
      timeline,
      enrollment: { voiceEmbedder: rig.voiceEmbedder, faceEmbedder: rig.faceEmbedder, camera: rig.camera },
      simulator: rig,
    },
    {
      ownerName: ENV.OWNER_NAME,
      commandDurationSec: ENV.COMMAND_DURATION_SEC,
      faceMaxAttempts: ENV.FACE_MAX_ATTEMPTS,
      faceFrameTimeoutMs: ENV.FACE_FRAME_TIMEOUT_MS,
      enrollVoiceSamples: ENV.ENROLL_VOICE_SAMPLES,
      enrollFaceFrames: ENV.ENROLL_FACE_FRAMES,
      speechShutdownGraceMs: ENV.SPEECH_SHUTDOWN_GRACE_MS,
      idlePrompts: ENV.IDLE_PROMPTS
        ? { minDelayMs: ENV.IDLE_PROMPT_MIN_SEC * 1000, maxDelayMs: ENV.IDLE_PROMPT_MAX_SEC * 1000 }
        : undefined,
    },
  );

  // Initialize orchestrator
  await orchestrator.initialize();

  // Create Express app for HTTP endpoints
  const app = express();
  app.use(cors());
  app.use(express.json());
  app.use('/api', createApiRouter(orchestrator, timeline));

  // Start HTTP server (for both REST API and WebSocket)
  const httpServer = app.listen(ENV.SERVER_PORT, () => {
    logger.info('Server', `HTTP server running on http://localhost:${ENV.SERVER_PORT}`);
  });

  // Start WebSocket server (attached to HTTP server on same port)
  const wsServer = new VigilWebSocketServer(orchestrator);
  wsServer.start(httpServer);

  logger.info('Server', `Vigil server running on port ${ENV.SERVER_PORT}`);

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = (): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Server', 'Shutting down...');
    wsServer.stop();
    httpServer.close();
    orchestrator
      .shutdown()
      .catch((err: unknown) => {
        logger.error('Server', 'Shutdown failed', err);
      })
      .finally(() => process.exit(0));
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err) => {
  console.error('Failed to start server:', err);
  process.exit(1);
});
