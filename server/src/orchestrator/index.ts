/**
 * Vigil Orchestrator
 * Central coordinator: runs the wake-to-reply pipeline, arbitrates the
 * devices through their guards and drives the security overlay.
 *
 * Wake and camera events from the background workers arrive through a
 * single-consumer channel. A wake that finds a session already running is
 * dropped, never queued.
 */

import { EventEmitter } from 'events';
import { z } from 'zod';
import { logger, addLogListener } from '../utils/logger.js';
import type { LogEntry } from '../utils/logger.js';
import { EventChannel } from '../utils/channel.js';
import { StateMachine, describeSecurity } from '../state/StateMachine.js';
import { MESSAGES } from './messages.js';
import { IdleCompanion } from '../companion/IdleCompanion.js';
import type { IdleCompanionOptions } from '../companion/IdleCompanion.js';
import { enrollFace, enrollVoice } from '../identity/enrollment.js';
import {
  CollaboratorError,
  DeviceUnavailableError,
  ResourceBusyError,
  ResourceDegradedError,
  TranscriptionEmptyError,
  guardCollaborator,
  toCollaboratorError,
} from '../errors.js';
import type { ResourceGuards } from '../resources/ResourceGuard.js';
import type { WakeEvent, WakeListener } from '../wakeword/WakeListener.js';
import type { CameraBlockedEvent, CameraMonitor } from '../camera/CameraMonitor.js';
import type { CommandRecorder } from '../audio/CommandRecorder.js';
import type { SpeechOutput } from '../audio/SpeechOutput.js';
import type { IdentityVerifier } from '../identity/IdentityVerifier.js';
import type { ProfileStore } from '../identity/ProfileStore.js';
import type { FaceEmbedder, VoiceEmbedder } from '../identity/embedders.js';
import type { TranscriptionRelay } from '../stt/TranscriptionRelay.js';
import type { CommandDispatcher } from '../commands/dispatcher.js';
import type { Timeline } from '../timeline/Timeline.js';
import type { CameraDevice } from '../devices/types.js';
import type { DeviceSimulator } from '../devices/mock.js';
import type {
  BiometricProfile,
  BlockedCause,
  Modality,
  PipelineSession,
  PipelineStage,
  Recording,
  ResourceKind,
  ResourceSnapshot,
  SecurityState,
  ServerMessage,
  SessionOutcome,
  TimelineEntry,
  VerificationResult,
  WakeSource,
} from '../types/index.js';

export interface OrchestratorEvents {
  broadcast: (message: ServerMessage) => void;
  sessionEnd: (session: PipelineSession) => void;
}

export interface OrchestratorDeps {
  guards: ResourceGuards;
  wakeListener: WakeListener;
  cameraMonitor: CameraMonitor;
  recorder: CommandRecorder;
  verifier: IdentityVerifier;
  transcription: TranscriptionRelay;
  dispatcher: CommandDispatcher;
  speech: SpeechOutput;
  profiles: ProfileStore;
  timeline: Timeline;
  enrollment: {
    voiceEmbedder: VoiceEmbedder;
    faceEmbedder: FaceEmbedder;
    camera: CameraDevice;
  };
  simulator?: DeviceSimulator;
  state?: StateMachine;
  clock?: () => Date;
}

export interface OrchestratorOptions {
  ownerName: string;
  commandDurationSec: number;
  faceMaxAttempts: number;
  faceFrameTimeoutMs: number;
  enrollVoiceSamples: number;
  enrollFaceFrames: number;
  speechShutdownGraceMs: number;
  // Leave out to keep quiet while idle
  idlePrompts?: Omit<IdleCompanionOptions, 'clock'>;
}

type OrchestratorInput =
  | { type: 'wake'; source: WakeSource }
  | { type: 'camera_blocked'; cause: BlockedCause }
  | { type: 'camera_restored' };

interface Reply {
  outcome: SessionOutcome;
  message: string | null;
}

interface IdentityVerdict {
  verified: boolean;
  checked: boolean;
}

const HOLDER = 'orchestrator';

// ============== Client messages ==============

const resourceKindSchema = z.enum(['mic', 'speaker', 'camera']);

const clientMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('wake') }),
  z.object({ type: z.literal('say_wake_phrase') }),
  z.object({ type: z.literal('clear_security') }),
  z.object({ type: z.literal('reset_resource'), payload: z.object({ kind: resourceKindSchema }) }),
  z.object({ type: z.literal('inject_transcript'), payload: z.object({ text: z.string().max(500) }) }),
  z.object({
    type: z.literal('simulate_camera'),
    payload: z.object({ covered: z.boolean().optional(), failing: z.boolean().optional() }),
  }),
  z.object({ type: z.literal('enroll'), payload: z.object({ modality: z.enum(['voice', 'face']) }) }),
]);

export type ClientMessage = z.infer<typeof clientMessageSchema>;

export class Orchestrator extends EventEmitter {
  private readonly state: StateMachine;
  private readonly clock: () => Date;
  private readonly companion: IdleCompanion | null;
  private readonly inbox = new EventChannel<OrchestratorInput>('orchestrator');
  private stopConsuming: (() => void) | null = null;
  private stopLogForwarding: (() => void) | null = null;

  private activeSession: Promise<void> | null = null;
  private enrolling = false;
  private droppedWakes = 0;
  // Security state to go back to once the camera is uncovered
  private securityBeforeCamera: SecurityState | null = null;

  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly options: OrchestratorOptions,
  ) {
    super();
    this.state = deps.state ?? new StateMachine();
    this.clock = deps.clock ?? (() => new Date());
    this.companion = options.idlePrompts
      ? new IdleCompanion(() => this.isQuiet(), { ...options.idlePrompts, clock: this.clock })
      : null;
    this.setupEventHandlers();
  }

  private setupEventHandlers(): void {
    const { wakeListener, cameraMonitor, speech, timeline, guards } = this.deps;

    // State machine events
    this.state.on('stageChange', (stage: PipelineStage, _oldStage: PipelineStage, session: PipelineSession | null) => {
      this.broadcast('stage_change', { stage, session: session ? summarizeSession(session) : null }, session?.id);
    });

    this.state.on('securityChange', (security: SecurityState) => {
      this.broadcast('security_change', security);
    });

    this.state.on('sessionEnd', (session: PipelineSession) => {
      this.emit('sessionEnd', session);
    });

    // Background workers feed the inbox
    wakeListener.on('wake', (_event: WakeEvent) => {
      this.inbox.put({ type: 'wake', source: 'voice' });
    });

    wakeListener.on('failure', (err: unknown) => {
      timeline.add('error', `Wake listener stopped working: ${describeError(err)}`);
    });

    cameraMonitor.on('blocked', (event: CameraBlockedEvent) => {
      this.inbox.put({ type: 'camera_blocked', cause: event.cause });
    });

    cameraMonitor.on('restored', () => {
      this.inbox.put({ type: 'camera_restored' });
    });

    // Resources
    for (const guard of Object.values(guards)) {
      guard.on('change', (snapshot: ResourceSnapshot) => {
        this.broadcast('resource_change', snapshot);
      });
      guard.on('degraded', (kind: ResourceKind) => {
        timeline.add('error', `The ${kind} is unavailable and needs a reset.`);
        this.broadcast('error', { message: `The ${kind} is unavailable`, kind });
      });
    }

    // Outbound
    speech.on('queued', (text: string) => {
      this.broadcast('utterance', { text });
    });

    timeline.on('entry', (entry: TimelineEntry) => {
      this.broadcast('timeline_entry', entry, entry.sessionId);
    });

    this.companion?.on('prompt', (text: string) => {
      timeline.add('friend', text);
      speech.speak(text);
    });
  }

  /**
   * Load profiles and start the background workers
   */
  async initialize(): Promise<void> {
    logger.info('Orchestrator', 'Initializing Vigil Orchestrator');
    const { profiles, wakeListener, cameraMonitor, timeline } = this.deps;

    this.stopLogForwarding = addLogListener((entry: LogEntry) => {
      this.broadcast('log', entry);
    });

    await profiles.load();
    if (!profiles.has('voice') && !profiles.has('face')) {
      logger.warn('Orchestrator', 'No biometrics enrolled: every command is accepted without identity checks');
    }

    this.stopConsuming = this.inbox.consume((input) => this.handleInput(input));

    try {
      await wakeListener.start();
    } catch (err) {
      logger.error('Orchestrator', 'Wake listener could not start', err);
      timeline.add('error', 'Microphone unavailable; wake phrase detection is off.');
    }

    try {
      await cameraMonitor.start();
    } catch (err) {
      logger.error('Orchestrator', 'Camera monitor could not start', err);
      timeline.add('error', 'Camera unavailable; tamper monitoring is off.');
    }

    this.say(MESSAGES.greeting(this.options.ownerName, this.clock()));
    this.companion?.start();
    logger.info('Orchestrator', 'Orchestrator initialized - Vigil is idle');
  }

  /**
   * Shutdown the orchestrator
   */
  async shutdown(): Promise<void> {
    logger.info('Orchestrator', 'Shutting down');
    this.companion?.stop();
    this.stopConsuming?.();
    this.stopConsuming = null;
    // Let a running session finish before its workers go away
    while (this.activeSession) {
      logger.info('Orchestrator', 'Waiting for the active session to finish');
      await this.activeSession;
    }
    await this.deps.wakeListener.stop();
    await this.deps.cameraMonitor.stop();
    await this.deps.speech.shutdown(this.options.speechShutdownGraceMs);
    this.stopLogForwarding?.();
    this.stopLogForwarding = null;
  }

  // ============== Inputs ==============

  /**
   * Wake from the UI (button / API). Goes through the same acceptance rules
   * as a detected wake phrase.
   */
  wake(source: WakeSource = 'ui'): void {
    this.inbox.put({ type: 'wake', source });
  }

  /**
   * Resolves when every queued input has been handled and no session is running.
   */
  async settle(): Promise<void> {
    await this.inbox.settled();
    while (this.activeSession) {
      await this.activeSession;
      await this.inbox.settled();
    }
  }

  private async handleInput(input: OrchestratorInput): Promise<void> {
    switch (input.type) {
      case 'wake':
        this.handleWake(input.source);
        break;

      case 'camera_blocked':
        this.handleCameraBlocked(input.cause);
        break;

      case 'camera_restored':
        this.handleCameraRestored();
        break;
    }
  }

  private handleWake(source: WakeSource): void {
    if (this.enrolling) {
      this.dropWake(source, 'enrollment in progress');
      return;
    }
    const decision = this.state.canAcceptWake();
    if (!decision.accepted) {
      this.dropWake(source, decision.reason);
      return;
    }

    const session = this.state.beginSession(source);
    logger.info('Orchestrator', `Wake accepted (${source})`, undefined, session.id);
    this.deps.timeline.add('system', `Wake (${source})`, session.id);

    // Not awaited: the inbox keeps flowing so later wakes can be dropped
    const run = this.runSession(session.id)
      .catch((err: unknown) => {
        logger.error('Orchestrator', 'Session crashed', err, session.id);
      })
      .finally(() => {
        if (this.activeSession === run) this.activeSession = null;
      });
    this.activeSession = run;
  }

  private dropWake(source: WakeSource, reason: string): void {
    this.droppedWakes++;
    logger.info('Orchestrator', `Wake dropped (${source}): ${reason}`);
  }

  private handleCameraBlocked(cause: BlockedCause): void {
    const current = this.state.getSecurity();
    if (!(current.level === 'lockdown' && current.reason === 'camera')) {
      this.securityBeforeCamera = current;
    }
    this.deps.timeline.add('camera', cause === 'dark' ? 'Camera covered' : 'Camera unavailable');
    this.broadcast('camera_event', { event: 'blocked', cause });
    this.state.setSecurity({ level: 'lockdown', reason: 'camera' });
    this.say(MESSAGES.cameraBlocked);
  }

  private handleCameraRestored(): void {
    this.deps.timeline.add('camera', 'Camera restored');
    this.broadcast('camera_event', { event: 'restored' });
    const current = this.state.getSecurity();
    if (current.level === 'lockdown' && current.reason === 'camera') {
      this.state.setSecurity(this.securityBeforeCamera ?? { level: 'normal' });
      this.securityBeforeCamera = null;
    }
    this.say(MESSAGES.cameraRestored);
  }

  // ============== Pipeline ==============

  private async runSession(sessionId: string): Promise<void> {
    let reply: Reply;
    try {
      reply = await this.runStages(sessionId);
    } catch (err) {
      reply = this.failureReply(err, sessionId);
    }

    try {
      this.state.setOutcome(reply.outcome);
      if (reply.message) {
        this.state.advance('speaking');
        this.say(reply.message, sessionId);
        await this.deps.speech.drain();
      }
    } catch (err) {
      logger.error('Orchestrator', 'Failed to deliver reply', err, sessionId);
    } finally {
      await this.restoreListeners(sessionId);
      this.state.endSession(reply.outcome);
    }
  }

  /**
   * Recording through dispatch. Returns what to say; throws on failures that
   * abort the cycle.
   */
  private async runStages(sessionId: string): Promise<Reply> {
    const { guards, wakeListener, recorder, transcription, dispatcher, timeline } = this.deps;

    // Keep the listener paused for the whole cycle so our own reply cannot wake us
    const stoodDown = await wakeListener.standDown();
    if (!stoodDown) {
      logger.warn('Orchestrator', 'Wake listener did not stand down cleanly', undefined, sessionId);
    }

    const acquired = await guards.mic.acquire('exclusive', HOLDER);
    if (acquired.status === 'busy') {
      logger.warn('Orchestrator', `Microphone busy (${acquired.heldBy}); aborting cycle`, undefined, sessionId);
      return { outcome: 'busy', message: null };
    }

    const lease = acquired.lease;
    this.state.trackLease(lease);
    let recording: Recording;
    try {
      this.state.advance('recording');
      recording = await recorder.record(lease, this.options.commandDurationSec, sessionId);
    } finally {
      await guards.mic.release(lease);
      this.state.untrackLease(lease);
    }
    this.state.updateSession({ recording });

    const verdict = await this.verifyIdentity(recording, sessionId);
    if (!verdict.verified) {
      this.declareIntruder(sessionId);
      return { outcome: 'intruder', message: MESSAGES.intruder };
    }
    if (verdict.checked) {
      this.clearIdentityLockdown();
    }

    this.state.advance('transcribing');
    let text: string;
    try {
      text = await transcription.transcribe(recording, sessionId);
    } catch (err) {
      if (err instanceof TranscriptionEmptyError) {
        logger.warn('Orchestrator', 'Transcription empty', undefined, sessionId);
        timeline.add('system', 'Nothing understood', sessionId);
        return { outcome: 'no_speech', message: MESSAGES.noSpeech };
      }
      throw err;
    }
    this.state.updateSession({ transcript: text });
    timeline.add('user', text, sessionId);

    this.state.advance('dispatching');
    const result = await guardCollaborator('command dispatcher', () => dispatcher.dispatch(text));
    logger.info('Orchestrator', `Dispatched: ${result.intentExecuted ?? 'no intent'}`, result, sessionId);
    if (result.error) {
      timeline.add('error', `Command failed: ${result.error}`, sessionId);
    }
    if (result.security) {
      this.applySecurityRequest(result.security, sessionId);
    }
    return { outcome: 'completed', message: result.spokenMessage.trim() || null };
  }

  /**
   * Voice first. Face runs as the fallback when voice fails, or as the only
   * check when just a face is enrolled. Missing profiles skip their check.
   */
  private async verifyIdentity(recording: Recording, sessionId: string): Promise<IdentityVerdict> {
    const { profiles, verifier } = this.deps;
    const voiceProfile = profiles.get('voice');
    const faceProfile = profiles.get('face');
    const results: VerificationResult[] = [];

    if (!voiceProfile && !faceProfile) {
      logger.info('Orchestrator', 'No biometrics enrolled; identity checks skipped', undefined, sessionId);
      return { verified: true, checked: false };
    }

    if (voiceProfile) {
      this.state.advance('verifying_voice');
      const voice = await verifier.verifyVoice(recording, voiceProfile, sessionId);
      results.push(voice);
      this.state.updateSession({ verifications: [...results] });
      if (voice.matched) {
        return { verified: true, checked: true };
      }
      if (!faceProfile) {
        return { verified: false, checked: true };
      }
      logger.info('Orchestrator', 'Voice check failed; escalating to face', undefined, sessionId);
    } else {
      logger.info('Orchestrator', 'No voice profile; face is the only check', undefined, sessionId);
    }

    if (!faceProfile) {
      return { verified: false, checked: true };
    }

    this.state.advance('verifying_face');
    const face = await this.checkFace(faceProfile, sessionId);
    results.push(face);
    this.state.updateSession({ verifications: [...results] });
    return { verified: face.matched, checked: true };
  }

  private async checkFace(profile: BiometricProfile, sessionId: string): Promise<VerificationResult> {
    try {
      return await this.deps.verifier.verifyFace(profile, {
        frameTimeoutMs: this.options.faceFrameTimeoutMs,
        maxAttempts: this.options.faceMaxAttempts,
        sessionId,
      });
    } catch (err) {
      if (err instanceof ResourceBusyError || err instanceof DeviceUnavailableError || err instanceof ResourceDegradedError) {
        logger.warn('Orchestrator', 'Face check unavailable', err, sessionId);
        return { modality: 'face', similarity: -1, matched: false };
      }
      throw err;
    }
  }

  private failureReply(err: unknown, sessionId: string): Reply {
    const error = toCollaboratorError('pipeline', err);
    logger.error('Orchestrator', `Cycle aborted: ${error.message}`, error, sessionId);

    if (error instanceof ResourceBusyError) {
      return { outcome: 'busy', message: null };
    }
    if (error instanceof DeviceUnavailableError || error instanceof ResourceDegradedError) {
      this.deps.timeline.add('error', error.message, sessionId);
      return { outcome: 'device_error', message: MESSAGES.generic };
    }
    if (error instanceof CollaboratorError) {
      this.deps.timeline.add('error', error.message, sessionId);
      return { outcome: 'collaborator_error', message: MESSAGES.trouble };
    }
    this.deps.timeline.add('error', error.message, sessionId);
    return { outcome: 'device_error', message: MESSAGES.generic };
  }

  /**
   * Runs on every exit path: hand back anything the session still holds,
   * then bring the background workers back.
   */
  private async restoreListeners(sessionId: string): Promise<void> {
    const session = this.state.getSession();
    for (const lease of session?.leases ?? []) {
      logger.warn('Orchestrator', `Releasing leftover ${lease.kind} lease`, undefined, sessionId);
      await this.deps.guards[lease.kind].release(lease);
      this.state.untrackLease(lease);
    }

    const listening = await this.deps.wakeListener.rearm();
    if (!listening) {
      logger.error('Orchestrator', 'Wake listener could not resume', undefined, sessionId);
    }
    const watching = await this.deps.cameraMonitor.resume();
    if (!watching) {
      logger.error('Orchestrator', 'Camera monitor could not resume', undefined, sessionId);
    }
  }

  // ============== Security ==============

  private declareIntruder(sessionId: string): void {
    logger.warn('Orchestrator', 'INTRUDER DETECTED - Access denied', undefined, sessionId);
    this.deps.timeline.add('security', 'Intruder detected, access denied', sessionId);
    const current = this.state.getSecurity();
    if (current.level === 'lockdown' && current.reason === 'camera') {
      this.securityBeforeCamera = { level: 'lockdown', reason: 'identity' };
      return;
    }
    this.state.setSecurity({ level: 'lockdown', reason: 'identity' });
  }

  private clearIdentityLockdown(): void {
    const current = this.state.getSecurity();
    if (current.level === 'lockdown' && current.reason === 'identity') {
      this.state.setSecurity({ level: 'normal' });
    }
  }

  private applySecurityRequest(request: 'elevate' | 'normal', sessionId: string): void {
    const next: SecurityState = request === 'elevate' ? { level: 'elevated', reason: 'owner request' } : { level: 'normal' };
    const current = this.state.getSecurity();
    if (current.level === 'lockdown' && current.reason === 'camera') {
      this.securityBeforeCamera = next;
      return;
    }
    this.deps.timeline.add('security', request === 'elevate' ? 'Entered security mode' : 'Returned to normal mode', sessionId);
    this.state.setSecurity(next);
  }

  /**
   * Clear an identity alarm or security mode from the UI. A covered camera
   * keeps its lockdown until it is uncovered.
   */
  clearSecurity(): boolean {
    const current = this.state.getSecurity();
    if (current.level === 'lockdown' && current.reason === 'camera') {
      this.securityBeforeCamera = { level: 'normal' };
      return false;
    }
    this.deps.timeline.add('security', 'Security cleared by operator');
    this.state.setSecurity({ level: 'normal' });
    return true;
  }

  // ============== Resources ==============

  async resetResource(kind: ResourceKind): Promise<boolean> {
    const ok = await this.deps.guards[kind].reset();
    this.deps.timeline.add('system', ok ? `The ${kind} was reset` : `The ${kind} is still unavailable`);
    return ok;
  }

  // ============== Enrollment ==============

  /**
   * Record a new owner profile. Refused while a session is running; wakes are
   * dropped until it finishes.
   */
  async enroll(modality: Modality): Promise<BiometricProfile> {
    const kind: ResourceKind = modality === 'voice' ? 'mic' : 'camera';
    if (this.enrolling) {
      throw new ResourceBusyError(kind, 'enrollment');
    }
    if (!this.state.isIdle()) {
      throw new ResourceBusyError(kind, 'session');
    }

    const { guards, recorder, enrollment, profiles, wakeListener, timeline } = this.deps;
    this.enrolling = true;
    timeline.add('system', `Enrolling ${modality}`);
    try {
      let profile: BiometricProfile;
      if (modality === 'voice') {
        await wakeListener.standDown();
        profile = await enrollVoice(
          { micGuard: guards.mic, recorder, embedder: enrollment.voiceEmbedder },
          { samples: this.options.enrollVoiceSamples, durationSec: this.options.commandDurationSec },
        );
      } else {
        profile = await enrollFace(
          { cameraGuard: guards.camera, camera: enrollment.camera, embedder: enrollment.faceEmbedder },
          { frames: this.options.enrollFaceFrames, frameTimeoutMs: this.options.faceFrameTimeoutMs },
        );
      }
      await profiles.save(profile);
      timeline.add('security', `${modality} profile enrolled from ${profile.samples} sample(s)`);
      this.say(MESSAGES.enrolled(modality));
      return profile;
    } catch (err) {
      const error = toCollaboratorError('enrollment', err);
      timeline.add('error', `Enrollment failed: ${error.message}`);
      throw error;
    } finally {
      this.enrolling = false;
      if (modality === 'voice') {
        await wakeListener.rearm();
      }
    }
  }

  // ============== Client Message Handling ==============

  /**
   * Handle message from a control client
   */
  async handleClientMessage(message: unknown): Promise<void> {
    const parsed = clientMessageSchema.safeParse(message);
    if (!parsed.success) {
      logger.warn('Orchestrator', 'Invalid client message', parsed.error.issues);
      this.broadcast('error', { message: 'Invalid message' });
      return;
    }

    const msg = parsed.data;
    logger.debug('Orchestrator', `Client message: ${msg.type}`, msg);
    const simulator = this.deps.simulator;

    switch (msg.type) {
      case 'wake':
        this.wake('ui');
        break;

      case 'clear_security':
        this.clearSecurity();
        break;

      case 'reset_resource':
        await this.resetResource(msg.payload.kind);
        break;

      case 'enroll':
        try {
          await this.enroll(msg.payload.modality);
        } catch (err) {
          this.broadcast('error', { message: describeError(err) });
        }
        break;

      case 'say_wake_phrase':
      case 'inject_transcript':
      case 'simulate_camera':
        if (!simulator) {
          logger.warn('Orchestrator', `${msg.type} needs the mock devices`);
          this.broadcast('error', { message: 'Simulation is not available with real devices' });
          break;
        }
        if (msg.type === 'say_wake_phrase') {
          simulator.triggerWake();
        } else if (msg.type === 'inject_transcript') {
          simulator.injectTranscript(msg.payload.text);
        } else {
          if (msg.payload.covered !== undefined) simulator.setCameraCovered(msg.payload.covered);
          if (msg.payload.failing !== undefined) simulator.setCameraFailing(msg.payload.failing);
        }
        break;
    }
  }

  // ============== Output ==============

  /**
   * Nothing running, nothing queued to say and no lockdown.
   */
  private isQuiet(): boolean {
    const { speech } = this.deps;
    return (
      this.state.isIdle() &&
      !this.enrolling &&
      this.state.getSecurity().level !== 'lockdown' &&
      speech.pending() === 0 &&
      !speech.isSpeaking()
    );
  }

  private say(text: string, sessionId?: string): void {
    this.deps.timeline.add('system', text, sessionId);
    this.deps.speech.speak(text);
  }

  private broadcast(type: ServerMessage['type'], payload: unknown, sessionId?: string): void {
    const message: ServerMessage = sessionId ? { type, payload, ts: Date.now(), sessionId } : { type, payload, ts: Date.now() };
    this.emit('broadcast', message);
  }

  // ============== Status ==============

  getSecurity(): SecurityState {
    return this.state.getSecurity();
  }

  getStage(): PipelineStage {
    return this.state.getStage();
  }

  getDroppedWakes(): number {
    return this.droppedWakes;
  }

  getStatus(): {
    stage: PipelineStage;
    security: SecurityState;
    securityLabel: string;
    session: ReturnType<typeof summarizeSession> | null;
    enrolling: boolean;
    droppedWakes: number;
    wakeListener: string;
    cameraMonitor: { state: string; obstruction: string };
    resources: ResourceSnapshot[];
    profiles: Record<Modality, boolean>;
    speechPending: number;
  } {
    const { guards, wakeListener, cameraMonitor, profiles, speech } = this.deps;
    const session = this.state.getSession();
    const security = this.state.getSecurity();
    return {
      stage: this.state.getStage(),
      security,
      securityLabel: describeSecurity(security),
      session: session ? summarizeSession(session) : null,
      enrolling: this.enrolling,
      droppedWakes: this.droppedWakes,
      wakeListener: wakeListener.getState(),
      cameraMonitor: { state: cameraMonitor.getState(), obstruction: cameraMonitor.getObstruction() },
      resources: Object.values(guards).map((guard) => guard.snapshot()),
      profiles: { voice: profiles.has('voice'), face: profiles.has('face') },
      speechPending: speech.pending(),
    };
  }
}

function summarizeSession(session: Readonly<PipelineSession>): {
  id: string;
  stage: PipelineStage;
  source: WakeSource;
  startedAt: number;
  leases: string[];
  verifications: VerificationResult[];
  transcript: string | null;
  outcome: SessionOutcome | null;
} {
  return {
    id: session.id,
    stage: session.stage,
    source: session.source,
    startedAt: session.startedAt,
    leases: session.leases.map((l) => `${l.kind}:${l.holder}`),
    verifications: session.verifications,
    transcript: session.transcript,
    outcome: session.outcome,
  };
}

function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
