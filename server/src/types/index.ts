/**
 * Shared Types for Vigil
 */

// ============== Resources ==============

export type ResourceKind = 'mic' | 'speaker' | 'camera';

export type LeasePriority = 'background' | 'exclusive';

export type LeaseStatus = 'active' | 'paused' | 'released';

export type ResourceHealth = 'ok' | 'degraded';

export interface ResourceLease {
  readonly id: string;
  readonly kind: ResourceKind;
  readonly holder: string;
  readonly priority: LeasePriority;
}

/**
 * Implemented by background lessees. The guard awaits these when the lease is
 * preempted or handed back; a rejection marks the resource degraded.
 */
export interface PreemptibleHolder {
  onPause(): Promise<void>;
  onResume(): Promise<void>;
}

export type AcquireResult =
  | { status: 'granted'; lease: ResourceLease }
  | { status: 'busy'; heldBy: string };

export interface ResourceSnapshot {
  kind: ResourceKind;
  health: ResourceHealth;
  exclusiveHolder: string | null;
  background: { holder: string; status: LeaseStatus; held: boolean } | null;
}

// ============== Audio / Video ==============

export interface Recording {
  samples: Float32Array;
  sampleRate: number;
}

export interface Frame {
  width: number;
  height: number;
  channels: 1 | 3;
  data: Uint8Array;
  ts: number;
}

export interface BoundingBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface DetectedFace {
  box: BoundingBox;
  embedding: Float32Array;
}

// ============== Identity ==============

export type Modality = 'voice' | 'face';

export interface BiometricProfile {
  modality: Modality;
  vector: Float32Array;
  samples: number;
  createdAt: number;
}

export interface VerificationResult {
  modality: Modality;
  similarity: number;     // cosine, [-1, 1]
  matched: boolean;
  attempts?: number;      // face path only
  reason?: 'no-embedding' | 'no-face';
}

// ============== Pipeline ==============

export type PipelineStage =
  | 'idle'
  | 'awake'
  | 'recording'
  | 'verifying_voice'
  | 'verifying_face'
  | 'transcribing'
  | 'dispatching'
  | 'speaking';

export type WakeSource = 'voice' | 'ui';

export type SessionOutcome =
  | 'completed'
  | 'no_speech'
  | 'intruder'
  | 'busy'
  | 'collaborator_error'
  | 'device_error';

export interface PipelineSession {
  id: string;
  stage: PipelineStage;
  source: WakeSource;
  startedAt: number;
  leases: ResourceLease[];
  recording: Recording | null;
  verifications: VerificationResult[];
  transcript: string | null;
  outcome: SessionOutcome | null;
}

// ============== Security ==============

export type LockdownReason = 'identity' | 'camera';

export type SecurityState =
  | { level: 'normal' }
  | { level: 'elevated'; reason: string }
  | { level: 'lockdown'; reason: LockdownReason };

// ============== Camera ==============

export type ObstructionState = 'clear' | 'obstructed';

export type BlockedCause = 'dark' | 'unavailable';

// ============== Commands ==============

export interface DispatchResult {
  spokenMessage: string;
  intentExecuted: string | null;
  error: string | null;
  security?: 'elevate' | 'normal';
}

// ============== Timeline ==============

export type TimelineKind = 'system' | 'user' | 'security' | 'camera' | 'note' | 'error' | 'friend';

export interface TimelineEntry {
  ts: number;
  kind: TimelineKind;
  text: string;
  sessionId?: string;
}

// ============== WebSocket Messages ==============

export type ServerEventType =
  | 'status'            // Full status snapshot
  | 'stage_change'      // Pipeline stage changed
  | 'security_change'   // Security overlay changed
  | 'camera_event'      // Camera blocked / restored
  | 'resource_change'   // Lease or health changed
  | 'utterance'         // Something was queued for speech
  | 'timeline_entry'    // Timeline appended
  | 'log'               // Debug log message
  | 'error';            // Error message

// Server -> Client
export interface ServerMessage {
  type: ServerEventType;
  payload: unknown;
  ts: number;
  sessionId?: string;
}
