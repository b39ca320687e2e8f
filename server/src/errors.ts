import type { ResourceKind } from './types/index.js';

export class VigilError extends Error {
  constructor(message: string, public readonly code: string, public readonly details?: unknown) {
    super(message);
    this.name = 'VigilError';
  }
}

export class ResourceBusyError extends VigilError {
  constructor(kind: ResourceKind, heldBy: string) {
    super(`The ${kind} is busy (held by ${heldBy}).`, 'RESOURCE_BUSY', { kind, heldBy });
    this.name = 'ResourceBusyError';
  }
}

export class DeviceUnavailableError extends VigilError {
  constructor(kind: ResourceKind, originalError?: unknown) {
    super(`The ${kind} could not be opened or read.`, 'DEVICE_UNAVAILABLE', { kind, originalError });
    this.name = 'DeviceUnavailableError';
  }
}

export class ResourceDegradedError extends VigilError {
  constructor(kind: ResourceKind) {
    super(`The ${kind} is degraded and needs a manual reset.`, 'RESOURCE_DEGRADED', { kind });
    this.name = 'ResourceDegradedError';
  }
}

export class TranscriptionEmptyError extends VigilError {
  constructor() {
    super('No speech was understood.', 'TRANSCRIPTION_EMPTY');
    this.name = 'TranscriptionEmptyError';
  }
}

export class CollaboratorError extends VigilError {
  constructor(collaborator: string, originalError: unknown) {
    const reason = originalError instanceof Error ? originalError.message : String(originalError);
    super(`${collaborator} failed: ${reason}`, 'COLLABORATOR_ERROR', { collaborator, originalError });
    this.name = 'CollaboratorError';
  }
}

export class ProfileCorruptError extends VigilError {
  constructor(file: string, issues: unknown) {
    super(`Profile file ${file} is malformed.`, 'PROFILE_CORRUPT', { file, issues });
    this.name = 'ProfileCorruptError';
  }
}

/**
 * Wraps anything thrown by an external collaborator. Errors from the resource
 * layer pass through so the orchestrator can still tell them apart.
 */
export function toCollaboratorError(collaborator: string, err: unknown): VigilError {
  if (err instanceof VigilError) return err;
  return new CollaboratorError(collaborator, err);
}

/**
 * Runs a collaborator call and normalizes whatever it throws.
 */
export async function guardCollaborator<T>(collaborator: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw toCollaboratorError(collaborator, err);
  }
}
