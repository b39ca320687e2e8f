import { describe, expect, it } from 'vitest';
import { StateMachine, describeSecurity } from '../StateMachine.js';
import type { PipelineSession, PipelineStage, SecurityState } from '../../types/index.js';

describe('StateMachine', () => {
  it('walks a full session and returns to idle', () => {
    const state = new StateMachine();
    const stages: PipelineStage[] = [];
    const ended: PipelineSession[] = [];
    state.on('stageChange', (stage: PipelineStage) => stages.push(stage));
    state.on('sessionEnd', (session: PipelineSession) => ended.push(session));

    state.beginSession('voice');
    for (const stage of ['recording', 'verifying_voice', 'transcribing', 'dispatching', 'speaking'] as const) {
      state.advance(stage);
    }
    state.endSession('completed');

    expect(stages).toEqual(['awake', 'recording', 'verifying_voice', 'transcribing', 'dispatching', 'speaking', 'idle']);
    expect(ended).toHaveLength(1);
    expect(ended[0]?.outcome).toBe('completed');
    expect(state.getSession()).toBeNull();
    expect(state.isIdle()).toBe(true);
  });

  it('rejects an illegal transition', () => {
    const state = new StateMachine();
    state.beginSession('ui');

    expect(() => state.advance('dispatching')).toThrow('Illegal pipeline transition: awake -> dispatching');
  });

  it('refuses a wake while a session is running or the camera is in lockdown', () => {
    const state = new StateMachine();
    state.beginSession('voice');
    expect(state.canAcceptWake()).toEqual({ accepted: false, reason: 'session active (awake)' });
    expect(() => state.beginSession('voice')).toThrow('Cannot begin session');
    state.endSession('busy');

    state.setSecurity({ level: 'lockdown', reason: 'camera' });
    expect(state.canAcceptWake()).toEqual({ accepted: false, reason: 'camera lockdown' });

    state.setSecurity({ level: 'lockdown', reason: 'identity' });
    expect(state.canAcceptWake()).toEqual({ accepted: true });
  });

  it('keeps an outcome set during the session', () => {
    const state = new StateMachine();
    state.beginSession('voice');
    state.setOutcome('intruder');

    const ended = state.endSession('completed');

    expect(ended?.outcome).toBe('intruder');
  });

  it('tracks leases held by the session', () => {
    const state = new StateMachine();
    state.beginSession('voice');
    const lease = { id: 'mic_1', kind: 'mic' as const, holder: 'orchestrator', priority: 'exclusive' as const };

    state.trackLease(lease);
    expect(state.getSession()?.leases).toEqual([lease]);
    state.untrackLease(lease);
    expect(state.getSession()?.leases).toEqual([]);
  });

  it('emits securityChange only on an actual change', () => {
    const state = new StateMachine();
    const changes: string[] = [];
    state.on('securityChange', (next: SecurityState) => changes.push(describeSecurity(next)));

    state.setSecurity({ level: 'elevated', reason: 'owner request' });
    state.setSecurity({ level: 'elevated', reason: 'owner request' });
    state.setSecurity({ level: 'normal' });

    expect(changes).toEqual(['elevated(owner request)', 'normal']);
  });
});
