import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { IdleCompanion } from '../IdleCompanion.js';
import { MESSAGES, idlePrompt, timeOfDay } from '../../orchestrator/messages.js';

const MORNING = new Date(2024, 0, 15, 10, 0);
const LATE = new Date(2024, 0, 15, 23, 30);

describe('messages by time of day', () => {
  it('buckets the hours', () => {
    expect([5, 11, 12, 16, 17, 21, 22, 4].map((hour) => timeOfDay(new Date(2024, 0, 15, hour)))).toEqual([
      'morning',
      'morning',
      'afternoon',
      'afternoon',
      'evening',
      'evening',
      'night',
      'night',
    ]);
  });

  it('greets according to the hour', () => {
    expect(MESSAGES.greeting('Sam', MORNING)).toBe('Good morning, Sam. Vigil online and standing by.');
    expect(MESSAGES.greeting('Sam', LATE)).toBe('Late session, Sam? Vigil online and watching your back.');
  });

  it('picks idle prompts from the pool for the hour', () => {
    expect(idlePrompt(MORNING, 0)).toBe("You've been quiet for a while. Need any help?");
    expect(idlePrompt(LATE, 0.99)).toBe('If you need anything, just say my name.');
  });
});

describe('IdleCompanion', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  function setup(open: { value: boolean }) {
    const companion = new IdleCompanion(() => open.value, {
      minDelayMs: 1000,
      maxDelayMs: 3000,
      random: () => 0,
      clock: () => MORNING,
    });
    const prompts: string[] = [];
    companion.on('prompt', (text: string) => prompts.push(text));
    return { companion, prompts };
  }

  it('speaks up once per interval while the gate is open', () => {
    const { companion, prompts } = setup({ value: true });
    companion.start();

    vi.advanceTimersByTime(999);
    expect(prompts).toEqual([]);

    vi.advanceTimersByTime(1);
    expect(prompts).toEqual(["You've been quiet for a while. Need any help?"]);

    vi.advanceTimersByTime(1000);
    expect(prompts).toHaveLength(2);
    companion.stop();
  });

  it('skips a tick while the gate is closed and tries again on the next one', () => {
    const gate = { value: false };
    const { companion, prompts } = setup(gate);
    companion.start();

    vi.advanceTimersByTime(1000);
    expect(prompts).toEqual([]);

    gate.value = true;
    vi.advanceTimersByTime(1000);
    expect(prompts).toHaveLength(1);
    companion.stop();
  });

  it('stays silent after stop', () => {
    const { companion, prompts } = setup({ value: true });
    companion.start();
    companion.stop();

    vi.advanceTimersByTime(10_000);

    expect(prompts).toEqual([]);
    expect(companion.isRunning()).toBe(false);
  });

  it('waits somewhere between the minimum and maximum delay', () => {
    const companion = new IdleCompanion(() => true, {
      minDelayMs: 1000,
      maxDelayMs: 3000,
      random: () => 0.5,
      clock: () => MORNING,
    });
    const prompts: string[] = [];
    companion.on('prompt', (text: string) => prompts.push(text));
    companion.start();

    vi.advanceTimersByTime(1999);
    expect(prompts).toEqual([]);
    vi.advanceTimersByTime(1);
    expect(prompts).toEqual(["I'm monitoring your system. Everything looks stable."]);
    companion.stop();
  });
});
