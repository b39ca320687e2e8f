/**
 * Command dispatch collaborator
 * Turns recognised text into a side effect and a message to speak.
 *
 * The orchestrator only depends on CommandDispatcher; the keyword dispatcher
 * below is the default, replaceable by an LLM or workflow engine.
 */

import { logger } from '../utils/logger.js';
import type { DispatchResult } from '../types/index.js';

export interface CommandDispatcher {
  dispatch(text: string): Promise<DispatchResult>;
}

export interface Note {
  text: string;
  ts: number;
}

export interface NoteStore {
  add(text: string): Promise<Note>;
  list(): Promise<Note[]>;
}

export class InMemoryNoteStore implements NoteStore {
  private notes: Note[] = [];

  async add(text: string): Promise<Note> {
    const note = { text, ts: Date.now() };
    this.notes.push(note);
    return note;
  }

  async list(): Promise<Note[]> {
    return [...this.notes];
  }
}

const NOTE_PREFIXES = ['note that', 'note this', 'note', 'remember that', 'remember'];

function formatClock(date: Date): string {
  const hh = String(date.getHours()).padStart(2, '0');
  const mm = String(date.getMinutes()).padStart(2, '0');
  return `${hh}:${mm}`;
}

export class KeywordCommandDispatcher implements CommandDispatcher {
  constructor(
    private readonly notes: NoteStore,
    private readonly wakePhrase: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async dispatch(text: string): Promise<DispatchResult> {
    const lowered = text.toLowerCase().trim();
    logger.debug('Commands', `Dispatching "${lowered}"`);

    if (lowered.includes('enter security mode') || lowered.includes('security alert')) {
      return this.ok('security_mode', 'Entering security mode. All systems on high alert.', 'elevate');
    }

    if (lowered.includes('normal mode') || lowered.includes('stand down')) {
      return this.ok('normal_mode', 'Returning to normal operational mode.', 'normal');
    }

    if ((lowered.includes('note') || lowered.includes('remember')) && !lowered.includes('notepad') && !lowered.includes('note pad')) {
      return this.takeNote(text, lowered);
    }

    if (lowered.includes('time is it') || lowered.includes('current time')) {
      return this.ok('time', `It is ${formatClock(this.now())}.`);
    }

    if (lowered.includes('how are you') || lowered.includes('are you there')) {
      return this.ok('smalltalk', 'Online and fully operational. How can I assist you?');
    }

    if (lowered.includes(this.wakePhrase.toLowerCase())) {
      return this.ok('smalltalk', "You called, I'm listening.");
    }

    return {
      spokenMessage: "I'm still learning. I didn't understand that command yet.",
      intentExecuted: null,
      error: null,
    };
  }

  private async takeNote(text: string, lowered: string): Promise<DispatchResult> {
    let noteText = text.trim();
    for (const prefix of NOTE_PREFIXES) {
      const idx = lowered.indexOf(prefix);
      if (idx >= 0) {
        noteText = text.trim().slice(idx + prefix.length).trim();
        break;
      }
    }
    if (!noteText) {
      return { spokenMessage: 'What should I note down?', intentExecuted: null, error: 'empty_note' };
    }
    try {
      await this.notes.add(noteText);
    } catch (err) {
      logger.error('Commands', 'Failed to store note', err);
      return { spokenMessage: "I couldn't save that note.", intentExecuted: null, error: 'note_store_failed' };
    }
    return this.ok('note', `I'll remember that: ${noteText}`);
  }

  private ok(intent: string, spokenMessage: string, security?: DispatchResult['security']): DispatchResult {
    return security
      ? { spokenMessage, intentExecuted: intent, error: null, security }
      : { spokenMessage, intentExecuted: intent, error: null };
  }
}
