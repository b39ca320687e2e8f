/**
 * Timeline
 * Bounded in-memory history of what the assistant heard, said and noticed.
 */

import { EventEmitter } from 'events';
import type { TimelineEntry, TimelineKind } from '../types/index.js';

export class Timeline extends EventEmitter {
  private entries: TimelineEntry[] = [];

  constructor(private readonly limit: number) {
    super();
  }

  add(kind: TimelineKind, text: string, sessionId?: string): TimelineEntry {
    const entry: TimelineEntry = sessionId ? { ts: Date.now(), kind, text, sessionId } : { ts: Date.now(), kind, text };
    this.entries.push(entry);
    if (this.entries.length > this.limit) {
      this.entries.splice(0, this.entries.length - this.limit);
    }
    this.emit('entry', entry);
    return entry;
  }

  list(): TimelineEntry[] {
    return [...this.entries];
  }
}
