/**
 * Logger Utility
 * Traces all events with timestamps and session IDs
 * Saves logs to file for debugging
 */

import * as fs from 'fs';
import * as path from 'path';
import { ENV } from '../config/env.js';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export interface LogEntry {
  level: LogLevel;
  category: string;
  message: string;
  data?: unknown;
  ts: number;
  sessionId?: string;
}

// Empty LOG_DIR keeps logs on the console only
let logFile: string | null = ENV.LOG_DIR
  ? path.join(ENV.LOG_DIR, `vigil-${new Date().toISOString().slice(0, 10)}.log`)
  : null;

if (ENV.LOG_DIR) {
  try {
    if (!fs.existsSync(ENV.LOG_DIR)) {
      fs.mkdirSync(ENV.LOG_DIR, { recursive: true });
    }
  } catch (e) {
    console.error('Failed to create log directory, file logging disabled:', e);
    logFile = null;
  }
}

// Event listeners for log streaming to clients
type LogListener = (entry: LogEntry) => void;
const listeners: Set<LogListener> = new Set();

export function addLogListener(listener: LogListener): () => void {
  listeners.add(listener);
  return () => listeners.delete(listener);
}

function formatTime(ts: number): string {
  const d = new Date(ts);
  return d.toISOString().slice(11, 23); // HH:mm:ss.SSS
}

function isSampleArray(value: unknown): value is Float32Array | Int16Array | Uint8Array {
  return value instanceof Float32Array || value instanceof Int16Array || value instanceof Uint8Array;
}

// Simplify data for logging (sample buffers and embeddings are summarized)
function simplifyData(data: unknown): unknown {
  if (data === undefined || data === null) return data;

  if (data instanceof Error) {
    return { name: data.name, message: data.message };
  }

  if (isSampleArray(data)) {
    return `[${data.constructor.name} ${data.length}]`;
  }

  if (typeof data === 'string') {
    return data.length > 500 ? data.slice(0, 500) + '...' : data;
  }

  if (typeof data === 'object') {
    if (Array.isArray(data)) {
      if (data.length > 16 && data.every((v) => typeof v === 'number')) {
        return `[number[] ${data.length}]`;
      }
      return data.slice(0, 10).map(simplifyData);
    }
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      result[key] = simplifyData(value);
    }
    return result;
  }

  return data;
}

function writeToFile(line: string): void {
  if (!logFile) return;
  try {
    fs.appendFileSync(logFile, line);
  } catch (e) {
    console.error('Failed to write log file, file logging disabled:', e);
    logFile = null;
  }
}

function emit(entry: LogEntry): void {
  const prefix = `[${formatTime(entry.ts)}] [${entry.level}] [${entry.category}]`;
  const sessionInfo = entry.sessionId ? ` (session:${entry.sessionId.slice(0, 8)})` : '';

  const logFn = entry.level === 'ERROR' ? console.error :
                entry.level === 'WARN' ? console.warn :
                console.log;

  const simplifiedData = simplifyData(entry.data);

  if (simplifiedData !== undefined) {
    logFn(`${prefix}${sessionInfo} ${entry.message}`, simplifiedData);
  } else {
    logFn(`${prefix}${sessionInfo} ${entry.message}`);
  }

  const dataStr = simplifiedData !== undefined ? ` ${JSON.stringify(simplifiedData)}` : '';
  writeToFile(`${prefix}${sessionInfo} ${entry.message}${dataStr}\n`);

  // Notify listeners (with simplified data)
  listeners.forEach(l => l({ ...entry, data: simplifiedData }));
}

export function debug(category: string, message: string, data?: unknown, sessionId?: string): void {
  if (!ENV.DEBUG) return;
  emit({ level: 'DEBUG', category, message, data, ts: Date.now(), sessionId });
}

export function info(category: string, message: string, data?: unknown, sessionId?: string): void {
  emit({ level: 'INFO', category, message, data, ts: Date.now(), sessionId });
}

export function warn(category: string, message: string, data?: unknown, sessionId?: string): void {
  emit({ level: 'WARN', category, message, data, ts: Date.now(), sessionId });
}

export function error(category: string, message: string, data?: unknown, sessionId?: string): void {
  emit({ level: 'ERROR', category, message, data, ts: Date.now(), sessionId });
}

export const logger = { debug, info, warn, error, addLogListener };
