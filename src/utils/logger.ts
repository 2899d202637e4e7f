/**
 * Live execution logger for webshots.
 *
 * All output goes to stderr so stdout stays clean for JSON output.
 * Emoji prefixes give instant visual context in the terminal.
 * The level is fixed when the logger is created and the logger is
 * passed explicitly to whatever needs it.
 */

import type { LogLevel } from '../schema/config.js';

// ── Public types ─────────────────────────────────────────────

export interface Logger {
  readonly level: LogLevel;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  section(title: string): void;
  step(index: number, total: number, description: string): void;
  stepResult(index: number, total: number, success: boolean, description: string): void;
  login(message: string): void;
  worker(message: string): void;
}

export type LogSink = (line: string) => void;

const LEVEL_ORDER: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

// ── Core write ──────────────────────────────────────────────

function writeStderr(line: string): void {
  process.stderr.write(line + '\n');
}

// ── Factory ──────────────────────────────────────────────────

export function createLogger(level: LogLevel, sink: LogSink = writeStderr): Logger {
  const enabled = (at: LogLevel): boolean => LEVEL_ORDER[at] >= LEVEL_ORDER[level];
  const emit = (at: LogLevel, line: string): void => {
    if (enabled(at)) sink(line);
  };

  return {
    level,

    debug(message: string): void {
      emit('debug', `🔎 ${message}`);
    },

    info(message: string): void {
      emit('info', `ℹ️  ${message}`);
    },

    warn(message: string): void {
      emit('warn', `⚠️  ${message}`);
    },

    error(message: string): void {
      emit('error', `💥 ${message}`);
    },

    section(title: string): void {
      emit('info', `\n${'─'.repeat(50)}`);
      emit('info', `▶  ${title}`);
      emit('info', `${'─'.repeat(50)}`);
    },

    step(index: number, total: number, description: string): void {
      emit('info', `📋 [${String(index + 1)}/${String(total)}] ${description}`);
    },

    stepResult(index: number, total: number, success: boolean, description: string): void {
      const icon = success ? '✅' : '❌';
      emit(success ? 'info' : 'warn', `${icon} [${String(index + 1)}/${String(total)}] ${description}`);
    },

    login(message: string): void {
      emit('info', `🔐 ${message}`);
    },

    worker(message: string): void {
      emit('debug', `🛠️  ${message}`);
    },
  };
}

/** Logger that drops everything; handy for callers that must pass one. */
export const silentLogger: Logger = createLogger('error', () => {});
