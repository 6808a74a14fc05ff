// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
/**
 * Diagnostic sink handed to every pipeline stage. One sink lives for one
 * generation run.
 */
export interface DiagnosticSink {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export type LogLevel = "info" | "warn" | "error";

export interface LogEntry {
  level: LogLevel;
  message: string;
}

/**
 * Sink that collects entries in memory. Useful for tests and for callers
 * that want to render diagnostics themselves.
 */
export interface MemorySink extends DiagnosticSink {
  readonly entries: LogEntry[];
  /** Messages logged at the given level, in order. */
  messages(level: LogLevel): string[];
}

export function createMemorySink(): MemorySink {
  const entries: LogEntry[] = [];
  return {
    entries,
    info: (message) => entries.push({ level: "info", message }),
    warn: (message) => entries.push({ level: "warn", message }),
    error: (message) => entries.push({ level: "error", message }),
    messages: (level) => entries.filter((e) => e.level === level).map((e) => e.message),
  };
}

// ANSI colors
const YELLOW = "\x1b[33m";
const RED = "\x1b[31m";
const RESET = "\x1b[0m";

export interface ConsoleSinkOptions {
  /** Colorize warnings and errors (default: stderr is a TTY) */
  color?: boolean;
  /** Clock used for timestamps (default: `new Date()`) */
  now?: () => Date;
  /** Stream for info lines; use "stderr" when stdout carries JSON output */
  infoStream?: "stdout" | "stderr";
}

/**
 * Sink that writes `<ISO time> - LEVEL - message` lines. Info goes to
 * stdout unless `infoStream` says otherwise; warnings and errors go to
 * stderr.
 */
export function createConsoleSink(options: ConsoleSinkOptions = {}): DiagnosticSink {
  const color = options.color ?? Boolean(process.stderr.isTTY);
  const now = options.now ?? (() => new Date());

  const line = (level: string, message: string): string =>
    `${now().toISOString()} - ${level} - ${message}`;

  return {
    info(message) {
      if (options.infoStream === "stderr") {
        console.error(line("INFO", message));
      } else {
        console.log(line("INFO", message));
      }
    },
    warn(message) {
      const text = line("WARNING", message);
      console.warn(color ? `${YELLOW}${text}${RESET}` : text);
    },
    error(message) {
      const text = line("ERROR", message);
      console.error(color ? `${RED}${text}${RESET}` : text);
    },
  };
}
