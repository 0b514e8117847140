/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const COLOR: Record<LogLevel, string> = {
  debug: '\x1b[90m',   // grey
  info: '\x1b[36m',    // cyan
  warn: '\x1b[33m',    // yellow
  error: '\x1b[31m',   // red
};

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  child(scope: string): Logger;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

function threshold(): LogLevel {
  if (process.env.SWITCHBOARD_DEBUG === '1') return 'debug';
  const configured = process.env.SWITCHBOARD_LOG_LEVEL?.toLowerCase();
  return isLogLevel(configured) ? configured : 'info';
}

function render(data: unknown): string {
  if (data === undefined) return '';
  if (data instanceof Error) return ` ${data.stack ?? data.message}`;
  try {
    return ` ${JSON.stringify(data)}`;
  } catch {
    return ` ${String(data)}`;
  }
}

function write(level: LogLevel, scope: string, message: string, data?: unknown): void {
  if (RANK[level] < RANK[threshold()]) return;
  const stamp = new Date().toISOString().split('T')[1].slice(0, 12);
  const line = `${COLOR[level]}[${stamp}] [${level.toUpperCase()}] [${scope}] ${message}${render(data)}\x1b[0m`;
  if (level === 'error') console.error(line);
  else if (level === 'warn') console.warn(line);
  else console.log(line);
}

/** Scoped console logger; the level is re-read on every call so tests can flip it. */
export function createLogger(scope: string): Logger {
  return {
    debug: (message, data) => write('debug', scope, message, data),
    info: (message, data) => write('info', scope, message, data),
    warn: (message, data) => write('warn', scope, message, data),
    error: (message, data) => write('error', scope, message, data),
    child: (sub) => createLogger(`${scope}:${sub}`),
  };
}
