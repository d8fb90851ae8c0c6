import type { LogLevel, LogCategory, LogEntry } from '@vsplit/types';

//------------------------------------------------------------------------------//
// 로그 싱크 (외부 저장소로 보내는 함수, 지연 주입으로 순환 참조 방지)
export type LogSink = (entry: LogEntry) => void | Promise<void>;

let sink: LogSink | null = null;

export const setLogSink = (fn: LogSink | null) => {
  sink = fn;
};

// 콘솔 출력 레벨 (숫자가 작을수록 심각)
const LEVEL_ORDER: Record<LogLevel, number> = {
  ERROR: 0,
  WARN: 1,
  INFO: 2,
  DEBUG: 3,
};

let consoleLevel: LogLevel = 'INFO';

export const setLogLevel = (level: LogLevel) => {
  consoleLevel = level;
};

export const getLogLevel = (): LogLevel => consoleLevel;

const formatLine = (level: LogLevel | 'SUCCESS', category: LogCategory, message: string): string =>
  `[${new Date().toISOString()}] ${level.padEnd(7)} [${category}] ${message}`;

const writeConsole = (level: LogLevel, category: LogCategory, message: string, meta: unknown, success: boolean): void => {
  if (LEVEL_ORDER[level] > LEVEL_ORDER[consoleLevel]) {
    return;
  }

  const line = formatLine(success ? 'SUCCESS' : level, category, message);
  const args = meta === undefined ? [line] : [line, meta];

  if (level === 'ERROR') {
    console_error(...args);
  } else if (level === 'WARN') {
    console_warn(...args);
  } else if (level === 'DEBUG') {
    console_debug(...args);
  } else {
    console_log(...args);
  }
};

// 로그
const log = (level: LogLevel, category: LogCategory, message: string, meta?: unknown, success = false): void => {
  writeConsole(level, category, message, meta, success);

  if (sink) {
    const entry: LogEntry = { level, category, message, meta, createdAt: new Date().toISOString() };
    try {
      const pending = sink(entry);
      if (pending instanceof Promise) {
        pending.catch(reportSinkFailure);
      }
    } catch (error) {
      reportSinkFailure(error);
    }
  }
};

const reportSinkFailure = (error: unknown): void => {
  console_error(formatLine('ERROR', 'system', `Log sink failed: ${error instanceof Error ? error.message : String(error)}`));
};

export const logger = {
  error: (category: LogCategory, message: string, meta?: unknown) => log('ERROR', category, message, meta),
  warn: (category: LogCategory, message: string, meta?: unknown) => log('WARN', category, message, meta),
  info: (category: LogCategory, message: string, meta?: unknown) => log('INFO', category, message, meta),
  debug: (category: LogCategory, message: string, meta?: unknown) => log('DEBUG', category, message, meta),
  success: (category: LogCategory, message: string, meta?: unknown) => log('INFO', category, message, meta, true),
};

//------------------------------------------------------------------------------//
// 콘솔 로그 유틸 (ESLint no-console 규칙 무시)

/* eslint-disable no-console */
export const console_log = (...args: unknown[]): void => {
  console.log(...args);
};

export const console_error = (...args: unknown[]): void => {
  console.error(...args);
};

export const console_warn = (...args: unknown[]): void => {
  console.warn(...args);
};

export const console_debug = (...args: unknown[]): void => {
  console.debug(...args);
};
/* eslint-enable no-console */
