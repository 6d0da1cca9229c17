import { WriteStream, createWriteStream, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { getLogContext } from './context.js';
import type { AppLogger, AppLogRecord, LogContext, LogData, LogLevel } from './types.js';

let sinkHooksInstalled = false;
let fileSink: { path: string; stream: WriteStream } | null = null;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/** `LOG_LEVEL` as a level, or null when it names none. */
export function parseLogLevel(raw: string): LogLevel | null {
  const normalized = raw.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? null;
}

function minimumLevel(): LogLevel {
  return parseLogLevel(process.env.LOG_LEVEL ?? '') ?? 'warn';
}

export function isLevelEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minimumLevel()];
}

function resolveLogFilePath(): string | null {
  const filePath = process.env.APP_LOG_FILE;
  if (!filePath || filePath === 'off') return null;
  return filePath;
}

function closeFileSink(): void {
  if (!fileSink) return;
  fileSink.stream.end();
  fileSink = null;
}

function ensureFileSink(): WriteStream | null {
  const filePath = resolveLogFilePath();
  if (!filePath) return null;

  if (fileSink?.path === filePath) {
    return fileSink.stream;
  }

  closeFileSink();

  const dir = dirname(filePath);
  try {
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    const stream = createWriteStream(filePath, { flags: 'a', encoding: 'utf-8' });
    stream.on('error', (error) => {
      process.stderr.write(`log file sink failed: ${error.message}\n`);
      fileSink = null;
    });
    fileSink = { path: filePath, stream };
    return stream;
  } catch (error) {
    process.stderr.write(
      `log file sink unavailable: ${error instanceof Error ? error.message : String(error)}\n`
    );
    return null;
  }
}

function writeLineToFile(line: string): void {
  const sink = ensureFileSink();
  if (!sink) return;
  sink.write(`${line}\n`);
}

// stdout carries the agenda itself, so every record goes to stderr.
function writeToStd(line: string): void {
  process.stderr.write(`${line}\n`);
}

function serializeValue(value: unknown): unknown {
  if (value instanceof Error) {
    return {
      name: value.name,
      message: value.message,
      stack: process.env.NODE_ENV === 'development' ? value.stack : undefined,
    };
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return value;
}

function normalizeData(data?: LogData): LogData {
  if (!data) return {};
  const normalized: LogData = {};
  for (const [key, value] of Object.entries(data)) {
    normalized[key] = serializeValue(value);
  }
  return normalized;
}

function toRecord(
  level: LogLevel,
  event: string,
  baseContext: LogContext,
  data?: LogData,
): AppLogRecord {
  const context = getLogContext();
  return {
    timestamp: new Date().toISOString(),
    level,
    event,
    ...context,
    ...baseContext,
    ...normalizeData(data),
  };
}

function emitRecord(record: AppLogRecord): void {
  const line = JSON.stringify(record);
  writeToStd(line);
  writeLineToFile(line);
}

export function createLogger(baseContext: LogContext = {}): AppLogger {
  const log = (level: LogLevel, event: string, data?: LogData): void => {
    if (!isLevelEnabled(level)) return;
    emitRecord(toRecord(level, event, baseContext, data));
  };

  return {
    debug: (event: string, data?: LogData) => log('debug', event, data),
    info: (event: string, data?: LogData) => log('info', event, data),
    warn: (event: string, data?: LogData) => log('warn', event, data),
    error: (event: string, data?: LogData) => log('error', event, data),
    child: (context: LogContext) => createLogger({ ...baseContext, ...context }),
  };
}

/** Close the file sink when the process ends. */
export function initObservability(): void {
  if (sinkHooksInstalled) return;
  sinkHooksInstalled = true;
  process.once('exit', closeFileSink);
  process.once('SIGINT', closeFileSink);
  process.once('SIGTERM', closeFileSink);
}
