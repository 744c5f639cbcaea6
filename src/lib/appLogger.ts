import { appendFile, mkdir } from 'fs/promises';
import path from 'path';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type AppLoggerOptions = {
  filePath?: string;
  echo?: boolean;
  minLevel?: LogLevel;
};

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };
const MAX_BUFFER = 200;
const FLUSH_INTERVAL_MS = 1500;

let initialized = false;
let logFile: string | null = null;
let echo = false;
let minLevel: LogLevel = 'debug';
let queue: string[] = [];
let flushTimer: ReturnType<typeof setTimeout> | null = null;
let flushInFlight: Promise<void> | null = null;

const safeStringify = (value: unknown) => {
  try {
    if (value instanceof Error) {
      return JSON.stringify({
        name: value.name,
        message: value.message,
        stack: value.stack,
      });
    }
    const encoded = JSON.stringify(value);
    return encoded === undefined ? '"[unserializable]"' : encoded;
  } catch {
    return '"[unserializable]"';
  }
};

const formatLine = (level: LogLevel, message: string, data?: unknown, now = new Date()) => {
  const ts = now.toISOString();
  const suffix = data !== undefined ? ` ${safeStringify(data)}` : '';
  return `${ts} [${level.toUpperCase()}] ${message}${suffix}\n`;
};

const ensureLogFile = async (file: string) => {
  try {
    await mkdir(path.dirname(file), { recursive: true });
    await appendFile(file, '');
  } catch (error) {
    console.warn('logger:ensureLogFile failed', error);
  }
};

const writeQueue = async () => {
  if (!logFile || queue.length === 0) return;
  const payload = queue.join('');
  queue = [];
  try {
    await appendFile(logFile, payload, 'utf8');
  } catch (error) {
    console.warn('logger:flush failed', error);
  }
};

export const flushLogs = async () => {
  if (flushTimer) {
    clearTimeout(flushTimer);
    flushTimer = null;
  }
  if (flushInFlight) await flushInFlight;
  flushInFlight = writeQueue().finally(() => {
    flushInFlight = null;
  });
  await flushInFlight;
};

const scheduleFlush = () => {
  if (flushTimer || !logFile) return;
  flushTimer = setTimeout(() => {
    flushTimer = null;
    void flushLogs();
  }, FLUSH_INTERVAL_MS);
  flushTimer.unref();
};

const enqueue = (level: LogLevel, message: string, data?: unknown) => {
  if (!initialized || LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
  const line = formatLine(level, message, data);
  if (echo) {
    const write = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
    write(line.trimEnd());
  }
  if (!logFile) return;
  queue.push(line);
  if (queue.length > MAX_BUFFER) {
    queue = queue.slice(queue.length - MAX_BUFFER);
  }
  scheduleFlush();
};

export const logDebug = (message: string, data?: unknown) => enqueue('debug', message, data);
export const logInfo = (message: string, data?: unknown) => enqueue('info', message, data);
export const logWarn = (message: string, data?: unknown) => enqueue('warn', message, data);
export const logError = (message: string, data?: unknown) => enqueue('error', message, data);

export const initAppLogger = (options: AppLoggerOptions = {}) => {
  if (initialized || process.env.NODE_ENV === 'test') return;
  initialized = true;
  logFile = options.filePath ? path.resolve(options.filePath) : null;
  echo = Boolean(options.echo);
  minLevel = options.minLevel ?? 'debug';
  if (logFile) void ensureLogFile(logFile);
  logInfo('APP_START', { pid: process.pid, logFile });

  process.on('unhandledRejection', (reason) => {
    enqueue('error', 'UNHANDLED_REJECTION', reason);
  });
  process.on('beforeExit', () => {
    if (queue.length) void flushLogs();
  });
};

export const __test__ = { formatLine, safeStringify };
