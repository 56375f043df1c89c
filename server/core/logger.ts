import fs from 'node:fs';
import path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };
const MAX_BYTES = 2_000_000; // 2MB
const BACKUPS = 3;

function isLogLevel(value: string): value is LogLevel {
  return value in LEVELS;
}

function thresholdFromEnv(): number {
  const raw = String(process.env.LOG_LEVEL || '').trim().toLowerCase();
  if (isLogLevel(raw)) return LEVELS[raw];
  if (process.env.NODE_ENV === 'test') return LEVELS.warn;
  return process.env.NODE_ENV === 'production' ? LEVELS.info : LEVELS.debug;
}

function rotateIfNeeded(filePath: string) {
  try {
    const dir = path.dirname(filePath);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
    if (!fs.existsSync(filePath)) return;
    const stat = fs.statSync(filePath);
    if (stat.size < MAX_BYTES) return;
    for (let i = BACKUPS - 1; i >= 0; i--) {
      const src = i === 0 ? filePath : `${filePath}.${i}`;
      const dst = `${filePath}.${i + 1}`;
      if (fs.existsSync(src)) fs.renameSync(src, dst);
    }
  } catch (err) {
    console.error(`logger rotation failed for ${filePath}: ${String(err)}`);
  }
}

function writeFileLine(filePath: string, line: string) {
  try {
    rotateIfNeeded(filePath);
    fs.appendFileSync(filePath, line + '\n', 'utf8');
  } catch (err) {
    console.error(`logger write failed for ${filePath}: ${String(err)}`);
  }
}

function render(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value instanceof Error) return value.stack || value.message;
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

export type LogMethod = (event: string, ...details: unknown[]) => void;

export interface Logger {
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
}

/**
 * Event-first logger: `log.info('job_started', { id })`.
 * Lines go to the console and, when LOG_FILE is set, to a rotating file.
 */
export function getLogger(name = 'app'): Logger {
  const threshold = thresholdFromEnv();
  const file = process.env.LOG_FILE?.trim() ? path.resolve(process.env.LOG_FILE.trim()) : undefined;

  const emit = (level: LogLevel, event: string, details: unknown[]) => {
    if (LEVELS[level] < threshold) return;
    const line = [`${new Date().toISOString()} | ${level.toUpperCase()} | ${name} | ${event}`, ...details.map(render)].join(' ');
    if (file) writeFileLine(file, line);
    if (level === 'error') console.error(line);
    else if (level === 'warn') console.warn(line);
    else if (level === 'debug') console.debug(line);
    else console.log(line);
  };

  return {
    debug: (event, ...details) => emit('debug', event, details),
    info: (event, ...details) => emit('info', event, details),
    warn: (event, ...details) => emit('warn', event, details),
    error: (event, ...details) => emit('error', event, details),
  };
}
