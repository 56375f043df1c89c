import type { ZodError } from 'zod';

export type ToolErrorSubtype =
  | 'AuthRequired'
  | 'Restricted'
  | 'Network'
  | 'UnsupportedFormat'
  | 'Unavailable'
  | 'RateLimited'
  | 'ToolMissing'
  | 'Unknown';

export type ErrorKind =
  | 'ValidationError'
  | 'Unauthorized'
  | 'RateLimited'
  | 'NotFound'
  | 'AlreadyTerminal'
  | `ExternalToolError:${ToolErrorSubtype}`
  | 'Timeout'
  | 'Cancelled'
  | 'InternalError';

/** Structured failure stored on a job and rendered to clients. */
export type JobError = {
  kind: ErrorKind;
  message: string;
};

export class AppError extends Error {
  readonly kind: ErrorKind;
  readonly status: number;
  readonly code: string;
  readonly details?: unknown;

  constructor(kind: ErrorKind, status: number, code: string, message?: string, details?: unknown) {
    super(message || code);
    this.name = new.target.name;
    this.kind = kind;
    this.status = Number.isInteger(status) ? status : 500;
    this.code = code || 'INTERNAL_ERROR';
    this.details = details;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super('ValidationError', 400, 'INVALID_REQUEST', message, details);
  }

  static fromZod(err: ZodError): ValidationError {
    const first = err.issues[0];
    const where = first?.path.length ? `${first.path.join('.')}: ` : '';
    const message = first ? `${where}${first.message}` : 'Invalid request';
    return new ValidationError(message, err.issues.map((i) => ({ path: i.path.join('.'), message: i.message })));
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Unauthorized') {
    super('Unauthorized', 401, 'UNAUTHORIZED', message);
  }
}

export class RateLimitedError extends AppError {
  readonly retryAfterMs: number;

  constructor(retryAfterMs: number) {
    super('RateLimited', 429, 'RATE_LIMITED', 'Rate limit exceeded');
    this.retryAfterMs = Math.max(0, Math.ceil(retryAfterMs));
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Not found') {
    super('NotFound', 404, 'NOT_FOUND', message);
  }
}

export class AlreadyTerminalError extends AppError {
  constructor(id: string, state: string) {
    super('AlreadyTerminal', 409, 'ALREADY_TERMINAL', `Job ${id} already ${state}`);
  }
}

const TOOL_STATUS: Record<ToolErrorSubtype, { status: number; code: string }> = {
  AuthRequired: { status: 403, code: 'UPSTREAM_AUTH_REQUIRED' },
  Restricted: { status: 451, code: 'UPSTREAM_RESTRICTED' },
  Network: { status: 502, code: 'UPSTREAM_NETWORK' },
  UnsupportedFormat: { status: 422, code: 'UNSUPPORTED_FORMAT' },
  Unavailable: { status: 404, code: 'CONTENT_UNAVAILABLE' },
  RateLimited: { status: 429, code: 'UPSTREAM_RATELIMIT' },
  ToolMissing: { status: 500, code: 'TOOL_MISSING' },
  Unknown: { status: 502, code: 'EXTRACTOR_ERROR' },
};

export class ExternalToolError extends AppError {
  readonly subtype: ToolErrorSubtype;

  constructor(subtype: ToolErrorSubtype, message: string) {
    const { status, code } = TOOL_STATUS[subtype];
    super(`ExternalToolError:${subtype}`, status, code, message);
    this.subtype = subtype;
  }
}

export class TimeoutError extends AppError {
  constructor(message = 'External tool timed out') {
    super('Timeout', 504, 'TIMEOUT', message);
  }
}

export class CancelledError extends AppError {
  constructor(message = 'Cancelled') {
    super('Cancelled', 499, 'CANCELLED', message);
  }
}

export class InternalError extends AppError {
  constructor(message = 'Unexpected server error', details?: unknown) {
    super('InternalError', 500, 'INTERNAL_ERROR', message, details);
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

// Order matters: age gates mention "sign in", 404 pages mention "unable to download webpage".
const TOOL_PATTERNS: Array<[ToolErrorSubtype, RegExp]> = [
  ['ToolMissing', /spawn \S+ enoent|yt-dlp: not found|ffmpeg: not found|command not found/i],
  ['RateLimited', /HTTP Error 429|too many requests|rate.?limit/i],
  ['Restricted', /confirm your age|age.?restricted|inappropriate for some users|not available in your country|geo.?restrict|blocked it in your country/i],
  ['AuthRequired', /sign in|log ?in required|cookies (?:are|is) (?:required|needed)|--cookies|authentication|members.?only|private video|HTTP Error 40[13]/i],
  ['Unavailable', /video unavailable|this video is unavailable|has been removed|does not exist|no longer available|HTTP Error 404/i],
  ['UnsupportedFormat', /unsupported url|no video formats|requested format is not available|no such format|format not available/i],
  ['Network', /network is unreachable|ETIMEDOUT|ECONNRESET|ENETUNREACH|EHOSTUNREACH|ECONNREFUSED|getaddrinfo|name or service not known|temporary failure in name resolution|unable to download webpage|connection reset|timed out/i],
];

function summarize(output: string): string {
  const lines = output.split(/\r?\n/).map((line) => line.trim()).filter(Boolean);
  const detail = lines.find((line) => /^ERROR:/i.test(line)) ?? lines[lines.length - 1] ?? '';
  const cleaned = detail.replace(/^ERROR:\s*/i, '').replace(/https?:\/\/[\w./?&=%+#:~-]+/gi, '[url]');
  return cleaned.length > 300 ? `${cleaned.slice(0, 300)}…` : cleaned;
}

/**
 * Map raw tool output (stderr, spawn error message) to a typed tool error.
 */
export function classifyToolError(output: string): ExternalToolError {
  const text = String(output || '');
  const match = TOOL_PATTERNS.find(([, re]) => re.test(text));
  const subtype = match ? match[0] : 'Unknown';
  const detail = summarize(text);
  return new ExternalToolError(subtype, detail || 'Extractor error');
}

export function toJobError(err: unknown): JobError {
  if (isAppError(err)) return { kind: err.kind, message: err.message };
  const message = err instanceof Error ? err.message : String(err);
  return { kind: 'InternalError', message: message || 'Unexpected error' };
}
