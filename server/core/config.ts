import path from 'node:path';
import { clamp, getEnvInt, getEnvString, isFalse, isTrue, type EnvSource } from './env.js';

export type AppConfig = {
  port: number;
  corsOrigin: true | string | string[] | undefined;
  trustProxy: boolean | number | string[];
  apiKey?: string; // when set, every non-public route requires `Authorization: Bearer <apiKey>`
  cacheTtlMs: number;
  streamCacheTtlMs: number; // 0 = singleflight only, never stored
  rateLimit: number; // admitted requests per window per client
  rateWindowMs: number;
  globalRateLimitPerMin: number; // coarse per-IP flood guard in front of everything
  maxConcurrent: number;
  extractTimeoutMs: number;
  downloadTimeoutMs: number;
  mergeTimeoutMs: number;
  cancelGraceMs: number;
  killGraceMs: number; // SIGTERM to SIGKILL, kept under cancelGraceMs so the process is gone before its slot frees
  downloadRetries: number;
  retryBackoffMs: number;
  downloadDir: string;
  jobRetentionMs: number;
  jobReaperIntervalMs: number;
  ytDlpPath: string;
  ffmpegPath: string;
};

function parseCorsOrigin(input: string | undefined): AppConfig['corsOrigin'] {
  if (!input) return true; // allow any by default
  const val = input.trim();
  if (val === 'disabled') return undefined;
  if (val === '*' || val === 'true') return true;
  // comma-separated list
  const parts = val.split(',').map((s) => s.trim()).filter(Boolean);
  return parts.length > 1 ? parts : parts[0];
}

function parseTrustProxy(input: string | undefined): AppConfig['trustProxy'] {
  if (!input || isFalse(input)) return false;
  if (isTrue(input)) return true;
  if (/^\d+$/.test(input.trim())) return Number(input.trim());
  return input.split(',').map((s) => s.trim()).filter(Boolean);
}

const seconds = (env: EnvSource, key: string, fallback: number, min: number, max: number) =>
  clamp(getEnvInt(env, key, fallback), min, max) * 1000;

export function loadConfig(env: EnvSource = process.env): AppConfig {
  const cancelGraceMs = clamp(getEnvInt(env, 'CANCEL_GRACE_MS', 5_000), 0, 120_000);
  return {
    port: clamp(getEnvInt(env, 'PORT', 8080), 0, 65_535),
    corsOrigin: parseCorsOrigin(env.CORS_ORIGIN),
    trustProxy: parseTrustProxy(env.TRUST_PROXY),
    apiKey: getEnvString(env, 'API_KEY'),
    cacheTtlMs: seconds(env, 'CACHE_TTL_SEC', 300, 0, 86_400),
    streamCacheTtlMs: seconds(env, 'STREAM_CACHE_TTL_SEC', 0, 0, 300),
    rateLimit: clamp(getEnvInt(env, 'RATE_LIMIT', 60), 1, 1_000_000),
    rateWindowMs: seconds(env, 'RATE_WINDOW_SEC', 60, 1, 86_400),
    globalRateLimitPerMin: clamp(getEnvInt(env, 'GLOBAL_RATE_LIMIT_PER_MIN', 600), 1, 1_000_000),
    maxConcurrent: clamp(getEnvInt(env, 'MAX_CONCURRENT', 2), 1, 16),
    extractTimeoutMs: seconds(env, 'EXTRACT_TIMEOUT_SEC', 60, 1, 3_600),
    downloadTimeoutMs: seconds(env, 'DOWNLOAD_TIMEOUT_SEC', 1_800, 1, 86_400),
    mergeTimeoutMs: seconds(env, 'MERGE_TIMEOUT_SEC', 600, 1, 86_400),
    cancelGraceMs,
    killGraceMs: Math.floor(cancelGraceMs / 2),
    downloadRetries: clamp(getEnvInt(env, 'DOWNLOAD_RETRIES', 3), 0, 10),
    retryBackoffMs: clamp(getEnvInt(env, 'RETRY_BACKOFF_MS', 2_000), 0, 60_000),
    downloadDir: path.resolve(getEnvString(env, 'DOWNLOAD_DIR') ?? 'downloads'),
    jobRetentionMs: seconds(env, 'JOB_RETENTION_SEC', 3_600, 1, 7 * 86_400),
    jobReaperIntervalMs: seconds(env, 'JOB_REAPER_INTERVAL_SEC', 600, 1, 86_400),
    ytDlpPath: getEnvString(env, 'YTDLP_PATH') ?? 'yt-dlp',
    ffmpegPath: getEnvString(env, 'FFMPEG_PATH') ?? 'ffmpeg',
  };
}
