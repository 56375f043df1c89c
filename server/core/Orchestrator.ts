import { withDeadline } from './abort.js';
import type { AppConfig } from './config.js';
import {
  AlreadyTerminalError,
  CancelledError,
  InternalError,
  NotFoundError,
  RateLimitedError,
} from './errors.js';
import type { ExtractionTool, FormatsResult, MediaInfo, PlaylistEntry, PlaylistInfo, RawInfo, StreamResult } from './extractor.js';
import { cacheKey, libraryUrl, paginate, type Page } from './formats.js';
import { JobRegistry, type JobRecord } from './JobRegistry.js';
import { getLogger, type Logger } from './logger.js';
import { RateLimiter } from './RateLimiter.js';
import { TtlCache } from './TtlCache.js';
import {
  DownloadBody,
  JobId,
  LibraryBody,
  LibraryKind,
  parseInput,
  PlaylistBody,
  StreamBody,
  UrlBody,
  type LibraryKindType,
} from './validate.js';
import { WorkerPool, type ShutdownOptions } from './WorkerPool.js';
import { YtDlpTool } from './YtDlpTool.js';

type Cached =
  | { kind: 'info'; value: MediaInfo }
  | { kind: 'formats'; value: FormatsResult }
  | { kind: 'playlist'; value: PlaylistInfo };

export type PlaylistPage = Page<PlaylistEntry> & { id: string | null; title: string | null };
export type LibraryPage = Page<PlaylistEntry> & { kind: LibraryKindType };

export type HealthReport = {
  status: 'ok' | 'stopping';
  cacheSize: number;
  rateLimitClients: number;
  apiKeyRequired: boolean;
  uptime: number;
  jobs: ReturnType<JobRegistry['stats']>;
  queue: ReturnType<WorkerPool['stats']>;
};

export type OrchestratorOptions = {
  config: AppConfig;
  tool: ExtractionTool;
  log?: Logger;
  now?: () => number;
  newId?: () => string;
};

/**
 * Orchestrator - single entry surface for the HTTP layer
 *
 * Every call admits the client through the rate limiter first, then validates
 * its input, then goes to the cache (lookups) or the registry and pool (jobs).
 */
export class Orchestrator {
  readonly config: AppConfig;
  readonly cache: TtlCache<Cached>;
  readonly streamCache: TtlCache<StreamResult>;
  readonly limiter: RateLimiter;
  readonly registry: JobRegistry;
  readonly pool: WorkerPool;

  private readonly tool: ExtractionTool;
  private readonly log: Logger;
  private readonly now: () => number;
  private readonly startedAt: number;
  private readonly lifecycle = new AbortController();
  private reaper?: NodeJS.Timeout;
  private stopping?: Promise<void>;

  constructor(options: OrchestratorOptions) {
    const { config } = options;
    this.config = config;
    this.tool = options.tool;
    this.log = options.log ?? getLogger('orchestrator');
    this.now = options.now ?? Date.now;
    this.startedAt = this.now();

    this.cache = new TtlCache<Cached>({ ttlMs: config.cacheTtlMs, now: this.now });
    this.streamCache = new TtlCache<StreamResult>({ ttlMs: config.streamCacheTtlMs, now: this.now });
    this.limiter = new RateLimiter({ limit: config.rateLimit, windowMs: config.rateWindowMs, now: this.now });
    this.registry = new JobRegistry({ log: this.log, now: this.now, newId: options.newId });
    this.pool = new WorkerPool({
      registry: this.registry,
      tool: this.tool,
      log: this.log,
      maxConcurrent: config.maxConcurrent,
      downloadDir: config.downloadDir,
      downloadTimeoutMs: config.downloadTimeoutMs,
      mergeTimeoutMs: config.mergeTimeoutMs,
      cancelGraceMs: config.cancelGraceMs,
      downloadRetries: config.downloadRetries,
      retryBackoffMs: config.retryBackoffMs,
    });
  }

  private admit(clientId: string): void {
    if (!this.limiter.allow(clientId)) {
      const retryAfterMs = this.limiter.retryAfterMs(clientId);
      this.log.debug('rate_limited', { clientId, retryAfterMs });
      throw new RateLimitedError(retryAfterMs);
    }
  }

  private extract<T>(label: string, fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    return withDeadline(this.config.extractTimeoutMs, label, this.lifecycle.signal, fn);
  }

  async lookupMetadata(clientId: string, input: unknown): Promise<MediaInfo> {
    this.admit(clientId);
    const { url, cookies } = parseInput(UrlBody, input);
    const entry = await this.cache.getOrCompute(cacheKey(url, cookies), async () => ({
      kind: 'info' as const,
      value: await this.extract('metadata', (signal) => this.tool.fetchMetadata(url, { cookies }, signal)),
    }));
    if (entry.kind !== 'info') throw new InternalError('Cache entry kind mismatch');
    return entry.value;
  }

  async lookupFormats(clientId: string, input: unknown): Promise<FormatsResult> {
    this.admit(clientId);
    const { url, cookies } = parseInput(UrlBody, input);
    const entry = await this.cache.getOrCompute(cacheKey(url, cookies, 'formats'), async () => ({
      kind: 'formats' as const,
      value: await this.extract('formats', (signal) => this.tool.fetchFormats(url, { cookies }, signal)),
    }));
    if (entry.kind !== 'formats') throw new InternalError('Cache entry kind mismatch');
    return entry.value;
  }

  async getStreamUrl(clientId: string, input: unknown): Promise<StreamResult> {
    this.admit(clientId);
    const req = parseInput(StreamBody, input);
    const { url, cookies, ...options } = req;
    const suffix = [
      'stream',
      options.mode,
      options.formatId ?? '',
      options.audioFormatId ?? '',
      options.videoFormatId ?? '',
      options.maxHeight ?? '',
      options.preferredExt ?? '',
    ].join(':');
    return this.streamCache.getOrCompute(cacheKey(url, cookies, suffix), () =>
      this.extract('stream', (signal) => this.tool.resolveStream(url, req, signal)),
    );
  }

  async lookupRawInfo(clientId: string, input: unknown): Promise<RawInfo> {
    this.admit(clientId);
    const { url, cookies } = parseInput(UrlBody, input);
    return this.extract('raw_info', (signal) => this.tool.fetchRawInfo(url, { cookies }, signal));
  }

  private async playlist(url: string, cookies: string | undefined): Promise<PlaylistInfo> {
    const entry = await this.cache.getOrCompute(cacheKey(url, cookies, 'playlist'), async () => ({
      kind: 'playlist' as const,
      value: await this.extract('playlist', (signal) => this.tool.fetchPlaylist(url, { cookies }, signal)),
    }));
    if (entry.kind !== 'playlist') throw new InternalError('Cache entry kind mismatch');
    return entry.value;
  }

  async listPlaylist(clientId: string, input: unknown): Promise<PlaylistPage> {
    this.admit(clientId);
    const { url, cookies, limit, offset } = parseInput(PlaylistBody, input);
    const info = await this.playlist(url, cookies);
    return { id: info.id, title: info.title, ...paginate(info.entries, limit, offset) };
  }

  async listLibrary(clientId: string, kind: unknown, input: unknown): Promise<LibraryPage> {
    this.admit(clientId);
    const parsedKind = LibraryKind.safeParse(kind);
    if (!parsedKind.success) throw new NotFoundError(`Unknown library: ${String(kind)}`);
    const { cookies, limit, offset } = parseInput(LibraryBody, input ?? {});
    const info = await this.playlist(libraryUrl(parsedKind.data), cookies);
    return { kind: parsedKind.data, ...paginate(info.entries, limit, offset) };
  }

  async startDownload(clientId: string, input: unknown): Promise<JobRecord> {
    this.admit(clientId);
    const request = parseInput(DownloadBody, input);
    if (this.stopping) throw new InternalError('Service is shutting down');
    const job = this.registry.create(request);
    this.pool.submit(job.id);
    return job;
  }

  async getJob(clientId: string, id: unknown): Promise<JobRecord> {
    this.admit(clientId);
    const jobId = parseInput(JobId, id);
    const job = this.registry.get(jobId);
    if (!job) throw new NotFoundError('Job not found');
    return job;
  }

  async cancelJob(clientId: string, id: unknown): Promise<JobRecord> {
    this.admit(clientId);
    const jobId = parseInput(JobId, id);
    const outcome = this.registry.requestCancel(jobId);
    if (outcome === 'not_found') throw new NotFoundError('Job not found');
    if (outcome === 'already_terminal') {
      throw new AlreadyTerminalError(jobId, this.registry.get(jobId)?.state ?? 'finished');
    }
    if (!this.pool.cancel(jobId)) this.registry.update(jobId, { type: 'cancel' });
    const job = this.registry.get(jobId);
    if (!job) throw new NotFoundError('Job not found');
    return job;
  }

  async clearCache(clientId: string): Promise<{ cleared: number }> {
    this.admit(clientId);
    const cleared = this.cache.size() + this.streamCache.size();
    this.cache.clear();
    this.streamCache.clear();
    this.log.info('cache_cleared', { clientId, cleared });
    return { cleared };
  }

  health(): HealthReport {
    return {
      status: this.stopping ? 'stopping' : 'ok',
      cacheSize: this.cache.size() + this.streamCache.size(),
      rateLimitClients: this.limiter.clientCount(),
      apiKeyRequired: Boolean(this.config.apiKey),
      uptime: Math.floor((this.now() - this.startedAt) / 1000),
      jobs: this.registry.stats(),
      queue: this.pool.stats(),
    };
  }

  /** Start the retention reaper. */
  start(): this {
    if (this.reaper || this.stopping) return this;
    this.reaper = setInterval(() => this.reap(), this.config.jobReaperIntervalMs);
    this.reaper.unref?.();
    return this;
  }

  reap(): number {
    return this.registry.evictTerminal(this.config.jobRetentionMs);
  }

  shutdown(options: ShutdownOptions = {}): Promise<void> {
    if (!this.stopping) {
      this.stopping = (async () => {
        this.log.info('orchestrator_stopping');
        if (this.reaper) clearInterval(this.reaper);
        this.reaper = undefined;
        this.lifecycle.abort(new CancelledError('Service is shutting down'));
        await this.pool.shutdown(options);
        this.cache.dispose();
        this.streamCache.dispose();
        this.limiter.dispose();
        this.log.info('orchestrator_stopped');
      })();
    }
    return this.stopping;
  }
}

/**
 * Build the shared runtime from configuration. The yt-dlp adapter is used
 * unless another tool is injected.
 */
export function createRuntime(config: AppConfig, tool?: ExtractionTool, log: Logger = getLogger('orchestrator')): Orchestrator {
  const extractor =
    tool ??
    new YtDlpTool({
      log: getLogger('ytdlp'),
      ytDlpPath: config.ytDlpPath,
      ffmpegPath: config.ffmpegPath,
      killGraceMs: config.killGraceMs,
    });
  return new Orchestrator({ config, tool: extractor, log }).start();
}
