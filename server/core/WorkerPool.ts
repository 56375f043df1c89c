import fs from 'node:fs';
import path from 'node:path';
import { sleep, withDeadline } from './abort.js';
import { CancelledError, ExternalToolError, toJobError } from './errors.js';
import type { DownloadTarget, ExtractionTool, FileResult } from './extractor.js';
import { buildSelectors } from './formats.js';
import type { JobRegistry } from './JobRegistry.js';
import type { Logger } from './logger.js';
import type { DownloadRequest } from './validate.js';

export type WorkerPoolOptions = {
  registry: JobRegistry;
  tool: ExtractionTool;
  log: Logger;
  maxConcurrent: number;
  downloadDir: string;
  downloadTimeoutMs: number;
  mergeTimeoutMs: number;
  cancelGraceMs: number;
  downloadRetries: number;
  retryBackoffMs: number;
};

export type ShutdownOptions = {
  /** Abort running jobs instead of letting them finish. */
  cancelRunning?: boolean;
  timeoutMs?: number;
};

type RunningTask = {
  id: string;
  controller: AbortController;
  done: Promise<void>;
  graceTimer?: NodeJS.Timeout;
  settled: boolean;
};

type ProgressBand = readonly [number, number];

const MAX_CONCURRENT_CAP = 16;

/**
 * Worker Pool - bounded execution of download jobs
 *
 * - FIFO queue; at most `maxConcurrent` jobs running or merging
 * - `submit` only enqueues, it never waits for capacity
 * - Each job runs under its own AbortController; cancellation is checked before
 *   every tool call and forwarded to the tool, which kills its process
 * - A tool call that outlives its deadline or cancellation by the grace period
 *   is abandoned; a job stuck anywhere else is marked cancelled after the grace
 *   period, cleaned up, and its slot is released
 * - Work files are removed on every exit path, outputs too unless completed
 */
export class WorkerPool {
  private waiting: string[] = [];
  private running = new Map<string, RunningTask>();
  private cleanups = new Set<Promise<void>>();
  private accepting = true;
  private maxConcurrent: number;

  private readonly registry: JobRegistry;
  private readonly tool: ExtractionTool;
  private readonly log: Logger;
  private readonly opts: WorkerPoolOptions;

  constructor(options: WorkerPoolOptions) {
    this.opts = options;
    this.registry = options.registry;
    this.tool = options.tool;
    this.log = options.log;
    this.maxConcurrent = clampConcurrency(options.maxConcurrent);
  }

  /**
   * Enqueue job for execution
   */
  submit(id: string): void {
    if (!this.accepting) {
      this.registry.requestCancel(id);
      this.registry.update(id, { type: 'cancel' });
      this.log.warn('job_rejected_shutdown', { id });
      return;
    }
    if (!this.registry.has(id)) {
      this.log.error('job_not_found', { id });
      return;
    }
    this.waiting.push(id);
    this.log.info('job_enqueued', { id, queueLength: this.waiting.length });
    this.schedule();
  }

  /**
   * Start queued jobs while capacity allows
   */
  schedule(): void {
    while (this.accepting && this.running.size < this.maxConcurrent && this.waiting.length > 0) {
      const id = this.waiting.shift();
      if (id === undefined) break;
      if (this.registry.isCancelRequested(id)) {
        this.registry.update(id, { type: 'cancel' });
        continue;
      }
      if (!this.registry.update(id, { type: 'start' })) continue;
      this.start(id);
    }
  }

  private start(id: string): void {
    const controller = new AbortController();
    const task: RunningTask = { id, controller, settled: false, done: Promise.resolve() };
    this.running.set(id, task);
    this.log.info('job_started', { id, running: this.running.size, waiting: this.waiting.length });

    task.done = this.execute(id, controller.signal)
      .catch((err: unknown) => {
        this.log.error('job_worker_crashed', { id, error: String(err) });
        this.registry.update(id, { type: 'fail', error: toJobError(err) });
      })
      .finally(() => this.release(task));
  }

  private release(task: RunningTask): void {
    task.settled = true;
    if (task.graceTimer) clearTimeout(task.graceTimer);
    if (this.running.get(task.id) === task) {
      this.running.delete(task.id);
      this.schedule();
    }
  }

  /**
   * Cancel a queued or running job. Returns false when the pool does not hold it.
   */
  cancel(id: string): boolean {
    const idx = this.waiting.indexOf(id);
    if (idx >= 0) {
      this.waiting.splice(idx, 1);
      this.registry.update(id, { type: 'cancel' });
      this.log.info('job_removed_from_queue', { id });
      return true;
    }

    const task = this.running.get(id);
    if (!task) return false;
    if (!task.controller.signal.aborted) {
      task.controller.abort(new CancelledError('Cancelled by user'));
      this.log.info('job_abort_signalled', { id });
    }
    if (!task.graceTimer) {
      task.graceTimer = setTimeout(() => this.forceCancel(task), this.opts.cancelGraceMs);
      task.graceTimer.unref?.();
    }
    return true;
  }

  private forceCancel(task: RunningTask): void {
    if (task.settled) return;
    if (this.registry.update(task.id, { type: 'cancel' })) {
      this.log.warn('job_cancel_forced', { id: task.id, graceMs: this.opts.cancelGraceMs });
    }
    if (this.running.get(task.id) === task) {
      this.running.delete(task.id);
      this.schedule();
    }
    const job = this.registry.get(task.id);
    if (job) {
      const { workDir, targetDir } = this.jobDirs(task.id, job.request);
      const pending = this.cleanup(task.id, workDir, job.state === 'completed' ? undefined : targetDir).finally(() =>
        this.cleanups.delete(pending),
      );
      this.cleanups.add(pending);
    }
  }

  private jobDirs(id: string, req: DownloadRequest): { workDir: string; targetDir: string } {
    return {
      workDir: path.join(this.opts.downloadDir, '.work', id),
      targetDir: path.join(this.opts.downloadDir, req.outputDir ?? ''),
    };
  }

  private checkpoint(id: string, signal: AbortSignal): void {
    if (signal.aborted || this.registry.isCancelRequested(id)) throw new CancelledError();
  }

  private async execute(id: string, signal: AbortSignal): Promise<void> {
    const job = this.registry.get(id);
    if (!job) return;
    const req = job.request;
    const { workDir, targetDir } = this.jobDirs(id, req);

    try {
      await fs.promises.mkdir(workDir, { recursive: true });
      await fs.promises.mkdir(targetDir, { recursive: true });
      this.checkpoint(id, signal);

      const selectors = buildSelectors(req);
      let output: FileResult;
      if (!req.merge) {
        output = await this.download(id, req, selectors.single, { dir: targetDir, baseName: id }, signal, [0, 100]);
      } else {
        const video = await this.download(id, req, selectors.video, { dir: workDir, baseName: 'video' }, signal, [0, 60]);
        const audio = await this.download(id, req, selectors.audio, { dir: workDir, baseName: 'audio' }, signal, [60, 90]);
        this.checkpoint(id, signal);
        if (!this.registry.update(id, { type: 'merging' })) throw new CancelledError();
        this.registry.update(id, { type: 'progress', progress: 90 });
        const outputPath = path.join(targetDir, `${id}.${req.container}`);
        output = await withDeadline(
          this.opts.mergeTimeoutMs,
          'merge',
          signal,
          (s) => this.tool.merge(video.path, audio.path, req.container, outputPath, s),
          this.opts.cancelGraceMs,
        );
      }

      this.checkpoint(id, signal);
      this.registry.update(id, {
        type: 'complete',
        result: { path: output.path, filename: path.basename(output.path), size: output.size },
      });
    } catch (err) {
      this.settleFailure(id, err, signal);
    } finally {
      const completed = this.registry.get(id)?.state === 'completed';
      await this.cleanup(id, workDir, completed ? undefined : targetDir);
    }
  }

  private async download(
    id: string,
    req: DownloadRequest,
    selector: string,
    target: DownloadTarget,
    signal: AbortSignal,
    [lo, hi]: ProgressBand,
  ): Promise<FileResult> {
    for (let attempt = 1; ; attempt++) {
      this.checkpoint(id, signal);
      this.registry.update(id, { type: 'attempt' });
      try {
        const result = await withDeadline(
          this.opts.downloadTimeoutMs,
          'download',
          signal,
          (s) =>
            this.tool.download(req.url, selector, target, s, {
              cookies: req.cookies,
              onProgress: (p) => {
                if (typeof p.percent === 'number') {
                  this.registry.update(id, { type: 'progress', progress: lo + ((hi - lo) * p.percent) / 100 });
                }
              },
            }),
          this.opts.cancelGraceMs,
        );
        this.registry.update(id, { type: 'progress', progress: hi });
        return result;
      } catch (err) {
        const retryable =
          err instanceof ExternalToolError &&
          err.subtype === 'RateLimited' &&
          attempt <= this.opts.downloadRetries &&
          !signal.aborted;
        if (!retryable) throw err;
        const delayMs = this.opts.retryBackoffMs * attempt;
        this.log.warn('job_download_retry', { id, attempt, delayMs });
        await sleep(delayMs, signal);
      }
    }
  }

  private settleFailure(id: string, err: unknown, signal: AbortSignal): void {
    // A user cancellation wins over whatever error the aborted tool reported.
    if (err instanceof CancelledError || (signal.aborted && signal.reason instanceof CancelledError)) {
      this.registry.update(id, { type: 'cancel' });
      return;
    }
    const error = toJobError(err);
    if (!this.registry.update(id, { type: 'fail', error })) {
      this.log.debug('job_failure_discarded', { id, kind: error.kind });
    }
  }

  private async cleanup(id: string, workDir: string, outputDir?: string): Promise<void> {
    try {
      await fs.promises.rm(workDir, { recursive: true, force: true });
    } catch (err) {
      this.log.warn('job_cleanup_workdir_failed', { id, error: String(err) });
    }
    if (!outputDir) return;
    try {
      const list = await fs.promises.readdir(outputDir);
      for (const filename of list) {
        if (filename.startsWith(id + '.')) {
          await fs.promises.rm(path.join(outputDir, filename), { force: true });
        }
      }
    } catch (err) {
      this.log.warn('job_cleanup_output_failed', { id, error: String(err) });
    }
  }

  isActive(id: string): boolean {
    return this.running.has(id) || this.waiting.includes(id);
  }

  stats() {
    return {
      running: this.running.size,
      queued: this.waiting.length,
      maxConcurrent: this.maxConcurrent,
    };
  }

  /**
   * Update max concurrent jobs (for runtime config changes)
   */
  setMaxConcurrent(max: number): void {
    this.maxConcurrent = clampConcurrency(max);
    this.log.info('max_concurrent_updated', { maxConcurrent: this.maxConcurrent });
    this.schedule();
  }

  /**
   * Stop accepting work, cancel everything queued and wait for running jobs
   * (aborting them first unless `cancelRunning` is false).
   */
  async shutdown(options: ShutdownOptions = {}): Promise<void> {
    const { cancelRunning = true, timeoutMs = this.opts.cancelGraceMs + 1_000 } = options;
    this.accepting = false;

    for (const id of this.waiting.splice(0)) {
      this.registry.requestCancel(id);
      this.registry.update(id, { type: 'cancel' });
    }

    const tasks = Array.from(this.running.values());
    if (cancelRunning) {
      for (const task of tasks) {
        this.registry.requestCancel(task.id);
        this.cancel(task.id);
      }
    }

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, timeoutMs);
    });
    const pending = [...tasks.map((t) => t.done), ...this.cleanups];
    await Promise.race([Promise.allSettled(pending), deadline]);
    if (timer) clearTimeout(timer);
    this.log.info('worker_pool_stopped', { abandoned: tasks.filter((t) => !t.settled).length });
  }
}

function clampConcurrency(value: number): number {
  const n = Math.floor(Number(value));
  return Number.isFinite(n) ? Math.max(1, Math.min(MAX_CONCURRENT_CAP, n)) : 1;
}
