import fs from 'node:fs';
import path from 'node:path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ExternalToolError } from '../core/errors.js';
import { JobRegistry, isTerminal } from '../core/JobRegistry.js';
import type { Logger } from '../core/logger.js';
import type { DownloadRequest } from '../core/validate.js';
import { WorkerPool, type WorkerPoolOptions } from '../core/WorkerPool.js';
import {
  FakeTool,
  deferred,
  downloadRequest,
  makeTmpDir,
  never,
  removeDir,
  silentLogger,
  untilAborted,
  writeOutput,
  type Deferred,
} from './helpers.js';

const WAIT = { timeout: 3_000, interval: 5 };

describe('WorkerPool', () => {
  let dir: string;
  let log: Logger;
  let registry: JobRegistry;
  let tool: FakeTool;
  let pool: WorkerPool;

  function makePool(overrides: Partial<WorkerPoolOptions> = {}) {
    pool = new WorkerPool({
      registry,
      tool,
      log,
      maxConcurrent: 2,
      downloadDir: dir,
      downloadTimeoutMs: 5_000,
      mergeTimeoutMs: 5_000,
      cancelGraceMs: 5_000,
      downloadRetries: 3,
      retryBackoffMs: 1,
      ...overrides,
    });
    return pool;
  }

  function submit(overrides: Partial<DownloadRequest> = {}) {
    const job = registry.create(downloadRequest(overrides));
    pool.submit(job.id);
    return job.id;
  }

  const stateOf = (id: string) => registry.get(id)?.state;

  async function idle(id: string) {
    await vi.waitFor(() => {
      expect(isTerminal(stateOf(id) ?? 'queued')).toBe(true);
      expect(pool.isActive(id)).toBe(false);
    }, WAIT);
  }

  beforeEach(() => {
    dir = makeTmpDir();
    log = silentLogger();
    registry = new JobRegistry({ log });
    tool = new FakeTool();
  });

  afterEach(async () => {
    await pool.shutdown({ timeoutMs: 200 });
    vi.restoreAllMocks();
    removeDir(dir);
  });

  describe('execution', () => {
    it('runs a single download to completion', async () => {
      makePool();
      const id = submit();
      await idle(id);

      expect(registry.get(id)).toMatchObject({
        state: 'completed',
        progress: 100,
        attempts: 1,
        result: { path: path.join(dir, `${id}.mp4`), filename: `${id}.mp4`, size: 5 },
      });
      expect(tool.downloads[0].selector).toBe('b');
      expect(tool.downloads[0].target).toEqual({ dir, baseName: id });
      expect(fs.existsSync(path.join(dir, `${id}.mp4`))).toBe(true);
      expect(fs.existsSync(path.join(dir, '.work', id))).toBe(false);
    });

    it('writes into the requested output sub-directory', async () => {
      makePool();
      const id = submit({ outputDir: 'music/mixes' });
      await idle(id);
      expect(registry.get(id)?.result?.path).toBe(path.join(dir, 'music', 'mixes', `${id}.mp4`));
    });

    it('downloads both parts, merges them and maps progress onto the stages', async () => {
      makePool();
      const seen: string[] = [];
      let id = '';
      tool.downloadImpl = async (call) => {
        call.options.onProgress?.({ stage: 'downloading', percent: 50 });
        seen.push(`${call.target.baseName}:${registry.get(id)?.progress}`);
        return writeOutput(call.target, call.target.baseName === 'video' ? 'mp4' : 'm4a');
      };
      tool.mergeImpl = async (call) => {
        const job = registry.get(id);
        seen.push(`merge:${job?.state}:${job?.progress}`);
        await fs.promises.writeFile(call.outputPath, 'merged');
        return { path: call.outputPath, size: 6 };
      };

      id = submit({ merge: true, container: 'mkv' });
      await idle(id);

      const workDir = path.join(dir, '.work', id);
      expect(tool.downloads.map((c) => [c.selector, c.target.dir, c.target.baseName])).toEqual([
        ['bv*', workDir, 'video'],
        ['ba', workDir, 'audio'],
      ]);
      expect(tool.merges).toHaveLength(1);
      expect(tool.merges[0]).toMatchObject({
        videoPath: path.join(workDir, 'video.mp4'),
        audioPath: path.join(workDir, 'audio.m4a'),
        container: 'mkv',
        outputPath: path.join(dir, `${id}.mkv`),
      });
      expect(seen).toEqual(['video:30', 'audio:75', 'merge:merging:90']);
      expect(registry.get(id)).toMatchObject({
        state: 'completed',
        progress: 100,
        result: { filename: `${id}.mkv`, size: 6 },
      });
      expect(fs.existsSync(workDir)).toBe(false);
    });
  });

  describe('concurrency', () => {
    it('never runs more than maxConcurrent jobs and keeps the rest queued', async () => {
      makePool({ maxConcurrent: 2 });
      const gates: Deferred<void>[] = [];
      tool.downloadImpl = async (call) => {
        const gate = deferred<void>();
        gates.push(gate);
        await gate.promise;
        return writeOutput(call.target);
      };

      const ids = Array.from({ length: 5 }, () => submit());
      expect(pool.stats()).toEqual({ running: 2, queued: 3, maxConcurrent: 2 });
      expect(registry.stats()).toMatchObject({ running: 2, queued: 3 });

      for (let i = 0; i < ids.length; i++) {
        await vi.waitFor(() => expect(gates.length).toBeGreaterThan(i), WAIT);
        expect(tool.active).toBeLessThanOrEqual(2);
        gates[i].resolve();
      }
      for (const id of ids) await idle(id);

      expect(tool.maxActive).toBe(2);
      expect(ids.map(stateOf)).toEqual(['completed', 'completed', 'completed', 'completed', 'completed']);
    });

    it('starts queued jobs in submission order', async () => {
      makePool({ maxConcurrent: 1 });
      const ids = [submit(), submit(), submit()];
      for (const id of ids) await idle(id);
      expect(tool.downloads.map((c) => c.target.baseName)).toEqual(ids);
    });

    it('picks up queued work when capacity is raised', async () => {
      makePool({ maxConcurrent: 1 });
      tool.downloadImpl = (call) => untilAborted(call.signal);
      submit();
      submit();
      expect(pool.stats()).toMatchObject({ running: 1, queued: 1 });

      pool.setMaxConcurrent(2);
      expect(pool.stats()).toEqual({ running: 2, queued: 0, maxConcurrent: 2 });
    });
  });

  describe('cancellation', () => {
    it('cancels a queued job without invoking the tool', async () => {
      makePool({ maxConcurrent: 1 });
      const gate = deferred<void>();
      tool.downloadImpl = async (call) => {
        await gate.promise;
        return writeOutput(call.target);
      };
      const first = submit();
      const second = submit();
      expect(stateOf(second)).toBe('queued');

      registry.requestCancel(second);
      expect(pool.cancel(second)).toBe(true);
      expect(stateOf(second)).toBe('cancelled');

      await vi.waitFor(() => expect(tool.downloads).toHaveLength(1), WAIT);
      gate.resolve();
      await idle(first);

      expect(stateOf(first)).toBe('completed');
      expect(tool.downloads.map((c) => c.target.baseName)).toEqual([first]);
    });

    it('skips a job whose cancellation was requested before it started', async () => {
      makePool();
      const job = registry.create(downloadRequest());
      registry.requestCancel(job.id);
      pool.submit(job.id);
      expect(stateOf(job.id)).toBe('cancelled');
      expect(tool.calls.download).toBe(0);
    });

    it('aborts a running download and removes its partial output', async () => {
      makePool({ cancelGraceMs: 10_000 });
      tool.downloadImpl = async (call) => {
        await fs.promises.writeFile(path.join(call.target.dir, `${call.target.baseName}.mp4.part`), 'partial');
        return untilAborted(call.signal);
      };
      const id = submit();
      const partial = path.join(dir, `${id}.mp4.part`);
      await vi.waitFor(() => expect(fs.existsSync(partial)).toBe(true), WAIT);

      registry.requestCancel(id);
      pool.cancel(id);
      await idle(id);

      expect(registry.get(id)).toMatchObject({ state: 'cancelled', cancelRequested: true });
      expect(registry.get(id)?.error).toBeUndefined();
      expect(fs.existsSync(partial)).toBe(false);
    });

    it('stops waiting for a tool that ignores cancellation and removes its partial output', async () => {
      makePool({ maxConcurrent: 1, cancelGraceMs: 30 });
      tool.downloadImpl = async (call) => {
        if (tool.calls.download > 1) return writeOutput(call.target);
        await fs.promises.writeFile(path.join(call.target.dir, `${call.target.baseName}.mp4.part`), 'partial');
        return never();
      };
      const stuck = submit();
      const next = submit();
      const partial = path.join(dir, `${stuck}.mp4.part`);
      await vi.waitFor(() => expect(fs.existsSync(partial)).toBe(true), WAIT);

      registry.requestCancel(stuck);
      pool.cancel(stuck);
      expect(stateOf(stuck)).toBe('running');

      await vi.waitFor(() => expect(stateOf(stuck)).toBe('cancelled'), WAIT);
      await idle(next);
      expect(stateOf(next)).toBe('completed');
      await vi.waitFor(() => expect(fs.existsSync(partial)).toBe(false), WAIT);
    });

    it('force-cancels and cleans up a job stuck outside the tool', async () => {
      makePool({ maxConcurrent: 1, cancelGraceMs: 30 });
      vi.spyOn(fs.promises, 'mkdir').mockImplementationOnce(() => never());
      const job = registry.create(downloadRequest());
      const partial = path.join(dir, `${job.id}.mp4.part`);
      fs.writeFileSync(partial, 'partial');
      pool.submit(job.id);
      const next = submit();

      registry.requestCancel(job.id);
      pool.cancel(job.id);
      await vi.waitFor(() => expect(stateOf(job.id)).toBe('cancelled'), WAIT);
      expect(log.warn).toHaveBeenCalledWith('job_cancel_forced', { id: job.id, graceMs: 30 });

      await idle(next);
      expect(stateOf(next)).toBe('completed');
      await vi.waitFor(() => expect(fs.existsSync(partial)).toBe(false), WAIT);
      expect(tool.downloads.map((c) => c.target.baseName)).toEqual([next]);
    });
  });

  describe('failures', () => {
    it('fails with Timeout when the download deadline passes', async () => {
      makePool({ downloadTimeoutMs: 30 });
      tool.downloadImpl = (call) => untilAborted(call.signal);
      const id = submit();
      await idle(id);
      expect(registry.get(id)).toMatchObject({
        state: 'failed',
        error: { kind: 'Timeout', message: 'download exceeded 30ms' },
      });
      expect(registry.get(id)?.result).toBeUndefined();
    });

    it('fails a download whose tool never returns once the deadline and grace pass', async () => {
      makePool({ maxConcurrent: 1, downloadTimeoutMs: 30, cancelGraceMs: 20 });
      tool.downloadImpl = (call) => (tool.calls.download === 1 ? never() : writeOutput(call.target));
      const hung = submit();
      const next = submit();
      await idle(hung);
      expect(registry.get(hung)).toMatchObject({
        state: 'failed',
        error: { kind: 'Timeout', message: 'download exceeded 30ms' },
      });

      await idle(next);
      expect(stateOf(next)).toBe('completed');
    });

    it('records the tool error kind when authentication is required', async () => {
      makePool();
      tool.downloadImpl = () => Promise.reject(new ExternalToolError('AuthRequired', 'Sign in to continue'));
      const id = submit();
      await idle(id);
      expect(registry.get(id)).toMatchObject({
        state: 'failed',
        attempts: 1,
        error: { kind: 'ExternalToolError:AuthRequired', message: 'Sign in to continue' },
      });
      expect(fs.readdirSync(dir).filter((f) => f.startsWith(id))).toEqual([]);
    });

    it('retries upstream rate limiting with backoff', async () => {
      makePool({ downloadRetries: 2 });
      tool.downloadImpl = (call) =>
        tool.calls.download <= 2
          ? Promise.reject(new ExternalToolError('RateLimited', 'HTTP Error 429: Too Many Requests'))
          : writeOutput(call.target);
      const id = submit();
      await idle(id);
      expect(registry.get(id)).toMatchObject({ state: 'completed', attempts: 3 });
      expect(log.warn).toHaveBeenCalledWith('job_download_retry', { id, attempt: 1, delayMs: 1 });
      expect(log.warn).toHaveBeenCalledWith('job_download_retry', { id, attempt: 2, delayMs: 2 });
    });

    it('gives up after the configured retries', async () => {
      makePool({ downloadRetries: 2 });
      tool.downloadImpl = () => Promise.reject(new ExternalToolError('RateLimited', 'HTTP Error 429: Too Many Requests'));
      const id = submit();
      await idle(id);
      expect(tool.calls.download).toBe(3);
      expect(registry.get(id)).toMatchObject({
        state: 'failed',
        attempts: 3,
        error: { kind: 'ExternalToolError:RateLimited' },
      });
    });

    it('does not retry other tool errors', async () => {
      makePool();
      tool.downloadImpl = () => Promise.reject(new ExternalToolError('Unavailable', 'Video unavailable'));
      const id = submit();
      await idle(id);
      expect(tool.calls.download).toBe(1);
      expect(registry.get(id)?.error?.kind).toBe('ExternalToolError:Unavailable');
    });

    it('turns unexpected exceptions into InternalError', async () => {
      makePool();
      tool.downloadImpl = () => Promise.reject(new Error('disk on fire'));
      const id = submit();
      await idle(id);
      expect(registry.get(id)).toMatchObject({
        state: 'failed',
        error: { kind: 'InternalError', message: 'disk on fire' },
      });
    });

    it('keeps one failing job from affecting another', async () => {
      makePool();
      tool.downloadImpl = (call) =>
        call.url.includes('broken')
          ? Promise.reject(new ExternalToolError('Unknown', 'exit 1'))
          : writeOutput(call.target);
      const bad = submit({ url: 'https://media.example.com/broken' });
      const good = submit();
      await idle(bad);
      await idle(good);
      expect([stateOf(bad), stateOf(good)]).toEqual(['failed', 'completed']);
    });
  });

  describe('shutdown', () => {
    it('cancels queued and running jobs and refuses new work', async () => {
      makePool({ maxConcurrent: 1 });
      tool.downloadImpl = (call) => untilAborted(call.signal);
      const running = submit();
      const queued = submit();
      await vi.waitFor(() => expect(tool.downloads).toHaveLength(1), WAIT);

      await pool.shutdown({ timeoutMs: 1_000 });

      expect([stateOf(running), stateOf(queued)]).toEqual(['cancelled', 'cancelled']);
      const late = submit();
      expect(stateOf(late)).toBe('cancelled');
      expect(tool.calls.download).toBe(1);
    });
  });
});
