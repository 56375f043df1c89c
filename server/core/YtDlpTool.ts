import { spawn } from 'node:child_process';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { classifyToolError, ExternalToolError } from './errors.js';
import type {
  Container,
  DownloadOptions,
  DownloadResult,
  DownloadTarget,
  ExtractionTool,
  FormatsResult,
  LookupOptions,
  MediaInfo,
  MergeResult,
  PlaylistInfo,
  RawInfo,
  StreamOptions,
  StreamResult,
} from './extractor.js';
import { isRecord, pickStream, toFormatsResult, toMediaInfo, toPlaylistInfo } from './formats.js';
import type { Logger } from './logger.js';
import { cleanedChildEnv, findProducedFile, headerArgs, parseDlLine, writeCookieFile } from './ytHelpers.js';

export type YtDlpToolOptions = {
  log: Logger;
  ytDlpPath?: string;
  ffmpegPath?: string;
  /** SIGTERM first, SIGKILL once this elapses. */
  killGraceMs?: number;
  tmpDir?: string;
};

type RunResult = {
  stdout: string;
  stderr: string;
};

const STDERR_KEEP = 64 * 1024;

/**
 * YtDlpTool - yt-dlp / ffmpeg process wrapper
 *
 * Features:
 * - Single-JSON extraction for metadata, formats, stream URLs and playlists
 * - Per-call cookie jar in a private temp dir, removed afterwards
 * - Progress parsing from `--newline` output
 * - Abort kills the child (SIGTERM, then SIGKILL after the grace period)
 * - Failures classified into typed tool errors
 */
export class YtDlpTool implements ExtractionTool {
  private readonly log: Logger;
  private readonly ytDlpPath: string;
  private readonly ffmpegPath: string;
  private readonly killGraceMs: number;
  private readonly tmpDir: string;

  constructor(options: YtDlpToolOptions) {
    this.log = options.log;
    this.ytDlpPath = options.ytDlpPath ?? 'yt-dlp';
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.killGraceMs = options.killGraceMs ?? 5_000;
    this.tmpDir = options.tmpDir ?? path.join(os.tmpdir(), 'mediagate');
  }

  async fetchRawInfo(url: string, options: LookupOptions, signal: AbortSignal): Promise<RawInfo> {
    return this.dumpJson(url, ['--no-playlist'], options, signal);
  }

  async fetchMetadata(url: string, options: LookupOptions, signal: AbortSignal): Promise<MediaInfo> {
    return toMediaInfo(await this.fetchRawInfo(url, options, signal));
  }

  async fetchFormats(url: string, options: LookupOptions, signal: AbortSignal): Promise<FormatsResult> {
    return toFormatsResult(await this.fetchRawInfo(url, options, signal));
  }

  async resolveStream(url: string, options: StreamOptions, signal: AbortSignal): Promise<StreamResult> {
    const raw = await this.fetchRawInfo(url, options, signal);
    return pickStream(raw, options, Date.now());
  }

  async fetchPlaylist(url: string, options: LookupOptions, signal: AbortSignal): Promise<PlaylistInfo> {
    const raw = await this.dumpJson(url, ['--flat-playlist', '--yes-playlist'], options, signal);
    return toPlaylistInfo(raw);
  }

  async download(
    url: string,
    selector: string,
    target: DownloadTarget,
    signal: AbortSignal,
    options: DownloadOptions = {},
  ): Promise<DownloadResult> {
    const args = [
      '--no-warnings',
      '--no-colors',
      '--newline',
      '--progress',
      '--no-playlist',
      '-f',
      selector,
      '-o',
      path.join(target.dir, `${target.baseName}.%(ext)s`),
      '--ffmpeg-location',
      this.ffmpegPath,
      ...headerArgs(url),
    ];

    this.log.info('ytdlp_download_start', { url, format: selector, dir: target.dir });
    await this.withCookies(options.cookies, args, () =>
      this.run(this.ytDlpPath, [...args, url], signal, (line) => {
        const progress = parseDlLine(line);
        if (progress) options.onProgress?.(progress);
      }),
    );

    const produced = findProducedFile(target.dir, target.baseName);
    if (!produced) throw new ExternalToolError('Unknown', 'Download finished without an output file');
    const filePath = path.join(target.dir, produced);
    const stat = await fs.promises.stat(filePath);
    this.log.info('ytdlp_download_done', { url, file: produced, size: stat.size });
    return { path: filePath, size: stat.size };
  }

  async merge(
    videoPath: string,
    audioPath: string,
    container: Container,
    outputPath: string,
    signal: AbortSignal,
  ): Promise<MergeResult> {
    const args = [
      '-hide_banner',
      '-loglevel',
      'error',
      '-y',
      '-i',
      videoPath,
      '-i',
      audioPath,
      '-map',
      '0:v:0',
      '-map',
      '1:a:0',
      '-c',
      'copy',
      ...(container === 'mp4' ? ['-movflags', '+faststart'] : []),
      outputPath,
    ];
    this.log.info('ffmpeg_merge_start', { output: path.basename(outputPath), container });
    await this.run(this.ffmpegPath, args, signal);
    const stat = await fs.promises.stat(outputPath);
    return { path: outputPath, size: stat.size };
  }

  private async dumpJson(url: string, extra: string[], options: LookupOptions, signal: AbortSignal): Promise<RawInfo> {
    const args = ['--dump-single-json', '--no-warnings', '--skip-download', ...extra, ...headerArgs(url)];
    const { stdout } = await this.withCookies(options.cookies, args, () =>
      this.run(this.ytDlpPath, [...args, url], signal),
    );
    let parsed: unknown;
    try {
      parsed = JSON.parse(stdout);
    } catch (err) {
      this.log.warn('ytdlp_json_parse_failed', { url, error: String(err) });
      throw new ExternalToolError('Unknown', 'Extractor returned unreadable output');
    }
    if (!isRecord(parsed)) throw new ExternalToolError('Unknown', 'Extractor returned unexpected output');
    return parsed;
  }

  private async withCookies<T>(cookies: string | undefined, args: string[], fn: () => Promise<T>): Promise<T> {
    if (!cookies) return fn();
    const jar = await writeCookieFile(this.tmpDir, cookies);
    args.push('--cookies', jar.file);
    try {
      return await fn();
    } finally {
      await jar.dispose();
    }
  }

  /**
   * Spawn and collect output. Rejects with the signal's reason once aborted,
   * otherwise with a classified tool error on non-zero exit.
   */
  private run(bin: string, args: string[], signal: AbortSignal, onLine?: (line: string) => void): Promise<RunResult> {
    return new Promise((resolve, reject) => {
      if (signal.aborted) {
        reject(signal.reason);
        return;
      }

      const child = spawn(bin, args, {
        stdio: ['ignore', 'pipe', 'pipe'],
        env: cleanedChildEnv(process.env),
      });

      let stdout = '';
      let stderr = '';
      let pending = '';
      let killTimer: NodeJS.Timeout | undefined;
      let settled = false;

      const onAbort = () => {
        this.log.info('child_abort', { bin: path.basename(bin), pid: child.pid });
        child.kill('SIGTERM');
        killTimer = setTimeout(() => {
          if (child.exitCode === null && child.signalCode !== 'SIGKILL') child.kill('SIGKILL');
        }, this.killGraceMs);
        killTimer.unref?.();
      };
      signal.addEventListener('abort', onAbort, { once: true });

      const settle = (fn: () => void) => {
        if (settled) return;
        settled = true;
        signal.removeEventListener('abort', onAbort);
        if (killTimer) clearTimeout(killTimer);
        fn();
      };

      child.stdout.setEncoding('utf8');
      child.stdout.on('data', (chunk: string) => {
        stdout += chunk;
        if (!onLine) return;
        pending += chunk;
        const lines = pending.split(/\r?\n|\r/);
        pending = lines.pop() ?? '';
        for (const line of lines) if (line) onLine(line);
      });

      child.stderr.setEncoding('utf8');
      child.stderr.on('data', (chunk: string) => {
        stderr += chunk;
        if (stderr.length > STDERR_KEEP) stderr = stderr.slice(-STDERR_KEEP);
      });

      child.on('error', (err) => {
        this.log.error('child_spawn_error', { bin: path.basename(bin), error: String(err) });
        settle(() => reject(signal.aborted ? signal.reason : classifyToolError(err.message)));
      });

      child.on('close', (code) => {
        settle(() => {
          if (signal.aborted) {
            reject(signal.reason);
          } else if (code === 0) {
            resolve({ stdout, stderr });
          } else {
            const error = classifyToolError(stderr || stdout || `${path.basename(bin)} exited with ${code}`);
            this.log.warn('child_failed', { bin: path.basename(bin), exitCode: code, kind: error.kind, error: error.message });
            reject(error);
          }
        });
      });
    });
  }
}
