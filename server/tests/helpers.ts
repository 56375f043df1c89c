import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { vi } from 'vitest';
import { loadConfig, type AppConfig } from '../core/config.js';
import type {
  Container,
  DownloadOptions,
  DownloadTarget,
  ExtractionTool,
  FileResult,
  FormatsResult,
  LookupOptions,
  MediaInfo,
  PlaylistInfo,
  RawInfo,
  StreamOptions,
  StreamResult,
} from '../core/extractor.js';
import { pickStream, toFormatsResult, toMediaInfo, toPlaylistInfo } from '../core/formats.js';
import type { Logger } from '../core/logger.js';
import type { DownloadRequest } from '../core/validate.js';

export function silentLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function makeTmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'mediagate-test-'));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    ...loadConfig({}),
    cancelGraceMs: 50,
    retryBackoffMs: 1,
    ...overrides,
  };
}

export function downloadRequest(overrides: Partial<DownloadRequest> = {}): DownloadRequest {
  return { url: 'https://media.example.com/watch?v=abc', container: 'mp4', merge: false, ...overrides };
}

export type Deferred<T> = {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
};

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Settles only by rejecting with the signal's reason. */
export function untilAborted<T>(signal: AbortSignal): Promise<T> {
  return new Promise<T>((_resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}

/** A tool call that ignores cancellation entirely. */
export function never<T>(): Promise<T> {
  return new Promise<T>(() => {});
}

export const SAMPLE_INFO: RawInfo = {
  id: 'abc',
  title: 'Sample clip',
  duration: 212,
  thumbnail: 'https://img.example.com/abc.jpg',
  uploader: 'Sample channel',
  view_count: 1234,
  webpage_url: 'https://media.example.com/watch?v=abc',
  availability: 'public',
  formats: [
    { format_id: '140', ext: 'm4a', protocol: 'https', acodec: 'mp4a.40.2', vcodec: 'none', abr: 128, tbr: 130, url: 'https://cdn.example.com/140' },
    { format_id: '251', ext: 'webm', protocol: 'https', acodec: 'opus', vcodec: 'none', abr: 160, tbr: 165, url: 'https://cdn.example.com/251' },
    { format_id: '18', ext: 'mp4', protocol: 'https', acodec: 'mp4a.40.2', vcodec: 'avc1', height: 360, tbr: 500, url: 'https://cdn.example.com/18' },
    { format_id: '22', ext: 'mp4', protocol: 'https', acodec: 'mp4a.40.2', vcodec: 'avc1', height: 720, tbr: 1500, url: 'https://cdn.example.com/22' },
  ],
  subtitles: { en: [{ ext: 'vtt' }] },
  automatic_captions: {},
};

export const SAMPLE_PLAYLIST: RawInfo = {
  id: 'PL1',
  title: 'Sample list',
  entries: ['e0', 'e1', 'e2', 'e3', 'e4'].map((id) => ({ id, title: `Entry ${id}`, url: `https://media.example.com/watch?v=${id}` })),
};

export type DownloadCall = {
  url: string;
  selector: string;
  target: DownloadTarget;
  signal: AbortSignal;
  options: DownloadOptions;
};

export type MergeCall = {
  videoPath: string;
  audioPath: string;
  container: Container;
  outputPath: string;
  signal: AbortSignal;
};

/** Write `<dir>/<baseName>.<ext>` the way the real tool leaves its output. */
export async function writeOutput(target: DownloadTarget, ext = 'mp4', body = 'media'): Promise<FileResult> {
  const filePath = path.join(target.dir, `${target.baseName}.${ext}`);
  await fs.promises.writeFile(filePath, body);
  return { path: filePath, size: Buffer.byteLength(body) };
}

/**
 * In-process stand-in for yt-dlp/ffmpeg. Lookups answer from fixtures,
 * downloads write a small file; every behaviour can be replaced per test.
 */
export class FakeTool implements ExtractionTool {
  calls = { metadata: 0, formats: 0, stream: 0, raw: 0, playlist: 0, download: 0, merge: 0 };
  downloads: DownloadCall[] = [];
  merges: MergeCall[] = [];
  active = 0;
  maxActive = 0;

  info: RawInfo = SAMPLE_INFO;
  playlistInfo: RawInfo = SAMPLE_PLAYLIST;
  lookupImpl?: (url: string, signal: AbortSignal) => Promise<RawInfo>;
  downloadImpl: (call: DownloadCall) => Promise<FileResult> = (call) => writeOutput(call.target);
  mergeImpl: (call: MergeCall) => Promise<FileResult> = async (call) => {
    await fs.promises.writeFile(call.outputPath, 'merged');
    return { path: call.outputPath, size: 6 };
  };

  private lookup(url: string, signal: AbortSignal): Promise<RawInfo> {
    return this.lookupImpl ? this.lookupImpl(url, signal) : Promise.resolve(this.info);
  }

  async fetchMetadata(url: string, _options: LookupOptions, signal: AbortSignal): Promise<MediaInfo> {
    this.calls.metadata += 1;
    return toMediaInfo(await this.lookup(url, signal));
  }

  async fetchFormats(url: string, _options: LookupOptions, signal: AbortSignal): Promise<FormatsResult> {
    this.calls.formats += 1;
    return toFormatsResult(await this.lookup(url, signal));
  }

  async resolveStream(url: string, options: StreamOptions, signal: AbortSignal): Promise<StreamResult> {
    this.calls.stream += 1;
    return pickStream(await this.lookup(url, signal), options, 0);
  }

  async fetchRawInfo(url: string, _options: LookupOptions, signal: AbortSignal): Promise<RawInfo> {
    this.calls.raw += 1;
    return this.lookup(url, signal);
  }

  async fetchPlaylist(url: string, _options: LookupOptions, signal: AbortSignal): Promise<PlaylistInfo> {
    this.calls.playlist += 1;
    if (this.lookupImpl) return toPlaylistInfo(await this.lookupImpl(url, signal));
    return toPlaylistInfo(this.playlistInfo);
  }

  async download(
    url: string,
    selector: string,
    target: DownloadTarget,
    signal: AbortSignal,
    options: DownloadOptions = {},
  ): Promise<FileResult> {
    const call: DownloadCall = { url, selector, target, signal, options };
    this.calls.download += 1;
    this.downloads.push(call);
    this.active += 1;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      return await this.downloadImpl(call);
    } finally {
      this.active -= 1;
    }
  }

  async merge(
    videoPath: string,
    audioPath: string,
    container: Container,
    outputPath: string,
    signal: AbortSignal,
  ): Promise<FileResult> {
    const call: MergeCall = { videoPath, audioPath, container, outputPath, signal };
    this.calls.merge += 1;
    this.merges.push(call);
    return this.mergeImpl(call);
  }
}
