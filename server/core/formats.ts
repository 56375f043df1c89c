/**
 * Mapping and selection over yt-dlp's info JSON.
 */

import { createHash } from 'node:crypto';
import type {
  FormatsResult,
  MediaInfo,
  PlaylistEntry,
  PlaylistInfo,
  RawInfo,
  SimpleFormat,
  StreamOptions,
  StreamResult,
} from './extractor.js';
import type { DownloadRequest, LibraryKindType } from './validate.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const str = (v: unknown): string | null => (typeof v === 'string' ? v : typeof v === 'number' ? String(v) : null);
const num = (v: unknown): number | null => (typeof v === 'number' && Number.isFinite(v) ? v : null);
const record = (v: unknown): Record<string, unknown> => (isRecord(v) ? v : {});

/** `cache:<md5([url, cookies])>[:suffix]` */
export function cacheKey(url: string, cookies?: string, suffix = ''): string {
  const digest = createHash('md5').update(JSON.stringify([url, cookies || null])).digest('hex');
  const base = `cache:${digest}`;
  return suffix ? `${base}:${suffix}` : base;
}

export function toMediaInfo(raw: RawInfo): MediaInfo {
  return {
    id: str(raw.id),
    title: str(raw.title),
    duration: num(raw.duration),
    thumbnail: str(raw.thumbnail),
    uploader: str(raw.uploader),
    viewCount: num(raw.view_count),
    webpageUrl: str(raw.webpage_url),
    availability: str(raw.availability),
  };
}

export function simplifyFormat(fmt: Record<string, unknown>): SimpleFormat {
  return {
    formatId: str(fmt.format_id),
    format: str(fmt.format),
    ext: str(fmt.ext),
    protocol: str(fmt.protocol),
    acodec: str(fmt.acodec),
    vcodec: str(fmt.vcodec),
    height: num(fmt.height),
    tbr: num(fmt.tbr),
    abr: num(fmt.abr),
    url: str(fmt.url),
  };
}

export function rawFormats(raw: RawInfo): SimpleFormat[] {
  return Array.isArray(raw.formats) ? raw.formats.filter(isRecord).map(simplifyFormat) : [];
}

export function toFormatsResult(raw: RawInfo): FormatsResult {
  return {
    formats: rawFormats(raw),
    subtitles: record(raw.subtitles),
    automaticCaptions: record(raw.automatic_captions),
  };
}

export function toPlaylistInfo(raw: RawInfo): PlaylistInfo {
  const entries: PlaylistEntry[] = (Array.isArray(raw.entries) ? raw.entries : [])
    .filter(isRecord)
    .map((entry) => ({
      id: str(entry.id),
      title: str(entry.title),
      duration: num(entry.duration),
      thumbnail: str(entry.thumbnail),
      webpageUrl: str(entry.webpage_url) ?? str(entry.url),
    }));
  return { id: str(raw.id), title: str(raw.title), entries };
}

export function isHlsFormat(fmt: SimpleFormat): boolean {
  const protocol = (fmt.protocol || '').toLowerCase();
  const ext = (fmt.ext || '').toLowerCase();
  const url = (fmt.url || '').toLowerCase();
  return protocol.includes('m3u8') || ext === 'm3u8' || url.includes('m3u8') || protocol.includes('hls');
}

function pickMax(candidates: SimpleFormat[], score: (f: SimpleFormat) => [number, number]): SimpleFormat | undefined {
  let best: SimpleFormat | undefined;
  let bestScore: [number, number] = [-Infinity, -Infinity];
  for (const fmt of candidates) {
    const s = score(fmt);
    if (s[0] > bestScore[0] || (s[0] === bestScore[0] && s[1] > bestScore[1])) {
      best = fmt;
      bestScore = s;
    }
  }
  return best;
}

// Progressive (non-HLS) streams win when any exist.
function preferProgressive(formats: SimpleFormat[]): SimpleFormat[] {
  const direct = formats.filter((f) => !isHlsFormat(f));
  return direct.length ? direct : formats;
}

export function pickBestAudio(formats: SimpleFormat[]): SimpleFormat | undefined {
  const audio = formats.filter((f) => f.vcodec === 'none' && f.acodec !== 'none');
  return pickMax(preferProgressive(audio), (f) => [f.abr ?? 0, f.tbr ?? 0]);
}

export function pickBestAv(formats: SimpleFormat[]): SimpleFormat | undefined {
  const av = formats.filter((f) => f.vcodec !== 'none' && f.acodec !== 'none');
  return pickMax(preferProgressive(av), (f) => [f.height ?? 0, f.tbr ?? 0]);
}

export function findFormatById(formats: SimpleFormat[], formatId?: string): SimpleFormat | undefined {
  if (!formatId) return undefined;
  return formats.find((f) => f.formatId === formatId);
}

export function filterFormats(
  formats: SimpleFormat[],
  maxHeight?: number,
  preferredExt?: string,
  allowMuxed = true,
): SimpleFormat[] {
  let filtered = formats;
  if (maxHeight) filtered = filtered.filter((f) => (f.height ?? 0) <= maxHeight);
  if (preferredExt) filtered = filtered.filter((f) => (f.ext || '').toLowerCase() === preferredExt.toLowerCase());
  if (!allowMuxed) filtered = filtered.filter((f) => f.acodec === 'none' || f.vcodec === 'none');
  return filtered;
}

export function pickStream(raw: RawInfo, options: StreamOptions, resolvedAt = Date.now()): StreamResult {
  const formats = filterFormats(rawFormats(raw), options.maxHeight, options.preferredExt);
  const subtitles = record(raw.subtitles);
  const automaticCaptions = record(raw.automatic_captions);

  if (options.formatId) {
    const chosen = findFormatById(formats, options.formatId);
    return {
      audioUrl: chosen?.url ?? null,
      videoUrl: chosen?.url ?? null,
      formatId: options.formatId,
      audioFormatId: null,
      subtitles,
      automaticCaptions,
      resolvedAt,
    };
  }

  const audio = findFormatById(formats, options.audioFormatId) ?? pickBestAudio(formats);
  const av = findFormatById(formats, options.videoFormatId) ?? pickBestAv(formats);
  return {
    audioUrl: audio?.url ?? null,
    videoUrl: options.mode === 'av' ? av?.url ?? null : null,
    formatId: av?.formatId ?? null,
    audioFormatId: audio?.formatId ?? null,
    subtitles,
    automaticCaptions,
    resolvedAt,
  };
}

export type FormatSelectors = {
  /** Single pre-muxed download when no merge is requested. */
  single: string;
  video: string;
  audio: string;
};

const alternatives = (...options: string[]) => Array.from(new Set(options)).join('/');

/** yt-dlp `-f` selectors for a download request. */
export function buildSelectors(req: Pick<DownloadRequest, 'formatId' | 'maxHeight' | 'preferredExt' | 'codec'>): FormatSelectors {
  const height = req.maxHeight ? `[height<=?${req.maxHeight}]` : '';
  const ext = req.preferredExt ? `[ext=${req.preferredExt}]` : '';
  const codec = req.codec ? `[acodec^=${req.codec}]` : '';

  const audio = alternatives(`ba${codec}`, 'ba');
  if (req.formatId) {
    const [videoId, audioId] = req.formatId.split('+');
    return {
      single: req.formatId,
      video: videoId || req.formatId,
      audio: audioId || audio,
    };
  }
  return {
    single: alternatives(`b${height}${ext}${codec}`, `b${height}`, 'b'),
    video: alternatives(`bv*${height}${ext}`, `bv*${height}`, 'bv*'),
    audio,
  };
}

export function libraryUrl(kind: LibraryKindType): string {
  switch (kind) {
    case 'liked':
      return 'https://www.youtube.com/playlist?list=LL';
    case 'watchlater':
      return 'https://www.youtube.com/playlist?list=WL';
    case 'playlists':
      return 'https://www.youtube.com/feed/playlists';
  }
}

export type Page<T> = {
  total: number;
  offset: number;
  limit: number;
  entries: T[];
};

export function paginate<T>(entries: T[], limit?: number, offset?: number): Page<T> {
  const total = entries.length;
  const lim = limit && limit > 0 ? limit : total;
  const off = offset && offset >= 0 ? offset : 0;
  return { total, offset: off, limit: lim, entries: entries.slice(off, off + lim) };
}
