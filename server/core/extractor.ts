/**
 * Contract between the orchestration core and the external extraction tool.
 * Every call takes an AbortSignal and must reject with the signal's reason
 * once it aborts; failures reject with ExternalToolError.
 */

export type RawInfo = Record<string, unknown>;

export interface MediaInfo {
  id: string | null;
  title: string | null;
  duration: number | null;
  thumbnail: string | null;
  uploader: string | null;
  viewCount: number | null;
  webpageUrl: string | null;
  availability: string | null;
}

export interface SimpleFormat {
  formatId: string | null;
  format: string | null;
  ext: string | null;
  protocol: string | null;
  acodec: string | null;
  vcodec: string | null;
  height: number | null;
  tbr: number | null;
  abr: number | null;
  url: string | null;
}

export interface FormatsResult {
  formats: SimpleFormat[];
  subtitles: Record<string, unknown>;
  automaticCaptions: Record<string, unknown>;
}

export interface StreamResult {
  audioUrl: string | null;
  videoUrl: string | null;
  formatId: string | null;
  audioFormatId: string | null;
  subtitles: Record<string, unknown>;
  automaticCaptions: Record<string, unknown>;
  /** Upstream stream URLs expire quickly; re-resolve close to playback. */
  resolvedAt: number;
}

export interface PlaylistEntry {
  id: string | null;
  title: string | null;
  duration: number | null;
  thumbnail: string | null;
  webpageUrl: string | null;
}

export interface PlaylistInfo {
  id: string | null;
  title: string | null;
  entries: PlaylistEntry[];
}

export type LookupOptions = {
  cookies?: string;
};

export type StreamOptions = LookupOptions & {
  mode: 'audio' | 'av';
  formatId?: string;
  audioFormatId?: string;
  videoFormatId?: string;
  maxHeight?: number;
  preferredExt?: string;
};

export type DownloadProgress = {
  stage: 'downloading' | 'processing';
  percent?: number;
  speed?: string;
  eta?: string;
};

export type DownloadTarget = {
  dir: string;
  /** File name without extension; the tool picks the extension. */
  baseName: string;
};

export type DownloadOptions = LookupOptions & {
  onProgress?: (progress: DownloadProgress) => void;
};

export interface FileResult {
  path: string;
  size: number;
}

export type DownloadResult = FileResult;
export type MergeResult = FileResult;

export type Container = 'mp4' | 'mkv' | 'webm';

export interface ExtractionTool {
  fetchMetadata(url: string, options: LookupOptions, signal: AbortSignal): Promise<MediaInfo>;
  fetchFormats(url: string, options: LookupOptions, signal: AbortSignal): Promise<FormatsResult>;
  resolveStream(url: string, options: StreamOptions, signal: AbortSignal): Promise<StreamResult>;
  fetchRawInfo(url: string, options: LookupOptions, signal: AbortSignal): Promise<RawInfo>;
  fetchPlaylist(url: string, options: LookupOptions, signal: AbortSignal): Promise<PlaylistInfo>;
  download(
    url: string,
    selector: string,
    target: DownloadTarget,
    signal: AbortSignal,
    options?: DownloadOptions,
  ): Promise<DownloadResult>;
  merge(
    videoPath: string,
    audioPath: string,
    container: Container,
    outputPath: string,
    signal: AbortSignal,
  ): Promise<MergeResult>;
}
