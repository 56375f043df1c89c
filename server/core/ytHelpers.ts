/**
 * yt-dlp helper functions
 */

import fs from 'node:fs';
import path from 'node:path';
import type { DownloadProgress } from './extractor.js';

/**
 * Generate HTTP headers for specific domains (YouTube, X/Twitter, Instagram, Facebook)
 */
export function makeHeaders(u: string): string[] {
  let host = '';
  try {
    host = new URL(u).hostname.toLowerCase();
  } catch {
    return ['user-agent: Mozilla/5.0'];
  }
  if (host.includes('youtube.com') || host.includes('youtu.be')) {
    return ['referer: https://www.youtube.com', 'user-agent: Mozilla/5.0'];
  }
  if (host.includes('x.com') || host.includes('twitter.com')) {
    return ['referer: https://x.com', 'user-agent: Mozilla/5.0'];
  }
  if (host.includes('instagram.com')) {
    return ['referer: https://www.instagram.com', 'user-agent: Mozilla/5.0'];
  }
  if (host.includes('facebook.com') || host.includes('fbcdn.net')) {
    return ['referer: https://www.facebook.com', 'user-agent: Mozilla/5.0'];
  }
  return ['user-agent: Mozilla/5.0'];
}

/** `--add-header` pairs for the command line. */
export function headerArgs(u: string): string[] {
  return makeHeaders(u).flatMap((h) => ['--add-header', h]);
}

/**
 * Parse a yt-dlp `--newline` output line into a progress event
 */
export function parseDlLine(text: string): DownloadProgress | null {
  if (/^\[(Merger|ffmpeg|ExtractAudio|VideoConvertor|FixupM3u8)\]/.test(text.trim())) {
    return { stage: 'processing' };
  }
  if (!/^\[download\]/.test(text.trim())) return null;
  const pctMatch = text.match(/(\d{1,3}(?:\.\d+)?)%/);
  if (!pctMatch) return null;
  const out: DownloadProgress = {
    stage: 'downloading',
    percent: Math.max(0, Math.min(100, parseFloat(pctMatch[1]))),
  };
  const speedMatch = text.match(/\bat\s+([\d.,]+\s*(?:[KMG]?i?B)\/s)/i);
  const etaMatch = text.match(/ETA\s+(\d{2}:\d{2}(?::\d{2})?)/i);
  if (speedMatch) out.speed = speedMatch[1].replace(/\s+/g, '');
  if (etaMatch) out.eta = etaMatch[1];
  return out;
}

/**
 * Find produced file by base name, skipping yt-dlp's partial and fragment files
 */
export function findProducedFile(dir: string, baseName: string): string | undefined {
  const list = fs.readdirSync(dir);
  return list.find(
    (f) => f.startsWith(baseName + '.') && !/\.(part|ytdl|temp)$/i.test(f) && !/\.part-Frag\d+/i.test(f),
  );
}

/**
 * Write request cookies to a private temp file for `--cookies`; returns the
 * path and a disposer.
 */
export async function writeCookieFile(tmpDir: string, cookies: string): Promise<{ file: string; dispose: () => Promise<void> }> {
  await fs.promises.mkdir(tmpDir, { recursive: true });
  const dir = await fs.promises.mkdtemp(path.join(tmpDir, 'cookies-'));
  const file = path.join(dir, 'cookies.txt');
  await fs.promises.writeFile(file, cookies, { encoding: 'utf8', mode: 0o600 });
  return {
    file,
    dispose: () => fs.promises.rm(dir, { recursive: true, force: true }),
  };
}

/**
 * Clean environment variables for child processes
 */
export function cleanedChildEnv(env: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  const cleaned = { ...env };
  delete cleaned.HTTP_PROXY;
  delete cleaned.HTTPS_PROXY;
  delete cleaned.NO_PROXY;
  delete cleaned.http_proxy;
  delete cleaned.https_proxy;
  delete cleaned.no_proxy;
  return cleaned;
}
