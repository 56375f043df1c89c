import { z } from 'zod';
import { ValidationError } from './errors.js';

const HttpUrl = z
  .string()
  .trim()
  .url()
  .max(2000)
  .refine((u) => /^https?:\/\//i.test(u), 'Only http/https allowed');

// Netscape cookie jar contents, written to a temp file for the tool
const Cookies = z.string().max(200_000).optional();

const FormatId = z
  .string()
  .regex(/^[0-9a-zA-Z+*/._-]{1,32}$/, 'Invalid format id')
  .optional();

const Ext = z
  .string()
  .regex(/^[a-zA-Z0-9]{1,8}$/, 'Invalid extension')
  .transform((s) => s.toLowerCase())
  .optional();

const Codec = z
  .string()
  .regex(/^[a-zA-Z0-9.]{1,16}$/, 'Invalid codec')
  .optional();

const MaxHeight = z.coerce.number().int().positive().max(8640).optional();

const Limit = z.coerce.number().int().positive().max(5000).optional();
const Offset = z.coerce.number().int().nonnegative().optional();

const OutputDir = z
  .string()
  .trim()
  .max(200)
  .refine((dir) => !/^([/\\]|[a-zA-Z]:)/.test(dir), 'Must be relative')
  .refine((dir) => dir.split(/[/\\]+/).every((part) => part !== '..'), 'Must not leave the download root')
  .refine((dir) => /^[\w ./\\-]*$/.test(dir), 'Invalid characters')
  .optional();

export const UrlBody = z.object({
  url: HttpUrl,
  cookies: Cookies,
});

export const StreamBody = z.object({
  url: HttpUrl,
  mode: z.enum(['audio', 'av']).default('audio'),
  cookies: Cookies,
  formatId: FormatId,
  audioFormatId: FormatId,
  videoFormatId: FormatId,
  maxHeight: MaxHeight,
  preferredExt: Ext,
});

export const PlaylistBody = z.object({
  url: HttpUrl,
  cookies: Cookies,
  limit: Limit,
  offset: Offset,
});

export const LibraryKind = z.enum(['liked', 'watchlater', 'playlists']);

export const LibraryBody = z.object({
  cookies: Cookies,
  limit: Limit,
  offset: Offset,
});

export const DownloadBody = z.object({
  url: HttpUrl,
  cookies: Cookies,
  formatId: FormatId,
  maxHeight: MaxHeight,
  preferredExt: Ext,
  codec: Codec,
  container: z.enum(['mp4', 'mkv', 'webm']).default('mp4'),
  merge: z.boolean().default(false),
  outputDir: OutputDir,
});

export const JobId = z.string().trim().min(1).max(128);

export type UrlRequest = z.infer<typeof UrlBody>;
export type StreamRequest = z.infer<typeof StreamBody>;
export type PlaylistRequest = z.infer<typeof PlaylistBody>;
export type LibraryKindType = z.infer<typeof LibraryKind>;
export type LibraryRequest = z.infer<typeof LibraryBody>;
export type DownloadRequest = z.infer<typeof DownloadBody>;

/** Parse once at the facade boundary; downstream code trusts the result. */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) throw ValidationError.fromZod(parsed.error);
  return parsed.data;
}
