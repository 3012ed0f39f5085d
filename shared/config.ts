import { z } from 'zod';
import { libraryPaths, type LibraryPaths } from './paths';

const MEGABYTE = 1024 * 1024;

const numeric = (defaultValue: number) => z
  .string()
  .optional()
  .transform((val, ctx) => {
    if (val === undefined || val.trim() === '') return defaultValue;
    const parsed = Number(val);
    if (!Number.isFinite(parsed)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a number, got "${val}"` });
      return z.NEVER;
    }
    return parsed;
  });

const envSchema = z.object({
  DISCORD_TOKEN: z.string().default(''),
  SPOTIFY_CLIENT_ID: z.string().default(''),
  SPOTIFY_CLIENT_SECRET: z.string().default(''),

  LIBRARY_PATH: z.string().optional(),
  DATABASE_PATH: z.string().optional(),
  // unset, 0 or negative means no limit
  STORAGE_LIMIT_MB: numeric(0),

  MIN_CONFIDENCE: numeric(0.6).pipe(z.number().min(0).max(1)),
  SEARCH_RESULTS: numeric(5).pipe(z.number().int().min(1).max(20)),
  DOWNLOAD_ATTEMPTS: numeric(3).pipe(z.number().int().min(1)),
  DOWNLOAD_BACKOFF_MS: numeric(1000).pipe(z.number().min(0)),
  METADATA_ATTEMPTS: numeric(2).pipe(z.number().int().min(1)),
  METADATA_BACKOFF_MS: numeric(500).pipe(z.number().min(0)),
  METADATA_MAX_AGE_HOURS: numeric(24 * 7).pipe(z.number().min(0)),

  METADATA_TIMEOUT_MS: numeric(10_000).pipe(z.number().positive()),
  SEARCH_TIMEOUT_MS: numeric(30_000).pipe(z.number().positive()),
  DOWNLOAD_TIMEOUT_MS: numeric(5 * 60_000).pipe(z.number().positive()),
  TRANSCODE_TIMEOUT_MS: numeric(5 * 60_000).pipe(z.number().positive()),
  ARTWORK_TIMEOUT_MS: numeric(15_000).pipe(z.number().positive()),

  YT_DLP_PATH: z.string().default('yt-dlp'),
  FFMPEG_PATH: z.string().default('ffmpeg'),
  AUDIO_BITRATE: z.string().regex(/^\d+k$/, 'AUDIO_BITRATE must look like 192k').default('192k'),
  MAX_UPLOAD_MB: numeric(25).pipe(z.number().positive()),
});

export interface CourierConfig {
  discordToken: string;
  spotify: {
    clientId: string;
    clientSecret: string;
    timeoutMs: number;
  };
  paths: LibraryPaths;
  storageLimitBytes: number | null;
  metadata: {
    attempts: number;
    backoffMs: number;
    maxAgeMs: number;
  };
  acquisition: {
    minConfidence: number;
    searchResults: number;
    downloadAttempts: number;
    downloadBackoffMs: number;
    searchTimeoutMs: number;
    downloadTimeoutMs: number;
    transcodeTimeoutMs: number;
    artworkTimeoutMs: number;
    ytDlpPath: string;
    ffmpegPath: string;
    audioBitrate: string;
  };
  maxUploadBytes: number;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CourierConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
  }
  const e = parsed.data;

  return {
    discordToken: e.DISCORD_TOKEN,
    spotify: {
      clientId: e.SPOTIFY_CLIENT_ID,
      clientSecret: e.SPOTIFY_CLIENT_SECRET,
      timeoutMs: e.METADATA_TIMEOUT_MS,
    },
    paths: libraryPaths(e.LIBRARY_PATH, e.DATABASE_PATH),
    storageLimitBytes: e.STORAGE_LIMIT_MB > 0 ? Math.floor(e.STORAGE_LIMIT_MB * MEGABYTE) : null,
    metadata: {
      attempts: e.METADATA_ATTEMPTS,
      backoffMs: e.METADATA_BACKOFF_MS,
      maxAgeMs: e.METADATA_MAX_AGE_HOURS * 60 * 60 * 1000,
    },
    acquisition: {
      minConfidence: e.MIN_CONFIDENCE,
      searchResults: e.SEARCH_RESULTS,
      downloadAttempts: e.DOWNLOAD_ATTEMPTS,
      downloadBackoffMs: e.DOWNLOAD_BACKOFF_MS,
      searchTimeoutMs: e.SEARCH_TIMEOUT_MS,
      downloadTimeoutMs: e.DOWNLOAD_TIMEOUT_MS,
      transcodeTimeoutMs: e.TRANSCODE_TIMEOUT_MS,
      artworkTimeoutMs: e.ARTWORK_TIMEOUT_MS,
      ytDlpPath: e.YT_DLP_PATH,
      ffmpegPath: e.FFMPEG_PATH,
      audioBitrate: e.AUDIO_BITRATE,
    },
    maxUploadBytes: Math.floor(e.MAX_UPLOAD_MB * MEGABYTE),
  };
}

// Credentials are only needed by the bot itself, not by the maintenance scripts
export function requireCredentials(config: CourierConfig, names: Array<'discord' | 'spotify'>) {
  const missing: string[] = [];
  if (names.includes('discord') && !config.discordToken) missing.push('DISCORD_TOKEN');
  if (names.includes('spotify') && !config.spotify.clientId) missing.push('SPOTIFY_CLIENT_ID');
  if (names.includes('spotify') && !config.spotify.clientSecret) missing.push('SPOTIFY_CLIENT_SECRET');
  if (missing.length) {
    throw new ConfigError(missing.map(name => `${name}: required`));
  }
}
