import { join } from 'path';
import { runProcess } from './process';
import TrackRequestError from '../../shared/TrackRequestError';
import type { SourceCandidate } from '../../shared/messages';
import { createLogger } from '../../shared/util';

const log = createLogger('yt-dlp', 'warn');

export interface YtDlpOptions {
  binPath: string;
  timeoutMs: number;
}

interface SearchEntry {
  id?: unknown;
  url?: unknown;
  webpage_url?: unknown;
  title?: unknown;
  channel?: unknown;
  uploader?: unknown;
  duration?: unknown;
}

const isSearchEntry = (value: unknown): value is SearchEntry =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const optionalString = (value: unknown) => typeof value === 'string' && value ? value : null;

/**
 * Parse the one-JSON-object-per-line output of `--dump-json --flat-playlist`.
 * Lines that are not usable search results are skipped.
 */
export function parseSearchOutput(stdout: string): SourceCandidate[] {
  const candidates: SourceCandidate[] = [];
  for (const line of stdout.split(/\r?\n/)) {
    if (!line.trim().startsWith('{')) continue;
    let entry: unknown;
    try {
      entry = JSON.parse(line);
    } catch (e) {
      log('Skipping unparseable search result line:', line.slice(0, 120));
      continue;
    }
    if (!isSearchEntry(entry)) continue;
    const id = optionalString(entry.id);
    const title = optionalString(entry.title);
    if (!id || !title) continue;
    candidates.push({
      id,
      title,
      url: optionalString(entry.webpage_url) ?? optionalString(entry.url) ?? `https://www.youtube.com/watch?v=${id}`,
      uploader: optionalString(entry.channel) ?? optionalString(entry.uploader),
      durationSeconds: typeof entry.duration === 'number' && Number.isFinite(entry.duration)
        ? Math.round(entry.duration)
        : null,
    });
  }
  return candidates;
}

/**
 * Map yt-dlp's stderr to a download failure.
 * Unavailable, private and age-restricted videos will not succeed on retry;
 * anything else is assumed to be a network hiccup.
 */
export function classifyDownloadFailure(stderr: string, timedOut: boolean = false): TrackRequestError {
  if (timedOut) {
    return new TrackRequestError('DOWNLOAD_FAILED', 'yt-dlp timed out', { retryable: true });
  }
  const unavailableMatch = stderr.match(/\[youtube\] (.+): Video unavailable(.*)/);
  if (unavailableMatch) {
    return new TrackRequestError('DOWNLOAD_FAILED', `Video ${unavailableMatch[1]} is unavailable`, { retryable: false });
  }
  if (stderr.match('Sign in to confirm your age')) {
    return new TrackRequestError('DOWNLOAD_FAILED', 'Video is age restricted', { retryable: false });
  }
  if (stderr.match(/Private video|This video has been removed/)) {
    return new TrackRequestError('DOWNLOAD_FAILED', 'Video is private or removed', { retryable: false });
  }
  const lastError = stderr.split(/\r?\n/).filter(line => line.startsWith('ERROR:')).pop();
  return new TrackRequestError('DOWNLOAD_FAILED', lastError ?? 'yt-dlp failed', { retryable: true });
}

export async function searchYouTube(query: string, limit: number, options: YtDlpOptions): Promise<SourceCandidate[]> {
  const result = await runProcess(options.binPath, [
    '--dump-json',
    '--flat-playlist',
    '--no-warnings',
    '--ignore-config',
    `ytsearch${limit}:${query}`,
  ], { timeoutMs: options.timeoutMs });

  if (result.code !== 0) {
    throw classifyDownloadFailure(result.stderr, result.timedOut);
  }
  return parseSearchOutput(result.stdout);
}

/**
 * Download the best audio stream of `url` to `<outputDir>/<basename>.<ext>`.
 * Resolves to the path of the downloaded file as reported by yt-dlp.
 */
export async function downloadAudio(
  url: string,
  outputDir: string,
  basename: string,
  options: YtDlpOptions,
): Promise<string> {
  const result = await runProcess(options.binPath, [
    '--no-playlist',
    '--no-overwrites',
    '--no-warnings',
    '--ignore-config',
    '--restrict-filenames',
    '-f', 'bestaudio/best',
    '--output', join(outputDir, `${basename}.%(ext)s`),
    '--print', 'after_move:filepath',
    url,
  ], { timeoutMs: options.timeoutMs });

  if (result.code !== 0) {
    throw classifyDownloadFailure(result.stderr, result.timedOut);
  }
  const downloadedPath = result.stdout.split(/\r?\n/).map(line => line.trim()).filter(Boolean).pop();
  if (!downloadedPath) {
    log('yt-dlp exited without reporting a file', result.stdout);
    throw new TrackRequestError('DOWNLOAD_FAILED', 'yt-dlp did not report a downloaded file', { retryable: true });
  }
  return downloadedPath;
}
