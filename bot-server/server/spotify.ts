import Bottleneck from 'bottleneck';
import { z } from 'zod';
import TrackRequestError from '../../shared/TrackRequestError';
import type { TrackKey, TrackMetadata } from '../../shared/messages';
import { createLogger, errorMessage } from '../../shared/util';

const TOKEN_URL = 'https://accounts.spotify.com/api/token';
const API_URL = 'https://api.spotify.com/v1';
// renew the access token this long before Spotify says it expires
const TOKEN_EXPIRY_MARGIN_MS = 30_000;

export interface MetadataProvider {
  fetchTrack(trackId: TrackKey): Promise<TrackMetadata>;
}

/**
 * Pull a track id out of a Spotify reference.
 * Accepts `spotify:track:<id>` and `https://open.spotify.com/[intl-xx/]track/<id>`;
 * albums, playlists and everything else give null.
 */
export function extractTrackId(reference: string): TrackKey | null {
  const text = reference.trim();
  const uriMatch = text.match(/^spotify:track:([A-Za-z0-9]+)$/);
  if (uriMatch) return uriMatch[1];

  const withoutQuery = text.replace(/[?#].*$/, '');
  const urlMatch = withoutQuery.match(/^(?:https?:\/\/)?open\.spotify\.com\/(?:intl-[^/]+\/)?track\/([A-Za-z0-9]+)\/?$/i);
  return urlMatch ? urlMatch[1] : null;
}

// First Spotify track reference anywhere in a chat message
export function findTrackReference(text: string): string | null {
  const candidates = text.match(/spotify:track:[A-Za-z0-9]+|(?:https?:\/\/)?open\.spotify\.com\/[^\s<>]+/gi) ?? [];
  return candidates.find(candidate => extractTrackId(candidate) !== null) ?? null;
}

const tokenSchema = z.object({
  access_token: z.string(),
  token_type: z.string(),
  expires_in: z.number(),
});

const trackSchema = z.object({
  id: z.string(),
  name: z.string(),
  duration_ms: z.number(),
  artists: z.array(z.object({ name: z.string() })),
  album: z.object({
    name: z.string(),
    images: z.array(z.object({ url: z.string() })).default([]),
  }).nullish(),
});

export type SpotifyTrack = z.infer<typeof trackSchema>;

export function toTrackMetadata(track: SpotifyTrack): TrackMetadata {
  return {
    trackId: track.id,
    title: track.name,
    artist: track.artists[0]?.name || 'Unknown Artist',
    album: track.album?.name || null,
    durationSeconds: Math.round(track.duration_ms / 1000),
    artworkUrl: track.album?.images[0]?.url ?? null,
  };
}

interface SpotifyClientOptions {
  clientId: string;
  clientSecret: string;
  timeoutMs: number;
  now?: () => number;
}

export default class SpotifyClient implements MetadataProvider {
  private limiter = new Bottleneck({
    maxConcurrent: 2,
    minTime: 100,
  });
  private token?: { value: string, expiresAt: number };
  private now: () => number;

  constructor(private options: SpotifyClientOptions) {
    this.now = options.now ?? Date.now;
  }

  private log = createLogger('Spotify');

  public async fetchTrack(trackId: TrackKey): Promise<TrackMetadata> {
    const body = await this.request(`${API_URL}/tracks/${encodeURIComponent(trackId)}`);
    const parsed = trackSchema.safeParse(body);
    if (!parsed.success) {
      throw new TrackRequestError('UPSTREAM_UNAVAILABLE', `Malformed track response for ${trackId}`, {
        retryable: true,
        cause: parsed.error,
      });
    }
    return toTrackMetadata(parsed.data);
  }

  private async getAccessToken() {
    if (this.token && this.token.expiresAt > this.now()) {
      return this.token.value;
    }
    const credentials = Buffer.from(`${this.options.clientId}:${this.options.clientSecret}`).toString('base64');
    const body = await this.send(TOKEN_URL, {
      method: 'POST',
      headers: {
        'Authorization': `Basic ${credentials}`,
        'Content-Type': 'application/x-www-form-urlencoded',
      },
      body: new URLSearchParams({ grant_type: 'client_credentials' }).toString(),
    });
    const parsed = tokenSchema.safeParse(body);
    if (!parsed.success) {
      throw new TrackRequestError('UPSTREAM_UNAVAILABLE', 'Malformed token response', { cause: parsed.error });
    }
    this.token = {
      value: parsed.data.access_token,
      expiresAt: this.now() + parsed.data.expires_in * 1000 - TOKEN_EXPIRY_MARGIN_MS,
    };
    this.log('Obtained access token, valid for', parsed.data.expires_in, 'seconds');
    return this.token.value;
  }

  private async request(url: string) {
    const token = await this.getAccessToken();
    return this.send(url, { headers: { Authorization: `Bearer ${token}` } });
  }

  private async send(url: string, init: RequestInit): Promise<unknown> {
    let response: Response;
    try {
      response = await this.limiter.schedule(() =>
        fetch(url, { ...init, signal: AbortSignal.timeout(this.options.timeoutMs) }));
    } catch (e) {
      throw new TrackRequestError('UPSTREAM_UNAVAILABLE', `Request to ${url} failed: ${errorMessage(e)}`, {
        retryable: true,
        cause: e,
      });
    }
    if (!response.ok) {
      // a revoked token is fetched again on the next request
      if (response.status === 401) this.token = undefined;
      throw new TrackRequestError('UPSTREAM_UNAVAILABLE', `Spotify responded with ${response.status} for ${url}`, {
        retryable: response.status === 429 || response.status >= 500,
      });
    }
    try {
      return await response.json();
    } catch (e) {
      throw new TrackRequestError('UPSTREAM_UNAVAILABLE', `Invalid JSON from ${url}`, { retryable: true, cause: e });
    }
  }
}
