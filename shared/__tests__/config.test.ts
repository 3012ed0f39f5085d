import { describe, it, expect } from 'vitest';
import { join, resolve } from 'path';
import { ConfigError, loadConfig, requireCredentials } from '../config';

describe('loadConfig', () => {
  it('fills in defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.storageLimitBytes).toBeNull();
    expect(config.maxUploadBytes).toBe(25 * 1024 * 1024);
    expect(config.metadata).toEqual({ attempts: 2, backoffMs: 500, maxAgeMs: 7 * 24 * 60 * 60 * 1000 });
    expect(config.acquisition).toMatchObject({
      minConfidence: 0.6,
      searchResults: 5,
      downloadAttempts: 3,
      downloadBackoffMs: 1000,
      ytDlpPath: 'yt-dlp',
      ffmpegPath: 'ffmpeg',
      audioBitrate: '192k',
    });
    expect(config.spotify).toEqual({ clientId: '', clientSecret: '', timeoutMs: 10_000 });
  });

  it('converts the storage limit to bytes', () => {
    expect(loadConfig({ STORAGE_LIMIT_MB: '100' }).storageLimitBytes).toBe(104_857_600);
    expect(loadConfig({ STORAGE_LIMIT_MB: '0' }).storageLimitBytes).toBeNull();
    expect(loadConfig({ STORAGE_LIMIT_MB: '-5' }).storageLimitBytes).toBeNull();
  });

  it('uses defaults for blank values', () => {
    const config = loadConfig({ SEARCH_RESULTS: '', DOWNLOAD_ATTEMPTS: '  ' });
    expect(config.acquisition.searchResults).toBe(5);
    expect(config.acquisition.downloadAttempts).toBe(3);
  });

  it('rejects values that are not numbers', () => {
    try {
      loadConfig({ STORAGE_LIMIT_MB: '2GB', DOWNLOAD_ATTEMPTS: 'five' });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigError);
      expect(e instanceof ConfigError && e.issues).toEqual([
        'STORAGE_LIMIT_MB: expected a number, got "2GB"',
        'DOWNLOAD_ATTEMPTS: expected a number, got "five"',
      ]);
    }
    expect(() => loadConfig({ MAX_UPLOAD_MB: 'lots' })).toThrow(/MAX_UPLOAD_MB/);
  });

  it('lays out the library under LIBRARY_PATH', () => {
    const root = resolve('/tmp/courier-library');
    const config = loadConfig({ LIBRARY_PATH: root });
    expect(config.paths).toEqual({
      root,
      tracks: join(root, 'tracks'),
      covers: join(root, 'covers'),
      work: join(root, 'work'),
      database: join(root, 'tracks.sqlite'),
      lock: join(root, 'courier.lock'),
    });
  });

  it('keeps an explicit database path', () => {
    const database = resolve('/tmp/elsewhere/courier.sqlite');
    expect(loadConfig({ DATABASE_PATH: database }).paths.database).toBe(database);
  });

  it('rejects out of range values', () => {
    expect(() => loadConfig({ MIN_CONFIDENCE: '1.5' })).toThrow(ConfigError);
    expect(() => loadConfig({ AUDIO_BITRATE: 'loud' })).toThrow(/AUDIO_BITRATE/);
    expect(() => loadConfig({ SEARCH_RESULTS: '0' })).toThrow(ConfigError);
  });
});

describe('requireCredentials', () => {
  it('lists every missing credential', () => {
    const config = loadConfig({ SPOTIFY_CLIENT_ID: 'test-client' });
    try {
      requireCredentials(config, ['discord', 'spotify']);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigError);
      expect(e instanceof ConfigError && e.issues).toEqual(['DISCORD_TOKEN: required', 'SPOTIFY_CLIENT_SECRET: required']);
    }
  });

  it('passes when the requested credentials are set', () => {
    const config = loadConfig({ SPOTIFY_CLIENT_ID: 'test-client', SPOTIFY_CLIENT_SECRET: 'test-secret' });
    expect(() => requireCredentials(config, ['spotify'])).not.toThrow();
  });
});
