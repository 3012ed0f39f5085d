/**
 * Types passed between the resolver, the cache, the acquisition pipeline
 * and the chat transport.
 */

// Streaming-service track id; used as cache key, lock key and file stem
export type TrackKey = string;

export interface TrackMetadata {
  trackId: TrackKey;
  title: string;
  artist: string;
  album: string | null;
  durationSeconds: number;
  artworkUrl: string | null;
}

export interface CacheRecord {
  key: TrackKey;
  metadata: TrackMetadata;
  filePath: string;
  fileSizeBytes: number;
  coverPath: string | null;
  coverSizeBytes: number;
  createdAt: Date;
  lastAccessedAt: Date;
}

export interface ResolvedTrack {
  key: TrackKey;
  metadata: TrackMetadata;
}

export interface DeliveryResult {
  key: TrackKey;
  metadata: TrackMetadata;
  filePath: string;
  coverPath: string | null;
  fileSizeBytes: number;
  // true when served from the cache without running an acquisition
  cached: boolean;
  release: () => Promise<void>;
}

export type AcquisitionState =
  'idle' |
  'searching' |
  'downloading' |
  'transcoding' |
  'embedding' |
  'done' |
  'failed';

export interface SourceCandidate {
  id: string;
  url: string;
  title: string;
  uploader: string | null;
  durationSeconds: number | null;
}
