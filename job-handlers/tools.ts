import { searchYouTube, downloadAudio } from './wrappers/yt-dlp';
import { transcodeToMp3 } from './wrappers/ffmpeg';
import getAudioInfo, { type AudioInfo } from './getAudioInfo';
import { fetchArtwork, writeTags } from './embedArtwork';
import type { CourierConfig } from '../shared/config';
import type { SourceCandidate, TrackMetadata } from '../shared/messages';

/**
 * External programs and services the acquisition pipeline drives.
 * Tests substitute fakes; production uses yt-dlp, ffmpeg, music-metadata and node-id3.
 */
export interface AcquisitionTools {
  search(query: string, limit: number): Promise<SourceCandidate[]>;
  /** Resolves to the path of the downloaded source file inside `workDir` */
  download(candidate: SourceCandidate, workDir: string): Promise<string>;
  transcode(inputPath: string, outputPath: string): Promise<void>;
  probe(filePath: string): Promise<AudioInfo>;
  /** Resolves to the size of the written cover in bytes */
  fetchArtwork(url: string, outputPath: string): Promise<number>;
  writeTags(filePath: string, metadata: TrackMetadata, coverPath: string | null): Promise<void>;
}

export function createYouTubeTools(options: CourierConfig['acquisition']): AcquisitionTools {
  return {
    search: (query, limit) => searchYouTube(query, limit, {
      binPath: options.ytDlpPath,
      timeoutMs: options.searchTimeoutMs,
    }),
    download: (candidate, workDir) => downloadAudio(candidate.url, workDir, 'source', {
      binPath: options.ytDlpPath,
      timeoutMs: options.downloadTimeoutMs,
    }),
    transcode: (inputPath, outputPath) => transcodeToMp3(inputPath, outputPath, {
      binPath: options.ffmpegPath,
      bitrate: options.audioBitrate,
      timeoutMs: options.transcodeTimeoutMs,
    }),
    probe: getAudioInfo,
    fetchArtwork: (url, outputPath) => fetchArtwork(url, outputPath, options.artworkTimeoutMs),
    writeTags,
  };
}

