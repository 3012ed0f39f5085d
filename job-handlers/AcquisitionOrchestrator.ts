import { join } from 'path';
import { mkdir, mkdtemp, rm, stat } from 'fs/promises';
import pRetry from 'p-retry';
import SingleFlight from './SingleFlight';
import { pickBestCandidate, buildSearchQuery } from './scoreCandidates';
import type { AcquisitionTools } from './tools';
import TrackRequestError, { isTrackRequestError, toTrackRequestError } from '../shared/TrackRequestError';
import type { AcquisitionState, CacheRecord, SourceCandidate, TrackKey, TrackMetadata } from '../shared/messages';
import { createLogger, errorMessage, formatBytes } from '../shared/util';

export interface ArtifactSink {
  store(
    key: TrackKey,
    metadata: TrackMetadata,
    sourceFilePath: string,
    sizeBytes: number,
    options?: { coverPath?: string },
  ): Promise<CacheRecord>;
}

export type StateChangeListener = (key: TrackKey, state: AcquisitionState) => void;

export interface AcquisitionOptions {
  workPath: string;
  minConfidence: number;
  searchResults: number;
  downloadAttempts: number;
  downloadBackoffMs: number;
  onStateChange?: StateChangeListener;
}

/**
 * Turns resolved track metadata into a cached MP3.
 * At most one acquisition runs per key; concurrent callers share its result.
 */
export default class AcquisitionOrchestrator {
  private flights = new SingleFlight<CacheRecord>();
  private states = new Map<TrackKey, AcquisitionState>();
  private listeners: StateChangeListener[] = [];

  constructor(
    private tools: AcquisitionTools,
    private sink: ArtifactSink,
    private options: AcquisitionOptions,
  ) {
    if (options.onStateChange) this.listeners.push(options.onStateChange);
  }

  private log = createLogger('Acquisition');
  private warn = createLogger('Acquisition', 'warn');

  public onStateChange(listener: StateChangeListener) {
    this.listeners.push(listener);
  }

  public stateOf(key: TrackKey): AcquisitionState {
    return this.states.get(key) ?? 'idle';
  }

  public isInFlight(key: TrackKey) {
    return this.flights.state(key).status === 'in_flight';
  }

  public acquire(key: TrackKey, metadata: TrackMetadata): Promise<CacheRecord> {
    return this.flights.run(key, () => this.execute(key, metadata));
  }

  private setState(key: TrackKey, state: AcquisitionState) {
    if (state === 'done' || state === 'failed') {
      this.states.delete(key);
    } else {
      this.states.set(key, state);
    }
    for (const listener of this.listeners) {
      try {
        listener(key, state);
      } catch (e) {
        this.warn('State listener threw for', key, errorMessage(e));
      }
    }
  }

  private async execute(key: TrackKey, metadata: TrackMetadata) {
    this.log('Acquiring', key, buildSearchQuery(metadata));
    let createdDir: string | null = null;
    try {
      await mkdir(this.options.workPath, { recursive: true });
      const workDir = await mkdtemp(join(this.options.workPath, `${key}-`));
      createdDir = workDir;

      this.setState(key, 'searching');
      const candidate = await this.search(metadata);

      this.setState(key, 'downloading');
      const sourcePath = await this.withRetries(`download ${candidate.id}`, () =>
        this.tools.download(candidate, workDir));

      this.setState(key, 'transcoding');
      const outputPath = join(workDir, `${key}.mp3`);
      await this.transcode(sourcePath, outputPath);

      this.setState(key, 'embedding');
      const coverPath = await this.embed(key, metadata, outputPath, workDir);

      const { size } = await stat(outputPath);
      const record = await this.sink.store(key, metadata, outputPath, size, coverPath ? { coverPath } : {});
      this.log('Acquired', key, formatBytes(record.fileSizeBytes), 'from', candidate.url);
      this.setState(key, 'done');
      return record;
    } catch (e) {
      this.warn('Acquisition of', key, 'failed:', errorMessage(e));
      this.setState(key, 'failed');
      throw toTrackRequestError(e, 'DOWNLOAD_FAILED');
    } finally {
      if (createdDir) {
        const dir = createdDir;
        await rm(dir, { recursive: true, force: true }).catch((err: unknown) => {
          this.warn('Could not remove work directory', dir, errorMessage(err));
        });
      }
    }
  }

  private async search(metadata: TrackMetadata): Promise<SourceCandidate> {
    const query = buildSearchQuery(metadata);
    const candidates = await this.withRetries(`search "${query}"`, () =>
      this.tools.search(query, this.options.searchResults));
    const best = pickBestCandidate(metadata, candidates, this.options.minConfidence);
    if (!best) {
      throw new TrackRequestError(
        'NOT_FOUND',
        `None of ${candidates.length} results for "${query}" reached confidence ${this.options.minConfidence}`,
      );
    }
    this.log('Picked', best.candidate.url, best.candidate.title, 'with confidence', best.confidence);
    return best.candidate;
  }

  // Network steps: retry anything not explicitly marked as permanent
  private async withRetries<T>(label: string, fn: () => Promise<T>) {
    const attempts = this.options.downloadAttempts;
    try {
      return await pRetry(fn, {
        retries: attempts - 1,
        factor: 2,
        minTimeout: this.options.downloadBackoffMs,
        randomize: false,
        onFailedAttempt: (error) => {
          if (isTrackRequestError(error) && !error.retryable) {
            throw error;
          }
          this.warn(`Attempt ${error.attemptNumber}/${attempts} to ${label} failed:`, error.message);
        },
      });
    } catch (e) {
      if (isTrackRequestError(e)) throw e;
      throw new TrackRequestError(
        'DOWNLOAD_FAILED',
        `Could not ${label}: ${errorMessage(e)}`,
        { retryable: false, cause: e },
      );
    }
  }

  private async transcode(sourcePath: string, outputPath: string) {
    try {
      await this.tools.transcode(sourcePath, outputPath);
      await this.tools.probe(outputPath);
    } catch (e) {
      throw toTrackRequestError(e, 'TRANSCODE_FAILED');
    }
  }

  // Artwork and tags are optional; the track is delivered without them on failure
  private async embed(key: TrackKey, metadata: TrackMetadata, outputPath: string, workDir: string) {
    let coverPath: string | null = null;
    if (metadata.artworkUrl) {
      const target = join(workDir, `${key}.jpg`);
      try {
        await this.tools.fetchArtwork(metadata.artworkUrl, target);
        coverPath = target;
      } catch (e) {
        this.warn('Could not fetch artwork for', key, errorMessage(e));
      }
    }
    try {
      await this.tools.writeTags(outputPath, metadata, coverPath);
    } catch (e) {
      this.warn('Could not write tags for', key, errorMessage(e));
    }
    return coverPath;
  }
}
