import pRetry from 'p-retry';
import { extractTrackId, type MetadataProvider } from './spotify';
import type { MetadataStore } from './queries';
import TrackRequestError, { isTrackRequestError } from '../../shared/TrackRequestError';
import type { ResolvedTrack, TrackKey, TrackMetadata } from '../../shared/messages';
import { createLogger, errorMessage } from '../../shared/util';

interface ResolverOptions {
  attempts: number;
  backoffMs: number;
}

/**
 * Turns a track reference into canonical metadata.
 * The metadata table is a pass-through cache in front of the provider.
 */
export default class MetadataResolver {
  constructor(
    private provider: MetadataProvider,
    private store: MetadataStore | null,
    private options: ResolverOptions,
  ) {}

  private log = createLogger('MetadataResolver');
  private warn = createLogger('MetadataResolver', 'warn');

  public async resolve(reference: string): Promise<ResolvedTrack> {
    const key = extractTrackId(reference);
    if (!key) {
      throw new TrackRequestError('INVALID_REFERENCE', `Not a track reference: ${reference.slice(0, 200)}`);
    }

    const stored = await this.fromStore(key);
    if (stored) return { key, metadata: stored };

    const metadata = await this.fetch(key);
    await this.store?.put(metadata).catch((e: unknown) => {
      this.warn('Could not save metadata for', key, errorMessage(e));
    });
    return { key, metadata };
  }

  private async fromStore(key: TrackKey): Promise<TrackMetadata | null> {
    if (!this.store) return null;
    try {
      return await this.store.get(key);
    } catch (e) {
      this.warn('Metadata table unavailable, asking the provider for', key, errorMessage(e));
      return null;
    }
  }

  private async fetch(key: TrackKey) {
    try {
      const metadata = await pRetry(() => this.provider.fetchTrack(key), {
        retries: this.options.attempts - 1,
        factor: 2,
        minTimeout: this.options.backoffMs,
        randomize: false,
        onFailedAttempt: (error) => {
          if (isTrackRequestError(error) && !error.retryable) {
            throw error;
          }
          this.warn(`Metadata attempt ${error.attemptNumber}/${this.options.attempts} for ${key} failed:`, error.message);
        },
      });
      this.log('Resolved', key, `${metadata.artist} - ${metadata.title}`);
      return metadata;
    } catch (e) {
      if (isTrackRequestError(e, 'UPSTREAM_UNAVAILABLE')) throw e;
      throw new TrackRequestError('UPSTREAM_UNAVAILABLE', `Metadata lookup for ${key} failed: ${errorMessage(e)}`, {
        retryable: true,
        cause: e,
      });
    }
  }
}
