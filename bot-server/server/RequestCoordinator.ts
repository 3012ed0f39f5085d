import MetadataResolver from './MetadataResolver';
import ArtifactCache, { type ArtifactLease } from './ArtifactCache';
import AcquisitionOrchestrator from '../../job-handlers/AcquisitionOrchestrator';
import TrackRequestError, { toTrackRequestError } from '../../shared/TrackRequestError';
import type { DeliveryResult, TrackKey, TrackMetadata } from '../../shared/messages';
import { createLogger } from '../../shared/util';

// an artifact evicted between store and lease is acquired this many more times
const EVICTED_BEFORE_DELIVERY_RETRIES = 1;

export interface HandleOptions {
  signal?: AbortSignal;
}

export interface TrackRequestHandler {
  handle(reference: string, options?: HandleOptions): Promise<DeliveryResult>;
}

const cancelled = () => new TrackRequestError('REQUEST_CANCELLED', 'Request was cancelled');

/**
 * Settle with `promise`, or reject early once `signal` aborts.
 * The underlying work keeps running either way.
 */
function detachable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(cancelled());
    const settle = <V>(done: (value: V) => void) => (value: V) => {
      signal.removeEventListener('abort', onAbort);
      done(value);
    };
    void promise.then(settle(resolve), settle(reject));
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });
}

/**
 * Entry point for a single track request:
 * resolve the reference, serve the cached file or acquire it, and hand out a lease
 * the transport releases once the upload is done.
 */
export default class RequestCoordinator implements TrackRequestHandler {
  constructor(
    private resolver: MetadataResolver,
    private cache: ArtifactCache,
    private orchestrator: AcquisitionOrchestrator,
  ) {}

  private log = createLogger('RequestCoordinator');

  public async handle(reference: string, options: HandleOptions = {}): Promise<DeliveryResult> {
    const { signal } = options;
    try {
      if (signal?.aborted) throw cancelled();
      const { key, metadata } = await detachable(this.resolver.resolve(reference), signal);

      let cached = true;
      let lease = await this.cache.lease(key);
      for (let attempt = 0; !lease && attempt <= EVICTED_BEFORE_DELIVERY_RETRIES; attempt++) {
        cached = false;
        lease = await this.acquireAndLease(key, metadata, signal);
      }
      if (!lease) {
        throw new TrackRequestError('STORAGE_FULL', `${key} was evicted before it could be delivered`);
      }
      if (signal?.aborted) {
        await lease.release();
        throw cancelled();
      }

      this.log(cached ? 'Cache hit' : 'Acquired', key, `${lease.record.metadata.artist} - ${lease.record.metadata.title}`);
      return {
        key,
        metadata: lease.record.metadata,
        filePath: lease.record.filePath,
        coverPath: lease.record.coverPath,
        fileSizeBytes: lease.record.fileSizeBytes,
        cached,
        release: lease.release,
      };
    } catch (e) {
      throw toTrackRequestError(e, 'DOWNLOAD_FAILED');
    }
  }

  private async acquireAndLease(
    key: TrackKey,
    metadata: TrackMetadata,
    signal?: AbortSignal,
  ): Promise<ArtifactLease | null> {
    await detachable(this.orchestrator.acquire(key, metadata), signal);
    return this.cache.lease(key);
  }
}
