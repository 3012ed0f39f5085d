import { mkdir } from 'fs/promises';
import { createDatabase, initializeDatabase, type CourierDatabase } from './database';
import { createMetadataStore, createRequestLog, type RequestLog } from './queries';
import ArtifactCache from './ArtifactCache';
import MetadataResolver from './MetadataResolver';
import RequestCoordinator from './RequestCoordinator';
import SpotifyClient, { type MetadataProvider } from './spotify';
import AcquisitionOrchestrator from '../../job-handlers/AcquisitionOrchestrator';
import { type AcquisitionTools, createYouTubeTools } from '../../job-handlers/tools';
import type { CourierConfig } from '../../shared/config';
import { createLogger } from '../../shared/util';

export interface Courier {
  db: CourierDatabase;
  cache: ArtifactCache;
  resolver: MetadataResolver;
  orchestrator: AcquisitionOrchestrator;
  coordinator: RequestCoordinator;
  requests: RequestLog;
}

interface CourierOverrides {
  provider?: MetadataProvider;
  tools?: AcquisitionTools;
}

const log = createLogger('Courier');

/** Open the library and wire the pipeline together. */
export async function createCourier(config: CourierConfig, overrides: CourierOverrides = {}): Promise<Courier> {
  const { paths } = config;
  await Promise.all([paths.tracks, paths.covers, paths.work].map(dir => mkdir(dir, { recursive: true })));

  const db = createDatabase(paths.database);
  await initializeDatabase(db);

  const cache = new ArtifactCache(db, {
    tracksPath: paths.tracks,
    coversPath: paths.covers,
    workPath: paths.work,
    storageLimitBytes: config.storageLimitBytes,
  });
  const provider = overrides.provider ?? new SpotifyClient({
    clientId: config.spotify.clientId,
    clientSecret: config.spotify.clientSecret,
    timeoutMs: config.spotify.timeoutMs,
  });
  const resolver = new MetadataResolver(
    provider,
    createMetadataStore(db, config.metadata.maxAgeMs),
    { attempts: config.metadata.attempts, backoffMs: config.metadata.backoffMs },
  );
  const orchestrator = new AcquisitionOrchestrator(
    overrides.tools ?? createYouTubeTools(config.acquisition),
    cache,
    {
      workPath: paths.work,
      minConfidence: config.acquisition.minConfidence,
      searchResults: config.acquisition.searchResults,
      downloadAttempts: config.acquisition.downloadAttempts,
      downloadBackoffMs: config.acquisition.downloadBackoffMs,
    },
  );
  const coordinator = new RequestCoordinator(resolver, cache, orchestrator);

  log('Library at', paths.root, config.storageLimitBytes === null
    ? 'without a storage limit'
    : `with a storage limit of ${config.storageLimitBytes} bytes`);
  return { db, cache, resolver, orchestrator, coordinator, requests: createRequestLog(db) };
}
