/**
 * Kysely queries outside the artifact cache: the metadata pass-through
 * table, requesters and the request log.
 */
import { sql } from 'kysely';
import type { CourierDatabase, TrackRequest } from './database';
import type { TrackMetadata } from '../../shared/messages';
import type { TrackRequestErrorType } from '../../shared/TrackRequestError';

//
// track metadata
//

export interface MetadataStore {
  get(trackId: string): Promise<TrackMetadata | null>;
  put(metadata: TrackMetadata): Promise<void>;
}

export function createMetadataStore(
  db: CourierDatabase,
  maxAgeMs: number,
  now: () => Date = () => new Date(),
): MetadataStore {
  return {
    async get(trackId) {
      const row = await db.selectFrom('trackMetadata')
        .selectAll()
        .where('trackId', '=', trackId)
        .executeTakeFirst();
      if (!row) return null;
      // stale rows are refreshed from the provider on the next resolve
      if (now().getTime() - new Date(row.fetchedAt).getTime() > maxAgeMs) return null;
      return {
        trackId: row.trackId,
        title: row.title,
        artist: row.artist,
        album: row.album,
        durationSeconds: row.durationSeconds,
        artworkUrl: row.artworkUrl,
      };
    },

    async put(metadata) {
      const fetchedAt = now().toISOString();
      await db.insertInto('trackMetadata')
        .values({ ...metadata, fetchedAt })
        .onConflict(oc => oc.column('trackId').doUpdateSet({
          title: metadata.title,
          artist: metadata.artist,
          album: metadata.album,
          durationSeconds: metadata.durationSeconds,
          artworkUrl: metadata.artworkUrl,
          fetchedAt,
        }))
        .execute();
    },
  };
}

//
// requesters and the request log
//

export interface Requester {
  id: string;
  username: string;
  displayName: string | null;
}

// the upload limit is a transport constraint, not a pipeline failure
export type RequestFailure = TrackRequestErrorType | 'UPLOAD_TOO_LARGE' | 'UPLOAD_FAILED';

export interface RequestLog {
  recordRequester(requester: Requester): Promise<void>;
  createRequest(reference: string, requesterId: string | null): Promise<number>;
  markDelivered(requestId: number, trackKey: string, cached: boolean): Promise<void>;
  markFailed(requestId: number, errorType: RequestFailure, trackKey?: string): Promise<void>;
}

export function createRequestLog(db: CourierDatabase): RequestLog {
  return {
    async recordRequester({ id, username, displayName }) {
      await db.insertInto('users')
        .values({ id, username, displayName, requestCount: 1, lastRequestAt: new Date().toISOString() })
        .onConflict(oc => oc.column('id').doUpdateSet({
          username,
          displayName,
          requestCount: sql<number>`requestCount + 1`,
          lastRequestAt: new Date().toISOString(),
        }))
        .execute();
    },

    async createRequest(reference, requesterId) {
      const row = await db.insertInto('trackRequests')
        .values({ reference, requester: requesterId, status: 'processing' })
        .returning('id')
        .executeTakeFirstOrThrow();
      return row.id;
    },

    async markDelivered(requestId, trackKey, cached) {
      await db.updateTable('trackRequests')
        .set({ status: 'delivered', trackKey, cached: Number(cached), fulfilledAt: new Date().toISOString() })
        .where('id', '=', requestId)
        .execute();
    },

    async markFailed(requestId, errorType, trackKey) {
      await db.updateTable('trackRequests')
        .set({ status: 'failed', errorType, trackKey: trackKey ?? null })
        .where('id', '=', requestId)
        .execute();
    },
  };
}

export const requestsByUser = (db: CourierDatabase, requesterId: string): Promise<TrackRequest[]> =>
  db.selectFrom('trackRequests')
    .selectAll()
    .where('requester', '=', requesterId)
    .orderBy('id', 'desc')
    .execute();
