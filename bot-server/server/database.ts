/**
 * Database definitions using Kysely over a local SQLite file.
 * Table interfaces and row types are exported here, along with
 * `createDatabase` and `initializeDatabase`, which creates any missing tables.
 */
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import SQLite from 'better-sqlite3';
import {
  Kysely,
  SqliteDialect,
  sql,
  type ColumnType,
  type Generated,
  type Selectable,
} from 'kysely';

type CreatedAtType = ColumnType<string, string | undefined, string>;

interface CachedTracksTable {
  trackKey: string;

  title: string;
  artist: string;
  album: string | null;
  durationSeconds: number;
  artworkUrl: string | null;

  filePath: string;
  fileSizeBytes: number;
  coverPath: string | null;
  coverSizeBytes: number;

  createdAt: string;
  lastAccessedAt: string;
}

interface TrackMetadataTable {
  trackId: string;
  title: string;
  artist: string;
  album: string | null;
  durationSeconds: number;
  artworkUrl: string | null;
  fetchedAt: string;
}

interface UsersTable {
  id: string;
  createdAt: CreatedAtType;
  username: string;
  displayName: string | null;
  requestCount: Generated<number>;
  lastRequestAt: string | null;
}

interface TrackRequestsTable {
  id: Generated<number>;
  createdAt: CreatedAtType;

  reference: string;
  requester: string | null;
  trackKey: string | null;
  status: 'processing' | 'delivered' | 'failed';
  errorType: string | null;
  cached: number | null;
  fulfilledAt: string | null;
}

export type CachedTrack = Selectable<CachedTracksTable>;
export type TrackRequest = Selectable<TrackRequestsTable>;

export interface Database {
  cachedTracks: CachedTracksTable;
  trackMetadata: TrackMetadataTable;
  users: UsersTable;
  trackRequests: TrackRequestsTable;
}

export type CourierDatabase = Kysely<Database>;

export function createDatabase(path: string): CourierDatabase {
  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true });
  }
  return new Kysely<Database>({
    dialect: new SqliteDialect({
      database: new SQLite(path),
    }),
  });
}

export async function initializeDatabase(db: CourierDatabase) {
  await db.schema.createTable('cachedTracks').ifNotExists()
    .addColumn('trackKey', 'text', col => col.primaryKey())
    .addColumn('title', 'text', col => col.notNull())
    .addColumn('artist', 'text', col => col.notNull())
    .addColumn('album', 'text')
    .addColumn('durationSeconds', 'integer', col => col.notNull())
    .addColumn('artworkUrl', 'text')
    .addColumn('filePath', 'text', col => col.notNull())
    .addColumn('fileSizeBytes', 'integer', col => col.notNull())
    .addColumn('coverPath', 'text')
    .addColumn('coverSizeBytes', 'integer', col => col.notNull().defaultTo(0))
    .addColumn('createdAt', 'text', col => col.notNull())
    .addColumn('lastAccessedAt', 'text', col => col.notNull())
    .execute();
  await db.schema.createIndex('cachedTracks_lastAccessedAt').ifNotExists()
    .on('cachedTracks')
    .columns(['lastAccessedAt', 'trackKey'])
    .execute();

  await db.schema.createTable('trackMetadata').ifNotExists()
    .addColumn('trackId', 'text', col => col.primaryKey())
    .addColumn('title', 'text', col => col.notNull())
    .addColumn('artist', 'text', col => col.notNull())
    .addColumn('album', 'text')
    .addColumn('durationSeconds', 'integer', col => col.notNull())
    .addColumn('artworkUrl', 'text')
    .addColumn('fetchedAt', 'text', col => col.notNull())
    .execute();

  await db.schema.createTable('users').ifNotExists()
    .addColumn('id', 'text', col => col.primaryKey())
    .addColumn('createdAt', 'text', col => col.notNull().defaultTo(sql`CURRENT_TIMESTAMP`))
    .addColumn('username', 'text', col => col.notNull())
    .addColumn('displayName', 'text')
    .addColumn('requestCount', 'integer', col => col.notNull().defaultTo(0))
    .addColumn('lastRequestAt', 'text')
    .execute();

  await db.schema.createTable('trackRequests').ifNotExists()
    .addColumn('id', 'integer', col => col.primaryKey().autoIncrement())
    .addColumn('createdAt', 'text', col => col.notNull().defaultTo(sql`CURRENT_TIMESTAMP`))
    .addColumn('reference', 'text', col => col.notNull())
    .addColumn('requester', 'text')
    .addColumn('trackKey', 'text')
    .addColumn('status', 'text', col => col.notNull())
    .addColumn('errorType', 'text')
    .addColumn('cached', 'integer')
    .addColumn('fulfilledAt', 'text')
    .execute();
}
