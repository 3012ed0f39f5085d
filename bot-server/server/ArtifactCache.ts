/**
 * Artifact cache
 *
 * Owns the `cachedTracks` table and the managed tracks/covers directories.
 * A row only exists while its audio file does: files are renamed into place
 * before the row is written, and unlinked before the row is deleted.
 *
 * When a storage limit is set, every store is followed by eviction of the
 * least recently accessed records (ties broken by key) until the library
 * fits again. Records leased for an in-progress delivery are never evicted.
 */
import { randomUUID } from 'crypto';
import { copyFile, mkdir, readdir, rename, rm, stat, unlink } from 'fs/promises';
import { join } from 'path';
import type { CourierDatabase, CachedTrack } from './database';
import KeyedMutex from '../../shared/KeyedMutex';
import TrackRequestError from '../../shared/TrackRequestError';
import type { CacheRecord, TrackKey, TrackMetadata } from '../../shared/messages';
import { createLogger, errorMessage, formatBytes } from '../../shared/util';

const PARTIAL_SUFFIX = '.partial';
// records read while eviction runs are ranked again, at most this many times
const MAX_EVICTION_PASSES = 3;

export interface ArtifactCacheOptions {
  tracksPath: string;
  coversPath: string;
  // acquisition scratch space, emptied by reconcile
  workPath?: string;
  storageLimitBytes?: number | null;
  now?: () => Date;
}

export interface StoreOptions {
  coverPath?: string | null;
}

export interface ArtifactLease {
  record: CacheRecord;
  release: () => Promise<void>;
}

export interface EvictionResult {
  evicted: TrackKey[];
  totalBytes: number;
  withinBudget: boolean;
}

export interface ReconcileResult {
  removedRecords: TrackKey[];
  removedFiles: string[];
}

const fileExists = async (path: string) => {
  try {
    return (await stat(path)).isFile();
  } catch (e) {
    if (isMissingFileError(e)) return false;
    throw e;
  }
};

const isMissingFileError = (e: unknown) =>
  e instanceof Error && 'code' in e && e.code === 'ENOENT';

const unlinkIfExists = async (path: string) => {
  try {
    await unlink(path);
  } catch (e) {
    if (!isMissingFileError(e)) throw e;
  }
};

// rename() cannot cross filesystems, so fall back to copy + unlink
async function moveFile(source: string, destination: string) {
  try {
    await rename(source, destination);
  } catch (e) {
    if (!(e instanceof Error && 'code' in e && e.code === 'EXDEV')) throw e;
    await copyFile(source, destination);
    await unlink(source);
  }
}

const recordSize = (row: Pick<CachedTrack, 'fileSizeBytes' | 'coverSizeBytes'>) =>
  row.fileSizeBytes + row.coverSizeBytes;

function toCacheRecord(row: CachedTrack): CacheRecord {
  return {
    key: row.trackKey,
    metadata: {
      trackId: row.trackKey,
      title: row.title,
      artist: row.artist,
      album: row.album,
      durationSeconds: row.durationSeconds,
      artworkUrl: row.artworkUrl,
    },
    filePath: row.filePath,
    fileSizeBytes: row.fileSizeBytes,
    coverPath: row.coverPath,
    coverSizeBytes: row.coverSizeBytes,
    createdAt: new Date(row.createdAt),
    lastAccessedAt: new Date(row.lastAccessedAt),
  };
}

export default class ArtifactCache {
  private db: CourierDatabase;
  private tracksPath: string;
  private coversPath: string;
  private workPath: string | null;
  private storageLimitBytes: number | null;
  private now: () => Date;

  private keyLock = new KeyedMutex();
  private budgetLock = new KeyedMutex();
  private leases = new Map<TrackKey, number>();
  // keys between file rename and row insert, which reconcile must leave alone
  private committing = new Set<TrackKey>();

  private log = createLogger('ArtifactCache');
  private warn = createLogger('ArtifactCache', 'warn');
  private error = createLogger('ArtifactCache', 'error');

  constructor(db: CourierDatabase, options: ArtifactCacheOptions) {
    this.db = db;
    this.tracksPath = options.tracksPath;
    this.coversPath = options.coversPath;
    this.workPath = options.workPath ?? null;
    this.storageLimitBytes = options.storageLimitBytes && options.storageLimitBytes > 0
      ? options.storageLimitBytes
      : null;
    this.now = options.now ?? (() => new Date());
  }

  public trackPath(key: TrackKey) {
    return join(this.tracksPath, `${key}.mp3`);
  }

  public coverPath(key: TrackKey) {
    return join(this.coversPath, `${key}.jpg`);
  }

  public async lookup(key: TrackKey): Promise<CacheRecord | null> {
    return this.keyLock.runExclusive(key, () => this.touch(key));
  }

  /**
   * Lookup that also pins the record, so eviction and purge skip it
   * until `release` is called. Used for the duration of an upload.
   */
  public async lease(key: TrackKey): Promise<ArtifactLease | null> {
    return this.keyLock.runExclusive(key, async () => {
      const record = await this.touch(key);
      if (!record) return null;
      this.leases.set(key, (this.leases.get(key) ?? 0) + 1);

      let released = false;
      const release = async () => {
        if (released) return;
        released = true;
        const remaining = (this.leases.get(key) ?? 1) - 1;
        if (remaining > 0) {
          this.leases.set(key, remaining);
          return;
        }
        this.leases.delete(key);
        // a pinned record may have been holding the library over budget
        if (this.storageLimitBytes !== null) {
          await this.evictUntilWithinBudget();
        }
      };
      return { record, release };
    });
  }

  public isPinned(key: TrackKey) {
    return (this.leases.get(key) ?? 0) > 0;
  }

  public async store(
    key: TrackKey,
    metadata: TrackMetadata,
    sourceFilePath: string,
    sizeBytes: number,
    options: StoreOptions = {},
  ): Promise<CacheRecord> {
    const { size: actualSize } = await stat(sourceFilePath);
    if (actualSize !== sizeBytes) {
      this.warn(`Reported size ${sizeBytes} for ${key} differs from ${actualSize} on disk, using the file size`);
    }
    const coverSize = options.coverPath ? (await stat(options.coverPath)).size : 0;

    if (this.storageLimitBytes !== null && actualSize + coverSize > this.storageLimitBytes) {
      await unlinkIfExists(sourceFilePath);
      if (options.coverPath) await unlinkIfExists(options.coverPath);
      this.error(
        `Artifact ${key} is ${formatBytes(actualSize + coverSize)},`,
        `larger than the whole storage limit of ${formatBytes(this.storageLimitBytes)}`
      );
      throw new TrackRequestError('STORAGE_FULL', `Artifact ${key} does not fit in the storage limit`);
    }

    const record = await this.keyLock.runExclusive(key, () =>
      this.commit(key, metadata, sourceFilePath, options.coverPath ?? null));

    if (this.storageLimitBytes !== null) {
      await this.evictUntilWithinBudget(key);
    }
    return record;
  }

  public async evictUntilWithinBudget(protectedKey?: TrackKey): Promise<EvictionResult> {
    const limit = this.storageLimitBytes;
    if (limit === null) {
      return { evicted: [], totalBytes: await this.totalBytes(), withinBudget: true };
    }

    return this.budgetLock.runExclusive('budget', async () => {
      const evicted: TrackKey[] = [];
      let totalBytes = 0;
      for (let pass = 1; pass <= MAX_EVICTION_PASSES; pass++) {
        const rows = await this.db.selectFrom('cachedTracks')
          .select(['trackKey', 'fileSizeBytes', 'coverSizeBytes', 'lastAccessedAt'])
          .orderBy('lastAccessedAt', 'asc')
          .orderBy('trackKey', 'asc')
          .execute();
        totalBytes = rows.reduce((sum, row) => sum + recordSize(row), 0);
        if (totalBytes <= limit) break;

        if (pass === 1) {
          this.warn(`Library is ${formatBytes(totalBytes)}, over the limit of ${formatBytes(limit)}. Evicting least recently used tracks`);
        }
        let touched = false;
        for (const row of rows) {
          if (totalBytes <= limit) break;
          if (row.trackKey === protectedKey || this.isPinned(row.trackKey)) continue;

          const outcome = await this.keyLock.runExclusive(row.trackKey, () =>
            this.evictRecord(row.trackKey, row.lastAccessedAt));
          if (outcome === 'touched') {
            touched = true;
          } else if (outcome > 0) {
            totalBytes -= outcome;
            evicted.push(row.trackKey);
            this.log('Evicted', row.trackKey, `(${formatBytes(outcome)})`);
          }
        }
        if (!touched) break;
      }

      const withinBudget = totalBytes <= limit;
      if (!withinBudget) {
        this.error(
          `STORAGE_FULL: library is still ${formatBytes(totalBytes)} after eviction,`,
          `over the limit of ${formatBytes(limit)}; the remaining tracks are in use`
        );
      }
      return { evicted, totalBytes, withinBudget };
    });
  }

  public async purge(key: TrackKey): Promise<boolean> {
    return this.keyLock.runExclusive(key, async () => {
      if (this.isPinned(key)) {
        this.warn('Refusing to purge', key, 'while it is being delivered');
        return false;
      }
      return (await this.removeRecord(key)) > 0;
    });
  }

  public async totalBytes() {
    const rows = await this.db.selectFrom('cachedTracks')
      .select(['fileSizeBytes', 'coverSizeBytes'])
      .execute();
    return rows.reduce((sum, row) => sum + recordSize(row), 0);
  }

  public async list(): Promise<CacheRecord[]> {
    const rows = await this.db.selectFrom('cachedTracks')
      .selectAll()
      .orderBy('lastAccessedAt', 'desc')
      .orderBy('trackKey', 'asc')
      .execute();
    return rows.map(toCacheRecord);
  }

  /**
   * Bring the table and the managed directories back in line:
   * rows whose audio file is gone are dropped, and files without a row
   * (including leftovers of interrupted stores) are deleted.
   * The work directory is emptied too, so only call this while no
   * acquisition is running.
   */
  public async reconcile(): Promise<ReconcileResult> {
    await mkdir(this.tracksPath, { recursive: true });
    await mkdir(this.coversPath, { recursive: true });

    return this.budgetLock.runExclusive('budget', async () => {
      const removedRecords: TrackKey[] = [];
      const removedFiles: string[] = [];

      const rows = await this.db.selectFrom('cachedTracks')
        .select(['trackKey', 'filePath', 'coverPath'])
        .execute();
      for (const row of rows) {
        const removed = await this.keyLock.runExclusive(row.trackKey, async () => {
          if (await fileExists(row.filePath)) return false;
          if (row.coverPath) await unlinkIfExists(row.coverPath);
          await this.db.deleteFrom('cachedTracks').where('trackKey', '=', row.trackKey).execute();
          return true;
        });
        if (removed) {
          this.warn('Dropped record with missing file:', row.trackKey);
          removedRecords.push(row.trackKey);
        }
      }

      const known = await this.db.selectFrom('cachedTracks')
        .select(['trackKey', 'filePath', 'coverPath'])
        .execute();
      const knownFiles = new Set(known.flatMap(row => row.coverPath ? [row.filePath, row.coverPath] : [row.filePath]));

      for (const directory of [this.tracksPath, this.coversPath]) {
        for (const file of await readdir(directory)) {
          const path = join(directory, file);
          if (knownFiles.has(path)) continue;
          const key = file.replace(/^\./, '').split('.')[0];
          if (this.committing.has(key)) continue;
          await unlinkIfExists(path);
          this.warn('Deleted orphaned file:', path);
          removedFiles.push(path);
        }
      }

      if (this.workPath) {
        await mkdir(this.workPath, { recursive: true });
        for (const entry of await readdir(this.workPath)) {
          const path = join(this.workPath, entry);
          await rm(path, { recursive: true, force: true });
          this.warn('Deleted leftover work directory:', path);
          removedFiles.push(path);
        }
      }

      return { removedRecords, removedFiles };
    });
  }

  // caller holds the key lock
  private async touch(key: TrackKey): Promise<CacheRecord | null> {
    const row = await this.db.selectFrom('cachedTracks')
      .selectAll()
      .where('trackKey', '=', key)
      .executeTakeFirst();
    if (!row) return null;

    if (!(await fileExists(row.filePath))) {
      this.warn('Cached file for', key, 'is missing, dropping the record');
      if (row.coverPath) await unlinkIfExists(row.coverPath);
      await this.db.deleteFrom('cachedTracks').where('trackKey', '=', key).execute();
      return null;
    }

    const lastAccessedAt = this.now().toISOString();
    await this.db.updateTable('cachedTracks')
      .set({ lastAccessedAt })
      .where('trackKey', '=', key)
      .execute();
    return toCacheRecord({ ...row, lastAccessedAt });
  }

  // caller holds the key lock
  private async commit(
    key: TrackKey,
    metadata: TrackMetadata,
    sourceFilePath: string,
    sourceCoverPath: string | null,
  ): Promise<CacheRecord> {
    await mkdir(this.tracksPath, { recursive: true });
    await mkdir(this.coversPath, { recursive: true });

    const filePath = this.trackPath(key);
    const coverPath = sourceCoverPath ? this.coverPath(key) : null;
    const existing = await this.db.selectFrom('cachedTracks')
      .select(['coverPath'])
      .where('trackKey', '=', key)
      .executeTakeFirst();

    this.committing.add(key);
    try {
      const partialPath = join(this.tracksPath, `.${key}.${randomUUID()}${PARTIAL_SUFFIX}`);
      await moveFile(sourceFilePath, partialPath);
      await rename(partialPath, filePath);

      if (sourceCoverPath && coverPath) {
        const partialCover = join(this.coversPath, `.${key}.${randomUUID()}${PARTIAL_SUFFIX}`);
        await moveFile(sourceCoverPath, partialCover);
        await rename(partialCover, coverPath);
      } else if (existing?.coverPath) {
        await unlinkIfExists(existing.coverPath);
      }

      const fileSizeBytes = (await stat(filePath)).size;
      const coverSizeBytes = coverPath ? (await stat(coverPath)).size : 0;
      const timestamp = this.now().toISOString();
      const values = {
        trackKey: key,
        title: metadata.title,
        artist: metadata.artist,
        album: metadata.album,
        durationSeconds: metadata.durationSeconds,
        artworkUrl: metadata.artworkUrl,
        filePath,
        fileSizeBytes,
        coverPath,
        coverSizeBytes,
        createdAt: timestamp,
        lastAccessedAt: timestamp,
      };

      try {
        await this.db.insertInto('cachedTracks')
          .values(values)
          .onConflict(oc => oc.column('trackKey').doUpdateSet({
            title: values.title,
            artist: values.artist,
            album: values.album,
            durationSeconds: values.durationSeconds,
            artworkUrl: values.artworkUrl,
            filePath,
            fileSizeBytes,
            coverPath,
            coverSizeBytes,
            lastAccessedAt: timestamp,
          }))
          .execute();
      } catch (e) {
        this.error('Failed to record', key, errorMessage(e));
        await unlinkIfExists(filePath);
        if (coverPath) await unlinkIfExists(coverPath);
        throw e;
      }

      this.log('Stored', key, `${metadata.artist} - ${metadata.title}`, `(${formatBytes(fileSizeBytes + coverSizeBytes)})`);
      return toCacheRecord(values);
    } finally {
      this.committing.delete(key);
    }
  }

  /**
   * Caller holds the key lock. Returns the number of bytes freed, or
   * 'touched' when the record was read after `seenAccessedAt` was taken.
   */
  private async evictRecord(key: TrackKey, seenAccessedAt: string): Promise<number | 'touched'> {
    if (this.isPinned(key)) return 0;
    const current = await this.db.selectFrom('cachedTracks')
      .select('lastAccessedAt')
      .where('trackKey', '=', key)
      .executeTakeFirst();
    if (!current) return 0;
    if (current.lastAccessedAt !== seenAccessedAt) return 'touched';
    return this.removeRecord(key);
  }

  // caller holds the key lock; returns the number of bytes freed
  private async removeRecord(key: TrackKey): Promise<number> {
    const row = await this.db.selectFrom('cachedTracks')
      .selectAll()
      .where('trackKey', '=', key)
      .executeTakeFirst();
    if (!row) return 0;

    try {
      await unlinkIfExists(row.filePath);
      if (row.coverPath) await unlinkIfExists(row.coverPath);
    } catch (e) {
      // keep the row so it still matches whatever is left on disk
      this.error('Failed to delete files for', key, errorMessage(e));
      return 0;
    }
    await this.db.deleteFrom('cachedTracks').where('trackKey', '=', key).execute();
    return recordSize(row);
  }
}
