import { join, dirname, resolve } from 'path';
import { fileURLToPath } from 'url';

export const __dirname = dirname(fileURLToPath(import.meta.url));

export const DEFAULT_LIBRARY_PATH = join(__dirname, '..', 'library');

export interface LibraryPaths {
  root: string;
  tracks: string;
  covers: string;
  // per-acquisition scratch directories live here and are removed when the acquisition settles
  work: string;
  database: string;
  // held by whichever process currently owns the library
  lock: string;
}

export function libraryPaths(root: string = DEFAULT_LIBRARY_PATH, databasePath?: string): LibraryPaths {
  const absoluteRoot = resolve(root);
  return {
    root: absoluteRoot,
    tracks: join(absoluteRoot, 'tracks'),
    covers: join(absoluteRoot, 'covers'),
    work: join(absoluteRoot, 'work'),
    database: databasePath ? resolve(databasePath) : join(absoluteRoot, 'tracks.sqlite'),
    lock: join(absoluteRoot, 'courier.lock'),
  };
}
