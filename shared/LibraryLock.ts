import { mkdir, open, readFile, unlink, type FileHandle } from 'fs/promises';
import { dirname } from 'path';
import { createLogger } from './util';

const log = createLogger('LibraryLock', 'warn');

const hasCode = (e: unknown, code: string) =>
  e instanceof Error && 'code' in e && e.code === code;

export class LibraryLockedError extends Error {
  constructor(public readonly lockPath: string, public readonly holderPid: number | null) {
    super(holderPid === null
      ? `The library is locked by ${lockPath}; remove it if no other courier process is running`
      : `The library is in use by process ${holderPid} (${lockPath})`);
    this.name = 'LibraryLockedError';
  }
}

export interface LibraryLock {
  path: string;
  release(): Promise<void>;
}

const isProcessAlive = (pid: number) => {
  try {
    process.kill(pid, 0);
    return true;
  } catch (e) {
    // EPERM still means the process exists
    return !hasCode(e, 'ESRCH');
  }
};

async function readHolder(lockPath: string): Promise<number | null> {
  try {
    const pid = Number.parseInt((await readFile(lockPath, 'utf8')).trim(), 10);
    return Number.isInteger(pid) && pid > 0 ? pid : null;
  } catch (e) {
    if (hasCode(e, 'ENOENT')) return null;
    throw e;
  }
}

async function tryCreate(lockPath: string) {
  let handle: FileHandle;
  try {
    handle = await open(lockPath, 'wx');
  } catch (e) {
    if (hasCode(e, 'EEXIST')) return false;
    throw e;
  }
  try {
    await handle.writeFile(`${process.pid}\n`);
  } finally {
    await handle.close();
  }
  return true;
}

/**
 * Exclusive ownership of a library directory across processes.
 * The lock file holds the owner's pid; a file left behind by a process
 * that no longer exists is taken over.
 */
export async function acquireLibraryLock(lockPath: string): Promise<LibraryLock> {
  await mkdir(dirname(lockPath), { recursive: true });
  if (!await tryCreate(lockPath)) {
    const holderPid = await readHolder(lockPath);
    if (holderPid === null || isProcessAlive(holderPid)) {
      throw new LibraryLockedError(lockPath, holderPid);
    }
    log('Taking over lock left by exited process', holderPid);
    await unlink(lockPath);
    if (!await tryCreate(lockPath)) {
      throw new LibraryLockedError(lockPath, await readHolder(lockPath));
    }
  }

  let released = false;
  return {
    path: lockPath,
    release: async () => {
      if (released) return;
      released = true;
      try {
        await unlink(lockPath);
      } catch (e) {
        if (!hasCode(e, 'ENOENT')) throw e;
      }
    },
  };
}
