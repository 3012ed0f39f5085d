/**
 * Repair the library: drop records whose file is gone, delete files nothing
 * refers to and leftover work directories, then enforce the storage limit.
 * Refuses to run while the bot holds the library lock.
 * Pass --purge <trackKey> to remove a single track.
 */
import 'dotenv/config';
import { createCourier } from './server/courier';
import { loadConfig } from '../shared/config';
import { acquireLibraryLock } from '../shared/LibraryLock';
import { errorMessage, formatBytes } from '../shared/util';

const config = loadConfig();
const lock = await acquireLibraryLock(config.paths.lock).catch((e: unknown) => {
  console.error(errorMessage(e));
  process.exit(1);
});
const courier = await createCourier(config);

const purgeIndex = process.argv.indexOf('--purge');
if (purgeIndex !== -1) {
  const key = process.argv[purgeIndex + 1];
  if (!key) {
    console.error('Usage: sweep-library [--purge <trackKey>]');
    await lock.release();
    process.exit(1);
  }
  console.log(await courier.cache.purge(key) ? `purged ${key}` : `${key} is not in the library`);
}

const { removedRecords, removedFiles } = await courier.cache.reconcile();
console.log('removed', removedRecords.length, 'records without files');
removedRecords.forEach(key => console.log('  ', key));
console.log('removed', removedFiles.length, 'files without records');
removedFiles.forEach(path => console.log('  ', path));

const { evicted, totalBytes, withinBudget } = await courier.cache.evictUntilWithinBudget();
if (evicted.length) {
  console.log('evicted', evicted.join(', '));
}

const records = await courier.cache.list();
console.log(records.length, 'tracks,', formatBytes(totalBytes), config.storageLimitBytes === null
  ? '(no storage limit)'
  : `of ${formatBytes(config.storageLimitBytes)}${withinBudget ? '' : ', over the limit'}`);

await courier.db.destroy();
await lock.release();
console.log('done');
