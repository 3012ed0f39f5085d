/**
 * Fetch a single track into the library without going through Discord.
 * Usage: npm run fetch-track -- <spotify track link or URI>
 */
import 'dotenv/config';
import { createCourier } from './server/courier';
import { loadConfig, requireCredentials } from '../shared/config';
import { acquireLibraryLock } from '../shared/LibraryLock';
import { errorMessage, formatBytes } from '../shared/util';

const reference = process.argv[2];
if (!reference) {
  console.error('Usage: fetch-track <spotify track link or URI>');
  process.exit(1);
}

const config = loadConfig();
requireCredentials(config, ['spotify']);
const lock = await acquireLibraryLock(config.paths.lock).catch((e: unknown) => {
  console.error(errorMessage(e));
  process.exit(1);
});
const courier = await createCourier(config);
courier.orchestrator.onStateChange((key, state) => console.log(key, state));

try {
  const delivery = await courier.coordinator.handle(reference);
  console.log(`${delivery.metadata.artist} - ${delivery.metadata.title}`);
  console.log(delivery.cached ? 'already cached:' : 'stored:', delivery.filePath, formatBytes(delivery.fileSizeBytes));
  await delivery.release();
} catch (e) {
  console.error(errorMessage(e));
  process.exitCode = 1;
} finally {
  await courier.db.destroy();
  await lock.release();
}
