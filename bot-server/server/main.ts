import 'dotenv/config';
import DiscordIntegration from './DiscordIntegration';
import { createCourier } from './courier';
import { loadConfig, requireCredentials } from '../../shared/config';
import { acquireLibraryLock } from '../../shared/LibraryLock';
import { createLogger, errorMessage, formatBytes } from '../../shared/util';

const log = createLogger('Main');
const logError = createLogger('Main', 'error');

process.on('unhandledRejection', (reason: unknown) => {
  logError('unhandledRejection', errorMessage(reason), reason);
});

const config = loadConfig();
requireCredentials(config, ['discord', 'spotify']);

const lock = await acquireLibraryLock(config.paths.lock).catch((e: unknown) => {
  logError(errorMessage(e));
  process.exit(1);
});
const courier = await createCourier(config);

const { removedRecords, removedFiles } = await courier.cache.reconcile();
if (removedRecords.length || removedFiles.length) {
  log('Reconciled library:', removedRecords.length, 'stale records,', removedFiles.length, 'orphaned files');
}
if (config.storageLimitBytes !== null) {
  const { evicted, totalBytes } = await courier.cache.evictUntilWithinBudget();
  log('Library holds', formatBytes(totalBytes), 'after evicting', evicted.length, 'tracks');
}

courier.orchestrator.onStateChange((key, state) => log(key, state));

const discord = new DiscordIntegration(courier.coordinator, courier.requests, {
  maxUploadBytes: config.maxUploadBytes,
});
await discord.start(config.discordToken);

const shutdown = async () => {
  log('Shutting down');
  await discord.stop();
  await courier.db.destroy();
  await lock.release();
  process.exit(0);
};
process.once('SIGINT', () => {
  shutdown().catch((e: unknown) => {
    logError('Shutdown failed', errorMessage(e));
    process.exit(1);
  });
});
