import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'fs';
import { readdir, writeFile } from 'fs/promises';
import { join } from 'path';
import AcquisitionOrchestrator from '../AcquisitionOrchestrator';
import { createFakeTools, type FakeTools, PAPER_LANTERNS, UNRELATED } from './fakeTools';
import { createTestLibrary, type TestLibrary } from '../../bot-server/server/__tests__/testLibrary';
import TrackRequestError, { isTrackRequestError } from '../../shared/TrackRequestError';
import type { AcquisitionState } from '../../shared/messages';

const KEY = PAPER_LANTERNS.trackId;

describe('AcquisitionOrchestrator', () => {
  let library: TestLibrary;
  let states: AcquisitionState[];

  const createOrchestrator = (tools: FakeTools) => new AcquisitionOrchestrator(tools, library.cache, {
    workPath: library.paths.work,
    minConfidence: 0.6,
    searchResults: 5,
    downloadAttempts: 3,
    downloadBackoffMs: 1,
    onStateChange: (_key, state) => states.push(state),
  });

  const failure = (promise: Promise<unknown>) => promise.then(
    () => { throw new Error('expected the acquisition to fail'); },
    (e: unknown) => e,
  );

  beforeEach(async () => {
    library = await createTestLibrary();
    states = [];
  });

  afterEach(async () => {
    await library.cleanup();
  });

  it('completes without artwork when the artwork download fails', async () => {
    const tools = createFakeTools({ artworkBytes: null });
    const orchestrator = createOrchestrator(tools);

    const record = await orchestrator.acquire(KEY, PAPER_LANTERNS);

    expect(states).toEqual(['searching', 'downloading', 'transcoding', 'embedding', 'done']);
    expect(record.coverPath).toBeNull();
    expect(record.fileSizeBytes).toBe(2048);
    expect(record.filePath).toBe(library.cache.trackPath(KEY));
    expect(tools.writeTags).toHaveBeenCalledWith(expect.stringMatching(/ABC123\.mp3$/), PAPER_LANTERNS, null);
    expect((await library.cache.lookup(KEY))?.metadata).toEqual(PAPER_LANTERNS);
    expect(await readdir(library.paths.work)).toEqual([]);
    expect(orchestrator.stateOf(KEY)).toBe('idle');
  });

  it('stores fetched artwork as the cover', async () => {
    const tools = createFakeTools({ artworkBytes: 700 });
    const record = await createOrchestrator(tools).acquire(KEY, PAPER_LANTERNS);

    expect(tools.fetchArtwork).toHaveBeenCalledWith(PAPER_LANTERNS.artworkUrl, expect.stringMatching(/ABC123\.jpg$/));
    expect(tools.writeTags).toHaveBeenCalledWith(
      expect.stringMatching(/ABC123\.mp3$/),
      PAPER_LANTERNS,
      expect.stringMatching(/ABC123\.jpg$/),
    );
    expect(record.coverPath).toBe(library.cache.coverPath(KEY));
    expect(record.coverSizeBytes).toBe(700);
    expect(existsSync(library.cache.coverPath(KEY))).toBe(true);
  });

  it('skips artwork for tracks without an artwork url', async () => {
    const tools = createFakeTools();
    const record = await createOrchestrator(tools).acquire(KEY, { ...PAPER_LANTERNS, artworkUrl: null });

    expect(tools.fetchArtwork).not.toHaveBeenCalled();
    expect(record.coverPath).toBeNull();
  });

  it('runs one acquisition for concurrent requests of the same track', async () => {
    const tools = createFakeTools();
    const orchestrator = createOrchestrator(tools);

    const first = orchestrator.acquire(KEY, PAPER_LANTERNS);
    const second = orchestrator.acquire(KEY, PAPER_LANTERNS);
    expect(orchestrator.isInFlight(KEY)).toBe(true);

    const [a, b] = await Promise.all([first, second]);

    expect(tools.search).toHaveBeenCalledTimes(1);
    expect(tools.download).toHaveBeenCalledTimes(1);
    expect(tools.transcode).toHaveBeenCalledTimes(1);
    expect(states.filter(state => state === 'searching')).toHaveLength(1);
    expect(a.filePath).toBe(b.filePath);
    expect(orchestrator.isInFlight(KEY)).toBe(false);
  });

  it('fails with NOT_FOUND when no candidate is good enough, leaving no files behind', async () => {
    const tools = createFakeTools({ candidates: [UNRELATED] });
    const orchestrator = createOrchestrator(tools);

    const error = await failure(orchestrator.acquire(KEY, PAPER_LANTERNS));

    expect(isTrackRequestError(error, 'NOT_FOUND')).toBe(true);
    expect(tools.download).not.toHaveBeenCalled();
    expect(states).toEqual(['searching', 'failed']);
    expect(await readdir(library.paths.work)).toEqual([]);
    expect(await library.cache.lookup(KEY)).toBeNull();
    expect(orchestrator.isInFlight(KEY)).toBe(false);
  });

  it('fails with NOT_FOUND when the search has no results', async () => {
    const tools = createFakeTools({ candidates: [] });
    const error = await failure(createOrchestrator(tools).acquire(KEY, PAPER_LANTERNS));
    expect(isTrackRequestError(error, 'NOT_FOUND')).toBe(true);
  });

  it('retries transient download failures', async () => {
    const tools = createFakeTools();
    tools.download
      .mockRejectedValueOnce(new Error('connection reset'))
      .mockRejectedValueOnce(new Error('connection reset'));

    const record = await createOrchestrator(tools).acquire(KEY, PAPER_LANTERNS);

    expect(tools.download).toHaveBeenCalledTimes(3);
    expect(record.key).toBe(KEY);
  });

  it('gives up after the configured number of download attempts', async () => {
    const tools = createFakeTools();
    tools.download.mockRejectedValue(new Error('connection reset'));

    const error = await failure(createOrchestrator(tools).acquire(KEY, PAPER_LANTERNS));

    expect(isTrackRequestError(error, 'DOWNLOAD_FAILED')).toBe(true);
    expect(error instanceof Error && error.message).toBe('Could not download vid-official: connection reset');
    expect(tools.download).toHaveBeenCalledTimes(3);
    expect(tools.transcode).not.toHaveBeenCalled();
    expect(await readdir(library.paths.work)).toEqual([]);
  });

  it('does not retry permanent download failures', async () => {
    const tools = createFakeTools();
    tools.download.mockRejectedValue(
      new TrackRequestError('DOWNLOAD_FAILED', 'Video vid-official is unavailable', { retryable: false }),
    );

    const error = await failure(createOrchestrator(tools).acquire(KEY, PAPER_LANTERNS));

    expect(isTrackRequestError(error, 'DOWNLOAD_FAILED')).toBe(true);
    expect(tools.download).toHaveBeenCalledTimes(1);
  });

  it('retries failed searches with the download policy', async () => {
    const tools = createFakeTools();
    tools.search.mockRejectedValueOnce(new Error('yt-dlp timed out'));

    await createOrchestrator(tools).acquire(KEY, PAPER_LANTERNS);

    expect(tools.search).toHaveBeenCalledTimes(2);
  });

  it('does not retry transcoding', async () => {
    const tools = createFakeTools();
    tools.transcode.mockRejectedValue(new TrackRequestError('TRANSCODE_FAILED', 'ffmpeg exited with 1'));

    const error = await failure(createOrchestrator(tools).acquire(KEY, PAPER_LANTERNS));

    expect(isTrackRequestError(error, 'TRANSCODE_FAILED')).toBe(true);
    expect(tools.transcode).toHaveBeenCalledTimes(1);
    expect(tools.download).toHaveBeenCalledTimes(1);
    expect(states).toEqual(['searching', 'downloading', 'transcoding', 'failed']);
    expect(await readdir(library.paths.work)).toEqual([]);
    expect(await library.cache.list()).toEqual([]);
  });

  it('treats an unreadable transcode as a transcode failure', async () => {
    const tools = createFakeTools();
    tools.probe.mockRejectedValue(new Error('no duration'));

    const error = await failure(createOrchestrator(tools).acquire(KEY, PAPER_LANTERNS));

    expect(isTrackRequestError(error, 'TRANSCODE_FAILED')).toBe(true);
  });

  it('delivers untagged files when tagging fails', async () => {
    const tools = createFakeTools();
    tools.writeTags.mockRejectedValue(new Error('bad frame'));

    const record = await createOrchestrator(tools).acquire(KEY, PAPER_LANTERNS);

    expect(record.key).toBe(KEY);
    expect(states.at(-1)).toBe('done');
  });

  it('passes storage failures through and still cleans up', async () => {
    await library.cleanup();
    library = await createTestLibrary({ storageLimitBytes: 1000 });
    const tools = createFakeTools({ audioBytes: 2048 });

    const error = await failure(createOrchestrator(tools).acquire(KEY, PAPER_LANTERNS));

    expect(isTrackRequestError(error, 'STORAGE_FULL')).toBe(true);
    expect(await readdir(library.paths.work)).toEqual([]);
  });

  it('reports a typed failure when the work directory cannot be created', async () => {
    const blocked = join(library.root, 'work-is-a-file');
    await writeFile(blocked, 'not a directory');
    const tools = createFakeTools();
    const orchestrator = new AcquisitionOrchestrator(tools, library.cache, {
      workPath: blocked,
      minConfidence: 0.6,
      searchResults: 5,
      downloadAttempts: 3,
      downloadBackoffMs: 1,
      onStateChange: (_key, state) => states.push(state),
    });

    const error = await failure(orchestrator.acquire(KEY, PAPER_LANTERNS));

    expect(isTrackRequestError(error, 'DOWNLOAD_FAILED')).toBe(true);
    expect(states).toEqual(['failed']);
    expect(tools.search).not.toHaveBeenCalled();
    expect(orchestrator.isInFlight(KEY)).toBe(false);
  });

  it('keeps going when a state listener throws', async () => {
    const orchestrator = createOrchestrator(createFakeTools());
    orchestrator.onStateChange(() => {
      throw new Error('listener broke');
    });

    await expect(orchestrator.acquire(KEY, PAPER_LANTERNS)).resolves.toMatchObject({ key: KEY });
  });
});
