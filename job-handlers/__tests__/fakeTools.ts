import { writeFile } from 'fs/promises';
import { join } from 'path';
import { vi } from 'vitest';
import type { AcquisitionTools } from '../tools';
import type { AudioInfo } from '../getAudioInfo';
import type { SourceCandidate, TrackMetadata } from '../../shared/messages';

export const PAPER_LANTERNS: TrackMetadata = {
  trackId: 'ABC123',
  title: 'Paper Lanterns',
  artist: 'Test Artist',
  album: 'Night Market',
  durationSeconds: 200,
  artworkUrl: 'https://images.example.com/paper-lanterns.jpg',
};

export const OFFICIAL_AUDIO: SourceCandidate = {
  id: 'vid-official',
  url: 'https://www.youtube.com/watch?v=vid-official',
  title: 'Test Artist - Paper Lanterns (Official Audio)',
  uploader: 'Test Artist',
  durationSeconds: 201,
};

export const UNRELATED: SourceCandidate = {
  id: 'vid-unrelated',
  url: 'https://www.youtube.com/watch?v=vid-unrelated',
  title: 'Someone Else - Different Song',
  uploader: 'Someone Else',
  durationSeconds: 200,
};

interface FakeToolsOptions {
  candidates?: SourceCandidate[];
  audioBytes?: number;
  // null makes the artwork download fail
  artworkBytes?: number | null;
  // downloads wait for this before writing their file
  downloadGate?: Promise<void>;
}

/** Stand-ins for yt-dlp, ffmpeg and friends that write small files into the work directory */
export function createFakeTools(options: FakeToolsOptions = {}) {
  const candidates = options.candidates ?? [OFFICIAL_AUDIO];
  const audioBytes = options.audioBytes ?? 2048;

  return {
    search: vi.fn(async (_query: string, _limit: number) => candidates),
    download: vi.fn(async (_candidate: SourceCandidate, workDir: string) => {
      await options.downloadGate;
      const path = join(workDir, 'source.webm');
      await writeFile(path, Buffer.alloc(1024, 1));
      return path;
    }),
    transcode: vi.fn(async (_inputPath: string, outputPath: string) => {
      await writeFile(outputPath, Buffer.alloc(audioBytes, 2));
    }),
    probe: vi.fn(async (_filePath: string): Promise<AudioInfo> => ({
      durationSeconds: 200.5,
      bitrate: 192_000,
      codec: 'MPEG 1 Layer 3',
    })),
    fetchArtwork: vi.fn(async (_url: string, outputPath: string) => {
      if (options.artworkBytes === null) {
        throw new Error('Artwork request failed with 404');
      }
      const size = options.artworkBytes ?? 512;
      await writeFile(outputPath, Buffer.alloc(size, 3));
      return size;
    }),
    writeTags: vi.fn(async (_filePath: string, _metadata: TrackMetadata, _coverPath: string | null) => {}),
  } satisfies AcquisitionTools;
}

export type FakeTools = ReturnType<typeof createFakeTools>;

export function createGate() {
  let open = () => {};
  const promise = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { promise, open: () => open() };
}
