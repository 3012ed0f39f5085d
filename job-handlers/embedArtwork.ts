import { readFile, writeFile } from 'fs/promises';
import NodeID3 from 'node-id3';
import type { TrackMetadata } from '../shared/messages';
import { createLogger } from '../shared/util';

const log = createLogger('Artwork');

/**
 * Download cover art to `outputPath`.
 * Resolves to the number of bytes written.
 */
export async function fetchArtwork(url: string, outputPath: string, timeoutMs: number) {
  const response = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
  if (!response.ok) {
    throw new Error(`Artwork request failed with ${response.status}`);
  }
  const buffer = Buffer.from(await response.arrayBuffer());
  if (!buffer.length) {
    throw new Error('Artwork response was empty');
  }
  await writeFile(outputPath, buffer);
  log('Fetched artwork', url, buffer.length, 'bytes');
  return buffer.length;
}

export function buildTags(metadata: TrackMetadata, cover: Buffer | null): NodeID3.Tags {
  const tags: NodeID3.Tags = {
    title: metadata.title,
    artist: metadata.artist,
    length: String(Math.round(metadata.durationSeconds * 1000)),
  };
  if (metadata.album) tags.album = metadata.album;
  if (cover) {
    tags.image = {
      mime: 'image/jpeg',
      type: { id: 3, name: 'front cover' },
      description: 'Cover',
      imageBuffer: cover,
    };
  }
  return tags;
}

/** Replace the ID3 tags of an mp3 file, with `coverPath` as its front cover if given. */
export async function writeTags(filePath: string, metadata: TrackMetadata, coverPath: string | null) {
  const cover = coverPath ? await readFile(coverPath) : null;
  const result = NodeID3.write(buildTags(metadata, cover), filePath);
  if (result instanceof Error) {
    throw result;
  }
}
