import { parseFile } from 'music-metadata';
import TrackRequestError from '../shared/TrackRequestError';

export interface AudioInfo {
  durationSeconds: number;
  bitrate: number | null;
  codec: string | null;
}

/**
 * Probe an encoded audio file.
 * A file without a readable duration is treated as a broken transcode.
 */
export default async function getAudioInfo(songPath: string): Promise<AudioInfo> {
  const { format } = await parseFile(songPath, { duration: true, skipCovers: true })
    .catch((err: unknown) => {
      throw new TrackRequestError('TRANSCODE_FAILED', `Could not read ${songPath}`, { cause: err });
    });
  if (!format.duration || !Number.isFinite(format.duration)) {
    throw new TrackRequestError('TRANSCODE_FAILED', `${songPath} has no readable duration`);
  }
  return {
    durationSeconds: format.duration,
    bitrate: format.bitrate ?? null,
    codec: format.codec ?? null,
  };
}
