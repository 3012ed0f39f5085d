import { runProcess } from './process';
import TrackRequestError from '../../shared/TrackRequestError';

export interface FfmpegOptions {
  binPath: string;
  bitrate: string;
  timeoutMs: number;
}

export function transcodeArgs(inputPath: string, outputPath: string, bitrate: string) {
  return [
    '-hide_banner',
    '-loglevel', 'error',
    '-y',
    '-i', inputPath,
    // drop embedded video/thumbnail streams, cover art is added separately
    '-vn',
    '-codec:a', 'libmp3lame',
    '-b:a', bitrate,
    '-map_metadata', '-1',
    outputPath,
  ];
}

export async function transcodeToMp3(inputPath: string, outputPath: string, options: FfmpegOptions) {
  const result = await runProcess(options.binPath, transcodeArgs(inputPath, outputPath, options.bitrate), {
    timeoutMs: options.timeoutMs,
  });
  if (result.timedOut) {
    throw new TrackRequestError('TRANSCODE_FAILED', 'ffmpeg timed out');
  }
  if (result.code !== 0) {
    const reason = result.stderr.trim().split(/\r?\n/).pop();
    throw new TrackRequestError('TRANSCODE_FAILED', `ffmpeg exited with ${result.code}: ${reason ?? 'no output'}`);
  }
}
