import { describe, it, expect, vi, beforeEach } from 'vitest';
import { runProcess } from '../process';
import { transcodeArgs, transcodeToMp3 } from '../ffmpeg';
import { isTrackRequestError } from '../../../shared/TrackRequestError';

vi.mock('../process', () => ({
  runProcess: vi.fn(),
}));

const options = { binPath: 'ffmpeg', bitrate: '192k', timeoutMs: 1000 };

describe('transcodeArgs', () => {
  it('encodes audio only to mp3 at the given bitrate', () => {
    expect(transcodeArgs('in.webm', 'out.mp3', '192k')).toEqual([
      '-hide_banner',
      '-loglevel', 'error',
      '-y',
      '-i', 'in.webm',
      '-vn',
      '-codec:a', 'libmp3lame',
      '-b:a', '192k',
      '-map_metadata', '-1',
      'out.mp3',
    ]);
  });
});

describe('transcodeToMp3', () => {
  const run = vi.mocked(runProcess);

  beforeEach(() => {
    run.mockReset();
  });

  it('resolves on a clean exit', async () => {
    run.mockResolvedValue({ code: 0, stdout: '', stderr: '', timedOut: false });
    await expect(transcodeToMp3('in.webm', 'out.mp3', options)).resolves.toBeUndefined();
    expect(run).toHaveBeenCalledWith('ffmpeg', transcodeArgs('in.webm', 'out.mp3', '192k'), { timeoutMs: 1000 });
  });

  it('reports the last line of stderr on failure', async () => {
    run.mockResolvedValue({
      code: 1,
      stdout: '',
      stderr: 'in.webm: Invalid data found when processing input\n',
      timedOut: false,
    });

    const error = await transcodeToMp3('in.webm', 'out.mp3', options).catch((e: unknown) => e);
    expect(isTrackRequestError(error, 'TRANSCODE_FAILED')).toBe(true);
    expect(error instanceof Error && error.message).toBe('ffmpeg exited with 1: in.webm: Invalid data found when processing input');
  });

  it('reports timeouts', async () => {
    run.mockResolvedValue({ code: null, stdout: '', stderr: '', timedOut: true });
    await expect(transcodeToMp3('in.webm', 'out.mp3', options)).rejects.toThrow('ffmpeg timed out');
  });
});
