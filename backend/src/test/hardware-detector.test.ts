import { describe, it, expect } from 'vitest';
import { HardwareAccelerationDetector } from '../infrastructure/index.js';
import { FakeProcessRunner, exited } from './fakes.js';

const ENCODERS_WITH_VT = [
  'Encoders:',
  ' V....D libx264              libx264 H.264 / AVC / MPEG-4 AVC / MPEG-4 part 10 (codec h264)',
  ' V....D h264_videotoolbox    VideoToolbox H.264 Encoder (codec h264)',
].join('\n');

const ENCODERS_WITHOUT_VT = ['Encoders:', ' V....D libx264              libx264 H.264 / AVC (codec h264)'].join('\n');

const runnerFor = (encoders: string, trialCode: number) =>
  new FakeProcessRunner((_command, args) => (args.includes('-encoders') ? exited(0, encoders) : exited(trialCode, '', 'trial stderr')));

const detectorFor = (runner: FakeProcessRunner, preference?: 'auto' | 'videotoolbox' | 'cpu') =>
  new HardwareAccelerationDetector({ runner, ffmpegPath: () => 'ffmpeg-test', preference, trialTimeout: 5000 });

describe('HardwareAccelerationDetector', () => {
  it('is available when listed and the trial encode succeeds', async () => {
    const runner = runnerFor(ENCODERS_WITH_VT, 0);

    await expect(detectorFor(runner).detect()).resolves.toBe(true);
    expect(runner.calls).toHaveLength(2);
    expect(runner.calls[0].args).toEqual(['-hide_banner', '-encoders']);
    expect(runner.calls[1].command).toBe('ffmpeg-test');
    expect(runner.calls[1].args).toEqual([
      '-y',
      '-hide_banner',
      '-loglevel',
      'error',
      '-f',
      'lavfi',
      '-i',
      'color=black:s=256x144:d=1',
      '-c:v',
      'h264_videotoolbox',
      '-b:v',
      '100k',
      '-f',
      'null',
      '-',
    ]);
    expect(runner.calls[1].options).toEqual({ timeout: 5000 });
  });

  it('caches the result for the lifetime of the detector', async () => {
    const runner = runnerFor(ENCODERS_WITH_VT, 0);
    const detector = detectorFor(runner);

    await detector.detect();
    await detector.detect();
    expect(runner.calls).toHaveLength(2);
  });

  it('is unavailable when the encoder is not listed', async () => {
    const runner = runnerFor(ENCODERS_WITHOUT_VT, 0);

    await expect(detectorFor(runner).detect()).resolves.toBe(false);
    expect(runner.calls).toHaveLength(1);
  });

  it('is unavailable when the trial encode fails', async () => {
    await expect(detectorFor(runnerFor(ENCODERS_WITH_VT, 1)).detect()).resolves.toBe(false);
  });

  it('never throws when ffmpeg cannot run', async () => {
    const runner = new FakeProcessRunner(() => new Error('spawn ffmpeg ENOENT'));
    await expect(detectorFor(runner).detect()).resolves.toBe(false);
  });

  it('skips detection entirely for the cpu preference', async () => {
    const runner = runnerFor(ENCODERS_WITH_VT, 0);

    await expect(detectorFor(runner, 'cpu').detect()).resolves.toBe(false);
    expect(runner.calls).toHaveLength(0);
  });

  it('skips the trial encode for the videotoolbox preference', async () => {
    const runner = runnerFor(ENCODERS_WITH_VT, 1);

    await expect(detectorFor(runner, 'videotoolbox').detect()).resolves.toBe(true);
    expect(runner.calls).toHaveLength(1);
  });
});
