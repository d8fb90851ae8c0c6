import path from 'path';
import { describe, it, expect, vi } from 'vitest';
import { SegmentExecutor } from '../services/index.js';
import { EncodeFailureError, RunCancelledError } from '../domain/index.js';
import { ProcessAbortedError } from '../utils/index.js';
import { FakeEncoder, ranges, vbrSoftwarePlan } from './fakes.js';

const SOURCE = '/videos/clip.mp4';
const OUT = '/videos/clip_parts';

const failure = (segmentIndex: number) => new EncodeFailureError({ segmentIndex, exitCode: 1, args: [], stderr: 'boom' });

describe('SegmentExecutor', () => {
  it('encodes every range in index order, one at a time', async () => {
    const encoder = new FakeEncoder();
    const executor = new SegmentExecutor(encoder);
    const [first, second, third] = ranges(3);

    const outputs = await executor.execute([third, first, second], vbrSoftwarePlan, SOURCE, OUT);

    expect(outputs).toEqual([
      path.join(OUT, 'clip_part001.mp4'),
      path.join(OUT, 'clip_part002.mp4'),
      path.join(OUT, 'clip_part003.mp4'),
    ]);
    expect(encoder.jobs.map(j => j.range.index)).toEqual([1, 2, 3]);
    expect(encoder.jobs[1]).toEqual({ sourcePath: SOURCE, range: second, plan: vbrSoftwarePlan, outputPath: outputs[1] });
    expect(encoder.maxActive).toBe(1);
  });

  it('returns an empty list without encoding when there are no ranges', async () => {
    const encoder = new FakeEncoder();

    await expect(new SegmentExecutor(encoder).execute([], vbrSoftwarePlan, SOURCE, OUT)).resolves.toEqual([]);
    expect(encoder.jobs).toHaveLength(0);
  });

  it('stops at the first failure', async () => {
    const encoder = new FakeEncoder(new Map([[2, failure(2)]]));
    const onSegmentComplete = vi.fn();

    const error = await new SegmentExecutor(encoder)
      .execute(ranges(4), vbrSoftwarePlan, SOURCE, OUT, { onSegmentComplete })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(EncodeFailureError);
    expect(error instanceof EncodeFailureError && error.segmentIndex).toBe(2);
    expect(encoder.jobs.map(j => j.range.index)).toEqual([1, 2]);
    expect(onSegmentComplete).toHaveBeenCalledTimes(1);
    expect(onSegmentComplete).toHaveBeenCalledWith(ranges(4)[0], path.join(OUT, 'clip_part001.mp4'));
  });

  it('cancels between segments', async () => {
    const encoder = new FakeEncoder();
    const controller = new AbortController();

    const error = await new SegmentExecutor(encoder)
      .execute(ranges(3), vbrSoftwarePlan, SOURCE, OUT, {
        signal: controller.signal,
        onSegmentComplete: () => controller.abort(),
      })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RunCancelledError);
    expect(error instanceof RunCancelledError && error.message).toBe('Run cancelled after 1/3 segments');
    expect(encoder.jobs).toHaveLength(1);
  });

  it('reports an aborted encode as a cancelled run', async () => {
    const encoder = new FakeEncoder(new Map([[1, new ProcessAbortedError('ffmpeg')]]));

    const error = await new SegmentExecutor(encoder).execute(ranges(2), vbrSoftwarePlan, SOURCE, OUT).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RunCancelledError);
    expect(error instanceof RunCancelledError && error.completedSegments).toBe(0);
    expect(error instanceof RunCancelledError && error.totalSegments).toBe(2);
  });
});
