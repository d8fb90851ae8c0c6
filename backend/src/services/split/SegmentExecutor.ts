import path from 'path';
import type { EncoderPlan, SegmentRange } from '@vsplit/types';
import { logger, ProcessAbortedError } from '../../utils/index.js';
import { EncoderArgs, RunCancelledError, segmentOutputPath } from '../../domain/index.js';
import type { SegmentEncoder } from '../../infrastructure/index.js';
//------------------------------------------------------------------------------//

export interface ExecuteOptions {
  /** 세그먼트 사이에서 확인하는 취소 신호 (진행 중인 인코딩에도 전달) */
  signal?: AbortSignal;
  /** 세그먼트 하나가 끝날 때마다 호출 */
  onSegmentComplete?: (range: SegmentRange, outputPath: string) => void;
}

/**
 * 세그먼트 실행기
 *
 * 책임:
 * - 계획된 세그먼트마다 외부 인코딩을 한 번씩, index 순서대로 실행
 * - 한 번에 하나만 실행 (하드웨어 인코더와 비트레이트 정확도 모두 자원을 독점해야 함)
 * - 첫 실패에서 중단, 이미 만든 세그먼트는 그대로 둠
 */
export class SegmentExecutor {
  constructor(private readonly encoder: SegmentEncoder) {}

  async execute(
    ranges: readonly SegmentRange[],
    plan: EncoderPlan,
    sourcePath: string,
    outputDir: string,
    options: ExecuteOptions = {}
  ): Promise<string[]> {
    const outputs: string[] = [];
    const ordered = [...ranges].sort((a, b) => a.index - b.index);
    const total = ordered.length;

    if (total === 0) {
      return outputs;
    }

    logger.info('encoder', `Encoding ${total} segment(s) with ${EncoderArgs.describe(plan)}`);

    for (const range of ordered) {
      if (options.signal?.aborted) {
        throw new RunCancelledError(outputs.length, total);
      }

      const outputPath = segmentOutputPath(sourcePath, outputDir, range.index);
      const endSeconds = range.startSeconds + range.durationSeconds;

      logger.info(
        'encoder',
        `Creating segment ${range.index}/${total}: ${path.basename(outputPath)} ` +
          `(${range.startSeconds.toFixed(3)}s ~ ${endSeconds.toFixed(3)}s)`
      );

      try {
        await this.encoder.encode({ sourcePath, range, plan, outputPath }, { signal: options.signal });
      } catch (error) {
        if (error instanceof ProcessAbortedError) {
          throw new RunCancelledError(outputs.length, total);
        }
        logger.error('encoder', `Segment ${range.index} failed, stopping run (${outputs.length} segment(s) left on disk)`);
        throw error;
      }

      outputs.push(outputPath);
      options.onSegmentComplete?.(range, outputPath);
      logger.success('encoder', `Segment ${range.index}/${total} done`);
    }

    return outputs;
  }
}
