import { logger, getFFmpegPath, defaultProcessRunner, ProcessAbortedError, type ProcessRunner, type ProcessResult } from '../../utils/index.js';
import { EncoderArgs, EncodeFailureError, type EncodeJob } from '../../domain/index.js';
//------------------------------------------------------------------------------//

export interface EncodeOptions {
  signal?: AbortSignal;
}

/**
 * 외부 인코딩 백엔드: 작업 하나당 출력 파일 하나
 */
export interface SegmentEncoder {
  encode(job: EncodeJob, options?: EncodeOptions): Promise<void>;
}

export interface FFmpegEncoderOptions {
  runner?: ProcessRunner;
  ffmpegPath?: () => string;
  /** 세그먼트 하나당 제한 시간 (밀리초), 0이면 무제한 */
  timeout?: number;
}

/** 에러에 남길 stderr 최대 길이 */
const STDERR_TAIL = 1000;

/**
 * FFmpeg 세그먼트 인코더
 *
 * 책임:
 * - EncoderArgs 로 인자 생성
 * - FFmpeg 프로세스 실행 및 완료 대기
 * - 실패 시 재현 가능한 정보(인자, 종료 코드, stderr)를 담은 EncodeFailureError
 *
 * Infrastructure Layer: 외부 도구(FFmpeg)에 대한 직접적인 의존성
 */
export class FFmpegEncoder implements SegmentEncoder {
  private readonly runner: ProcessRunner;
  private readonly ffmpegPath: () => string;
  private readonly timeout: number;

  constructor(options: FFmpegEncoderOptions = {}) {
    this.runner = options.runner ?? defaultProcessRunner;
    this.ffmpegPath = options.ffmpegPath ?? getFFmpegPath;
    this.timeout = options.timeout ?? 0;
  }

  async encode(job: EncodeJob, options: EncodeOptions = {}): Promise<void> {
    const args = EncoderArgs.build(job);
    const segmentIndex = job.range.index;

    logger.debug('encoder', `ffmpeg ${args.join(' ')}`);

    let result: ProcessResult;
    try {
      result = await this.runner.run(this.ffmpegPath(), args, { timeout: this.timeout, signal: options.signal });
    } catch (error) {
      // 취소는 호출자(SegmentExecutor)가 RunCancelledError 로 바꿈
      if (error instanceof ProcessAbortedError) {
        throw error;
      }
      throw new EncodeFailureError({
        segmentIndex,
        exitCode: null,
        args,
        stderr: '',
        reason: error instanceof Error ? error.message : String(error),
        cause: error,
      });
    }

    if (result.code !== 0) {
      const stderr = result.stderr.slice(-STDERR_TAIL);
      logger.debug('encoder', `FFmpeg stderr:\n${stderr}`);
      throw new EncodeFailureError({
        segmentIndex,
        exitCode: result.code,
        args,
        stderr,
        reason: result.code === null ? `killed by ${result.signal ?? 'signal'}` : undefined,
      });
    }
  }
}
