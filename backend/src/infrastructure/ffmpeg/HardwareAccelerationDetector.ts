import { logger, getFFmpegPath, defaultProcessRunner, type ProcessRunner } from '../../utils/index.js';
import type { EncoderPreference } from '../../config/index.js';
import { HARDWARE_CODEC } from '../../domain/index.js';
//------------------------------------------------------------------------------//

/**
 * 하드웨어 인코더 가용성 감지
 */
export interface HardwareCapabilityDetector {
  detect(): Promise<boolean>;
}

export interface HardwareAccelerationDetectorOptions {
  runner?: ProcessRunner;
  ffmpegPath?: () => string;
  preference?: EncoderPreference;
  /** 시험 인코딩 제한 시간 (밀리초) */
  trialTimeout?: number;
}

/**
 * VideoToolbox 하드웨어 가속 감지기
 *
 * 책임:
 * - FFmpeg 인코더 목록에서 h264_videotoolbox 확인
 * - 1초짜리 더미 영상으로 실제 인코딩 가능 여부 시험
 * - 감지 결과 캐싱 (인스턴스 = 한 번의 실행)
 *
 * 하드웨어가 없는 것은 정상적인 결과이므로 절대 throw 하지 않습니다.
 */
export class HardwareAccelerationDetector implements HardwareCapabilityDetector {
  private readonly runner: ProcessRunner;
  private readonly ffmpegPath: () => string;
  private readonly preference: EncoderPreference;
  private readonly trialTimeout: number;
  private cached: Promise<boolean> | null = null;

  constructor(options: HardwareAccelerationDetectorOptions = {}) {
    this.runner = options.runner ?? defaultProcessRunner;
    this.ffmpegPath = options.ffmpegPath ?? getFFmpegPath;
    this.preference = options.preference ?? 'auto';
    this.trialTimeout = options.trialTimeout ?? 5000;
  }

  /**
   * 하드웨어 가속 감지 (캐시 사용)
   */
  detect(): Promise<boolean> {
    if (!this.cached) {
      this.cached = this.runDetection();
    }
    return this.cached;
  }

  private async runDetection(): Promise<boolean> {
    if (this.preference === 'cpu') {
      logger.info('hardware', 'Hardware acceleration disabled by VSPLIT_ENCODER=cpu');
      return false;
    }

    logger.debug('hardware', 'Detecting VideoToolbox support...');

    const listed = await this.isEncoderListed();
    if (!listed) {
      logger.info('hardware', `✗ ${HARDWARE_CODEC} not available - software encoding (libx264) only`);
      return false;
    }

    // 강제 지정 시 시험 인코딩 생략
    if (this.preference === 'videotoolbox') {
      logger.info('hardware', `✓ ${HARDWARE_CODEC} listed (trial encode skipped by VSPLIT_ENCODER)`);
      return true;
    }

    const works = await this.trialEncode();
    if (works) {
      logger.info('hardware', `✓ ${HARDWARE_CODEC} available - will be used for VBR`);
    } else {
      logger.info('hardware', `✗ ${HARDWARE_CODEC} listed but unusable - software encoding (libx264) only`);
    }
    return works;
  }

  /**
   * `ffmpeg -encoders` 출력에 VideoToolbox 인코더가 있는지
   */
  private async isEncoderListed(): Promise<boolean> {
    try {
      const result = await this.runner.run(this.ffmpegPath(), ['-hide_banner', '-encoders'], { timeout: this.trialTimeout });
      return result.code === 0 && result.stdout.includes(HARDWARE_CODEC);
    } catch (error) {
      logger.debug('hardware', `Encoder listing failed: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }
  }

  /**
   * 시험 인코딩
   *
   * 전략: 1초짜리 검은 화면(lavfi)을 인코딩해서 null 출력으로 버림
   * - 성공: 사용 가능
   * - 실패/타임아웃: 사용 불가 (권한, 장치 없음 등)
   */
  private async trialEncode(): Promise<boolean> {
    const args = [
      '-y',
      '-hide_banner',
      '-loglevel',
      'error',
      '-f',
      'lavfi',
      '-i',
      'color=black:s=256x144:d=1',
      '-c:v',
      HARDWARE_CODEC,
      '-b:v',
      '100k',
      '-f',
      'null',
      '-',
    ];

    try {
      const result = await this.runner.run(this.ffmpegPath(), args, { timeout: this.trialTimeout });
      if (result.code === 0) {
        return true;
      }
      logger.debug('hardware', `${HARDWARE_CODEC} trial failed (exit ${result.code}): ${result.stderr.trim().split('\n')[0] ?? ''}`);
      return false;
    } catch (error) {
      logger.debug('hardware', `${HARDWARE_CODEC} trial failed: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }
  }
}
