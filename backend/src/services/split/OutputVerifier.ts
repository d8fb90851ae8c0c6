import path from 'path';
import {
  VerificationResultSchema,
  type EncoderPlan,
  type VerificationMismatch,
  type VerificationOutcome,
  type VerificationResult,
  type VideoMetadata,
} from '@vsplit/types';
import { logger } from '../../utils/index.js';
import { EncoderParameterSelector } from '../../domain/index.js';
import type { MetadataProbe } from '../../infrastructure/index.js';
//------------------------------------------------------------------------------//

/** 프레임레이트 허용 오차 (fps) */
export const FRAME_RATE_TOLERANCE = 0.01;
/** 비트레이트 허용 오차 (비율) */
export const BIT_RATE_TOLERANCE = {
  CBR: 0.05,
  VBR: 0.2,
} as const;

/**
 * 출력 검증기
 *
 * 대표 출력 파일 하나(관례상 첫 세그먼트)를 다시 프로브해서
 * 프레임레이트와 비트레이트를 계획의 목표와 비교합니다.
 * 결과는 보고용이며, 이미 끝난 실행을 실패로 바꾸지 않습니다.
 */
export class OutputVerifier {
  constructor(private readonly probe: MetadataProbe) {}

  async verify(samplePath: string, plan: EncoderPlan, source: VideoMetadata): Promise<VerificationResult> {
    const sampled = await this.probe.probe(samplePath);

    const expectedFrameRate = EncoderParameterSelector.effectiveFrameRate(plan, source);
    const expectedBitRate = EncoderParameterSelector.targetBitRate(plan);
    const tolerance = BIT_RATE_TOLERANCE[plan.rateControl.mode];

    // 스트림 자체의 비트레이트만 비교 (format 값은 오디오가 포함된 컨테이너 전체, default 는 추정값)
    const bitRateKnown = sampled.bitRateSource === 'stream' || sampled.bitRateSource === 'tags';
    const sampledBitRate = bitRateKnown ? sampled.bitRate : 0;

    return VerificationResultSchema.parse({
      samplePath,
      sampledFrameRate: sampled.frameRate,
      sampledBitRate,
      expectedFrameRate,
      expectedBitRate,
      matchesTarget: {
        frameRate: Math.abs(sampled.frameRate - expectedFrameRate) <= FRAME_RATE_TOLERANCE,
        bitRate: bitRateKnown && Math.abs(sampledBitRate - expectedBitRate) <= expectedBitRate * tolerance,
      },
    });
  }

  /**
   * 실행 결과 검증 (첫 세그먼트 기준)
   *
   * 프로브 실패는 에러가 아니라 unverifiable 로 보고합니다.
   */
  async verifyRun(outputs: readonly string[], plan: EncoderPlan, source: VideoMetadata): Promise<VerificationOutcome> {
    const samplePath = outputs[0];
    if (samplePath === undefined) {
      return { status: 'unverifiable', reason: 'No output files were produced' };
    }

    try {
      const result = await this.verify(samplePath, plan, source);
      logger.info(
        'verify',
        `${path.basename(samplePath)}: ${result.sampledFrameRate.toFixed(2)} fps, ` + `${(result.sampledBitRate / 1_000_000).toFixed(2)} Mbps`
      );
      return { status: 'verified', result };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.warn('verify', `Could not verify output file parameters: ${reason}`);
      return { status: 'unverifiable', reason };
    }
  }

  /**
   * 목표와 다른 항목을 경고로 변환
   */
  static toMismatches(result: VerificationResult): VerificationMismatch[] {
    const mismatches: VerificationMismatch[] = [];

    if (!result.matchesTarget.frameRate) {
      mismatches.push({
        kind: 'VerificationMismatch',
        field: 'frameRate',
        expected: result.expectedFrameRate,
        actual: result.sampledFrameRate,
        message: `Frame rate ${result.sampledFrameRate.toFixed(2)} fps differs from target ${result.expectedFrameRate.toFixed(2)} fps`,
      });
    }

    if (!result.matchesTarget.bitRate) {
      mismatches.push({
        kind: 'VerificationMismatch',
        field: 'bitRate',
        expected: result.expectedBitRate,
        actual: result.sampledBitRate,
        message:
          result.sampledBitRate === 0
            ? 'Video stream bit rate of the output could not be determined'
            : `Bit rate ${(result.sampledBitRate / 1_000_000).toFixed(2)} Mbps differs from target ` +
              `${(result.expectedBitRate / 1_000_000).toFixed(2)} Mbps`,
      });
    }

    return mismatches;
  }
}
