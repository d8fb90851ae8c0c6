import type { EncoderPlan, RateControl, RateControlMode, VideoMetadata } from '@vsplit/types';
import { InvalidIntentError, UnsupportedModeError } from '../errors.js';
//------------------------------------------------------------------------------//

export const SOFTWARE_CODEC = 'libx264';
export const HARDWARE_CODEC = 'h264_videotoolbox';

/**
 * 인코더 파라미터 선택 로직
 *
 * 결정 표:
 * - CBR: 하드웨어 유무와 무관하게 항상 libx264
 *   (하드웨어 인코더는 엄격한 비트레이트 유지를 보장하지 못함)
 * - VBR + 하드웨어: h264_videotoolbox, 원본 비트레이트를 평균 목표로
 * - VBR + 소프트웨어: libx264 ABR, 원본 비트레이트를 평균 목표로
 *
 * 오디오는 모든 모드에서 스트림 복사합니다.
 */
export class EncoderParameterSelector {
  static select(mode: RateControlMode, sourceBitRate: number, hardwareAvailable: boolean, targetFrameRate?: number): EncoderPlan {
    if (!Number.isInteger(sourceBitRate) || sourceBitRate <= 0) {
      throw new InvalidIntentError(`Source bit rate must be a positive integer (got ${sourceBitRate})`, { sourceBitRate });
    }

    const base = targetFrameRate === undefined ? {} : { targetFrameRate };

    switch (mode) {
      case 'CBR': {
        const plan: EncoderPlan = {
          codec: SOFTWARE_CODEC,
          useHardware: false,
          rateControl: this.buildCbr(sourceBitRate),
          ...base,
          audio: 'copy',
        };
        return Object.freeze(plan);
      }
      case 'VBR': {
        const plan: EncoderPlan = {
          codec: hardwareAvailable ? HARDWARE_CODEC : SOFTWARE_CODEC,
          useHardware: hardwareAvailable,
          rateControl: this.buildVbr(sourceBitRate, hardwareAvailable),
          ...base,
          audio: 'copy',
        };
        return Object.freeze(plan);
      }
      default: {
        const unknown: never = mode;
        throw new UnsupportedModeError(String(unknown));
      }
    }
  }

  /**
   * 엄격한 CBR
   *
   * - 목표 = 최대 = 최소 = 원본 비트레이트
   * - 버퍼는 비트레이트의 1/8 (작은 버퍼로 순간 변동 억제)
   * - nal-hrd=cbr, force-cfr 로 일정한 프레임 타이밍 강제
   * - 가장 느린 프리셋으로 목표 비트레이트 내 품질 최대화
   */
  private static buildCbr(bitRate: number): RateControl {
    return {
      mode: 'CBR',
      bitRate,
      maxRate: bitRate,
      minRate: bitRate,
      bufferSize: Math.max(1, Math.floor(bitRate / 8)),
      preset: 'veryslow',
      nalHrd: 'cbr',
      forceConstantFrameRate: true,
    };
  }

  /**
   * 평균 비트레이트 VBR (상한 없음, 복잡한 장면에서는 목표를 넘을 수 있음)
   */
  private static buildVbr(bitRate: number, useHardware: boolean): RateControl {
    if (useHardware) {
      return { mode: 'VBR', averageBitRate: bitRate, bufferSize: null, preset: null };
    }

    return { mode: 'VBR', averageBitRate: bitRate, bufferSize: bitRate * 2, preset: 'medium' };
  }

  /**
   * 실제 출력 프레임레이트 (목표가 없으면 원본 유지)
   */
  static effectiveFrameRate(plan: EncoderPlan, source: VideoMetadata): number {
    return plan.targetFrameRate ?? source.frameRate;
  }

  /**
   * 검증 시 기대하는 비트레이트
   */
  static targetBitRate(plan: EncoderPlan): number {
    return plan.rateControl.mode === 'CBR' ? plan.rateControl.bitRate : plan.rateControl.averageBitRate;
  }
}

export const selectEncoderPlan = EncoderParameterSelector.select.bind(EncoderParameterSelector);
