import type { SegmentRange, SplitIntent } from '@vsplit/types';
import { InvalidIntentError } from '../errors.js';

/** 이 값 이하의 마지막 세그먼트는 사실상 길이 0 */
export const SEGMENT_EPSILON = 1e-6;

/**
 * 세그먼트 계획 결과 통계
 */
export interface SegmentPlanStats {
  totalSegments: number;
  nominalSegmentDuration: number;
  lastSegmentDuration: number;
  /** 마지막 세그먼트 길이가 SEGMENT_EPSILON 이하인지 */
  hasNegligibleTail: boolean;
}

/**
 * 세그먼트 계획 로직
 *
 * 책임:
 * - 분할 의도(개수/길이)와 전체 길이로 시간 범위 목록 계산
 * - 세그먼트 연속성 검증
 *
 * 경계는 반올림하지 않습니다. 시작 시간은 누적하지 않고 index × 길이로 계산하며,
 * 마지막 세그먼트가 나머지를 모두 가져갑니다.
 */
export class SegmentPlanner {
  static plan(duration: number, intent: SplitIntent): SegmentRange[] {
    if (!Number.isFinite(duration) || duration <= 0) {
      throw new InvalidIntentError(`Source duration must be positive (got ${duration})`, { duration });
    }

    switch (intent.kind) {
      case 'count':
        return this.planByCount(duration, intent.segments);
      case 'duration':
        return this.planByDuration(duration, intent.seconds);
    }
  }

  /**
   * 개수 기준: duration / n 길이로 n개, 부동소수 오차는 마지막 세그먼트가 흡수
   */
  private static planByCount(duration: number, segments: number): SegmentRange[] {
    if (!Number.isInteger(segments) || segments < 1) {
      throw new InvalidIntentError(`Segment count must be a positive integer (got ${segments})`, { segments });
    }

    const segmentDuration = duration / segments;
    return this.buildRanges(duration, segmentDuration, segments, false);
  }

  /**
   * 길이 기준: ceil(duration / d)개, 마지막은 duration - d × (count - 1)
   */
  private static planByDuration(duration: number, seconds: number): SegmentRange[] {
    if (!Number.isFinite(seconds) || seconds <= 0) {
      throw new InvalidIntentError(`Segment duration must be positive (got ${seconds})`, { seconds });
    }

    // duration 이 d 의 정확한 배수여도 부동소수 나눗셈이 정수를 살짝 넘으면 ceil 이 하나 더 셈
    let count = Math.ceil(duration / seconds);
    while (count > 1 && duration - seconds * (count - 1) <= 0) {
      count--;
    }
    return this.buildRanges(duration, seconds, count, true);
  }

  private static buildRanges(duration: number, segmentDuration: number, count: number, clampTail: boolean): SegmentRange[] {
    const ranges: SegmentRange[] = [];

    for (let i = 0; i < count; i++) {
      const startSeconds = i * segmentDuration;
      let durationSeconds = segmentDuration;

      if (i === count - 1) {
        const remainder = Math.max(0, duration - startSeconds);
        durationSeconds = clampTail ? Math.min(segmentDuration, remainder) : remainder;
      }

      ranges.push(Object.freeze({ index: i + 1, startSeconds, durationSeconds }));
    }

    return ranges;
  }

  static getStats(ranges: readonly SegmentRange[]): SegmentPlanStats {
    const last = ranges[ranges.length - 1];
    return {
      totalSegments: ranges.length,
      nominalSegmentDuration: ranges.length > 0 ? ranges[0].durationSeconds : 0,
      lastSegmentDuration: last ? last.durationSeconds : 0,
      hasNegligibleTail: last !== undefined && last.durationSeconds <= SEGMENT_EPSILON,
    };
  }

  /**
   * 세그먼트 범위 검증
   *
   * 겹침이나 간격이 있는지 확인
   */
  static validateContinuity(ranges: readonly SegmentRange[], tolerance = SEGMENT_EPSILON): {
    isValid: boolean;
    errors: string[];
  } {
    const errors: string[] = [];

    for (let i = 1; i < ranges.length; i++) {
      const prev = ranges[i - 1];
      const curr = ranges[i];
      const prevEnd = prev.startSeconds + prev.durationSeconds;
      const gap = curr.startSeconds - prevEnd;

      if (gap > tolerance) {
        errors.push(`Gap detected between segment ${prev.index} and ${curr.index} (${gap.toFixed(6)}s)`);
      } else if (gap < -tolerance) {
        errors.push(`Overlap detected between segment ${prev.index} and ${curr.index}`);
      }

      if (curr.index !== prev.index + 1) {
        errors.push(`Segment index jumps from ${prev.index} to ${curr.index}`);
      }
    }

    return {
      isValid: errors.length === 0,
      errors,
    };
  }
}

export const planSegments = SegmentPlanner.plan.bind(SegmentPlanner);
