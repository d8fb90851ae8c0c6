import type { EncoderPlan, RateControl, SegmentRange } from '@vsplit/types';
//------------------------------------------------------------------------------//

/**
 * 세그먼트 하나의 인코딩 작업
 */
export interface EncodeJob {
  sourcePath: string;
  range: SegmentRange;
  plan: EncoderPlan;
  outputPath: string;
}

/**
 * EncoderPlan → FFmpeg 인자 변환기
 *
 * 문자열/플래그 포맷팅은 모두 여기서만 합니다.
 * 결정 로직(EncoderParameterSelector)은 프로세스 없이 테스트할 수 있어야 합니다.
 */
export class EncoderArgs {
  static build(job: EncodeJob): string[] {
    const { sourcePath, range, plan, outputPath } = job;
    const args: string[] = [];

    // 1. 전역 플래그
    args.push(...this.getGlobalArgs());

    // 2. 입력 전 -ss (키프레임 기준 빠른 seek, 경계는 근사값)
    if (range.startSeconds > 0) {
      args.push('-ss', formatSeconds(range.startSeconds));
    }

    // 3. 입력 파일과 길이
    args.push('-i', this.normalizePath(sourcePath));
    args.push('-t', formatSeconds(range.durationSeconds));

    // 4. 스트림 매핑 (오디오는 있으면 모두)
    args.push('-map', '0:v:0', '-map', '0:a?');

    // 5. 비디오
    args.push('-c:v', plan.codec);
    if (plan.targetFrameRate !== undefined) {
      args.push('-r', String(plan.targetFrameRate));
    }
    args.push(...this.buildRateControlArgs(plan.rateControl));

    // 6. 오디오 스트림 복사
    args.push(...this.buildAudioArgs(plan));

    // 7. 타임스탬프 정규화
    args.push('-avoid_negative_ts', 'make_non_negative');

    // 8. 출력 파일
    args.push(this.normalizePath(outputPath));

    return args;
  }

  static buildRateControlArgs(rateControl: RateControl): string[] {
    if (rateControl.mode === 'CBR') {
      const bitRate = String(rateControl.bitRate);
      const x264Params = [
        `nal-hrd=${rateControl.nalHrd}`,
        `force-cfr=${rateControl.forceConstantFrameRate ? 1 : 0}`,
        `bitrate=${Math.floor(rateControl.bitRate / 1000)}`,
      ].join(':');

      return [
        '-b:v',
        bitRate,
        '-maxrate',
        String(rateControl.maxRate),
        '-minrate',
        String(rateControl.minRate),
        '-bufsize',
        String(rateControl.bufferSize),
        '-x264-params',
        x264Params,
        '-preset',
        rateControl.preset,
      ];
    }

    const args = ['-b:v', String(rateControl.averageBitRate)];
    if (rateControl.bufferSize !== null) {
      args.push('-bufsize', String(rateControl.bufferSize));
    }
    if (rateControl.preset !== null) {
      args.push('-preset', rateControl.preset);
    }
    return args;
  }

  static buildAudioArgs(plan: EncoderPlan): string[] {
    return ['-c:a', plan.audio];
  }

  static getGlobalArgs(): string[] {
    return ['-y', '-nostats', '-hide_banner', '-loglevel', 'error'];
  }

  /**
   * 로그용 인코더 설명
   */
  static describe(plan: EncoderPlan): string {
    const kind = plan.useHardware ? 'Hardware accelerated' : 'Software';
    return `${plan.codec} (${kind}, ${plan.rateControl.mode})`;
  }

  /**
   * Windows 경로를 FFmpeg가 이해할 수 있는 형식으로 정규화
   */
  private static normalizePath(filePath: string): string {
    return filePath.replace(/\\/g, '/');
  }
}

function formatSeconds(seconds: number): string {
  return seconds.toFixed(3);
}
