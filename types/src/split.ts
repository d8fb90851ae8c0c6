import { z } from 'zod';
import { VideoMetadataSchema } from './media.js';

// 분할 의도: 세그먼트 개수 또는 세그먼트 길이 중 하나
export const SplitIntentSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('count'),
    segments: z.number(),
  }),
  z.object({
    kind: z.literal('duration'),
    seconds: z.number(),
  }),
]);
export type SplitIntent = z.infer<typeof SplitIntentSchema>;

// 비트레이트 제어 모드
export const RateControlModeSchema = z.enum(['CBR', 'VBR']);
export type RateControlMode = z.infer<typeof RateControlModeSchema>;

// 세그먼트 시간 범위 (index는 1부터 시작)
export const SegmentRangeSchema = z.object({
  index: z.number().int().positive(),
  startSeconds: z.number().min(0),
  durationSeconds: z.number().min(0),
});
export type SegmentRange = Readonly<z.infer<typeof SegmentRangeSchema>>;

// 사용하는 비디오 코덱
export const VideoCodecSchema = z.enum(['libx264', 'h264_videotoolbox']);
export type VideoCodec = z.infer<typeof VideoCodecSchema>;

// 모드별 비트레이트 제어 파라미터
export const CbrRateControlSchema = z.object({
  mode: z.literal('CBR'),
  bitRate: z.number().int().positive(),
  maxRate: z.number().int().positive(),
  minRate: z.number().int().positive(),
  bufferSize: z.number().int().positive(),
  preset: z.literal('veryslow'),
  nalHrd: z.literal('cbr'),
  forceConstantFrameRate: z.literal(true),
});
export type CbrRateControl = z.infer<typeof CbrRateControlSchema>;

export const VbrRateControlSchema = z.object({
  mode: z.literal('VBR'),
  averageBitRate: z.number().int().positive(),
  bufferSize: z.number().int().positive().nullable(),
  preset: z.string().nullable(),
});
export type VbrRateControl = z.infer<typeof VbrRateControlSchema>;

export const RateControlSchema = z.discriminatedUnion('mode', [CbrRateControlSchema, VbrRateControlSchema]);
export type RateControl = z.infer<typeof RateControlSchema>;

// 실행 전체에서 공유하는 인코더 설정 (세그먼트마다 달라지는 것은 시간 범위뿐)
export const EncoderPlanSchema = z.object({
  codec: VideoCodecSchema,
  useHardware: z.boolean(),
  rateControl: RateControlSchema,
  targetFrameRate: z.number().positive().optional(), // 없으면 원본 프레임레이트 유지
  audio: z.literal('copy'),
});
export type EncoderPlan = Readonly<z.infer<typeof EncoderPlanSchema>>;

// 출력 검증 결과
export const VerificationResultSchema = z.object({
  samplePath: z.string(),
  sampledFrameRate: z.number(),
  sampledBitRate: z.number().int(),
  expectedFrameRate: z.number(),
  expectedBitRate: z.number().int(),
  matchesTarget: z.object({
    frameRate: z.boolean(),
    bitRate: z.boolean(),
  }),
});
export type VerificationResult = z.infer<typeof VerificationResultSchema>;

// 목표와 다른 검증 결과 (에러가 아닌 경고)
export const VerificationMismatchSchema = z.object({
  kind: z.literal('VerificationMismatch'),
  field: z.enum(['frameRate', 'bitRate']),
  expected: z.number(),
  actual: z.number(),
  message: z.string(),
});
export type VerificationMismatch = z.infer<typeof VerificationMismatchSchema>;

export const VerificationOutcomeSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('verified'), result: VerificationResultSchema }),
  z.object({ status: z.literal('unverifiable'), reason: z.string() }),
]);
export type VerificationOutcome = z.infer<typeof VerificationOutcomeSchema>;

// 실행 컨텍스트 (모든 입력이 확정된 후 한 번 생성, 이후 불변)
export const RunContextSchema = z.object({
  sourcePath: z.string().min(1),
  outputDir: z.string().min(1),
  metadata: VideoMetadataSchema,
  intent: SplitIntentSchema,
  mode: RateControlModeSchema,
  targetFrameRate: z.number().positive().optional(),
  hardwareAvailable: z.boolean(),
});
export type RunContext = Readonly<z.infer<typeof RunContextSchema>>;

// 작업 요약
export interface JobSummary {
  context: RunContext;
  plan: EncoderPlan;
  ranges: readonly SegmentRange[];
  outputs: readonly string[];
  verification: VerificationOutcome;
  warnings: readonly VerificationMismatch[];
}
