import { z } from 'zod';

// 해상도 스키마
export const ResolutionSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
});
export type Resolution = z.infer<typeof ResolutionSchema>;

// 비트레이트 출처 (stream → tags.BPS → format → 기본값 순으로 탐색)
export const BitRateSourceSchema = z.enum(['stream', 'tags', 'format', 'default']);
export type BitRateSource = z.infer<typeof BitRateSourceSchema>;

// 프로브된 원본 비디오 메타데이터
export const VideoMetadataSchema = z.object({
  frameRate: z.number().positive(),
  bitRate: z.number().int().positive(), // bits/sec
  resolution: ResolutionSchema,
  durationSeconds: z.number().positive(),
  bitRateSource: BitRateSourceSchema,
});
export type VideoMetadata = Readonly<z.infer<typeof VideoMetadataSchema>>;
