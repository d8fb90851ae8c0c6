import dotenv from 'dotenv';
import { z } from 'zod';
import ms from 'ms';
import path from 'path';
import { LogLevelSchema } from '@vsplit/types';
import { backendRoot, projectRoot } from '../utils/dir.js';
//------------------------------------------------------------------------------//
dotenv.config({ path: path.resolve(backendRoot, '.env'), quiet: true });
dotenv.config({ path: path.resolve(projectRoot, '.env'), quiet: true });

// ms 라이브러리 형식의 시간 문자열을 밀리초로 변환하는 Zod 스키마 ('0'은 비활성)
const msStringSchema = z
  .string()
  .refine(
    val => {
      try {
        const result = ms(val as ms.StringValue);
        return typeof result === 'number' && !isNaN(result) && result >= 0;
      } catch {
        return false;
      }
    },
    { message: 'Invalid time format (e.g., "30s", "10m", "2h", "0")' }
  )
  .transform(val => ms(val as ms.StringValue));

// 환경 변수 Zod 스키마
const envSchema = z.object({
  NODE_ENV: z.enum(['production', 'development', 'test']).default('development'),
  LOG_LEVEL: z
    .string()
    .default('INFO')
    .transform(v => v.trim().toUpperCase())
    .pipe(LogLevelSchema),
  // 인코더 선택: Auto | VideoToolbox | CPU (대소문자 무시)
  VSPLIT_ENCODER: z
    .string()
    .default('Auto')
    .transform(v => {
      const norm = v.trim().toLowerCase();
      if (norm === 'videotoolbox') {
        return 'videotoolbox' as const;
      }
      if (norm === 'cpu') {
        return 'cpu' as const;
      }
      // 알 수 없는 값은 Auto로 강제
      return 'auto' as const;
    }),
  // 세그먼트 하나의 인코딩 제한 시간 ('0'이면 무제한)
  VSPLIT_ENCODE_TIMEOUT: msStringSchema.default(0),
  VSPLIT_PROBE_TIMEOUT: msStringSchema.default(30_000),
});

export type Environment = z.infer<typeof envSchema>;
export type EncoderPreference = Environment['VSPLIT_ENCODER'];

/**
 * 환경 변수 파싱 및 검증
 */
export function parseEnv(raw: Record<string, string | undefined>): Environment {
  return envSchema.parse(raw);
}

// 출력
export const env = parseEnv(process.env);

// 유틸리티 함수
export const isProduction = env.NODE_ENV === 'production';
export const isDevelopment = env.NODE_ENV === 'development';
export const isTest = env.NODE_ENV === 'test';
