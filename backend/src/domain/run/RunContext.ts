import path from 'path';
import { RunContextSchema, type RateControlMode, type RunContext, type SplitIntent, type VideoMetadata } from '@vsplit/types';
import { InvalidIntentError } from '../errors.js';

export interface RunContextInput {
  sourcePath: string;
  outputDir?: string;
  metadata: VideoMetadata;
  intent: SplitIntent;
  mode: RateControlMode;
  targetFrameRate?: number;
  hardwareAvailable: boolean;
}

/**
 * 실행 컨텍스트 생성
 *
 * 모든 입력(프로브 결과, 분할 의도, 모드, 하드웨어 여부)이 확정된 뒤 한 번만 만들고,
 * 이후 각 컴포넌트는 읽기만 합니다.
 */
export function createRunContext(input: RunContextInput): RunContext {
  const parsed = RunContextSchema.safeParse({
    sourcePath: input.sourcePath,
    outputDir: input.outputDir ?? defaultOutputDir(input.sourcePath),
    metadata: input.metadata,
    intent: input.intent,
    mode: input.mode,
    ...(input.targetFrameRate === undefined ? {} : { targetFrameRate: input.targetFrameRate }),
    hardwareAvailable: input.hardwareAvailable,
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.map(String).join('.')}: ` : '';
    throw new InvalidIntentError(`Invalid run context: ${where}${issue?.message ?? 'invalid input'}`, {
      issues: parsed.error.issues.map(i => ({ path: i.path.map(String).join('.'), message: i.message })),
    });
  }

  const context = parsed.data;

  // parse 결과는 새 객체이므로 안쪽부터 고정
  Object.freeze(context.metadata.resolution);
  Object.freeze(context.metadata);
  Object.freeze(context.intent);
  return Object.freeze(context);
}

/**
 * 기본 출력 디렉터리: <원본 디렉터리>/<파일명>_parts
 */
export function defaultOutputDir(sourcePath: string): string {
  const parsed = path.parse(path.resolve(sourcePath));
  return path.join(parsed.dir, `${parsed.name}_parts`);
}

/**
 * 세그먼트 출력 파일 경로: <outputDir>/<파일명>_part<NNN><확장자>
 */
export function segmentOutputPath(sourcePath: string, outputDir: string, index: number): string {
  const parsed = path.parse(sourcePath);
  const ext = parsed.ext || '.mp4';
  return path.join(outputDir, `${parsed.name}_part${index.toString().padStart(3, '0')}${ext}`);
}
